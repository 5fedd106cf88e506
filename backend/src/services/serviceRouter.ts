// Service Router - picks the text service endpoint for each generation request
// Hero slides go to the dedicated hero endpoints, everything else to the unified generate endpoint
import {
  GenerationRequest,
  HeroClassification,
  IRoutedRequest,
  RoutingStrategy,
  TEXT_SERVICE_PROTOCOL_VERSION,
  isHeroClassification,
} from '../models';

interface IRoute {
  endpoint: string;
  strategy: RoutingStrategy;
}

const HERO_ROUTES: Record<HeroClassification, IRoute> = {
  title_slide: { endpoint: `/${TEXT_SERVICE_PROTOCOL_VERSION}/hero/title`, strategy: 'hero_title' },
  section_divider: { endpoint: `/${TEXT_SERVICE_PROTOCOL_VERSION}/hero/section`, strategy: 'hero_section' },
  closing_slide: { endpoint: `/${TEXT_SERVICE_PROTOCOL_VERSION}/hero/closing`, strategy: 'hero_closing' },
};

/**
 * Content slides and unknown classifications both land here, so a slide the
 * router does not recognise still gets a generation attempt
 */
export const DEFAULT_ROUTE: IRoute = {
  endpoint: `/${TEXT_SERVICE_PROTOCOL_VERSION}/generate`,
  strategy: 'content_generate',
};

/**
 * Attach the target endpoint to a request. Deterministic and side-effect free:
 * the same (classification, variant) always yields the same route.
 */
export const routeRequest = (request: GenerationRequest, classification: string): IRoutedRequest => {
  // A hero endpoint only understands the element-based payload
  const route =
    isHeroClassification(classification) && request.mapping === 'hero'
      ? HERO_ROUTES[classification]
      : DEFAULT_ROUTE;

  const routed: IRoutedRequest = {
    request,
    endpoint: route.endpoint,
    strategy: route.strategy,
    protocolVersion: TEXT_SERVICE_PROTOCOL_VERSION,
  };
  return Object.freeze(routed);
};
