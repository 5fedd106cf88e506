// Shared test data for the content generation stage tests
import type { IGenerationResponse, IPresentation, IRoutedRequest, ISlide } from '../../models';
import type { IGenerationClient } from '../textServiceClient';

export const makeSlide = (overrides: Partial<ISlide> = {}): ISlide => ({
  slideId: 'slide_001',
  slideNumber: 1,
  title: 'Operating Priorities',
  narrative: 'Four areas decide next quarter',
  keyPoints: ['Throughput', 'Quality', 'Cost', 'Staffing'],
  classification: 'matrix_2x2',
  variantId: 'matrix_2x2',
  layoutId: 'L25',
  contentGuidance: {
    contentType: 'framework',
    toneIndicator: 'analytical',
    generationInstructions: 'One measurable goal per quadrant',
  },
  ...overrides,
});

/**
 * The three-slide deck used across stage tests:
 * hero title, 2x2 matrix content, hero closing
 */
export const makeThreeSlidePresentation = (): IPresentation => ({
  mainTitle: 'Quarterly Operations Review',
  footerText: 'Ops Review Q3',
  overallTheme: 'professional',
  targetAudience: 'Leadership team',
  slides: [
    makeSlide({
      slideId: 'slide_001',
      slideNumber: 1,
      title: 'Opening',
      narrative: 'Where operations stand',
      keyPoints: ['Results', 'Risks'],
      classification: 'title_slide',
      variantId: 'hero_opening_centered',
      layoutId: 'L29',
    }),
    makeSlide({ slideId: 'slide_002', slideNumber: 2 }),
    makeSlide({
      slideId: 'slide_003',
      slideNumber: 3,
      title: 'Thank You',
      narrative: 'Questions and next steps',
      keyPoints: ['Owners', 'Dates'],
      classification: 'closing_slide',
      variantId: 'hero_closing_final',
      layoutId: 'L29',
    }),
  ],
});

type Responder = (routed: IRoutedRequest, signal?: AbortSignal) => Promise<IGenerationResponse>;

/**
 * Generation client stub: answers through `responder`, records every call
 */
export class StubGenerationClient implements IGenerationClient {
  readonly calls: IRoutedRequest[] = [];

  constructor(private readonly responder: Responder = async (routed) => defaultResponse(routed)) {}

  generate(routed: IRoutedRequest, signal?: AbortSignal): Promise<IGenerationResponse> {
    this.calls.push(routed);
    return this.responder(routed, signal);
  }
}

export const defaultResponse = (routed: IRoutedRequest): IGenerationResponse => ({
  content: `<div class="slide">${routed.request.slideId}</div>`,
  title: `Title ${routed.request.slideNumber}`,
  subtitle: `Subtitle ${routed.request.slideNumber}`,
  metadata: { variant_id: routed.request.variantId },
});
