// Generation models - request, response and outcome shapes for the text service
import { z } from 'zod';
import type { IPresentation } from './Presentation';

export const TEXT_SERVICE_PROTOCOL_VERSION = 'v1.2';

/**
 * Mapping family a variant belongs to.
 * hero: element-based generation, content: block-based generation
 */
export type MappingKind = 'hero' | 'content';

export interface IHeroPayload {
  slide_number: number;
  slide_type: string;
  variant_id: string;
  narrative: string;
  topics: string[];
  context: {
    theme: string;
    audience: string;
    presentation_title: string;
    footer_text: string;
  };
}

export interface IContentPayload {
  variant_id: string;
  slide_spec: {
    slide_title: string;
    slide_subtitle?: string;
    slide_purpose: string;
    key_message: string;
    target_points: string[];
    tone: string;
    audience: string;
    layout_id: string;
  };
  presentation_spec: {
    presentation_title: string;
    footer_text: string;
    prior_slides_summary?: string;
  };
  enable_parallel: boolean;
  validate_character_counts: boolean;
}

interface IGenerationRequestBase {
  readonly slideId: string;
  readonly slideNumber: number;
  readonly classification: string;
  readonly variantId: string;
}

export type GenerationRequest =
  | (IGenerationRequestBase & { readonly mapping: 'hero'; readonly payload: Readonly<IHeroPayload> })
  | (IGenerationRequestBase & { readonly mapping: 'content'; readonly payload: Readonly<IContentPayload> });

export type RoutingStrategy = 'hero_title' | 'hero_section' | 'hero_closing' | 'content_generate';

export interface IRoutedRequest {
  readonly request: GenerationRequest;
  readonly endpoint: string;
  readonly strategy: RoutingStrategy;
  readonly protocolVersion: typeof TEXT_SERVICE_PROTOCOL_VERSION;
}

export const GenerationResponseSchema = z.object({
  content: z.string(),
  title: z.string().nullish(),
  subtitle: z.string().nullish(),
  metadata: z.record(z.unknown()).default({}),
});

export type IGenerationResponse = z.infer<typeof GenerationResponseSchema>;

export type FailureReason =
  | 'missing_required_field'
  | 'transform_failed'
  | 'service_unavailable'
  | 'service_error'
  | 'content_too_long'
  | 'invalid_response'
  | 'timeout';

export interface ISlideFailure {
  reason: FailureReason;
  message: string;
}

interface IGenerationResultBase {
  slideId: string;
  slideNumber: number;
  endpoint?: string;
}

export type GenerationResult =
  | (IGenerationResultBase & {
      success: true;
      generatedTitle?: string;
      generatedSubtitle?: string;
      generatedContent: string;
      metadata: Record<string, unknown>;
    })
  | (IGenerationResultBase & { success: false; failure: ISlideFailure });

export type ContentGeneratedPolicy = 'any' | 'all';

export type StageStatus = 'succeeded' | 'partial' | 'failed';

export interface IFailedSlide extends ISlideFailure {
  slideId: string;
  slideNumber: number;
}

export interface IStageResult {
  readonly status: StageStatus;
  readonly totalSlides: number;
  readonly successfulCount: number;
  readonly failedCount: number;
  readonly contentGenerated: boolean;
  readonly failedSlides: readonly IFailedSlide[];
  readonly results: readonly GenerationResult[];
  readonly presentation: IPresentation;
}
