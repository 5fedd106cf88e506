// Request Transformer - converts a validated slide into the text service request shape
// The variant catalog decides which mapping applies; each mapping is a pure function
import {
  ISlide,
  IPresentation,
  IPresentationContext,
  GenerationRequest,
  MappingKind,
  FOOTER_TEXT_MAX_LENGTH,
  truncateCharacters,
} from '../models';
import { TransformError } from '../utils/errors';
import { deepFreeze } from '../utils/deepFreeze';
import { VariantCatalog, getDefaultVariantCatalog } from './variantCatalog';

const PRIOR_SLIDES_IN_SUMMARY = 3;

interface IRequestBase {
  slideId: string;
  slideNumber: number;
  classification: string;
  variantId: string;
}

type SlideMapping = (slide: ISlide, base: IRequestBase, context: IPresentationContext) => GenerationRequest;

/**
 * Footer text is capped at 20 characters; the presentation title stands in when
 * upstream left the footer empty
 */
export const normalizeFooterText = (footerText: string | null | undefined, mainTitle: string): string => {
  const source = footerText && footerText.trim() !== '' ? footerText.trim() : mainTitle.trim();
  return truncateCharacters(source, FOOTER_TEXT_MAX_LENGTH).trimEnd();
};

export const buildPresentationContext = (presentation: IPresentation): IPresentationContext => ({
  mainTitle: presentation.mainTitle,
  footerText: normalizeFooterText(presentation.footerText, presentation.mainTitle),
  theme: presentation.overallTheme || 'professional',
  audience: presentation.targetAudience || 'general audience',
});

/**
 * Titles of the slides right before `currentIndex`, one bullet per line.
 * Gives content slides narrative continuity with what came before.
 */
export const buildPriorSlidesSummary = (slides: ISlide[], currentIndex: number): string | undefined => {
  const prior = slides.slice(Math.max(0, currentIndex - PRIOR_SLIDES_IN_SUMMARY), currentIndex);
  if (prior.length === 0) return undefined;

  return prior.map((slide) => `- ${slide.generatedTitle || slide.title}`).join('\n');
};

// Hero slides: element-based generation (title, subtitle, background copy)
const heroMapping: SlideMapping = (slide, base, context) => ({
  ...base,
  mapping: 'hero',
  payload: {
    slide_number: base.slideNumber,
    slide_type: base.classification,
    variant_id: base.variantId,
    narrative: slide.narrative || slide.title,
    topics: [...slide.keyPoints],
    context: {
      theme: context.theme,
      audience: context.audience,
      presentation_title: context.mainTitle,
      footer_text: context.footerText,
    },
  },
});

// Content slides: block-based generation against the variant's template
const contentMapping: SlideMapping = (slide, base, context) => {
  const guidance = slide.contentGuidance ?? {};

  return {
    ...base,
    mapping: 'content',
    payload: {
      variant_id: base.variantId,
      slide_spec: {
        slide_title: slide.generatedTitle || slide.title,
        ...(slide.generatedSubtitle ? { slide_subtitle: slide.generatedSubtitle } : {}),
        slide_purpose: guidance.generationInstructions || guidance.patternRationale || slide.narrative,
        key_message: slide.narrative,
        target_points: [...slide.keyPoints],
        tone: guidance.toneIndicator || 'professional',
        audience: context.audience,
        layout_id: slide.layoutId ?? '',
      },
      presentation_spec: {
        presentation_title: context.mainTitle,
        footer_text: context.footerText,
        ...(context.priorSlidesSummary ? { prior_slides_summary: context.priorSlidesSummary } : {}),
      },
      enable_parallel: true,
      validate_character_counts: true,
    },
  };
};

const MAPPINGS: Record<MappingKind, SlideMapping> = {
  hero: heroMapping,
  content: contentMapping,
};

/**
 * Build the immutable generation request for one slide.
 * Throws TransformError when the (classification, variant) pair has no mapping.
 */
export const transformSlide = (
  slide: ISlide,
  context: IPresentationContext,
  catalog: VariantCatalog = getDefaultVariantCatalog()
): GenerationRequest => {
  const classification = slide.classification ?? '';
  const variantId = slide.variantId ?? '';

  const mapping = catalog.resolveMapping(classification, variantId);
  if (!mapping) {
    const reason = catalog.get(variantId)
      ? `variant '${variantId}' is not registered for classification '${classification}'`
      : `no mapping for variant '${variantId}'`;
    throw new TransformError(`Cannot transform slide ${slide.slideId}: ${reason}`, variantId);
  }

  const base: IRequestBase = {
    slideId: slide.slideId,
    slideNumber: slide.slideNumber,
    classification,
    variantId,
  };

  return deepFreeze(MAPPINGS[mapping](slide, base, context));
};
