// Presentation model for the content generation stage
// Strawman documents arrive from the upstream pipeline as JSON and are checked here
import { z } from 'zod';

/**
 * Hero classifications render on the full-bleed hero layout and are generated
 * element by element (title, subtitle, background copy)
 */
export const HERO_CLASSIFICATIONS = ['title_slide', 'section_divider', 'closing_slide'] as const;

/**
 * Content classifications render on the block layout and are generated block by block
 */
export const CONTENT_CLASSIFICATIONS = [
  'bilateral_comparison',
  'sequential_3col',
  'impact_quote',
  'metrics_grid',
  'matrix_2x2',
  'grid_3x3',
  'asymmetric_8_4',
  'hybrid_1_2x2',
  'single_column',
  'styled_table',
] as const;

export const SLIDE_CLASSIFICATIONS = [...HERO_CLASSIFICATIONS, ...CONTENT_CLASSIFICATIONS] as const;

export type HeroClassification = (typeof HERO_CLASSIFICATIONS)[number];
export type SlideClassification = (typeof SLIDE_CLASSIFICATIONS)[number];

// Character ceilings shared by the transformer and the response checks
export const FOOTER_TEXT_MAX_LENGTH = 20;
export const GENERATED_TITLE_MAX_LENGTH = 50;
export const GENERATED_SUBTITLE_MAX_LENGTH = 90;

// Ceilings count characters, so an emoji is one character rather than two UTF-16 units
export const countCharacters = (text: string): number => [...text].length;

export const truncateCharacters = (text: string, maxLength: number): string => {
  return [...text].slice(0, maxLength).join('');
};

export const isSlideClassification = (value: string): value is SlideClassification => {
  return (SLIDE_CLASSIFICATIONS as readonly string[]).includes(value);
};

export const isHeroClassification = (value: string): value is HeroClassification => {
  return (HERO_CLASSIFICATIONS as readonly string[]).includes(value);
};

export const ContentGuidanceSchema = z
  .object({
    contentType: z.string().optional(),
    visualComplexity: z.string().optional(),
    contentDensity: z.string().optional(),
    toneIndicator: z.string().optional(),
    dataType: z.string().nullish(),
    emphasisHierarchy: z.array(z.string()).optional(),
    relationshipToPrevious: z.string().nullish(),
    generationInstructions: z.string().optional(),
    patternRationale: z.string().optional(),
  })
  .passthrough();

export type IContentGuidance = z.infer<typeof ContentGuidanceSchema>;

/**
 * Slide as handed over by the strawman stages.
 * Generation fields stay optional here: whether a slide is eligible is decided
 * per slide by the validator, not at the document boundary.
 */
export const SlideSchema = z.object({
  slideId: z.string().min(1),
  slideNumber: z.number().int().positive(),
  title: z.string().default(''),
  narrative: z.string().default(''),
  keyPoints: z.array(z.string()).default([]),
  classification: z.string().nullish(),
  variantId: z.string().nullish(),
  layoutId: z.string().nullish(),
  contentGuidance: ContentGuidanceSchema.nullish(),
  speakerNotes: z.string().nullish(),
  generatedTitle: z.string().nullish(),
  generatedSubtitle: z.string().nullish(),
  generatedContent: z.string().nullish(),
  hasTextFailure: z.boolean().optional(),
});

export type ISlide = z.infer<typeof SlideSchema>;

/**
 * What the stage needs before it can process anything: presentation metadata and
 * a non-empty list of identifiable slides. The rest of each slide is read per slide.
 */
export const SlideEnvelopeSchema = z.object({ slideId: z.string().min(1) }).passthrough();

export type IStrawmanSlide = z.infer<typeof SlideEnvelopeSchema>;

export const StrawmanSchema = z.object({
  mainTitle: z.string().trim().min(1, 'mainTitle is required'),
  footerText: z.string().nullish(),
  overallTheme: z.string().optional(),
  targetAudience: z.string().optional(),
  designSuggestions: z.string().optional(),
  presentationDuration: z.number().positive().optional(),
  slides: z.array(SlideEnvelopeSchema).min(1, 'presentation must contain at least one slide'),
});

export type IStrawman = z.infer<typeof StrawmanSchema>;

export const PresentationSchema = StrawmanSchema.extend({
  slides: z.array(SlideSchema).min(1, 'presentation must contain at least one slide'),
});

export type IPresentation = z.infer<typeof PresentationSchema>;

/**
 * Presentation-level metadata every generation request carries
 */
export interface IPresentationContext {
  mainTitle: string;
  footerText: string;
  theme: string;
  audience: string;
  priorSlidesSummary?: string;
}
