// Slide Validator - checks a slide carries every field the generation protocol needs
// Pure check: no logging, no mutation
import {
  ISlide,
  IContentGuidance,
  IStrawmanSlide,
  isSlideClassification,
  SlideSchema,
  SLIDE_CLASSIFICATIONS,
} from '../models';

export type RequiredSlideField = 'classification' | 'variantId' | 'layoutId' | 'contentGuidance';

export type ValidationOutcome =
  | { valid: true }
  | { valid: false; field: RequiredSlideField; problem: 'missing' | 'unknown'; message: string }
  | { valid: false; field: string; problem: 'invalid'; message: string };

/**
 * A slide field whose value has the wrong shape, e.g. `keyPoints: null`
 */
export interface ISlideFieldIssue {
  field: string;
  path: string;
  message: string;
}

export interface IReadSlide {
  slide: ISlide;
  fieldIssues: ISlideFieldIssue[];
}

/**
 * Read one strawman slide into its typed form.
 *
 * Fields with the wrong shape are left out of the slide and reported as issues,
 * so the slide fails on its own instead of failing the whole strawman.
 * A slide without a usable slideNumber takes its position in the deck.
 */
export const readSlide = (raw: IStrawmanSlide, position: number): IReadSlide => {
  const parsed = SlideSchema.safeParse(raw);
  if (parsed.success) {
    return { slide: parsed.data, fieldIssues: [] };
  }

  const fieldIssues = parsed.error.issues.map(
    (issue): ISlideFieldIssue => ({
      field: String(issue.path[0] ?? 'slide'),
      path: issue.path.join('.') || 'slide',
      message: issue.message,
    })
  );
  const invalidFields = new Set(fieldIssues.map((issue) => issue.field));
  const usable = Object.fromEntries(Object.entries(raw).filter(([key]) => !invalidFields.has(key)));

  return {
    slide: SlideSchema.parse({
      ...usable,
      ...(invalidFields.has('slideNumber') ? { slideNumber: position + 1 } : {}),
    }),
    fieldIssues,
  };
};

const isBlank = (value: string | null | undefined): boolean => {
  return value === null || value === undefined || value.trim() === '';
};

/**
 * Guidance counts as present when at least one hint carries a value
 */
export const hasContentGuidance = (guidance: IContentGuidance | null | undefined): boolean => {
  if (!guidance) return false;

  return Object.values(guidance).some((value) => {
    if (typeof value === 'string') return value.trim() !== '';
    if (Array.isArray(value)) return value.length > 0;
    return value !== null && value !== undefined;
  });
};

const missing = (slide: ISlide, field: RequiredSlideField): ValidationOutcome => ({
  valid: false,
  field,
  problem: 'missing',
  message: `Slide ${slide.slideId} is missing ${field}`,
});

/**
 * Validate a slide before generation.
 * Fields that failed to read come first; the required fields are then checked in
 * a fixed order and the first failing field is reported.
 * Generated title/subtitle ceilings are checked after generation, not here.
 */
export const validateSlide = (slide: ISlide, fieldIssues: readonly ISlideFieldIssue[] = []): ValidationOutcome => {
  const [firstIssue] = fieldIssues;
  if (firstIssue) {
    return {
      valid: false,
      field: firstIssue.field,
      problem: 'invalid',
      message: `Slide ${slide.slideId} has invalid ${firstIssue.path}: ${firstIssue.message}`,
    };
  }

  const classification = slide.classification;
  if (!classification || isBlank(classification)) {
    return missing(slide, 'classification');
  }
  if (!isSlideClassification(classification)) {
    return {
      valid: false,
      field: 'classification',
      problem: 'unknown',
      message: `Slide ${slide.slideId} has unknown classification '${classification}' (expected one of ${SLIDE_CLASSIFICATIONS.join(', ')})`,
    };
  }

  if (isBlank(slide.variantId)) return missing(slide, 'variantId');
  if (isBlank(slide.layoutId)) return missing(slide, 'layoutId');
  if (!hasContentGuidance(slide.contentGuidance)) return missing(slide, 'contentGuidance');

  return { valid: true };
};
