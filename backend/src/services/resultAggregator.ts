// Result Aggregator - folds per-slide outcomes into one stage report
import type {
  ContentGeneratedPolicy,
  GenerationResult,
  IFailedSlide,
  IPresentation,
  ISlide,
  IStageResult,
  StageStatus,
} from '../models';
import { deepFreeze } from '../utils/deepFreeze';

const isContentGenerated = (successful: number, total: number, policy: ContentGeneratedPolicy): boolean => {
  if (policy === 'all') return total > 0 && successful === total;
  return successful > 0;
};

const stageStatus = (successful: number, failed: number): StageStatus => {
  if (failed === 0) return 'succeeded';
  if (successful === 0) return 'failed';
  return 'partial';
};

const enrichSlide = (slide: ISlide, result: GenerationResult): ISlide => {
  if (!result.success) {
    // Failed slides keep whatever content they arrived with
    return { ...slide, hasTextFailure: true };
  }

  return {
    ...slide,
    generatedTitle: result.generatedTitle ?? slide.generatedTitle,
    generatedSubtitle: result.generatedSubtitle ?? slide.generatedSubtitle,
    generatedContent: result.generatedContent,
    hasTextFailure: false,
  };
};

/**
 * Build the stage result from one outcome per slide, given in slide order.
 * The caller's presentation is not modified; the enriched copy is returned
 * inside the result. The whole result is deeply frozen and shares no objects
 * with the arguments.
 */
export const aggregateResults = (
  presentation: IPresentation,
  results: GenerationResult[],
  policy: ContentGeneratedPolicy = 'any'
): IStageResult => {
  if (results.length !== presentation.slides.length) {
    throw new Error(
      `Expected ${presentation.slides.length} slide outcomes, got ${results.length}`
    );
  }

  const slides = presentation.slides.map((slide, index) => {
    const result = results[index];
    if (result.slideId !== slide.slideId) {
      throw new Error(`Outcome for ${result.slideId} does not match slide ${slide.slideId} at position ${index + 1}`);
    }
    return enrichSlide(slide, result);
  });

  const failedSlides: IFailedSlide[] = [];
  for (const result of results) {
    if (!result.success) {
      failedSlides.push({
        slideId: result.slideId,
        slideNumber: result.slideNumber,
        reason: result.failure.reason,
        message: result.failure.message,
      });
    }
  }

  const totalSlides = results.length;
  const failedCount = failedSlides.length;
  const successfulCount = totalSlides - failedCount;

  const stageResult: IStageResult = {
    status: stageStatus(successfulCount, failedCount),
    totalSlides,
    successfulCount,
    failedCount,
    contentGenerated: isContentGenerated(successfulCount, totalSlides, policy),
    failedSlides,
    results: structuredClone(results),
    presentation: structuredClone({ ...presentation, slides }),
  };

  return deepFreeze(stageResult);
};
