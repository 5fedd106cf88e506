// Content Generation Stage - drives validate → transform → route → generate for every slide
// and hands the per-slide outcomes to the aggregator
//
// One bad slide never aborts the run: every failure is caught at the slide boundary.
// Only a malformed strawman (no metadata, no slides, slides without ids) fails the stage
// before it starts; a slide with badly shaped fields fails on its own.
import {
  ContentGeneratedPolicy,
  GENERATED_SUBTITLE_MAX_LENGTH,
  GENERATED_TITLE_MAX_LENGTH,
  GenerationResult,
  IGenerationResponse,
  IPresentation,
  IPresentationContext,
  IRoutedRequest,
  ISlide,
  IStageResult,
  IStrawman,
  StrawmanSchema,
  countCharacters,
} from '../models';
import {
  ContentTooLongError,
  InvalidResponseError,
  SlideValidationError,
  StageInputError,
  TimeoutError,
  TransformError,
  toSlideFailure,
} from '../utils/errors';
import { ISlideFieldIssue, readSlide, validateSlide } from './slideValidator';
import { buildPresentationContext, buildPriorSlidesSummary, transformSlide } from './requestTransformer';
import { routeRequest } from './serviceRouter';
import { IGenerationClient } from './textServiceClient';
import { aggregateResults } from './resultAggregator';
import { VariantCatalog, getDefaultVariantCatalog } from './variantCatalog';

export type SlideState =
  | 'pending'
  | 'validating'
  | 'transforming'
  | 'routing'
  | 'generating'
  | 'completed'
  | 'failed';

export interface IContentGenerationStageOptions {
  client: IGenerationClient;
  catalog?: VariantCatalog;
  /** Slides generated at the same time (1 = sequential) */
  concurrency?: number;
  /** Deadline for the whole run; unfinished slides are recorded as timeouts */
  stageDeadlineMs?: number;
  contentGeneratedPolicy?: ContentGeneratedPolicy;
  onSlideStateChange?: (slideId: string, state: SlideState) => void;
}

const DEFAULT_STAGE_DEADLINE_MS = 5 * 60 * 1000;

/**
 * Check the top-level strawman before any slide is touched
 */
export const parseStrawman = (input: unknown): IStrawman => {
  const parsed = StrawmanSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'presentation'}: ${issue.message}`);
    throw new StageInputError('Malformed strawman: content generation cannot start', issues);
  }

  const seen = new Set<string>();
  for (const slide of parsed.data.slides) {
    if (seen.has(slide.slideId)) {
      throw new StageInputError('Malformed strawman: duplicate slide ids', [`slides: duplicate slideId '${slide.slideId}'`]);
    }
    seen.add(slide.slideId);
  }

  return parsed.data;
};

/**
 * Generated content must be non-empty and within the layout's character ceilings.
 * Oversized fields fail the slide rather than being cut down.
 */
export const checkGeneratedContent = (response: IGenerationResponse) => {
  if (response.content.trim() === '') {
    throw new InvalidResponseError('Text service returned empty content');
  }

  const title = response.title ?? undefined;
  const subtitle = response.subtitle ?? undefined;
  const titleLength = title === undefined ? 0 : countCharacters(title);
  const subtitleLength = subtitle === undefined ? 0 : countCharacters(subtitle);

  if (titleLength > GENERATED_TITLE_MAX_LENGTH) {
    throw new ContentTooLongError('title', titleLength, GENERATED_TITLE_MAX_LENGTH);
  }
  if (subtitleLength > GENERATED_SUBTITLE_MAX_LENGTH) {
    throw new ContentTooLongError('subtitle', subtitleLength, GENERATED_SUBTITLE_MAX_LENGTH);
  }

  return { generatedTitle: title, generatedSubtitle: subtitle, generatedContent: response.content };
};

export class ContentGenerationStage {
  private readonly client: IGenerationClient;
  private readonly catalog: VariantCatalog;
  private readonly concurrency: number;
  private readonly stageDeadlineMs: number;
  private readonly contentGeneratedPolicy: ContentGeneratedPolicy;
  private readonly onSlideStateChange?: (slideId: string, state: SlideState) => void;

  constructor(options: IContentGenerationStageOptions) {
    this.client = options.client;
    this.catalog = options.catalog ?? getDefaultVariantCatalog();
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    this.stageDeadlineMs = options.stageDeadlineMs ?? DEFAULT_STAGE_DEADLINE_MS;
    this.contentGeneratedPolicy = options.contentGeneratedPolicy ?? 'any';
    this.onSlideStateChange = options.onSlideStateChange;
  }

  /**
   * Run the stage on a strawman.
   * Throws StageInputError for a malformed strawman; otherwise always resolves
   * with a StageResult, even when every slide failed or the deadline passed.
   */
  async run(input: unknown): Promise<IStageResult> {
    const strawman = parseStrawman(input);
    const readSlides = strawman.slides.map((raw, index) => readSlide(raw, index));
    const slides = readSlides.map((read) => read.slide);
    const presentation: IPresentation = { ...strawman, slides };
    const context = buildPresentationContext(presentation);
    const startedAt = Date.now();

    console.log(
      `🚀 Content generation running: ${slides.length} slides ` +
        `(concurrency ${this.concurrency}, deadline ${this.stageDeadlineMs}ms)`
    );

    for (const slide of slides) {
      this.setState(slide.slideId, 'pending');
    }

    const controller = new AbortController();
    const outcomes: Array<GenerationResult | undefined> = new Array(slides.length).fill(undefined);

    let deadlineTimer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'deadline'>((resolve) => {
      deadlineTimer = setTimeout(() => resolve('deadline'), this.stageDeadlineMs);
    });

    const work = this.runSlides(slides, controller.signal, async (slide, index) => {
      outcomes[index] = await this.processSlide(
        slide,
        index,
        slides,
        context,
        readSlides[index].fieldIssues,
        controller.signal
      );
    }).then(() => 'done' as const);

    const finishedBy = await Promise.race([work, deadline]);
    clearTimeout(deadlineTimer);

    // Snapshot before aborting so late completions cannot change the result
    const results = slides.map(
      (slide, index): GenerationResult =>
        outcomes[index] ?? {
          slideId: slide.slideId,
          slideNumber: slide.slideNumber,
          success: false,
          failure: { reason: 'timeout', message: `Stage deadline of ${this.stageDeadlineMs}ms exceeded` },
        }
    );

    if (finishedBy === 'deadline') {
      controller.abort();
      const unfinished = outcomes.filter((outcome) => outcome === undefined).length;
      console.warn(`⚠️  Stage deadline exceeded: ${unfinished} slide(s) abandoned`);
      for (let index = 0; index < slides.length; index++) {
        if (outcomes[index] === undefined) this.setState(slides[index].slideId, 'failed');
      }
    }

    const stageResult = aggregateResults(presentation, results, this.contentGeneratedPolicy);
    const seconds = ((Date.now() - startedAt) / 1000).toFixed(2);

    console.log(
      `✅ Content generation done: ${stageResult.successfulCount}/${stageResult.totalSlides} successful, ` +
        `${stageResult.failedCount} failed in ${seconds}s`
    );

    return stageResult;
  }

  /**
   * Bounded worker pool; stops handing out slides once the run is aborted
   */
  private async runSlides(
    slides: ISlide[],
    signal: AbortSignal,
    handler: (slide: ISlide, index: number) => Promise<void>
  ): Promise<void> {
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < slides.length && !signal.aborted) {
        const index = next;
        next += 1;
        await handler(slides[index], index);
      }
    };

    const workerCount = Math.min(this.concurrency, slides.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
  }

  private async processSlide(
    slide: ISlide,
    index: number,
    slides: ISlide[],
    context: IPresentationContext,
    fieldIssues: readonly ISlideFieldIssue[],
    signal: AbortSignal
  ): Promise<GenerationResult> {
    let routed: IRoutedRequest | undefined;

    try {
      this.setState(slide.slideId, 'validating');
      const validation = validateSlide(slide, fieldIssues);
      if (!validation.valid) {
        throw new SlideValidationError(validation.message, validation.field);
      }

      this.setState(slide.slideId, 'transforming');
      const request = transformSlide(
        slide,
        { ...context, priorSlidesSummary: buildPriorSlidesSummary(slides, index) },
        this.catalog
      );

      this.setState(slide.slideId, 'routing');
      routed = routeRequest(request, request.classification);

      this.setState(slide.slideId, 'generating');
      const response = await this.client.generate(routed, signal);
      if (signal.aborted) {
        throw new TimeoutError(`Slide ${slide.slideId} finished after the stage deadline`);
      }
      const generated = checkGeneratedContent(response);

      this.setState(slide.slideId, 'completed');
      console.log(`✅ Slide ${slide.slideNumber} generated via ${routed.endpoint}`);

      return {
        slideId: slide.slideId,
        slideNumber: slide.slideNumber,
        success: true,
        endpoint: routed.endpoint,
        ...generated,
        metadata: response.metadata,
      };
    } catch (error) {
      const failure = toSlideFailure(error);
      const failed: GenerationResult = {
        slideId: slide.slideId,
        slideNumber: slide.slideNumber,
        success: false,
        failure,
        ...(routed ? { endpoint: routed.endpoint } : {}),
      };

      // The stage already recorded this slide as timed out and reported its result
      if (signal.aborted) return failed;

      this.setState(slide.slideId, 'failed');

      if (error instanceof TransformError) {
        console.error(`⚙️  Configuration error for slide ${slide.slideNumber}: ${failure.message}`);
      } else if (error instanceof SlideValidationError) {
        console.warn(`⚠️  Slide ${slide.slideNumber} skipped: ${failure.message}`);
      } else {
        console.error(`❌ Slide ${slide.slideNumber} generation failed (${failure.reason}): ${failure.message}`);
      }

      return failed;
    }
  }

  private setState(slideId: string, state: SlideState): void {
    this.onSlideStateChange?.(slideId, state);
  }
}
