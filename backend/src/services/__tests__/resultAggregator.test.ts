import { describe, it, expect } from 'vitest';
import { aggregateResults } from '../resultAggregator';
import type { GenerationResult } from '../../models';
import { makeThreeSlidePresentation } from './fixtures';

const success = (slideId: string, slideNumber: number): GenerationResult => ({
  slideId,
  slideNumber,
  success: true,
  endpoint: '/v1.2/generate',
  generatedTitle: `Title ${slideNumber}`,
  generatedSubtitle: `Subtitle ${slideNumber}`,
  generatedContent: `<div>${slideId}</div>`,
  metadata: {},
});

const failure = (slideId: string, slideNumber: number): GenerationResult => ({
  slideId,
  slideNumber,
  success: false,
  failure: { reason: 'timeout', message: 'Request timed out' },
});

describe('aggregateResults', () => {
  it('counts a fully successful run', () => {
    const presentation = makeThreeSlidePresentation();
    const result = aggregateResults(presentation, [
      success('slide_001', 1),
      success('slide_002', 2),
      success('slide_003', 3),
    ]);

    expect(result).toMatchObject({
      status: 'succeeded',
      totalSlides: 3,
      successfulCount: 3,
      failedCount: 0,
      contentGenerated: true,
      failedSlides: [],
    });
    expect(result.presentation.slides.map((slide) => slide.generatedTitle)).toEqual(['Title 1', 'Title 2', 'Title 3']);
  });

  it('flags failed slides and keeps their prior content', () => {
    const presentation = makeThreeSlidePresentation();
    presentation.slides[1].generatedTitle = 'Upstream title';

    const result = aggregateResults(presentation, [
      success('slide_001', 1),
      failure('slide_002', 2),
      success('slide_003', 3),
    ]);

    expect(result.status).toBe('partial');
    expect(result.contentGenerated).toBe(true);
    expect(result.failedSlides).toEqual([
      { slideId: 'slide_002', slideNumber: 2, reason: 'timeout', message: 'Request timed out' },
    ]);
    expect(result.presentation.slides[1]).toMatchObject({
      generatedTitle: 'Upstream title',
      hasTextFailure: true,
    });
    expect(result.presentation.slides[1].generatedContent).toBeUndefined();
    expect(result.presentation.slides[0].hasTextFailure).toBe(false);
  });

  it('leaves the input presentation untouched', () => {
    const presentation = makeThreeSlidePresentation();
    const before = JSON.parse(JSON.stringify(presentation));

    aggregateResults(presentation, [success('slide_001', 1), success('slide_002', 2), success('slide_003', 3)]);

    expect(presentation).toEqual(before);
  });

  it('applies the "all" content-generated policy', () => {
    const presentation = makeThreeSlidePresentation();
    const outcomes = [success('slide_001', 1), failure('slide_002', 2), success('slide_003', 3)];

    expect(aggregateResults(presentation, outcomes, 'any').contentGenerated).toBe(true);
    expect(aggregateResults(presentation, outcomes, 'all').contentGenerated).toBe(false);
  });

  it('reports a run where nothing succeeded as failed', () => {
    const presentation = makeThreeSlidePresentation();
    const result = aggregateResults(presentation, [
      failure('slide_001', 1),
      failure('slide_002', 2),
      failure('slide_003', 3),
    ]);

    expect(result.status).toBe('failed');
    expect(result.contentGenerated).toBe(false);
    expect(result.failedCount).toBe(3);
  });

  it('refuses outcomes that do not line up with the slides', () => {
    const presentation = makeThreeSlidePresentation();

    expect(() => aggregateResults(presentation, [success('slide_001', 1)])).toThrow('Expected 3 slide outcomes, got 1');
    expect(() =>
      aggregateResults(presentation, [success('slide_002', 2), success('slide_001', 1), success('slide_003', 3)])
    ).toThrow('Outcome for slide_002 does not match slide slide_001 at position 1');
  });

  it('returns a frozen result', () => {
    const presentation = makeThreeSlidePresentation();
    const result = aggregateResults(presentation, [
      success('slide_001', 1),
      success('slide_002', 2),
      success('slide_003', 3),
    ]);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.presentation.slides[1])).toBe(true);
    expect(Object.isFrozen(result.presentation.slides[1].contentGuidance)).toBe(true);
    expect(Object.isFrozen(result.results[0])).toBe(true);
    expect(Object.isFrozen(result.failedSlides)).toBe(true);
  });

  it('shares no objects with the caller', () => {
    const presentation = makeThreeSlidePresentation();
    const outcomes = [success('slide_001', 1), success('slide_002', 2), success('slide_003', 3)];

    const result = aggregateResults(presentation, outcomes);

    expect(result.presentation.slides[1].contentGuidance).toEqual(presentation.slides[1].contentGuidance);
    expect(result.presentation.slides[1].contentGuidance).not.toBe(presentation.slides[1].contentGuidance);
    expect(Object.isFrozen(presentation.slides[1].contentGuidance)).toBe(false);
    expect(Object.isFrozen(outcomes[0])).toBe(false);
  });
});
