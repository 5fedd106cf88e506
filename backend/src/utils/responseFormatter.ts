// Response Formatter Utility
// Turns a stage result into the API response shape the pipeline front end reads

import type { IFailedSlide, IStageResult, StageStatus } from '../models';
import type { IDeckPublicationOutcome } from '../services/deckBuilderClient';

export type IStagePublication = IDeckPublicationOutcome;

export interface IStageResponse {
  success: true;
  type: 'presentation_url' | 'stage_result';
  url?: string;
  status: StageStatus;
  slideCount: number;
  contentGenerated: boolean;
  successfulSlides: number;
  failedSlides: number;
  failures: readonly IFailedSlide[];
  message: string;
  placeholderDeck?: true;
  deckError?: string;
  result: IStageResult;
}

const describe = (result: IStageResult, url?: string, placeholderDeck = false): string => {
  const counts = `${result.successfulCount}/${result.totalSlides} slides generated`;
  if (url && placeholderDeck) {
    return `Presentation created (fallback mode): ${url}`;
  }
  if (url) {
    return result.contentGenerated
      ? `Your presentation with generated content is ready (${counts}). View it at: ${url}`
      : `Presentation created without generated content (${counts}): ${url}`;
  }
  return result.contentGenerated ? `Content generated (${counts})` : `No content generated (${counts})`;
};

/**
 * Converts a stage result (plus optional deck publication) to API response format
 *
 * What this does:
 * - Surfaces the counts callers use to judge a partial result
 * - Lists every failed slide with its reason
 * - Adds the deck URL when the deck builder published the presentation
 * - A placeholder deck carries no generated content, so contentGenerated is false for it
 */
export function toStageResponse(result: IStageResult, publication: IStagePublication = {}): IStageResponse {
  const url = publication.deck?.url;
  const placeholderDeck = url !== undefined && publication.placeholderDeck === true;

  return {
    success: true,
    type: url ? 'presentation_url' : 'stage_result',
    ...(url ? { url } : {}),
    status: result.status,
    slideCount: result.totalSlides,
    contentGenerated: placeholderDeck ? false : result.contentGenerated,
    successfulSlides: result.successfulCount,
    failedSlides: result.failedCount,
    failures: result.failedSlides,
    message: describe(result, url, placeholderDeck),
    ...(placeholderDeck ? { placeholderDeck: true as const } : {}),
    ...(publication.deckError ? { deckError: publication.deckError } : {}),
    result,
  };
}
