// Deck Builder Client - publishes an enriched presentation to the downstream deck renderer
// Optional: the stage works and reports results without it
import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { IPresentation } from '../models';
import { normalizeFooterText } from './requestTransformer';

interface IDeckSlidePayload {
  slide_id: string;
  layout: string;
  content: {
    slide_title: string;
    subtitle: string;
    html: string | null;
    presentation_name: string;
  };
  placeholder: boolean;
}

export interface IDeckPayload {
  title: string;
  slides: IDeckSlidePayload[];
}

export interface IDeckPublication {
  id: string;
  url: string;
}

export interface IDeckPayloadOptions {
  /** Send every slide as a placeholder carrying only its strawman title */
  placeholders?: boolean;
}

/**
 * What came of publishing: the deck, or why it could not be published.
 * `placeholderDeck` marks a deck published without generated content.
 */
export interface IDeckPublicationOutcome {
  deck?: IDeckPublication;
  deckError?: string;
  placeholderDeck?: boolean;
}

export interface IDeckBuilderClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  httpClient?: AxiosInstance;
}

const DeckResponseSchema = z.object({
  id: z.string(),
  url: z.string(),
});

// Slides without an assigned layout fall back to the generic content layout
const DEFAULT_LAYOUT_ID = 'L25';

/**
 * Build the deck builder payload. Failed slides are sent as placeholders so the
 * deck keeps its original slide order.
 */
export const buildDeckPayload = (presentation: IPresentation, options: IDeckPayloadOptions = {}): IDeckPayload => {
  const footer = normalizeFooterText(presentation.footerText, presentation.mainTitle);

  return {
    title: presentation.mainTitle,
    slides: presentation.slides.map((slide) => {
      if (options.placeholders) {
        return {
          slide_id: slide.slideId,
          layout: slide.layoutId || DEFAULT_LAYOUT_ID,
          content: { slide_title: slide.title, subtitle: '', html: null, presentation_name: footer },
          placeholder: true,
        };
      }

      return {
        slide_id: slide.slideId,
        layout: slide.layoutId || DEFAULT_LAYOUT_ID,
        content: {
          slide_title: slide.generatedTitle || slide.title,
          subtitle: slide.generatedSubtitle ?? '',
          html: slide.generatedContent ?? null,
          presentation_name: footer,
        },
        placeholder: slide.hasTextFailure === true || !slide.generatedContent,
      };
    }),
  };
};

export class DeckBuilderClient {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;

  constructor(options: IDeckBuilderClientOptions) {
    this.baseUrl = options.baseUrl;
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs ?? 30000,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  /**
   * Create a deck and return its id and absolute URL
   */
  async createPresentation(presentation: IPresentation, options: IDeckPayloadOptions = {}): Promise<IDeckPublication> {
    try {
      const response = await this.http.post<unknown>('/api/presentations', buildDeckPayload(presentation, options));
      const body = DeckResponseSchema.parse(response.data);

      return { id: body.id, url: this.getFullUrl(body.url) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Deck builder error: ${message}`);
    }
  }

  /**
   * The deck builder answers with a path; resolve it against its base URL
   */
  getFullUrl(url: string): string {
    return new URL(url, this.baseUrl).toString();
  }
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Publish the enriched deck. When that fails, publish the strawman as a deck of
 * placeholders instead, so the caller still gets a deck to open.
 * Never throws: a deck that could not be published at all is reported as `deckError`.
 */
export const publishDeck = async (
  deckBuilder: Pick<DeckBuilderClient, 'createPresentation'>,
  presentation: IPresentation
): Promise<IDeckPublicationOutcome> => {
  try {
    const deck = await deckBuilder.createPresentation(presentation);
    console.log(`📋 Deck published: ${deck.url}`);
    return { deck };
  } catch (error) {
    const deckError = errorMessage(error);
    console.error('❌ Deck builder integration failed:', deckError);
    console.warn('⚠️  Falling back to a deck with placeholder content');

    try {
      const deck = await deckBuilder.createPresentation(presentation, { placeholders: true });
      console.log(`📋 Placeholder deck published: ${deck.url}`);
      return { deck, deckError, placeholderDeck: true };
    } catch (fallbackError) {
      console.error('❌ Placeholder deck could not be published either:', errorMessage(fallbackError));
      return { deckError };
    }
  }
};
