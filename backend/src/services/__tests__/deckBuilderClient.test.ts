import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios, { AxiosError, InternalAxiosRequestConfig } from 'axios';
import { DeckBuilderClient, buildDeckPayload, publishDeck } from '../deckBuilderClient';
import type { IPresentation } from '../../models';
import { makeThreeSlidePresentation } from './fixtures';

const enrichedPresentation = (): IPresentation => {
  const presentation = makeThreeSlidePresentation();
  presentation.slides[0] = {
    ...presentation.slides[0],
    generatedTitle: 'Operations at a Glance',
    generatedSubtitle: 'Q3 in review',
    generatedContent: '<h1>Operations at a Glance</h1>',
    hasTextFailure: false,
  };
  presentation.slides[1] = { ...presentation.slides[1], hasTextFailure: true };
  presentation.slides[2] = { ...presentation.slides[2], generatedContent: '<h1>Thank You</h1>', layoutId: null };
  return presentation;
};

const createClient = (reply: (config: InternalAxiosRequestConfig) => unknown) => {
  const seen: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    baseURL: 'http://deck.test',
    adapter: async (config) => {
      seen.push(config);
      return { data: reply(config), status: 200, statusText: 'OK', headers: {}, config };
    },
  });
  return { client: new DeckBuilderClient({ baseUrl: 'http://deck.test', httpClient: http }), seen };
};

describe('buildDeckPayload', () => {
  it('maps generated fields and keeps failed slides as placeholders', () => {
    const payload = buildDeckPayload(enrichedPresentation());

    expect(payload.title).toBe('Quarterly Operations Review');
    expect(payload.slides).toEqual([
      {
        slide_id: 'slide_001',
        layout: 'L29',
        content: {
          slide_title: 'Operations at a Glance',
          subtitle: 'Q3 in review',
          html: '<h1>Operations at a Glance</h1>',
          presentation_name: 'Ops Review Q3',
        },
        placeholder: false,
      },
      {
        slide_id: 'slide_002',
        layout: 'L25',
        content: {
          slide_title: 'Operating Priorities',
          subtitle: '',
          html: null,
          presentation_name: 'Ops Review Q3',
        },
        placeholder: true,
      },
      {
        slide_id: 'slide_003',
        layout: 'L25',
        content: {
          slide_title: 'Thank You',
          subtitle: '',
          html: '<h1>Thank You</h1>',
          presentation_name: 'Ops Review Q3',
        },
        placeholder: false,
      },
    ]);
  });
});

describe('buildDeckPayload with placeholders', () => {
  it('sends every slide as a placeholder with its strawman title', () => {
    const payload = buildDeckPayload(enrichedPresentation(), { placeholders: true });

    expect(payload.slides.map((slide) => [slide.content.slide_title, slide.content.html, slide.placeholder])).toEqual([
      ['Opening', null, true],
      ['Operating Priorities', null, true],
      ['Thank You', null, true],
    ]);
  });
});

describe('DeckBuilderClient', () => {
  it('posts the deck and resolves the returned path against the base URL', async () => {
    const { client, seen } = createClient(() => ({ id: 'deck-1', url: '/p/deck-1' }));

    const publication = await client.createPresentation(enrichedPresentation());

    expect(publication).toEqual({ id: 'deck-1', url: 'http://deck.test/p/deck-1' });
    expect(seen[0].url).toBe('/api/presentations');
    expect(seen[0].method).toBe('post');
    expect(typeof seen[0].data === 'string' ? JSON.parse(seen[0].data).slides : []).toHaveLength(3);
  });

  it('keeps an absolute URL as returned', () => {
    const { client } = createClient(() => ({}));

    expect(client.getFullUrl('https://cdn.test/p/deck-2')).toBe('https://cdn.test/p/deck-2');
  });

  it('wraps a malformed reply', async () => {
    const { client } = createClient(() => ({ id: 'deck-3' }));

    await expect(client.createPresentation(enrichedPresentation())).rejects.toThrow(/^Deck builder error: /);
  });

  it('wraps a transport failure', async () => {
    const http = axios.create({
      adapter: async (config) => {
        throw new AxiosError('connect ECONNREFUSED 127.0.0.1:8000', 'ECONNREFUSED', config);
      },
    });
    const client = new DeckBuilderClient({ baseUrl: 'http://deck.test', httpClient: http });

    await expect(client.createPresentation(enrichedPresentation())).rejects.toThrow(
      'Deck builder error: connect ECONNREFUSED 127.0.0.1:8000'
    );
  });
});

describe('publishDeck', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('publishes the enriched deck', async () => {
    const { client } = createClient(() => ({ id: 'deck-4', url: '/p/deck-4' }));

    await expect(publishDeck(client, enrichedPresentation())).resolves.toEqual({
      deck: { id: 'deck-4', url: 'http://deck.test/p/deck-4' },
    });
  });

  it('falls back to a placeholder deck when the enriched deck is refused', async () => {
    const { client, seen } = createClient((config) => {
      const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : undefined;
      const enriched = JSON.stringify(body).includes('"placeholder":false');
      return enriched ? { id: 'deck-5' } : { id: 'deck-6', url: '/p/deck-6' };
    });

    const outcome = await publishDeck(client, enrichedPresentation());

    expect(outcome.deck).toEqual({ id: 'deck-6', url: 'http://deck.test/p/deck-6' });
    expect(outcome.placeholderDeck).toBe(true);
    expect(outcome.deckError).toMatch(/^Deck builder error: /);
    expect(seen).toHaveLength(2);
  });

  it('reports the first failure when the placeholder deck fails too', async () => {
    const { client } = createClient(() => ({ id: 'deck-7' }));

    const outcome = await publishDeck(client, enrichedPresentation());

    expect(outcome.deck).toBeUndefined();
    expect(outcome.placeholderDeck).toBeUndefined();
    expect(outcome.deckError).toMatch(/^Deck builder error: /);
  });
});
