// Content generation API routes
// Runs the content generation stage on a strawman and optionally publishes the deck
import express, { Request, Response } from 'express';
import { ContentGenerationStage } from '../services/contentGenerationStage';
import { TextServiceClient } from '../services/textServiceClient';
import { DeckBuilderClient, publishDeck } from '../services/deckBuilderClient';
import { VariantCatalog } from '../services/variantCatalog';
import { validateStrawman, StrawmanRequestHandler } from '../middleware/strawmanValidator';
import { StageInputError } from '../utils/errors';
import { toStageResponse } from '../utils/responseFormatter';

export interface IContentGenerationRouteDeps {
  stage: ContentGenerationStage;
  catalog: VariantCatalog;
  textService: Pick<TextServiceClient, 'healthCheck'>;
  deckBuilder: Pick<DeckBuilderClient, 'createPresentation'> | null;
}

export const createContentGenerationRouter = (deps: IContentGenerationRouteDeps) => {
  const router = express.Router();

  // List the variants the transformer knows how to map
  router.get('/variants', (req: Request, res: Response) => {
    res.json({
      success: true,
      version: deps.catalog.version,
      variants: deps.catalog.list(),
    });
  });

  // Probe the text generation service
  router.get('/text-service/health', async (req: Request, res: Response) => {
    const healthy = await deps.textService.healthCheck();
    res.status(healthy ? 200 : 503).json({ success: healthy, healthy });
  });

  // Run content generation for a strawman
  const generateContent: StrawmanRequestHandler = async (req, res) => {
    try {
      const result = await deps.stage.run(res.locals.presentation);

      const publication = deps.deckBuilder ? await publishDeck(deps.deckBuilder, result.presentation) : {};
      res.json(toStageResponse(result, publication));
    } catch (error) {
      if (error instanceof StageInputError) {
        res.status(400).json({ success: false, error: error.message, issues: error.issues });
        return;
      }
      console.error('Content generation error:', error);
      res.status(500).json({ success: false, error: 'Content generation failed' });
    }
  };

  router.post('/', validateStrawman, generateContent);

  return router;
};
