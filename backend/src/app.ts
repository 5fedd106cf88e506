// Main Express application setup for the content generation service
import express, { Application, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { Settings, getSettings } from './config/settings';
import { ContentGenerationStage } from './services/contentGenerationStage';
import { TextServiceClient } from './services/textServiceClient';
import { DeckBuilderClient } from './services/deckBuilderClient';
import { getDefaultVariantCatalog } from './services/variantCatalog';
import { createContentGenerationRouter, IContentGenerationRouteDeps } from './routes/contentGeneration';

const clientErrorStatus = (err: Error): number | undefined => {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
};

/**
 * Wire the stage and its collaborators from settings
 */
export const buildDependencies = (settings: Settings): IContentGenerationRouteDeps => {
  const catalog = getDefaultVariantCatalog();
  const textService = new TextServiceClient({
    baseUrl: settings.TEXT_SERVICE_URL,
    timeoutMs: settings.TEXT_SERVICE_TIMEOUT_MS,
    slideTimeoutMs: settings.TEXT_SERVICE_SLIDE_TIMEOUT_MS,
    maxRetries: settings.TEXT_SERVICE_MAX_RETRIES,
    retryBackoffMs: settings.TEXT_SERVICE_RETRY_BACKOFF_MS,
  });

  const stage = new ContentGenerationStage({
    client: textService,
    catalog,
    concurrency: settings.CONTENT_GENERATION_CONCURRENCY,
    stageDeadlineMs: settings.STAGE_DEADLINE_MS,
    contentGeneratedPolicy: settings.CONTENT_GENERATED_POLICY,
  });

  const deckBuilder = settings.DECK_BUILDER_ENABLED
    ? new DeckBuilderClient({ baseUrl: settings.DECK_BUILDER_API_URL })
    : null;

  return { stage, catalog, textService, deckBuilder };
};

/**
 * Create and configure Express application
 */
export const createApp = (
  settings: Settings = getSettings(),
  deps: IContentGenerationRouteDeps = buildDependencies(settings)
): Application => {
  const app: Application = express();

  // Security middleware
  app.use(helmet());

  const allowedOrigins: string[] = [];
  if (settings.FRONTEND_URL) {
    allowedOrigins.push(`https://${settings.FRONTEND_URL}`);
  }
  if (settings.NODE_ENV !== 'production') {
    allowedOrigins.push('http://localhost:3000', 'http://localhost:3001');
  }

  app.use(
    cors({
      origin: allowedOrigins,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    })
  );

  // Strawman documents can be large
  app.use(express.json({ limit: settings.REQUEST_BODY_LIMIT }));

  // Request logging
  if (settings.NODE_ENV === 'development') {
    app.use(morgan('dev'));
  } else if (settings.NODE_ENV !== 'test') {
    app.use(morgan('combined'));
  }

  // Health check endpoint
  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: settings.NODE_ENV,
      deckBuilderEnabled: deps.deckBuilder !== null,
    });
  });

  app.use('/api/content-generation', createContentGenerationRouter(deps));

  // 404 handler - must be after all routes
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Route not found',
      path: req.path,
    });
  });

  // Global error handler - must be last
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    console.error('❌ Error:', err);

    // body-parser errors carry the client error status to answer with (400, 413, 415)
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      res.status(status).json({
        success: false,
        error: 'type' in err && err.type === 'entity.parse.failed' ? 'Malformed JSON body' : err.message,
      });
      return;
    }

    res.status(500).json({
      success: false,
      error: settings.NODE_ENV === 'development' ? err.message : 'Internal server error',
      ...(settings.NODE_ENV === 'development' && { stack: err.stack }),
    });
  });

  return app;
};
