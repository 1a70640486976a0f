import express, { type Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import type { Container } from './container.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createQueryRoutes } from './routes/queryRoutes.js';
import { createIngestRoutes } from './routes/ingestRoutes.js';
import { createLawsRoutes } from './routes/lawsRoutes.js';
import { createSessionRoutes } from './routes/sessionRoutes.js';
import { createHealthRoutes } from './routes/healthRoutes.js';

export const API_PREFIX = '/api/v1';

/**
 * Build the Express application around an assembled container
 */
export function createApp(container: Container): Express {
  const app = express();

  app.use(requestIdMiddleware); // Request ID and logging context - must be first
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use(
    API_PREFIX,
    createHealthRoutes({
      vectorStore: container.vectorStore,
      sessionStore: container.sessionStore,
      models: {
        embeddingModel: container.denseEncoder.getModelName(),
        sparseModel: container.sparseEncoder.getModelName(),
        rerankerModel: container.scorer.getModelName(),
        llmModel: container.generator.getModelName(),
      },
    })
  );
  app.use(
    API_PREFIX,
    createQueryRoutes({
      queryPipeline: container.queryPipeline,
      collections: container.collections,
      sessions: container.sessions,
    })
  );
  app.use(
    API_PREFIX,
    createIngestRoutes({
      ingestionPipeline: container.ingestionPipeline,
      maxUploadBytes: container.env.MAX_UPLOAD_BYTES,
    })
  );
  app.use(API_PREFIX, createLawsRoutes(container.collections));
  app.use(API_PREFIX, createSessionRoutes(container.sessions));

  app.use(notFoundHandler);
  app.use(errorHandler); // Must be registered last

  return app;
}
