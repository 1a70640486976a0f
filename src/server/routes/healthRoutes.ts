import { Router, type Request, type Response } from 'express';
import type { SessionStore, VectorStore } from '../contracts/capabilities.js';
import { asyncHandler } from '../utils/errorHandling.js';

export interface HealthDependencies {
    vectorStore: VectorStore;
    sessionStore: SessionStore;
    models: { embeddingModel: string; sparseModel: string; rerankerModel: string; llmModel: string };
}

/**
 * GET /health
 * 200 when both stores answer, 503 otherwise
 */
export function createHealthRoutes({ vectorStore, sessionStore, models }: HealthDependencies): Router {
    const router = Router();

    router.get(
        '/health',
        asyncHandler(async (_req: Request, res: Response) => {
            const [vectorStoreHealthy, sessionStoreHealthy] = await Promise.all([
                vectorStore.healthCheck(),
                sessionStore.healthCheck(),
            ]);
            const healthy = vectorStoreHealthy && sessionStoreHealthy;

            res.status(healthy ? 200 : 503).json({
                status: healthy ? 'healthy' : 'degraded',
                timestamp: new Date().toISOString(),
                services: {
                    vectorStore: vectorStoreHealthy ? 'up' : 'down',
                    sessionStore: sessionStoreHealthy ? 'up' : 'down',
                },
                models,
            });
        })
    );

    return router;
}
