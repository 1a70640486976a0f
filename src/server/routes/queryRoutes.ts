import { Router, type Request, type Response } from 'express';
import type { QueryPipeline } from '../pipelines/query/QueryPipeline.js';
import type { QueryOutput } from '../pipelines/query/types.js';
import type { CollectionFactory } from '../services/collections/CollectionFactory.js';
import type { SessionService } from '../services/session/SessionService.js';
import type { ConversationTurn } from '../contracts/capabilities.js';
import { validate } from '../middleware/validation.js';
import { queryLimiter } from '../middleware/rateLimiter.js';
import { querySchemas, type QueryRequestBody } from '../validation/querySchemas.js';
import { asyncHandler } from '../utils/errorHandling.js';
import { AppError, ErrorCode, NotFoundError, PipelineExecutionError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

export interface QueryRouteDependencies {
    queryPipeline: QueryPipeline;
    collections: CollectionFactory;
    sessions: SessionService;
}

export function createQueryRoutes({ queryPipeline, collections, sessions }: QueryRouteDependencies): Router {
    const router = Router();

    /**
     * POST /query
     * Answer a legal question with citations from the country's statutes
     */
    router.post(
        '/query',
        queryLimiter,
        validate(querySchemas.ask),
        asyncHandler(async (req: Request, res: Response) => {
            const body: QueryRequestBody = querySchemas.ask.body.parse(req.body);

            const stats = await collections.getCollectionStats(body.country);
            if (!stats || stats.pointsCount === 0) {
                throw new NotFoundError('Laws for country', body.country, {
                    hint: 'Ingest laws for this country first',
                });
            }

            // History is optional context; an unreadable session does not fail the query
            let history: ConversationTurn[] | undefined;
            if (body.sessionId) {
                try {
                    history = await sessions.getHistoryTurns(body.sessionId);
                } catch (error) {
                    logger.warn({ error, sessionId: body.sessionId }, 'Failed to load session history');
                }
            }

            let result: QueryOutput;
            try {
                result = await queryPipeline.run({
                    question: body.question,
                    country: body.country,
                    lawTypes: body.lawTypes,
                    topK: body.topK,
                    history,
                });
            } catch (error) {
                if (error instanceof PipelineExecutionError) {
                    throw new AppError(
                        `Query processing failed: ${error.message}`,
                        ErrorCode.PIPELINE_EXECUTION_ERROR,
                        500,
                        true,
                        { stepErrors: error.stepErrors }
                    );
                }
                throw error;
            }

            if (body.sessionId) {
                const sessionId = body.sessionId;
                try {
                    await sessions.addUserMessage(sessionId, body.question, {
                        country: body.country,
                        lawTypes: body.lawTypes ?? null,
                    });
                    await sessions.addAssistantMessage(sessionId, result.answer, result.sources);
                } catch (error) {
                    logger.warn({ error, sessionId }, 'Failed to save exchange to session');
                }
            }

            res.json(result);
        })
    );

    return router;
}
