import express, { Router, type Request, type Response } from 'express';
import type { IngestionPipeline } from '../pipelines/ingestion/IngestionPipeline.js';
import { validate } from '../middleware/validation.js';
import { ingestLimiter } from '../middleware/rateLimiter.js';
import { ingestSchemas } from '../validation/ingestSchemas.js';
import { asyncHandler } from '../utils/errorHandling.js';
import { BadRequestError, PipelineExecutionError } from '../types/errors.js';
import { INGESTION_PIPELINE_NAME } from '../pipelines/ingestion/IngestionPipeline.js';
import { logger } from '../utils/logger.js';

/** Anything smaller cannot be a real statute PDF */
export const MIN_UPLOAD_BYTES = 1000;

export interface IngestRouteDependencies {
    ingestionPipeline: IngestionPipeline;
    maxUploadBytes: number;
}

export function createIngestRoutes({ ingestionPipeline, maxUploadBytes }: IngestRouteDependencies): Router {
    const router = Router();

    /**
     * POST /ingest?country=&lawType=&lawName=&filename=
     * Body: raw PDF bytes (Content-Type: application/pdf)
     */
    router.post(
        '/ingest',
        ingestLimiter,
        express.raw({ type: 'application/pdf', limit: maxUploadBytes }),
        validate(ingestSchemas.ingest),
        asyncHandler(async (req: Request, res: Response) => {
            const query = ingestSchemas.ingest.query.parse(req.query);
            const body: unknown = req.body;

            if (!Buffer.isBuffer(body)) {
                throw new BadRequestError('Request body must be a PDF sent with Content-Type: application/pdf');
            }
            if (body.length < MIN_UPLOAD_BYTES) {
                throw new BadRequestError('File too small to be a valid PDF', { bytes: body.length });
            }

            logger.info({ filename: query.filename, country: query.country, bytes: body.length }, 'Ingesting law document');

            const result = await ingestionPipeline.ingest(body, {
                country: query.country,
                lawType: query.lawType,
                lawName: query.lawName,
                lawNameEn: query.lawNameEn,
                lawNumber: query.lawNumber,
                lawYear: query.lawYear,
                sourceFile: query.filename,
            });

            if (!result.success) {
                throw new PipelineExecutionError(INGESTION_PIPELINE_NAME, result.errors);
            }

            res.status(201).json({
                ...result,
                message: `Law '${query.lawName}' ingested successfully`,
            });
        })
    );

    return router;
}
