import { Router, type Request, type Response } from 'express';
import type { CollectionFactory } from '../services/collections/CollectionFactory.js';
import { LAW_TYPES, SUPPORTED_COUNTRIES } from '../config/jurisdictions.js';
import { validate } from '../middleware/validation.js';
import { lawsSchemas } from '../validation/ingestSchemas.js';
import { asyncHandler } from '../utils/errorHandling.js';
import { NotFoundError } from '../types/errors.js';

export function createLawsRoutes(collections: CollectionFactory): Router {
    const router = Router();

    /**
     * GET /laws
     * Status of every supported country's collection
     */
    router.get(
        '/laws',
        asyncHandler(async (_req: Request, res: Response) => {
            res.json({ success: true, countries: await collections.listCollections() });
        })
    );

    /**
     * GET /laws/countries
     */
    router.get('/laws/countries', (_req: Request, res: Response) => {
        res.json({ countries: SUPPORTED_COUNTRIES, lawTypes: LAW_TYPES });
    });

    /**
     * GET /laws/:country
     */
    router.get(
        '/laws/:country',
        validate(lawsSchemas.country),
        asyncHandler(async (req: Request, res: Response) => {
            const { country } = lawsSchemas.country.params.parse(req.params);
            const stats = await collections.getCollectionStats(country);
            if (!stats) {
                res.json({
                    success: true,
                    country,
                    status: 'not_initialized',
                    message: 'No laws have been ingested for this country yet.',
                    stats: null,
                });
                return;
            }
            res.json({
                success: true,
                country,
                status: stats.pointsCount > 0 ? 'active' : 'empty',
                stats,
            });
        })
    );

    /**
     * DELETE /laws/:country
     * Permanently removes every indexed law of the country
     */
    router.delete(
        '/laws/:country',
        validate(lawsSchemas.country),
        asyncHandler(async (req: Request, res: Response) => {
            const { country } = lawsSchemas.country.params.parse(req.params);
            const deleted = await collections.deleteCountryCollection(country);
            if (!deleted) {
                throw new NotFoundError('Collection for country', country);
            }
            res.json({
                success: true,
                message: `Deleted all laws for ${country}`,
                collection: collections.getCollectionName(country),
            });
        })
    );

    /**
     * POST /laws/:country/reset
     * Drop and recreate the country's collection
     */
    router.post(
        '/laws/:country/reset',
        validate(lawsSchemas.country),
        asyncHandler(async (req: Request, res: Response) => {
            const { country } = lawsSchemas.country.params.parse(req.params);
            const collection = await collections.resetCountryCollection(country);
            res.json({ success: true, message: `Reset collection for ${country}`, collection });
        })
    );

    return router;
}
