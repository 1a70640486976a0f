import { z } from 'zod';
import { commonSchemas } from '../middleware/validation.js';

export const sessionSchemas = {
    create: {
        body: z
            .object({
                country: commonSchemas.country.default('egypt'),
                metadata: z.record(z.unknown()).optional(),
            })
            .default({}),
    },
    byId: {
        params: z.object({
            id: commonSchemas.sessionId,
        }),
    },
    list: {
        query: z.object({
            limit: z.coerce.number().int().min(1).max(100).default(100),
        }),
    },
};
