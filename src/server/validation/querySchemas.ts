import { z } from 'zod';
import { commonSchemas } from '../middleware/validation.js';

export const querySchemas = {
    ask: {
        body: z.object({
            question: z
                .string()
                .trim()
                .min(3, 'Question must be at least 3 characters')
                .max(1000, 'Question must be at most 1000 characters'),
            country: commonSchemas.country.default('egypt'),
            lawTypes: z.array(commonSchemas.lawType).optional(),
            sessionId: commonSchemas.sessionId.optional(),
            // Falls back to RERANK_TOP_K when omitted
            topK: z.number().int().min(1).max(20).optional(),
        }),
    },
};

export type QueryRequestBody = z.infer<typeof querySchemas.ask.body>;
