import { z } from 'zod';
import { commonSchemas } from '../middleware/validation.js';

const optionalText = z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined));

export const ingestSchemas = {
    ingest: {
        query: z.object({
            country: commonSchemas.country,
            lawType: commonSchemas.lawType,
            lawName: z.string().trim().min(1, 'Law name is required'),
            lawNameEn: optionalText,
            lawNumber: optionalText,
            lawYear: z.preprocess(
                (value) => (value === '' ? undefined : value),
                z.coerce.number().int().min(1800).max(2100).optional()
            ),
            filename: z
                .string()
                .trim()
                .regex(/\.pdf$/i, 'Only PDF files are supported'),
        }),
    },
};

export const lawsSchemas = {
    country: {
        params: z.object({
            country: commonSchemas.country,
        }),
    },
};
