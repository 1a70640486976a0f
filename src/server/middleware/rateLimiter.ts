import rateLimit from 'express-rate-limit';
import { isTest } from '../config/env.js';

/**
 * Query answering runs three models per request; keep bursts bounded per client
 */
export const queryLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: 30,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    skip: () => isTest(),
    message: { error: 'Too Many Requests', message: 'Too many questions, please try again later.' },
});

/**
 * Ingestion embeds a whole statute per request
 */
export const ingestLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: 20,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    skip: () => isTest(),
    message: { error: 'Too Many Requests', message: 'Too many ingestion requests, please try again later.' },
});
