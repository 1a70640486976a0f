import { Router, type Request, type Response } from 'express';
import type { SessionService } from '../services/session/SessionService.js';
import { validate } from '../middleware/validation.js';
import { sessionSchemas } from '../validation/sessionSchemas.js';
import { asyncHandler, throwIfNotFound } from '../utils/errorHandling.js';
import { AppError, ErrorCode, NotFoundError } from '../types/errors.js';

export function createSessionRoutes(sessions: SessionService): Router {
    const router = Router();

    /**
     * POST /sessions
     * Start a conversation. Sessions expire after a period of inactivity.
     */
    router.post(
        '/sessions',
        validate(sessionSchemas.create),
        asyncHandler(async (req: Request, res: Response) => {
            const body = sessionSchemas.create.body.parse(req.body);
            const session = await sessions.createSession({ country: body.country, metadata: body.metadata });
            res.status(201).json({ sessionId: session.sessionId, createdAt: session.createdAt });
        })
    );

    /**
     * GET /sessions
     * Active session ids (debugging and administration)
     */
    router.get(
        '/sessions',
        validate(sessionSchemas.list),
        asyncHandler(async (req: Request, res: Response) => {
            const { limit } = sessionSchemas.list.query.parse(req.query);
            const ids = await sessions.listSessions(limit);
            res.json({ success: true, count: ids.length, sessions: ids });
        })
    );

    /**
     * GET /sessions/:id
     * Session details and conversation history
     */
    router.get(
        '/sessions/:id',
        validate(sessionSchemas.byId),
        asyncHandler(async (req: Request, res: Response) => {
            const { id } = sessionSchemas.byId.params.parse(req.params);
            const session = await sessions.getSession(id);
            throwIfNotFound(session, 'Session', id);
            res.json(session);
        })
    );

    /**
     * DELETE /sessions/:id
     */
    router.delete(
        '/sessions/:id',
        validate(sessionSchemas.byId),
        asyncHandler(async (req: Request, res: Response) => {
            const { id } = sessionSchemas.byId.params.parse(req.params);
            if (!(await sessions.sessionExists(id))) {
                throw new NotFoundError('Session', id);
            }
            if (!(await sessions.deleteSession(id))) {
                throw new AppError('Failed to delete session', ErrorCode.INTERNAL_SERVER_ERROR, 500, true, { sessionId: id });
            }
            res.json({ success: true, message: `Session ${id} deleted` });
        })
    );

    return router;
}
