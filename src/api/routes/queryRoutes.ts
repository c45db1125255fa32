import { Router, Request, Response } from 'express';
import { withValidatedBody } from '../../middleware/validation';
import { newSessionId } from '../../services/sessionHistory';
import { createLogger } from '../../utils/logger';
import { AppServices } from '../appServices';
import { DirectQueryRequestSchema, QueryRequestSchema } from '../schemas';

const logger = createLogger('QueryRoutes');

export const createQueryRoutes = (services: AppServices): Router => {
  const router = Router();

  // Full rewrite/retrieve/grade workflow
  router.post('/query', withValidatedBody(QueryRequestSchema, async (body, req: Request, res: Response) => {
    const sessionId = body.session_id ?? newSessionId();
    logger.info(`Workflow query for session ${sessionId}: ${body.query.substring(0, 100)}`);

    const response = await services.engine.run(body.query, services.dependencies);
    services.history.recordQuery(sessionId, body.query, response);

    logger.info(`Workflow query completed with confidence ${response.confidence}`);
    res.status(200).json({
      success: true,
      data: {
        session_id: sessionId,
        response,
      },
    });
  }));

  // Single-shot knowledge-base query without the workflow
  router.post('/query/direct', withValidatedBody(DirectQueryRequestSchema, async (body, req: Request, res: Response) => {
    const sessionId = body.session_id ?? newSessionId();
    const response = await services.knowledgeBase.directQuery(body.query, body.mode, sessionId);

    res.status(200).json({
      success: true,
      data: {
        session_id: sessionId,
        response,
      },
    });
  }));

  return router;
};
