import { Router, Request, Response, NextFunction } from 'express';
import { NotFoundError } from '../../middleware/errorHandler';
import { createValidationMiddleware } from '../../middleware/validation';
import { AppServices } from '../appServices';
import { SessionParamsSchema } from '../schemas';

export const createHistoryRoutes = (services: AppServices): Router => {
  const router = Router();
  const validateParams = createValidationMiddleware({ params: SessionParamsSchema });

  router.get('/history/:sessionId', validateParams, (req: Request, res: Response, next: NextFunction) => {
    const session = services.history.get(req.params.sessionId);
    if (!session) {
      next(new NotFoundError(`Session ${req.params.sessionId} not found`));
      return;
    }
    res.status(200).json({ success: true, data: session });
  });

  router.delete('/history/:sessionId', validateParams, (req: Request, res: Response, next: NextFunction) => {
    if (!services.history.clear(req.params.sessionId)) {
      next(new NotFoundError(`Session ${req.params.sessionId} not found`));
      return;
    }
    res.status(200).json({ success: true, data: { session_id: req.params.sessionId, cleared: true } });
  });

  return router;
};
