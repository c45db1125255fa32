import { Router, Request, Response } from 'express';
import { ExternalServiceError, catchAsync } from '../../middleware/errorHandler';
import { withValidatedBody } from '../../middleware/validation';
import { AppServices } from '../appServices';
import { AddDocumentRequestSchema, BatchAddDocumentsRequestSchema } from '../schemas';

export const createDocumentRoutes = (services: AppServices): Router => {
  const router = Router();

  router.post('/documents', withValidatedBody(AddDocumentRequestSchema, async (body, req: Request, res: Response) => {
    const { session_id, ...document } = body;
    const result = await services.knowledgeBase.addDocument(document, session_id);
    if (!result.success) {
      throw new ExternalServiceError(result.error, 'knowledge_base');
    }

    res.status(201).json({ success: true, data: result });
  }));

  router.post('/documents/batch', withValidatedBody(BatchAddDocumentsRequestSchema, async (body, req: Request, res: Response) => {
    const result = await services.knowledgeBase.batchAddDocuments(body.documents, body.session_id);
    if (!result.success) {
      throw new ExternalServiceError(result.error, 'knowledge_base');
    }

    res.status(201).json({ success: true, data: result });
  }));

  router.get('/knowledge-base/status', catchAsync(async (req: Request, res: Response): Promise<void> => {
    const report = await services.knowledgeBase.knowledgeBaseStatus();
    res.status(report.status.available ? 200 : 503).json({
      success: report.status.available,
      data: report,
    });
  }));

  return router;
};
