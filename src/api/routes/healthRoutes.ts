import { Router, Request, Response } from 'express';
import { catchAsync } from '../../middleware/errorHandler';
import { settings } from '../../config';
import { createLogger } from '../../utils/logger';
import { AppServices } from '../appServices';

const logger = createLogger('HealthRoutes');

interface ServiceHealth {
  status: 'healthy' | 'unhealthy' | 'degraded';
  checked_at: string;
  error?: string;
  state?: string;
}

// Public health check; no authentication
export const createHealthRoutes = (services: AppServices): Router => {
  const router = Router();

  router.get('/health', catchAsync(async (req: Request, res: Response): Promise<void> => {
    logger.debug('Health check endpoint was called.');

    const startTime = Date.now();
    const checkedAt = new Date().toISOString();
    const serviceHealth: Record<string, ServiceHealth> = {};

    const kbStatus = await services.dependencies.status.status();
    serviceHealth.knowledge_base = kbStatus.available
      ? { status: 'healthy', checked_at: checkedAt }
      : { status: 'unhealthy', checked_at: checkedAt, error: kbStatus.error };

    if (services.llmStatus) {
      const llm = services.llmStatus();
      serviceHealth.llm = {
        status: llm.state === 'OPEN' ? 'degraded' : 'healthy',
        state: llm.state,
        checked_at: checkedAt,
      };
    }

    const healthy = Object.values(serviceHealth).every(service => service.status === 'healthy');
    const memory = process.memoryUsage();

    res.status(healthy ? 200 : 503).json({
      success: healthy,
      data: {
        status: healthy ? 'healthy' : 'unhealthy',
        timestamp: checkedAt,
        uptime: process.uptime(),
        version: settings.app.version,
        node_version: process.version,
        memory: {
          used: Math.round(memory.heapUsed / 1024 / 1024),
          total: Math.round(memory.heapTotal / 1024 / 1024),
        },
        services: serviceHealth,
        response_time_ms: Date.now() - startTime,
      },
    });
  }));

  return router;
};
