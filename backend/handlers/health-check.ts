import type { Request, Response } from 'express';
import type { IIntelStorage } from 'backend/apps/threat-intel/queries/intel-storage';
import { errorMessage } from 'backend/utils/log';

export function handleHealthCheck(storage: IIntelStorage, dialect: string) {
  return async (_req: Request, res: Response) => {
    const startTime = Date.now();

    try {
      await storage.ping();
      res.json({
        status: 'healthy',
        database: { dialect, connected: true },
        responseTime: Date.now() - startTime,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      console.error('Health check failed:', error);
      res.status(503).json({
        status: 'unhealthy',
        database: { dialect, connected: false, error: errorMessage(error) },
        responseTime: Date.now() - startTime,
        timestamp: new Date().toISOString(),
      });
    }
  };
}
