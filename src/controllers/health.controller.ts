import { Request, Response } from 'express';
import { healthService } from '../services';
import { sendSuccess, sendError } from '../utils';

/**
 * Health checks. All of them are synchronous: the service keeps no
 * connections.
 */
export class HealthController {
  getHealth = (_req: Request, res: Response): void => {
    sendSuccess(res, healthService.getHealthStatus(), 'Service is healthy');
  };

  /**
   * 503 lists each failed self-check as a detail entry
   */
  getReadiness = (_req: Request, res: Response): void => {
    const report = healthService.checkReadiness();

    if (report.ready) {
      sendSuccess(res, report, 'Service is ready');
      return;
    }

    const failed = report.checks
      .filter((check) => !check.ok)
      .map((check) => ({ field: check.name, message: check.detail }));
    sendError(res, 'Service is not ready', 503, undefined, failed);
  };

  getLiveness = (_req: Request, res: Response): void => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  };
}

export const healthController = new HealthController();

export default healthController;
