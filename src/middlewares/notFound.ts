import { Request, Response } from 'express';
import { sendError } from '../utils';

/**
 * Handle 404 - Route not found
 */
export const notFound = (req: Request, res: Response): void => {
  sendError(res, 'Route not found', 404, `${req.method} ${req.originalUrl}`);
};

export default notFound;
