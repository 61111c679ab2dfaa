import { Request, Response } from 'express';
import { categorizationService } from '../services';
import type { ParseOrdersBody, PreviewBody } from '../routes/schemas';
import { sendSuccess, asyncHandler } from '../utils';

/**
 * Order parsing and match preview controller.
 * Bodies arrive already validated by `validateRequest`.
 */
export class CategorizationController {
  /**
   * POST /orders/parse
   */
  parseOrders = asyncHandler(
    async (req: Request<Record<string, string>, unknown, ParseOrdersBody>, res: Response): Promise<void> => {
      const summary = categorizationService.parseSummary(req.body.text);
      sendSuccess(res, summary, `Parsed ${summary.orderCount} order(s)`);
    }
  );

  /**
   * POST /preview
   */
  preview = asyncHandler(
    async (req: Request<Record<string, string>, unknown, PreviewBody>, res: Response): Promise<void> => {
      const result = categorizationService.preview(req.body);
      sendSuccess(res, result, `Matched ${result.counts.MATCHED} of ${result.previews.length} transaction(s)`);
    }
  );
}

export const categorizationController = new CategorizationController();

export default categorizationController;
