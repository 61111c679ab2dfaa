import { Router } from 'express';
import { categorizationController } from '../controllers';
import { validateRequest } from '../middlewares';
import { previewBodySchema } from './schemas';

const router = Router();

/**
 * @route   POST /preview
 * @desc    Match transactions to pasted orders and draft memos
 * @access  Public
 *
 * Request body:
 * - text: string - Pasted order history
 * - transactions: { id, amount (milliunits), date (YYYY-MM-DD), payee, memo, category? }[]
 * - split?: boolean - Draft one memo per item for multi-item orders
 * - vendorOnly?: boolean - Only consider uncategorized vendor transactions
 *
 * Nothing is written anywhere; suggested updates are returned for the
 * caller to apply.
 *
 * Response:
 * - 200 OK: { parse, skippedTransactionCount, previews, counts }
 * - 400 Bad Request: Validation failed
 */
router.post('/', validateRequest({ body: previewBodySchema }), categorizationController.preview);

export default router;
