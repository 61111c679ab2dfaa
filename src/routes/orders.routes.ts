import { Router } from 'express';
import { categorizationController } from '../controllers';
import { validateRequest } from '../middlewares';
import { parseOrdersBodySchema } from './schemas';

const router = Router();

/**
 * @route   POST /orders/parse
 * @desc    Parse pasted order-history text into orders
 * @access  Public
 *
 * Request body:
 * - text: string - The pasted page
 *
 * Response:
 * - 200 OK: { orders, orderCount, droppedBlockCount, duplicateOrderCount }
 * - 400 Bad Request: Missing or oversized text
 */
router.post('/parse', validateRequest({ body: parseOrdersBodySchema }), categorizationController.parseOrders);

export default router;
