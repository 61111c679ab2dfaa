import { Router } from 'express';
import { healthController } from '../controllers';

const router = Router();

/**
 * @route   GET /health
 * @desc    Uptime, version and the configured vendor domain
 * @access  Public
 */
router.get('/', healthController.getHealth);

/**
 * @route   GET /health/ready
 * @desc    Parses, matches and writes a memo for a sample order with the
 *          configured settings; 503 names the step that failed
 * @access  Public
 */
router.get('/ready', healthController.getReadiness);

/**
 * @route   GET /health/live
 * @access  Public
 */
router.get('/live', healthController.getLiveness);

export default router;
