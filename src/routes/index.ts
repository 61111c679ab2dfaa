import { Router } from 'express';
import healthRoutes from './health.routes';
import ordersRoutes from './orders.routes';
import previewRoutes from './preview.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Order text parsing
router.use('/orders', ordersRoutes);

// Match + memo preview
router.use('/preview', previewRoutes);

export default router;
