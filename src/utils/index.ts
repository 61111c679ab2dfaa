export { default as logger, Logging } from './logger';
export { sendSuccess, sendError } from './response';
export { asyncHandler } from './asyncHandler';
export { AppError } from './AppError';
export { parseAmountToCents, toAbsoluteCents, formatCents } from './money';
