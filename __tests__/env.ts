/**
 * Runs before the test framework loads, so config/index.ts sees these values
 * the first time any test file imports it.
 */
process.env.NODE_ENV = 'test';
process.env.CORS_ORIGIN = '*';
process.env.PORT = '3001';
process.env.LOG_LEVEL = 'error'; // Reduce logging noise during tests
process.env.API_PREFIX = '/api/v1';
process.env.VENDOR_DOMAIN = 'amazon.ca';
process.env.MEMO_MAX_LENGTH = '200';
process.env.MATCH_DAYS_BEFORE = '7';
process.env.MATCH_DAYS_AFTER = '2';
process.env.AMOUNT_TOLERANCE_CENTS = '0';
process.env.VENDOR_PAYEE_KEYWORDS = 'amazon,amzn,amz';
