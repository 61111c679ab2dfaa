import { loadEnv, pipelineSettingsFromEnv } from '../../src/config';

describe('Config', () => {
  describe('loadEnv', () => {
    it('should apply defaults to an empty environment', () => {
      const config = loadEnv({});

      expect(config).toMatchObject({
        NODE_ENV: 'development',
        PORT: 3000,
        API_PREFIX: '/api/v1',
        CORS_ORIGIN: ['*'],
        LOG_LEVEL: 'info',
        VENDOR_DOMAIN: 'amazon.ca',
        MEMO_MAX_LENGTH: 200,
        MATCH_DAYS_BEFORE: 7,
        MATCH_DAYS_AFTER: 2,
        AMOUNT_TOLERANCE_CENTS: 0,
        VENDOR_PAYEE_KEYWORDS: ['amazon', 'amzn', 'amz'],
      });
    });

    it('should coerce numbers and split comma lists', () => {
      const config = loadEnv({
        PORT: '8080',
        MEMO_MAX_LENGTH: '120',
        CORS_ORIGIN: 'http://localhost:5173, https://budget.example.com',
      });

      expect(config.PORT).toBe(8080);
      expect(config.MEMO_MAX_LENGTH).toBe(120);
      expect(config.CORS_ORIGIN).toEqual(['http://localhost:5173', 'https://budget.example.com']);
    });

    it('should list every invalid variable', () => {
      expect(() => loadEnv({ PORT: 'abc', LOG_LEVEL: 'loud' })).toThrow(
        /^Invalid environment configuration: PORT: .+; LOG_LEVEL: .+$/
      );
    });

    it('should reject a negative date window', () => {
      expect(() => loadEnv({ MATCH_DAYS_AFTER: '-1' })).toThrow(/MATCH_DAYS_AFTER/);
    });

    it('should return a frozen object', () => {
      expect(Object.isFrozen(loadEnv({}))).toBe(true);
    });
  });

  describe('pipelineSettingsFromEnv', () => {
    it('should map environment values onto pipeline options', () => {
      const settings = pipelineSettingsFromEnv(
        loadEnv({
          VENDOR_DOMAIN: 'amazon.com',
          MEMO_MAX_LENGTH: '150',
          MATCH_DAYS_BEFORE: '5',
          MATCH_DAYS_AFTER: '1',
          AMOUNT_TOLERANCE_CENTS: '2',
          VENDOR_PAYEE_KEYWORDS: 'Amazon,AMZN Mktp',
        })
      );

      expect(settings).toEqual({
        parse: { vendorDomain: 'amazon.com', minItemNameLength: 8, maxItemsPerOrder: 10 },
        match: {
          amountToleranceCents: 2,
          dateWindow: { maxDaysOrderBeforeTransaction: 5, maxDaysOrderAfterTransaction: 1 },
        },
        memo: { maxLength: 150, truncationMarker: '...', itemSeparator: ', ', fallbackTitle: 'Amazon Purchase' },
        payeeKeywords: ['amazon', 'amzn mktp'],
      });
    });
  });
});
