import { HealthCheckResponse, ReadinessCheck, ReadinessReport } from '../types';
import { env, pipelineSettingsFromEnv } from '../config';
import type { PipelineSettings } from '../config';
import { parseOrders } from '../parsing';
import { matchTransactions } from '../matching';
import type { TransactionRecord } from '../matching';
import { generateMemo } from '../memo';

// ============================================
// Self-check data
// ============================================

const SELF_CHECK_ORDER_ID = '000-0000000-0000000';

const SELF_CHECK_TEXT = [
  'Order placed January 2, 2025',
  'Total $1.00',
  `Order # ${SELF_CHECK_ORDER_ID}`,
  'Sample Notebook A5',
].join('\n');

// Same day as the order, so any configured date window admits it
const SELF_CHECK_TRANSACTION: TransactionRecord = {
  id: 'self-check',
  amount: -1000,
  date: new Date(Date.UTC(2025, 0, 2)),
  payee: 'Amazon',
  memo: '',
  category: null,
};

const skipped = (name: ReadinessCheck['name']): ReadinessCheck => ({
  name,
  ok: false,
  detail: 'Not run: an earlier check failed',
});

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  constructor(private readonly settings: PipelineSettings = pipelineSettingsFromEnv(env)) {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
      vendorDomain: this.settings.parse.vendorDomain,
    };
  }

  /**
   * Runs a known order through parse, match and memo with the configured
   * settings. There are no external dependencies to ping.
   */
  checkReadiness(): ReadinessReport {
    const checks = this.runSelfCheck();
    return { ready: checks.every((check) => check.ok), checks };
  }

  private runSelfCheck(): ReadinessCheck[] {
    const order = parseOrders(SELF_CHECK_TEXT, this.settings.parse).orders.find(
      (parsed) => parsed.orderId === SELF_CHECK_ORDER_ID
    );
    if (!order) {
      return [
        { name: 'parser', ok: false, detail: 'Sample order block was not parsed' },
        skipped('matcher'),
        skipped('memo'),
      ];
    }
    const parser: ReadinessCheck = { name: 'parser', ok: true, detail: `Parsed order ${order.orderId}` };

    const [result] = matchTransactions([order], [SELF_CHECK_TRANSACTION], this.settings.match);
    if (result.status !== 'MATCHED') {
      return [
        parser,
        { name: 'matcher', ok: false, detail: `Sample charge was ${result.status}` },
        skipped('memo'),
      ];
    }
    const matcher: ReadinessCheck = { name: 'matcher', ok: true, detail: result.matchDetails.explanation };

    const { maxLength } = this.settings.memo;
    const generation = generateMemo(result, false, this.settings.memo);
    const memoFits =
      generation.kind === 'single' &&
      !generation.memo.itemsDropped &&
      generation.memo.text.length <= maxLength;

    const memo: ReadinessCheck = memoFits
      ? { name: 'memo', ok: true, detail: `Memo with item text and order link fits ${maxLength} characters` }
      : {
          name: 'memo',
          ok: false,
          detail: `Memo limit ${maxLength} leaves no room for item text beside the order link`,
        };

    return [parser, matcher, memo];
  }
}

// Singleton instance
export const healthService = new HealthService();

export default healthService;
