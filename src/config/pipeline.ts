import { DEFAULT_PARSE_OPTIONS } from '../parsing/constants';
import type { OrderParseOptions } from '../parsing/types';
import type { MatchOptions } from '../matching/types';
import { DEFAULT_MEMO_OPTIONS } from '../memo/constants';
import type { MemoOptions } from '../memo/types';
import type { EnvConfig } from '../types';

/**
 * Everything the parse → match → memo pipeline needs, passed explicitly.
 * The core modules never read the environment themselves.
 */
export interface PipelineSettings {
  parse: OrderParseOptions;
  match: MatchOptions;
  memo: MemoOptions;
  /** Payee substrings that mark a transaction as coming from the vendor */
  payeeKeywords: string[];
}

type PipelineEnv = Pick<
  EnvConfig,
  | 'VENDOR_DOMAIN'
  | 'MEMO_MAX_LENGTH'
  | 'MATCH_DAYS_BEFORE'
  | 'MATCH_DAYS_AFTER'
  | 'AMOUNT_TOLERANCE_CENTS'
  | 'VENDOR_PAYEE_KEYWORDS'
>;

export const pipelineSettingsFromEnv = (config: PipelineEnv): PipelineSettings => ({
  parse: {
    ...DEFAULT_PARSE_OPTIONS,
    vendorDomain: config.VENDOR_DOMAIN,
  },
  match: {
    amountToleranceCents: config.AMOUNT_TOLERANCE_CENTS,
    dateWindow: {
      maxDaysOrderBeforeTransaction: config.MATCH_DAYS_BEFORE,
      maxDaysOrderAfterTransaction: config.MATCH_DAYS_AFTER,
    },
  },
  memo: {
    ...DEFAULT_MEMO_OPTIONS,
    maxLength: config.MEMO_MAX_LENGTH,
  },
  payeeKeywords: config.VENDOR_PAYEE_KEYWORDS.map((keyword) => keyword.toLowerCase()),
});
