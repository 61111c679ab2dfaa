import { explainMatch } from '../../src/matching/explanation';
import { DEFAULT_DATE_WINDOW } from '../../src/matching/constants';

describe('explainMatch', () => {
  const base = {
    amountCents: 5757,
    amountCandidateCount: 1,
    windowCandidateCount: 1,
    dateWindow: DEFAULT_DATE_WINDOW,
  };

  it('should explain a dated match', () => {
    expect(
      explainMatch({
        ...base,
        reason: 'exact-amount+date-window',
        orderId: '702-8237239-1234567',
        dayOffset: 2,
      })
    ).toBe('Order 702-8237239-1234567 totals 57.57. Placed 2 days before the transaction');
  });

  it('should mention how many orders were in the window', () => {
    expect(
      explainMatch({
        ...base,
        reason: 'exact-amount+date-window',
        windowCandidateCount: 2,
        orderId: '702-8237239-1234567',
        dayOffset: 0,
      })
    ).toBe('Order 702-8237239-1234567 totals 57.57. Placed on the transaction date. Closest of 2 orders');
  });

  it('should explain a missing amount', () => {
    expect(explainMatch({ ...base, reason: 'no-amount-match', amountCandidateCount: 0, windowCandidateCount: 0 })).toBe(
      'No order totals 57.57'
    );
  });

  it('should explain orders outside the window', () => {
    expect(explainMatch({ ...base, reason: 'outside-date-window', windowCandidateCount: 0 })).toBe(
      '1 order totals 57.57. None placed within 7 days before or 2 days after the transaction'
    );
  });

  it('should list tied orders', () => {
    expect(
      explainMatch({
        ...base,
        reason: 'ambiguous-multiple',
        amountCandidateCount: 2,
        windowCandidateCount: 2,
        tiedOrderIds: ['702-0000000-0000001', '702-0000000-0000002'],
      })
    ).toBe(
      '2 orders total 57.57 and are equally close to the transaction date. Candidates: 702-0000000-0000001, 702-0000000-0000002'
    );
  });
});
