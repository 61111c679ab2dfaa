/**
 * Tests for order ↔ transaction matching
 *
 * Policy: exact amount → date window → closest date; exact ties are
 * ambiguous and consume nothing.
 */

import { matchTransaction, matchTransactions, resolveMatchOptions } from '../../src/matching/matchTransactions';
import { DEFAULT_DATE_WINDOW } from '../../src/matching/constants';
import { createOrder, createTransaction } from './helpers';

describe('matchTransactions', () => {
  // ============================================
  // Test fixtures
  // ============================================

  const catFoodOrder = createOrder('702-8237239-1234567', 5757, '2025-07-31', [
    { name: 'Tuna Feast 24-pack' },
    { name: 'Salmon & Shrimp Feast 24-pack' },
  ]);

  // ============================================
  // MATCHED
  // ============================================

  describe('MATCHED status', () => {
    it('should match an exact amount inside the date window', () => {
      const [result] = matchTransactions([catFoodOrder], [createTransaction('t1', -57570, '2025-08-02')]);

      expect(result.status).toBe('MATCHED');
      expect(result.reason).toBe('exact-amount+date-window');
      expect(result.order).toBe(catFoodOrder);
      expect(result.candidates).toEqual([]);
      expect(result.matchDetails).toEqual({
        amountCents: 5757,
        amountCandidateCount: 1,
        windowCandidateCount: 1,
        dayOffset: 2,
        explanation: 'Order 702-8237239-1234567 totals 57.57. Placed 2 days before the transaction',
      });
    });

    it('should match inflows by their absolute amount', () => {
      const [result] = matchTransactions([catFoodOrder], [createTransaction('refund', 57570, '2025-08-01')]);

      expect(result.status).toBe('MATCHED');
    });

    it('should round milliunits to the nearest cent', () => {
      const [result] = matchTransactions([catFoodOrder], [createTransaction('t1', -57565, '2025-08-01')]);

      // 57565 milliunits = 5756.5 cents → 5757
      expect(result.status).toBe('MATCHED');
    });

    it('should pick the order closest to the transaction date', () => {
      const older = createOrder('702-0000000-0000001', 2500, '2025-07-25');
      const newer = createOrder('702-0000000-0000002', 2500, '2025-07-30');

      const [result] = matchTransactions([older, newer], [createTransaction('t1', -25000, '2025-08-01')]);

      expect(result.status).toBe('MATCHED');
      expect(result.order?.orderId).toBe('702-0000000-0000002');
      expect(result.matchDetails.windowCandidateCount).toBe(2);
      expect(result.matchDetails.explanation).toBe(
        'Order 702-0000000-0000002 totals 25.00. Placed 2 days before the transaction. Closest of 2 orders'
      );
    });

    it('should match on amount alone when the date window is disabled', () => {
      const [result] = matchTransactions([catFoodOrder], [createTransaction('t1', -57570, '2026-01-15')], {
        dateWindow: null,
      });

      expect(result.status).toBe('MATCHED');
      expect(result.reason).toBe('exact-amount');
    });

    it('should allow a configured amount tolerance', () => {
      const [result] = matchTransactions([catFoodOrder], [createTransaction('t1', -57580, '2025-08-02')], {
        amountToleranceCents: 1,
      });

      expect(result.status).toBe('MATCHED');
    });
  });

  // ============================================
  // UNMATCHED
  // ============================================

  describe('UNMATCHED status', () => {
    it('should not match a different amount', () => {
      const [result] = matchTransactions([catFoodOrder], [createTransaction('t1', -57580, '2025-08-02')]);

      expect(result.status).toBe('UNMATCHED');
      expect(result.reason).toBe('no-amount-match');
      expect(result.order).toBeUndefined();
      expect(result.matchDetails.explanation).toBe('No order totals 57.58');
    });

    it('should stop matching once the transaction date leaves the window', () => {
      // 2025-08-07 is 7 days after the order, 2025-08-08 is 8
      const inside = matchTransactions([catFoodOrder], [createTransaction('t1', -57570, '2025-08-07')]);
      const outside = matchTransactions([catFoodOrder], [createTransaction('t1', -57570, '2025-08-08')]);

      expect(inside[0].status).toBe('MATCHED');
      expect(outside[0].status).toBe('UNMATCHED');
      expect(outside[0].reason).toBe('outside-date-window');
      expect(outside[0].matchDetails.amountCandidateCount).toBe(1);
      expect(outside[0].matchDetails.windowCandidateCount).toBe(0);
    });

    it('should allow orders at most two days after the transaction', () => {
      const twoAfter = matchTransactions([catFoodOrder], [createTransaction('t1', -57570, '2025-07-29')]);
      const threeAfter = matchTransactions([catFoodOrder], [createTransaction('t1', -57570, '2025-07-28')]);

      expect(twoAfter[0].status).toBe('MATCHED');
      expect(threeAfter[0].status).toBe('UNMATCHED');
    });

    it('should return UNMATCHED when there are no orders', () => {
      const [result] = matchTransactions([], [createTransaction('t1', -57570, '2025-08-02')]);

      expect(result.status).toBe('UNMATCHED');
      expect(result.reason).toBe('no-amount-match');
    });
  });

  // ============================================
  // AMBIGUOUS
  // ============================================

  describe('AMBIGUOUS status', () => {
    it('should not choose between equally close orders', () => {
      const before = createOrder('702-0000000-0000001', 2500, '2025-07-30');
      const after = createOrder('702-0000000-0000002', 2500, '2025-08-03');

      const [result] = matchTransactions([before, after], [createTransaction('t1', -25000, '2025-08-01')]);

      expect(result.status).toBe('AMBIGUOUS');
      expect(result.reason).toBe('ambiguous-multiple');
      expect(result.order).toBeUndefined();
      expect(result.candidates.map((order) => order.orderId)).toEqual([
        '702-0000000-0000001',
        '702-0000000-0000002',
      ]);
    });

    it('should leave tied orders available for later transactions', () => {
      const first = createOrder('702-0000000-0000001', 2500, '2025-08-01');
      const second = createOrder('702-0000000-0000002', 2500, '2025-08-01');

      const results = matchTransactions(
        [first, second],
        [createTransaction('t1', -25000, '2025-08-01'), createTransaction('t2', -25000, '2025-08-02')]
      );

      expect(results.map((result) => result.status)).toEqual(['AMBIGUOUS', 'AMBIGUOUS']);
    });
  });

  // ============================================
  // Consumption
  // ============================================

  describe('order consumption', () => {
    it('should not offer a matched order to a later transaction', () => {
      const results = matchTransactions(
        [catFoodOrder],
        [createTransaction('t1', -57570, '2025-08-01'), createTransaction('t2', -57570, '2025-08-02')]
      );

      expect(results[0].status).toBe('MATCHED');
      expect(results[1].status).toBe('UNMATCHED');
      expect(results[1].reason).toBe('no-amount-match');
    });

    it('should pair two identical charges with two identical orders in input order', () => {
      const first = createOrder('702-0000000-0000001', 1999, '2025-07-20');
      const second = createOrder('702-0000000-0000002', 1999, '2025-07-24');

      const results = matchTransactions(
        [first, second],
        [createTransaction('t1', -19990, '2025-07-24'), createTransaction('t2', -19990, '2025-07-25')]
      );

      expect(results.map((result) => result.order?.orderId)).toEqual([
        '702-0000000-0000002',
        '702-0000000-0000001',
      ]);
    });

    it('should treat a repeated order as one order', () => {
      const results = matchTransactions(
        [catFoodOrder, catFoodOrder],
        [createTransaction('t1', -57570, '2025-08-01'), createTransaction('t2', -57570, '2025-08-01')]
      );

      expect(results.map((result) => result.status)).toEqual(['MATCHED', 'UNMATCHED']);
      expect(results[0].order).toBe(catFoodOrder);
      expect(results[0].candidates).toEqual([]);
    });

    it('should keep the first of two records sharing an order id', () => {
      const first = createOrder('702-0000000-0000003', 1999, '2025-07-20');
      const repeated = createOrder('702-0000000-0000003', 1999, '2025-07-24');

      const results = matchTransactions(
        [first, repeated],
        [createTransaction('t1', -19990, '2025-07-24'), createTransaction('t2', -19990, '2025-07-24')]
      );

      expect(results[0].status).toBe('MATCHED');
      expect(results[0].order).toBe(first);
      expect(results[1].status).toBe('UNMATCHED');
    });

    it('should return one result per transaction in input order', () => {
      const transactions = [
        createTransaction('a', -100, '2025-08-01'),
        createTransaction('b', -57570, '2025-08-01'),
        createTransaction('c', -200, '2025-08-01'),
      ];

      const results = matchTransactions([catFoodOrder], transactions);

      expect(results.map((result) => result.transaction.id)).toEqual(['a', 'b', 'c']);
    });

    it('should not modify the orders array it is given', () => {
      const orders = [catFoodOrder];

      matchTransactions(orders, [createTransaction('t1', -57570, '2025-08-01')]);

      expect(orders).toEqual([catFoodOrder]);
    });

    it('should be deterministic', () => {
      const run = () =>
        matchTransactions([catFoodOrder], [createTransaction('t1', -57570, '2025-08-01')]).map(
          (result) => result.matchDetails
        );

      expect(run()).toEqual(run());
    });

    it('should reject inputs that are not arrays', () => {
      expect(() => Reflect.apply(matchTransactions, undefined, [null, []])).toThrow(TypeError);
    });
  });
});

describe('matchTransaction', () => {
  it('should use only the orders it is given', () => {
    const transaction = createTransaction('t1', -1000, '2025-08-01');

    expect(matchTransaction(transaction, []).status).toBe('UNMATCHED');
    expect(matchTransaction(transaction, [createOrder('702-0000000-0000001', 1000, '2025-08-01')]).status).toBe(
      'MATCHED'
    );
  });
});

describe('resolveMatchOptions', () => {
  it('should fill defaults', () => {
    expect(resolveMatchOptions()).toEqual({ amountToleranceCents: 0, dateWindow: DEFAULT_DATE_WINDOW });
  });

  it('should keep an explicit null window', () => {
    expect(resolveMatchOptions({ dateWindow: null }).dateWindow).toBeNull();
  });
});
