import type { OrderRecord } from '../../src/parsing/types';
import type { TransactionRecord } from '../../src/matching/types';
import { buildOrderLink } from '../../src/parsing/orderLink';

export const utcDate = (isoDate: string): Date => new Date(`${isoDate}T00:00:00.000Z`);

export const createOrder = (
  orderId: string,
  totalAmount: number,
  orderDate: string,
  items: OrderRecord['items'] = []
): OrderRecord => ({
  orderId,
  orderDate: utcDate(orderDate),
  totalAmount,
  items,
  orderLink: buildOrderLink(orderId, 'amazon.ca'),
});

export const createTransaction = (
  id: string,
  amount: number,
  date: string,
  overrides: Partial<TransactionRecord> = {}
): TransactionRecord => ({
  id,
  amount,
  date: utcDate(date),
  payee: 'Amazon.ca',
  memo: '',
  category: null,
  ...overrides,
});
