/**
 * Request body schemas for the order and preview routes.
 */

import { z } from 'zod';
import { calendarDate } from '../parsing';

// Pasted order history can be long, but not unbounded
export const MAX_PASTED_TEXT_LENGTH = 500_000;
export const MAX_TRANSACTIONS_PER_REQUEST = 500;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * `YYYY-MM-DD` → Date at UTC midnight; impossible dates are rejected.
 */
export const calendarDateSchema = z
  .string()
  .regex(ISO_DATE, 'Expected a date as YYYY-MM-DD')
  .transform((value, ctx) => {
    const [, year, month, day] = ISO_DATE.exec(value) ?? [];
    const date = calendarDate(Number(year), Number(month) - 1, Number(day));
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a calendar date: ${value}` });
      return z.NEVER;
    }
    return date;
  });

const pastedTextSchema = z
  .string({ required_error: 'text is required' })
  .max(MAX_PASTED_TEXT_LENGTH, `text may not exceed ${MAX_PASTED_TEXT_LENGTH} characters`);

export const transactionSchema = z.object({
  id: z.string().min(1),
  // milliunits, outflow negative
  amount: z.number().int(),
  date: calendarDateSchema,
  payee: z.string().default(''),
  memo: z.string().default(''),
  category: z.string().nullable().optional(),
});

export const parseOrdersBodySchema = z.object({
  text: pastedTextSchema,
});

export const previewBodySchema = z.object({
  text: pastedTextSchema,
  transactions: z.array(transactionSchema).max(MAX_TRANSACTIONS_PER_REQUEST),
  split: z.boolean().optional(),
  vendorOnly: z.boolean().optional(),
});

export type ParseOrdersBody = z.infer<typeof parseOrdersBodySchema>;
export type PreviewBody = z.infer<typeof previewBodySchema>;
