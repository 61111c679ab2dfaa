import { calendarDate, parseDateLine, toIsoDate } from '../../src/parsing/dates';
import { buildOrderLink } from '../../src/parsing/orderLink';

describe('parseDateLine', () => {
  it.each([
    ['July 31, 2025', '2025-07-31'],
    ['Jul 31 2025', '2025-07-31'],
    ['Sept 3, 2025', '2025-09-03'],
    ['31 July 2025', '2025-07-31'],
    ['2025-07-31', '2025-07-31'],
    ['Ordered on 2 Jan 2025', '2025-01-02'],
    ['Order date: March 9, 2024', '2024-03-09'],
  ])('should parse "%s"', (line, expected) => {
    const date = parseDateLine(line);

    expect(date && toIsoDate(date)).toBe(expected);
  });

  it('should reject impossible days', () => {
    expect(parseDateLine('February 30, 2025')).toBeNull();
    expect(parseDateLine('2025-13-01')).toBeNull();
  });

  it('should reject dates without a year and dates inside sentences', () => {
    expect(parseDateLine('Delivered August 2')).toBeNull();
    expect(parseDateLine('Arriving July 31, 2025 by 9pm')).toBeNull();
  });

  it('should return UTC midnight', () => {
    expect(parseDateLine('July 31, 2025')?.toISOString()).toBe('2025-07-31T00:00:00.000Z');
  });
});

describe('calendarDate', () => {
  it('should accept leap days only in leap years', () => {
    expect(calendarDate(2024, 1, 29)).not.toBeNull();
    expect(calendarDate(2025, 1, 29)).toBeNull();
  });
});

describe('buildOrderLink', () => {
  it('should build the order details URL', () => {
    expect(buildOrderLink('702-8237239-1234567', 'amazon.ca')).toBe(
      'https://www.amazon.ca/gp/your-account/order-details?ie=UTF8&orderID=702-8237239-1234567'
    );
  });

  it('should normalize a domain given with protocol, www or trailing slash', () => {
    expect(buildOrderLink('702-8237239-1234567', 'https://www.amazon.co.uk/')).toBe(
      'https://www.amazon.co.uk/gp/your-account/order-details?ie=UTF8&orderID=702-8237239-1234567'
    );
  });
});
