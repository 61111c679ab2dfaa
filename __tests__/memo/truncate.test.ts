import { fitMemo, sanitizeMemo, stripControlCharacters, truncateText } from '../../src/memo/truncate';
import { buildOrderLink } from '../../src/parsing/orderLink';

// 87 characters
const link = buildOrderLink('702-8237239-1234567', 'amazon.ca');
const body = 'Tuna Feast 24-pack, Salmon & Shrimp Feast 24-pack';

describe('truncateText', () => {
  it('should leave text that fits untouched', () => {
    expect(truncateText('Wireless Mouse', 14)).toBe('Wireless Mouse');
  });

  it('should cut and append the marker within the limit', () => {
    expect(truncateText('Wireless Mouse', 10)).toBe('Wireles...');
  });

  it('should not leave a space before the marker', () => {
    expect(truncateText('Tuna Feast 24-pack', 8)).toBe('Tuna...');
  });

  it('should never split a surrogate pair', () => {
    expect(truncateText('🎉🎉🎉', 5)).toBe('🎉...');
    expect(truncateText('🎉🎉🎉', 4)).toBe('');
  });

  it('should return an empty string when only the marker would fit', () => {
    expect(truncateText('Wireless Mouse', 3)).toBe('');
  });

  it('should use a custom marker', () => {
    expect(truncateText('Wireless Mouse', 9, '…')).toBe('Wireless…');
  });
});

describe('fitMemo', () => {
  it('should put the link on its own line when everything fits', () => {
    expect(fitMemo(body, link, 200)).toEqual({
      text: `${body}\n${link}`,
      truncated: false,
      itemsDropped: false,
    });
  });

  it('should truncate only the item text and keep the link whole', () => {
    const memo = fitMemo(body, link, 100);

    expect(memo).toEqual({ text: `Tuna Feas...\n${link}`, truncated: true, itemsDropped: false });
    expect(memo.text).toHaveLength(100);
    expect(memo.text.match(/https?:\/\/\S+/)?.[0]).toBe(link);
  });

  it('should return the link alone when no item text fits', () => {
    expect(fitMemo(body, link, 90)).toEqual({ text: link, truncated: true, itemsDropped: true });
  });

  it('should return a link longer than the limit whole', () => {
    expect(fitMemo(body, link, 50)).toEqual({ text: link, truncated: true, itemsDropped: true });
  });

  it('should fit text without a link', () => {
    expect(fitMemo('Wireless Mouse', undefined, 10)).toEqual({
      text: 'Wireles...',
      truncated: true,
      itemsDropped: false,
    });
  });

  it('should keep the limit for every length of item text', () => {
    for (let length = 1; length <= 150; length += 7) {
      const memo = fitMemo('x'.repeat(length), link, 120);

      expect(memo.text.length).toBeLessThanOrEqual(120);
      expect(memo.text.endsWith(link)).toBe(true);
    }
  });
});

describe('sanitizeMemo', () => {
  it('should truncate long text to the limit', () => {
    const memo = sanitizeMemo('A'.repeat(300));

    expect(memo).toBe(`${'A'.repeat(197)}...`);
  });

  it('should keep a trailing link intact', () => {
    const memo = sanitizeMemo(`${'x'.repeat(150)}\n${link}`);

    expect(memo).toBe(`${'x'.repeat(109)}...\n${link}`);
    expect(memo).toHaveLength(200);
  });

  it('should strip control characters but keep newlines', () => {
    expect(sanitizeMemo('Tuna\u0007 Feast\tPack\nLine two')).toBe('Tuna Feast Pack\nLine two');
  });
});

describe('stripControlCharacters', () => {
  it('should turn tabs into spaces', () => {
    expect(stripControlCharacters('a\tb\u0000c')).toBe('a bc');
  });
});
