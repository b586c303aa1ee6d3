import { describe, it, expect } from 'vitest';
import { EXPIRY_NOT_APPLICABLE, extractQuantity, parseExpiry } from '../src/utils/parsers';
import { toCsv } from '../src/utils/csv';
import { expectErr, expectOk } from './helpers';

describe('extractQuantity', () => {
  const cases: [string, number][] = [
    ['10', 10],
    ['10 bottles', 10],
    ['about 3 big boxes', 3],
    ['2 packs of 6', 2],
    ['007', 7],
  ];

  it.each(cases)('%s → %d', (text, expected) => {
    expect(expectOk(extractQuantity(text))).toBe(expected);
  });

  it('rejects text without a number', () => {
    expect(expectErr(extractQuantity('a few'))).toEqual({
      kind: 'InvalidQuantity',
      message: 'Please include a positive number for the quantity.',
    });
  });

  it('gives the same number when re-parsing its output', () => {
    const once = expectOk(extractQuantity('12 cans'));
    expect(expectOk(extractQuantity(String(once)))).toBe(once);
  });

  it('rejects zero', () => {
    expect(expectErr(extractQuantity('0 boxes'))).toEqual({
      kind: 'InvalidQuantity',
      message: 'Quantity must be positive.',
    });
  });
});

describe('parseExpiry', () => {
  const cases: [string, string][] = [
    ['31/12/2026', '31/12/26'],
    ['1/2/2027', '01/02/27'],
    ['05/06/26', '05/06/26'],
    ['2026-03-09', '09/03/26'],
    ['  29/02/2028 ', '29/02/28'],
  ];

  it.each(cases)('%s → %s', (text, expected) => {
    expect(expectOk(parseExpiry(text))).toBe(expected);
  });

  it.each(['na', 'NA', 'n/a', 'None'])('"%s" means not applicable', (text) => {
    expect(expectOk(parseExpiry(text))).toBe(EXPIRY_NOT_APPLICABLE);
  });

  it.each(['31/02/2026', '29/02/2027', '13/13/26', '2026/01/01', 'next week', '12-01-2026'])(
    'rejects %s',
    (text) => {
      expect(expectErr(parseExpiry(text))).toEqual({ kind: 'InvalidDate', input: text });
    }
  );

  it('rejects an empty answer', () => {
    expect(expectErr(parseExpiry('   '))).toEqual({ kind: 'InvalidDate', input: '' });
  });

  it('accepts its own output', () => {
    for (const input of ['2026-03-09', '9/3/2026', 'none']) {
      const once = expectOk(parseExpiry(input));
      expect(expectOk(parseExpiry(once))).toBe(once);
    }
  });
});

describe('toCsv', () => {
  it('writes a header and quotes cells that need it', () => {
    const csv = toCsv(['name', 'qty'], [
      ['Rice, brown', 3],
      ['Said "fresh"', 1],
    ]);

    expect(csv).toBe('name,qty\n"Rice, brown",3\n"Said ""fresh""",1\n');
  });

  it('writes only the header when there are no rows', () => {
    expect(toCsv(['a', 'b'], [])).toBe('a,b\n');
  });
});
