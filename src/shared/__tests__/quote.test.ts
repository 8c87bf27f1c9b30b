import { describe, it, expect } from 'vitest';
import { quoteIdentifier, quoteLiteral, quoteQualifiedName } from '../quote';

describe('quoteIdentifier', () => {
  it('leaves plain names bare and quotes the rest', () => {
    expect(quoteIdentifier('age')).toBe('age');
    expect(quoteIdentifier('user')).toBe('"user"');
    expect(quoteIdentifier('createdAt')).toBe('"createdAt"');
    expect(quoteIdentifier('we"ird')).toBe('"we""ird"');
    expect(quoteIdentifier('1st')).toBe('"1st"');
  });

  it('rejects empty names and NUL characters', () => {
    expect(() => quoteIdentifier('')).toThrow(TypeError);
    expect(() => quoteIdentifier('a\u0000b')).toThrow(TypeError);
  });

  it('quotes each part of a qualified name', () => {
    expect(quoteQualifiedName('public.order')).toBe('public."order"');
    expect(() => quoteQualifiedName('a..b')).toThrow('Invalid qualified name: a..b');
  });
});

describe('quoteLiteral', () => {
  it('renders defaults as SQL literals', () => {
    expect(quoteLiteral(null)).toBe('NULL');
    expect(quoteLiteral(true)).toBe('TRUE');
    expect(quoteLiteral(false)).toBe('FALSE');
    expect(quoteLiteral(1.5)).toBe('1.5');
    expect(quoteLiteral(10n)).toBe('10');
    expect(quoteLiteral("O'Brien")).toBe("'O''Brien'");
    expect(() => quoteLiteral(Number.NaN)).toThrow(TypeError);
  });
});
