import { parseRateLimit } from './rate-limit';

describe('parseRateLimit', () => {
  it.each([
    ['100 per hour', { limit: 100, ttlMs: 3_600_000 }],
    ['10/minute', { limit: 10, ttlMs: 60_000 }],
    ['5 per 30 seconds', { limit: 5, ttlMs: 30_000 }],
    ['1000 per day', { limit: 1000, ttlMs: 86_400_000 }],
    ['  3 PER SECOND ', { limit: 3, ttlMs: 1_000 }],
  ])('parses "%s"', (input, expected) => {
    expect(parseRateLimit(input)).toEqual(expected);
  });

  it('rejects unparsable strings', () => {
    expect(() => parseRateLimit('lots')).toThrow('Límite de peticiones inválido');
    expect(() => parseRateLimit('100 per fortnight')).toThrow();
  });

  it('rejects zero limits', () => {
    expect(() => parseRateLimit('0 per hour')).toThrow('valores deben ser > 0');
  });
});
