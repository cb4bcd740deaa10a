import { parseUtcTimestamp, settlementInstantOf, formatUtcDate, formatUtcDateTime } from './time';

describe('parseUtcTimestamp', () => {
  it('should parse a date as UTC midnight', () => {
    expect(parseUtcTimestamp('2026-02-06')).toBe(Date.UTC(2026, 1, 6));
  });

  it('should parse a date and time', () => {
    expect(parseUtcTimestamp('2026-02-06 07:30')).toBe(Date.UTC(2026, 1, 6, 7, 30));
    expect(parseUtcTimestamp('2026-02-06T07:30:15Z')).toBe(Date.UTC(2026, 1, 6, 7, 30, 15));
  });

  it('should reject dates that do not exist', () => {
    expect(parseUtcTimestamp('2026-02-30')).toBeNull();
    expect(parseUtcTimestamp('2026-13-01')).toBeNull();
    expect(parseUtcTimestamp('2026-02-06 24:00')).toBeNull();
    expect(parseUtcTimestamp('yesterday')).toBeNull();
  });
});

describe('settlementInstantOf', () => {
  it('should return 08:00 UTC of the day', () => {
    expect(settlementInstantOf('2026-03-27')).toBe(Date.UTC(2026, 2, 27, 8));
  });

  it('should only accept plain dates', () => {
    expect(settlementInstantOf('2026-03-27 10:00')).toBeNull();
    expect(settlementInstantOf('27MAR26')).toBeNull();
  });
});

describe('formatting', () => {
  const timestamp = Date.UTC(2026, 2, 27, 8, 5, 9);

  it('should format a UTC date', () => {
    expect(formatUtcDate(timestamp)).toBe('2026-03-27');
  });

  it('should format a UTC date and time', () => {
    expect(formatUtcDateTime(timestamp)).toBe('2026-03-27 08:05:09');
  });
});
