import { describe, it, expect } from 'vitest';
import { normalizeDate, parseDate } from '../../src/services/front-matter/date-normalizer.js';

function iso(value: unknown): string {
  if (!(value instanceof Date)) {
    throw new Error(`expected a Date, got ${String(value)}`);
  }
  return value.toISOString();
}

describe('normalizeDate', () => {
  it('should parse ISO-8601 with a Z suffix', () => {
    expect(iso(normalizeDate('2023-05-01T12:00:00Z'))).toBe('2023-05-01T12:00:00.000Z');
  });

  it('should apply explicit offsets', () => {
    expect(iso(normalizeDate('2023-05-01T12:00:00+08:00'))).toBe('2023-05-01T04:00:00.000Z');
    expect(iso(normalizeDate('2023-05-01T12:00:00-0530'))).toBe('2023-05-01T17:30:00.000Z');
  });

  it('should read ISO values without an offset as UTC', () => {
    expect(iso(normalizeDate('2023-05-01T12:00'))).toBe('2023-05-01T12:00:00.000Z');
  });

  it('should keep fractional seconds', () => {
    expect(iso(normalizeDate('2023-05-01T12:00:00.5Z'))).toBe('2023-05-01T12:00:00.500Z');
  });

  it('should parse space-separated date and time as UTC', () => {
    expect(iso(normalizeDate('2023-05-01 08:30:15'))).toBe('2023-05-01T08:30:15.000Z');
  });

  it('should parse a bare date as midnight UTC', () => {
    expect(iso(normalizeDate('2023-05-01'))).toBe('2023-05-01T00:00:00.000Z');
  });

  it('should tolerate surrounding whitespace', () => {
    expect(iso(normalizeDate(' 2023-05-01 '))).toBe('2023-05-01T00:00:00.000Z');
  });

  it('should keep unrecognized strings unchanged', () => {
    expect(normalizeDate('not-a-date')).toBe('not-a-date');
    expect(normalizeDate('May 1, 2023')).toBe('May 1, 2023');
  });

  it('should reject dates the calendar does not have', () => {
    expect(normalizeDate('2023-02-30')).toBe('2023-02-30');
    expect(normalizeDate('2023-13-01')).toBe('2023-13-01');
    expect(normalizeDate('2023-05-01 24:00:00')).toBe('2023-05-01 24:00:00');
  });

  it('should accept leap days in leap years only', () => {
    expect(iso(normalizeDate('2024-02-29'))).toBe('2024-02-29T00:00:00.000Z');
    expect(normalizeDate('2023-02-29')).toBe('2023-02-29');
  });

  it('should pass Date values through', () => {
    const date = new Date('2023-05-01T00:00:00Z');
    expect(normalizeDate(date)).toBe(date);
  });

  it('should pass other non-string values through', () => {
    expect(normalizeDate(20230501)).toBe(20230501);
    expect(normalizeDate(null)).toBe(null);
  });
});

describe('parseDate', () => {
  it('should report failure without throwing', () => {
    expect(parseDate('yesterday')).toEqual({ ok: false });
  });
});
