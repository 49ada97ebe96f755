import { describe, it, expect } from 'vitest';
import { parseTimestamp } from './timestamp.js';

describe('parseTimestamp', () => {
  it('parses the server format in UTC', () => {
    expect(parseTimestamp('2024/02/29 23:59:58 +0000')?.toISOString()).toBe('2024-02-29T23:59:58.000Z');
  });

  it('applies positive and negative offsets', () => {
    expect(parseTimestamp('2024/05/01 12:00:00 +0130')?.toISOString()).toBe('2024-05-01T10:30:00.000Z');
    expect(parseTimestamp('2024/05/01 12:00:00 -0500')?.toISOString()).toBe('2024-05-01T17:00:00.000Z');
  });

  it('treats a missing offset as UTC', () => {
    expect(parseTimestamp('2024/05/01 08:15:00')?.toISOString()).toBe('2024-05-01T08:15:00.000Z');
  });

  it('parses ISO-8601', () => {
    expect(parseTimestamp('2024-05-01T08:15:00Z')?.toISOString()).toBe('2024-05-01T08:15:00.000Z');
    expect(parseTimestamp('2024-05-01T08:15:00+02:00')?.toISOString()).toBe('2024-05-01T06:15:00.000Z');
  });

  it('rejects out-of-range fields', () => {
    expect(parseTimestamp('2023/02/29 10:00:00 +0000')).toBeNull();
    expect(parseTimestamp('2024/13/01 10:00:00 +0000')).toBeNull();
  });

  it('returns null for other input', () => {
    expect(parseTimestamp('last tuesday')).toBeNull();
    expect(parseTimestamp(1714550400)).toBeNull();
    expect(parseTimestamp(undefined)).toBeNull();
  });
});
