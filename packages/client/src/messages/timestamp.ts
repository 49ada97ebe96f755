/**
 * Server timestamp parsing
 *
 * The chat API writes `YYYY/MM/DD HH:MM:SS ±HHMM`; newer endpoints use ISO-8601.
 */

const SERVER_FORMAT = /^(\d{4})\/(\d{2})\/(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\s+([+-])(\d{2})(\d{2}))?$/;
const ISO_FORMAT = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/;

/**
 * Parse a server timestamp. Returns null for anything unparsable.
 */
export function parseTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string') return null;
  const text = value.trim();

  const match = SERVER_FORMAT.exec(text);
  if (match) {
    const [, year, month, day, hour, minute, second, sign, offsetHours, offsetMinutes] = match;
    const fields = [year, month, day, hour, minute, second].map(Number);
    const [y = 0, mo = 0, d = 0, h = 0, mi = 0, s = 0] = fields;

    const utc = Date.UTC(y, mo - 1, d, h, mi, s);
    const check = new Date(utc);
    // Date.UTC rolls over out-of-range fields; reject instead
    if (
      check.getUTCFullYear() !== y ||
      check.getUTCMonth() !== mo - 1 ||
      check.getUTCDate() !== d ||
      check.getUTCHours() !== h ||
      check.getUTCMinutes() !== mi ||
      check.getUTCSeconds() !== s
    ) {
      return null;
    }

    const offset = sign ? (Number(offsetHours) * 60 + Number(offsetMinutes)) * 60_000 : 0;
    return new Date(sign === '-' ? utc + offset : utc - offset);
  }

  if (ISO_FORMAT.test(text)) {
    const ms = Date.parse(text);
    return Number.isNaN(ms) ? null : new Date(ms);
  }

  return null;
}
