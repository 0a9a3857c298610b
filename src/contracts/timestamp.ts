const ISO_DATE_TIME =
    /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})?$/;

function offsetMinutes(designator: string | undefined): number {
    if (!designator || designator === 'Z') return 0;
    const sign = designator.startsWith('-') ? -1 : 1;
    const digits = designator.slice(1).replace(':', '');
    return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/**
 * Parses an ISO-8601 date-time. The offset is optional: a timestamp without
 * one is read as UTC, never as host-local time. Fractions beyond
 * milliseconds are truncated. Returns null for anything else, including
 * out-of-range fields such as Feb 30.
 */
export function parseIsoTimestamp(raw: string): Date | null {
    const match = ISO_DATE_TIME.exec(raw);
    if (!match) return null;

    const [, year, month, day, hour, minute, second = '0', fraction = '', offset] = match;
    const [y, mo, d, h, mi] = [year, month, day, hour, minute].map(Number);
    const s = Number(second);
    const ms = Number(fraction.slice(0, 3).padEnd(3, '0'));

    if (h > 23 || mi > 59 || s > 59) return null;

    const local = Date.UTC(y, mo - 1, d, h, mi, s, ms);
    const check = new Date(local);
    if (check.getUTCFullYear() !== y || check.getUTCMonth() !== mo - 1 || check.getUTCDate() !== d) {
        return null;
    }

    const offsetMins = offsetMinutes(offset);
    if (Math.abs(offsetMins) >= 24 * 60) return null;

    return new Date(local - offsetMins * 60_000);
}
