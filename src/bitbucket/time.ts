import { TimeFormatError } from "../rest/errors";

// 2021-01-02T03:04:05.123456+0000 (offset may also be +00:00 or Z)
const TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{1,6})(Z|[+-]\d{2}:?\d{2})$/;

/**
 * Parse a Bitbucket timestamp. Sub-millisecond digits are truncated.
 * Throws TimeFormatError for anything that is not a real calendar instant.
 */
export function parseBitbucketTime(value: string): Date {
  const match = TIMESTAMP.exec(value);
  if (!match) throw new TimeFormatError(value);

  const [, y, mo, d, h, mi, s, frac = "", zone = "Z"] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = Number(frac.padEnd(3, "0").slice(0, 3));

  let offsetMinutes = 0;
  if (zone !== "Z") {
    const digits = zone.replace(":", "");
    const sign = digits.startsWith("-") ? -1 : 1;
    const offH = Number(digits.slice(1, 3));
    const offM = Number(digits.slice(3, 5));
    if (offH > 23 || offM > 59) throw new TimeFormatError(value);
    offsetMinutes = sign * (offH * 60 + offM);
  }

  // Date.UTC would map years 0-99 onto 1900-1999
  const local = new Date(0);
  local.setUTCFullYear(year, month - 1, day);
  local.setUTCHours(hour, minute, second, millis);
  // Out-of-range parts roll over; reject instead
  if (
    local.getUTCFullYear() !== year ||
    local.getUTCMonth() !== month - 1 ||
    local.getUTCDate() !== day ||
    local.getUTCHours() !== hour ||
    local.getUTCMinutes() !== minute ||
    local.getUTCSeconds() !== second
  ) {
    throw new TimeFormatError(value);
  }

  return new Date(local.getTime() - offsetMinutes * 60_000);
}
