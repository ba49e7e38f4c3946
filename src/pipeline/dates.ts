// pattern: functional-core

// Zone abbreviations Date.parse does not know. The US zones, GMT, UT and Z
// are handled natively.
const ZONE_OFFSETS: Readonly<Record<string, string>> = {
  WET: "+0000",
  WEST: "+0100",
  BST: "+0100",
  CET: "+0100",
  CEST: "+0200",
  EET: "+0200",
  EEST: "+0300",
  MSK: "+0300",
  IST: "+0530",
  SGT: "+0800",
  HKT: "+0800",
  JST: "+0900",
  KST: "+0900",
  AEST: "+1000",
  AEDT: "+1100",
  NZST: "+1200",
  NZDT: "+1300",
};

const ISO_8601 =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:\s*(?:Z|[+-]\d{2}:?\d{2}))?)?$/i;

// Optional weekday, day, month name, year, then an optional time and zone
const RFC_822 =
  /^(?:[^\d\s,]+,\s*)?\d{1,2}\s+[A-Za-z]{3,9}\.?\s+\d{2,4}(?:\s+\d{1,2}:\d{2}(?::\d{2})?(?:\s*(?:[+-]\d{4}|[A-Za-z]{1,5}))?)?$/;

function parseOrNull(value: string): Date | null {
  // Date.parse takes nearly anything with a number in it
  if (!ISO_8601.test(value) && !RFC_822.test(value)) return null;
  const millis = Date.parse(value);
  return Number.isFinite(millis) ? new Date(millis) : null;
}

/**
 * Parses the date forms feeds use in practice: RFC 822/2822 (`pubDate`),
 * ISO 8601 (`published`, `updated`, `dc:date`), and RFC 822 with a named
 * zone outside the set the runtime recognises. Returns null when nothing
 * fits.
 */
export function parseFeedDate(value: string | null | undefined): Date | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;

  const zoned = trimmed.replace(/\s([A-Z]{3,4})$/, (match, zone: string) => {
    const offset = ZONE_OFFSETS[zone];
    return offset ? ` ${offset}` : match;
  });

  const direct = parseOrNull(zoned);
  if (direct) return direct;

  // A localized or misspelled weekday makes the whole string unparseable
  const withoutWeekday = zoned.replace(/^[^\d,]+,\s*/, "");
  if (withoutWeekday !== zoned) {
    return parseOrNull(withoutWeekday);
  }
  return null;
}

/** `YYYY-MM-DD` in UTC. */
export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}
