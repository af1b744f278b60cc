import { BadRequestException } from '@nestjs/common';

// A time part ending in an explicit UTC designator or numeric offset
const ZONE_SUFFIX = /T[\d:.,]+(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;
// Fractional seconds of the time part, e.g. ".123" in "10:00:00.123Z"
const FRACTION = /T\d{2}:?\d{2}:?\d{2}[.,](\d+)/i;

/** Current instant as UTC ISO-8601, the stored form of every timestamp column. */
export function nowTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Normalise a caller-supplied ISO-8601 timestamp to UTC with milliseconds,
 * e.g. `2024-05-01T12:00:00+02:00` becomes `2024-05-01T10:00:00.000Z`.
 * Stored that way, text order and chronological order agree.
 *
 * The value must carry `Z` or an offset, and at most millisecond precision;
 * anything else could not be stored without changing its instant.
 */
export function normalizeTimestamp(value: string): string {
  if (!ZONE_SUFFIX.test(value)) {
    throw new BadRequestException(`Timestamp needs a time with Z or a UTC offset: ${value}`);
  }

  const fraction = FRACTION.exec(value);
  if (fraction && fraction[1].length > 3) {
    throw new BadRequestException(`Timestamp is more precise than milliseconds: ${value}`);
  }

  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new BadRequestException(`Invalid timestamp: ${value}`);
  }
  return date.toISOString();
}
