import { isMatch, isValid, parseISO } from "date-fns";
import { fromZonedTime } from "date-fns-tz";

const DATE_TIME_PATTERN = /(\d{2})\/(\d{2})\/(\d{4})(?:\D{0,40}?(\d{2}):(\d{2}))?/;
const DATE_ONLY_PATTERN = /^\d{2}\/\d{2}\/\d{4}$/;
const ISO_PREFIX_PATTERN = /^\d{4}-\d{2}-\d{2}/;
const OFFSET_PATTERN = /(?:Z|[+-]\d{2}:?\d{2})$/i;

export function isDateHeading(text: string) {
  return DATE_ONLY_PATTERN.test(text.trim());
}

/**
 * Finds the first `dd/mm/yyyy` (optionally followed by `HH:mm`) in the text and
 * reads it as wall-clock time in `timeZone`.
 */
export function parseLocalDateTime(text: string, timeZone: string): Date | null {
  const match = DATE_TIME_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const [, day, month, year, hours, minutes] = match;
  const time = hours && minutes ? `${hours}:${minutes}` : "00:00";
  if (!isMatch(`${day}/${month}/${year} ${time}`, "dd/MM/yyyy HH:mm")) {
    return null;
  }

  return fromZonedTime(`${year}-${month}-${day}T${time}:00`, timeZone);
}

/** ISO 8601 timestamps; values without an offset are read in `timeZone`. */
export function parseIsoInstant(value: string, timeZone: string): Date | null {
  const trimmed = value.trim();
  if (!ISO_PREFIX_PATTERN.test(trimmed)) {
    return null;
  }

  const parsed = OFFSET_PATTERN.test(trimmed)
    ? parseISO(trimmed)
    : fromZonedTime(trimmed, timeZone);

  return isValid(parsed) ? parsed : null;
}

/** RFC 822 dates as found in RSS `pubDate`, or ISO strings. */
export function parseFeedDate(value: string | undefined, timeZone: string): Date | null {
  if (!value) {
    return null;
  }

  const iso = parseIsoInstant(value, timeZone);
  if (iso) {
    return iso;
  }

  const parsed = new Date(value);
  return isValid(parsed) ? parsed : null;
}
