/**
 * Timezone-Aware Date Utilities
 *
 * The portal reports by Indian financial year (April to March), so "current
 * year" and portal date inputs are computed in the configured timezone
 * (Asia/Kolkata by default).
 */
import moment from "moment-timezone";
import config from "../../config";

const TIMEZONE = config.timezone;

/** Get current time in the service timezone */
export function nowLocal(): moment.Moment {
  return moment().tz(TIMEZONE);
}

/** ISO timestamp for status records and payloads */
export function nowISO(): string {
  return new Date().toISOString();
}

/** Calendar year in the service timezone */
export function currentYear(): number {
  return nowLocal().year();
}

/**
 * Starting year of the financial year that contains today.
 * January–March belong to the financial year that began the previous April.
 */
export function currentFinancialYear(): number {
  const now = nowLocal();
  return now.month() >= 3 ? now.year() : now.year() - 1;
}

/** Date range of the financial year starting in April of the given year */
export function financialYearRange(startYear: number): { from: string; to: string } {
  return {
    from: `01/04/${startYear}`,
    to: `31/03/${startYear + 1}`,
  };
}

/**
 * Parse a stored timestamp. Accepts ISO strings and the legacy
 * JSON-wrapped form {"timestamp": "..."}; returns null when unparseable.
 */
export function parseTimestamp(value: string | undefined): Date | null {
  if (!value) return null;

  let candidate = value;
  if (value.trim().startsWith("{")) {
    try {
      const parsed: unknown = JSON.parse(value);
      if (
        typeof parsed === "object" &&
        parsed !== null &&
        "timestamp" in parsed &&
        typeof parsed.timestamp === "string"
      ) {
        candidate = parsed.timestamp;
      } else {
        return null;
      }
    } catch {
      return null;
    }
  }

  const parsed = moment.tz(candidate, moment.ISO_8601, TIMEZONE);
  return parsed.isValid() ? parsed.toDate() : null;
}
