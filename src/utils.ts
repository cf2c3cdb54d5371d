const GIB = 1024 ** 3;

export function bytesToGb(bytes: number) {
  return bytes / GIB;
}

export function gbToTb(gb: number) {
  return gb / 1024;
}

export function round2(value: number) {
  return Math.round(value * 100) / 100;
}

/** `YYYY-MM-DD HH:mm`, UTC unless a time zone is given. */
export function formatDateTime(value: Date, timeZone?: string) {
  const parts = formatDateParts(value, timeZone);
  return `${parts.year}-${parts.month}-${parts.day} ${parts.hour}:${parts.minute}`;
}

/** `YYYY-MM-DD HH:mm:ss`, UTC unless a time zone is given. */
export function formatDateTimeSeconds(value: Date, timeZone?: string) {
  const parts = formatDateParts(value, timeZone);
  return `${parts.year}-${parts.month}-${parts.day} ${parts.hour}:${parts.minute}:${parts.second}`;
}

/** `YYYYMMDD_HHmmss`, used to name one run's artifacts. */
export function formatRunStamp(value: Date, timeZone?: string) {
  const parts = formatDateParts(value, timeZone);
  return `${parts.year}${parts.month}${parts.day}_${parts.hour}${parts.minute}${parts.second}`;
}

type DateParts = {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
};

function formatDateParts(value: Date, timeZone?: string): DateParts {
  if (!timeZone) {
    const iso = value.toISOString();
    return {
      year: iso.slice(0, 4),
      month: iso.slice(5, 7),
      day: iso.slice(8, 10),
      hour: iso.slice(11, 13),
      minute: iso.slice(14, 16),
      second: iso.slice(17, 19)
    };
  }
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23"
  });
  const map = Object.fromEntries(
    formatter.formatToParts(value).map((part) => [part.type, part.value])
  );
  return {
    year: map.year ?? "0000",
    month: map.month ?? "00",
    day: map.day ?? "00",
    hour: map.hour ?? "00",
    minute: map.minute ?? "00",
    second: map.second ?? "00"
  };
}

/** Month label (`YYYY-MM`) of a `YYYY-MM-DD HH:mm` timestamp. */
export function monthOf(timestamp: string) {
  return timestamp.slice(0, 7);
}

/**
 * Every `YYYY-MM` label from `first` to `last` inclusive, ascending.
 * Labels sort lexicographically in calendar order.
 */
export function listMonthsBetween(first: string, last: string) {
  const months: string[] = [];
  let year = Number(first.slice(0, 4));
  let month = Number(first.slice(5, 7));
  const endYear = Number(last.slice(0, 4));
  const endMonth = Number(last.slice(5, 7));
  while (year < endYear || (year === endYear && month <= endMonth)) {
    months.push(`${year}-${String(month).padStart(2, "0")}`);
    month += 1;
    if (month > 12) {
      month = 1;
      year += 1;
    }
  }
  return months;
}

export function buildReportBaseKey(prefix: string, region: string, stamp: string) {
  return `${prefix}/${region}/${stamp}`;
}

export function withDuration(startMs: number, includeTimings?: boolean) {
  if (!includeTimings) return {};
  return { durationMs: Date.now() - startMs };
}
