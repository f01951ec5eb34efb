const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

const MONTH_MAP = new Map<string, number>(
  MONTHS.map((m, index) => [m, index]),
);

// SIP-date = rfc1123-date, always GMT
const SIP_DATE_REGEX = /^(Sun|Mon|Tue|Wed|Thu|Fri|Sat), (\d{2}) (Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) (\d{4}) (\d{2}):(\d{2}):(\d{2}) GMT$/;

const SIP_DATE_LENGTH = 29;

const pad2 = (n: number): string => String(n).padStart(2, '0');

function buildUtcDate(
  year: number,
  month: number,
  day: number,
  hour: number,
  min: number,
  sec: number,
): Date | null {
  const d = new Date(Date.UTC(year, month, day, hour, min, sec));
  if (
    d.getUTCFullYear() === year &&
    d.getUTCMonth() === month &&
    d.getUTCDate() === day &&
    d.getUTCHours() === hour &&
    d.getUTCMinutes() === min &&
    d.getUTCSeconds() === sec
  ) {
    return d;
  }
  return null;
}

export function formatSipDate(date: Date): string {
  const day = WEEKDAYS[date.getUTCDay()];
  const dateNumber = pad2(date.getUTCDate());
  const month = MONTHS[date.getUTCMonth()];
  const year = date.getUTCFullYear();
  const hour = pad2(date.getUTCHours());
  const min = pad2(date.getUTCMinutes());
  const sec = pad2(date.getUTCSeconds());
  return `${day}, ${dateNumber} ${month} ${year} ${hour}:${min}:${sec} GMT`;
}

export function parseSipDate(value: string): Date | null {
  if (value.length !== SIP_DATE_LENGTH) {
    return null;
  }
  const match = SIP_DATE_REGEX.exec(value);
  if (!match) {
    return null;
  }
  const [, weekday, day, monthString, year, hour, min, sec] = match;
  const month = MONTH_MAP.get(monthString ?? '');
  if (month === undefined) {
    return null;
  }
  const date = buildUtcDate(Number(year), month, Number(day), Number(hour), Number(min), Number(sec));
  if (date === null || WEEKDAYS[date.getUTCDay()] !== weekday) {
    return null;
  }
  return date;
}

export function isValidSipDate(value: string): boolean {
  return parseSipDate(value) !== null;
}
