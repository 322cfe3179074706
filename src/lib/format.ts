import type { TimeOfDay } from "@/types/travel";

const DAY_MS = 24 * 60 * 60 * 1000;
const isoDatePattern = /^(\d{4})-(\d{2})-(\d{2})$/;

const currencySymbols: Record<string, string> = {
  USD: "$",
  EUR: "€",
  GBP: "£",
};

export function formatCurrency(amount: number, currency = "USD") {
  if (currency === "JPY") {
    return `¥${Math.trunc(amount)}`;
  }
  const symbol = currencySymbols[currency];
  if (symbol) {
    return `${symbol}${amount.toFixed(2)}`;
  }
  return `${amount.toFixed(2)} ${currency}`;
}

export function getTimePeriod(hour: number): TimeOfDay {
  if (hour >= 5 && hour < 12) {
    return "morning";
  }
  if (hour >= 12 && hour < 17) {
    return "afternoon";
  }
  return "evening";
}

export function getTripDurationText(days: number) {
  if (days <= 3) return "short getaway";
  if (days <= 7) return "week-long trip";
  if (days <= 14) return "two-week vacation";
  return "extended journey";
}

export function truncateText(text: string, maxLength = 100) {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}...`;
}

export function isIsoDate(value: string) {
  const match = isoDatePattern.exec(value);
  if (!match) return false;
  const date = parseIsoDate(value);
  return date.toISOString().slice(0, 10) === value;
}

/**
 * Parses `YYYY-MM-DD` as midnight UTC. Invalid input yields an invalid Date.
 */
export function parseIsoDate(value: string) {
  const match = isoDatePattern.exec(value);
  if (!match) {
    return new Date(Number.NaN);
  }
  const [, year, month, day] = match;
  return new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
}

export function toIsoDate(date: Date) {
  return date.toISOString().slice(0, 10);
}

export function addDays(isoDate: string, days: number) {
  const date = parseIsoDate(isoDate);
  return toIsoDate(new Date(date.getTime() + days * DAY_MS));
}

/**
 * Whole days from `start` to `end` (negative when end is earlier).
 */
export function diffInDays(start: string, end: string) {
  return Math.round((parseIsoDate(end).getTime() - parseIsoDate(start).getTime()) / DAY_MS);
}

export function calculateDateRange(startDate: string, endDate: string) {
  const days = diffInDays(startDate, endDate) + 1;
  if (!Number.isFinite(days) || days <= 0) {
    return [];
  }
  return Array.from({ length: days }, (_, index) => addDays(startDate, index));
}

export function monthOf(isoDate: string) {
  return parseIsoDate(isoDate).getUTCMonth() + 1;
}

const longMonth = new Intl.DateTimeFormat("en-US", { month: "long", timeZone: "UTC" });
const shortMonth = new Intl.DateTimeFormat("en-US", { month: "short", timeZone: "UTC" });
const weekday = new Intl.DateTimeFormat("en-US", { weekday: "long", timeZone: "UTC" });

function padDay(date: Date) {
  return `${date.getUTCDate()}`.padStart(2, "0");
}

/** `May 04, 2026` */
export function formatLongDate(isoDate: string) {
  const date = parseIsoDate(isoDate);
  return `${longMonth.format(date)} ${padDay(date)}, ${date.getUTCFullYear()}`;
}

/** `May 04` */
export function formatShortDate(isoDate: string) {
  const date = parseIsoDate(isoDate);
  return `${shortMonth.format(date)} ${padDay(date)}`;
}

/** `Monday, May 04, 2026` */
export function formatWeekdayDate(isoDate: string) {
  const date = parseIsoDate(isoDate);
  return `${weekday.format(date)}, ${shortMonth.format(date)} ${padDay(date)}, ${date.getUTCFullYear()}`;
}

export function monthName(month: number) {
  return longMonth.format(new Date(Date.UTC(2000, month - 1, 1)));
}
