// lib/normalize.ts
// Field cleaners. Each returns the canonical value, or null when the input is unusable.
import type { ISODate } from "./types";

const RE_INTEGER = /^[+-]?\d+$/;
const RE_DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const RE_YMD = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

export function cleanText(raw: string | null | undefined): string {
  return (raw ?? "").toString().trim();
}

// "007" -> "7". BigInt keeps ids longer than 2^53 exact.
export function toPositiveIntegerString(raw: string): string | null {
  const s = cleanText(raw);
  if (!RE_INTEGER.test(s)) return null;
  const n = BigInt(s);
  return n > 0n ? n.toString() : null;
}

// "home appliances" -> "Home Appliances"; a word starts after any non-letter
export function toTitleCase(raw: string): string {
  return cleanText(raw)
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_m, before: string, letter: string) => before + letter.toUpperCase());
}

// "$1,234.50" -> 1234.5
export function parseAmount(raw: string): number | null {
  const s = cleanText(raw).replace(/[$,]/g, "").trim();
  if (!RE_DECIMAL.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

export function isLeapYear(y: number): boolean {
  return (y % 4 === 0 && y % 100 !== 0) || y % 400 === 0;
}

export function daysInMonth(y: number, m: number): number {
  if (m === 2) return isLeapYear(y) ? 29 : 28;
  return [4, 6, 9, 11].includes(m) ? 30 : 31;
}

// "2024-1-5" -> "2024-01-05"; impossible calendar dates -> null
export function toISODate(raw: string): ISODate | null {
  const t = cleanText(raw);
  const match = t.match(RE_YMD);
  if (!match) return null;
  const [, y, m, d] = match;
  const year = Number(y), month = Number(m), day = Number(d);
  if (year < 1 || month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return `${y}-${m.padStart(2, "0")}-${d.padStart(2, "0")}`;
}

export function formatAmount(n: number): string {
  return n.toFixed(2);
}
