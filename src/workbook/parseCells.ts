import * as XLSX from "xlsx";
import { isISODate, toISODate } from "../dates";

type DateFormat = { re: RegExp; order: ["y" | "m" | "d", "y" | "m" | "d", "y" | "m" | "d"] };

// Tried in order; the first one that yields a real calendar date wins.
const TEXT_DATE_FORMATS: DateFormat[] = [
  { re: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: ["y", "m", "d"] },
  { re: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: ["d", "m", "y"] },
  { re: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, order: ["y", "m", "d"] },
  { re: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: ["m", "d", "y"] },
];

const ISO_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[T ]\d{2}:\d{2}/;

function isBlankCell(v: unknown): boolean {
  if (v == null) return true;
  if (typeof v === "string") return v.trim() === "";
  return false;
}

function fromParts(year: number, month: number, day: number): string | null {
  const iso = toISODate(year, month, day);
  return isISODate(iso) ? iso : null;
}

function parseTextDate(s: string): string | null {
  for (const fmt of TEXT_DATE_FORMATS) {
    const m = fmt.re.exec(s);
    if (!m) continue;
    const parts = { y: 0, m: 0, d: 0 };
    fmt.order.forEach((key, i) => {
      parts[key] = Number(m[i + 1]);
    });
    const iso = fromParts(parts.y, parts.m, parts.d);
    if (iso) return iso;
  }
  const ts = ISO_TIMESTAMP.exec(s);
  if (ts && isISODate(ts[1])) return ts[1];
  return null;
}

/**
 * Reads a spreadsheet cell as a calendar date (YYYY-MM-DD). Accepts date
 * serial numbers, Date values and the text formats above; anything else is
 * null.
 */
export function parseCellDate(v: unknown): string | null {
  if (isBlankCell(v)) return null;

  if (v instanceof Date) {
    if (!Number.isFinite(v.getTime())) return null;
    return fromParts(v.getFullYear(), v.getMonth() + 1, v.getDate());
  }

  if (typeof v === "number") {
    if (!Number.isFinite(v) || v < 1) return null;
    const code: { y: number; m: number; d: number } = XLSX.SSF.parse_date_code(v);
    return fromParts(code.y, code.m, code.d);
  }

  if (typeof v === "string") return parseTextDate(v.trim());

  return null;
}

// Whole-unit balance. Thousand separators ("1,250,000" or "1.250.000") are dropped.
export function parseCellInt(v: unknown): number | null {
  if (v == null) return null;
  if (typeof v === "number") {
    if (!Number.isFinite(v)) return null;
    return Number.isInteger(v) ? v : Math.round(v);
  }
  if (typeof v === "string") {
    const s = v.trim().replace(/[,.]/g, "");
    return /^\d+$/.test(s) ? Number(s) : null;
  }
  return null;
}

export function parseCellText(v: unknown): string {
  if (v == null) return "";
  return String(v).trim();
}
