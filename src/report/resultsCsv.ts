import fs from "node:fs";
import path from "node:path";
import type { StreakResult } from "../types";

export const CSV_HEADER = ["identificacion", "racha", "fecha_fin", "nivel"] as const;

function csvField(value: string | number): string {
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function toCsv(rows: StreakResult[]): string {
  const lines = [CSV_HEADER.join(",")];
  for (const r of rows) {
    lines.push([r.identificacion, r.racha, r.fecha_fin, r.nivel].map(csvField).join(","));
  }
  return lines.join("\r\n") + "\r\n";
}

export function writeResultsCsv(filePath: string, rows: StreakResult[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, toCsv(rows), "utf8");
}
