import type { StreakResult } from "../types";

const RULE = "=".repeat(80);

export function formatResultLine(r: StreakResult): string {
  return `  ${r.identificacion.padEnd(20)} | racha: ${String(r.racha).padStart(2)} meses | fin: ${r.fecha_fin} | nivel: ${r.nivel}`;
}

export function formatReport(rows: StreakResult[], topN: number): string {
  const lines: string[] = [];

  lines.push("");
  lines.push(RULE);
  lines.push(`RESULTADOS: Top ${topN} rachas (de ${rows.length} totales)`);
  lines.push(RULE);
  for (const r of rows.slice(0, topN)) lines.push(formatResultLine(r));
  if (rows.length > topN) {
    lines.push(`  ... y ${rows.length - topN} clientes más`);
  }
  lines.push(RULE);
  lines.push("");

  return lines.join("\n");
}
