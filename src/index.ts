import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import { parseCliArgs, USAGE } from "./cli/args";
import { config } from "./config";
import { log, setVerbose } from "./log";
import { runStreakPipeline } from "./pipeline";
import { formatReport } from "./report/consoleReport";
import { writeResultsCsv } from "./report/resultsCsv";
import { closeDb, useDb } from "./storage/libsqlClient";
import { parseStreakParams } from "./streaks/params";
import { readWorkbook } from "./workbook/readWorkbook";

function resolvePath(relOrAbs: string) {
  return path.isAbsolute(relOrAbs) ? relOrAbs : path.join(process.cwd(), relOrAbs);
}

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }
  setVerbose(args.verbose);

  // Parameters are checked before anything is read or stored.
  const params = parseStreakParams({ referenceDate: args.fechaBase, minLength: args.n });

  const excelPath = resolvePath(args.excelPath);
  if (!fs.existsSync(excelPath)) {
    throw new Error(`Workbook not found: ${excelPath}`);
  }

  log.info(`Processing workbook: ${excelPath}`);
  log.info(`Parameters: fecha_base=${params.referenceDate}, n=${params.minLength}, engine=${args.engine}`);

  const data = readWorkbook(fs.readFileSync(excelPath));

  if (args.dbUrl) useDb({ url: args.dbUrl, authToken: config.db.authToken });

  try {
    const rows = await runStreakPipeline({ data, params, engine: args.engine });
    log.info(`✓ ${rows.length} clients with streaks >= ${params.minLength} months`);

    console.log(formatReport(rows, args.top));

    const outPath = resolvePath(args.outPath);
    writeResultsCsv(outPath, rows);
    log.info(`✓ Results written to: ${outPath}`);
  } finally {
    closeDb();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
