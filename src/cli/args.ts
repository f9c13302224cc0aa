import { parseArgs } from "node:util";
import { config, type StreakEngine } from "../config";
import { ValidationError } from "../errors";

export const USAGE = `Usage: npm start -- --fecha-base YYYY-MM-DD --n <months> [options]

Options:
  --excel <path>        Workbook with 'historia' and 'retiros' sheets (default: ${config.run.excelPath})
  --db <path|url>       libSQL database file or URL (default: ${config.db.url})
  --fecha-base <date>   Reference date, YYYY-MM-DD (required)
  --n <months>          Minimum streak length (required)
  --out <path>          Output CSV (default: ${config.run.outPath})
  --engine <sql|memory> Streak engine (default: ${config.run.engine})
  --top <count>         Rows shown in the console summary (default: ${config.run.reportTopN})
  --verbose             Debug logging
  --help                Show this message

Example: npm start -- --fecha-base 2024-12-15 --n 3`;

export interface CliArgs {
  help: boolean;
  excelPath: string;
  dbUrl: string | null;
  fechaBase: string | undefined;
  n: string | undefined;
  outPath: string;
  engine: StreakEngine;
  top: number;
  verbose: boolean;
}

// Bare paths become file: URLs; anything with a scheme (file:, libsql:, https:) passes through.
export function toDbUrl(value: string): string {
  if (value === ":memory:" || /^[a-z][a-z0-9+.-]+:/i.test(value)) return value;
  return `file:${value}`;
}

function parseEngine(value: string | undefined): StreakEngine {
  if (value === undefined) return config.run.engine;
  if (value === "sql" || value === "memory") return value;
  throw new ValidationError(`--engine must be 'sql' or 'memory' (got '${value}')`);
}

function parseTop(value: string | undefined): number {
  if (value === undefined) return config.run.reportTopN;
  if (!/^[1-9]\d*$/.test(value.trim())) throw new ValidationError(`--top must be a positive integer (got '${value}')`);
  return Number(value);
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        excel: { type: "string" },
        db: { type: "string" },
        "fecha-base": { type: "string" },
        n: { type: "string" },
        out: { type: "string" },
        engine: { type: "string" },
        top: { type: "string" },
        verbose: { type: "boolean", default: false },
        help: { type: "boolean", default: false },
      },
    }).values;
  } catch (err) {
    throw new ValidationError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Reads the command line. `--fecha-base` and `--n` are returned raw; they are
 * validated together with the rest of the run parameters.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const values = readFlags(argv);

  return {
    help: values.help === true,
    excelPath: values.excel ?? config.run.excelPath,
    dbUrl: values.db === undefined ? null : toDbUrl(values.db),
    fechaBase: values["fecha-base"],
    n: values.n,
    outPath: values.out ?? config.run.outPath,
    engine: parseEngine(values.engine),
    top: parseTop(values.top),
    verbose: values.verbose === true,
  };
}
