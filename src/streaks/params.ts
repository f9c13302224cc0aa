import { z } from "zod";
import { isISODate } from "../dates";
import { ValidationError } from "../errors";
import type { StreakParams } from "../types";

const zReferenceDate = z
  .string()
  .refine(isISODate, { message: "fecha_base must be a valid date in YYYY-MM-DD format" });

// Accepts a positive integer or its plain decimal text ("3"); "3.0", "-1" or "abc" are rejected.
const zMinLength = z.union([
  z.number().int().positive(),
  z
    .string()
    .regex(/^[1-9]\d*$/, { message: "n must be a positive integer" })
    .transform(Number),
]);

const StreakParamsSchema = z.object({
  referenceDate: zReferenceDate,
  minLength: zMinLength,
});

export function parseStreakParams(input: { referenceDate: unknown; minLength: unknown }): StreakParams {
  const parsed = StreakParamsSchema.safeParse(input);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".") || "params"}: ${i.message}`).join("; ");
    throw new ValidationError(`Invalid parameters: ${msg}`);
  }
  return parsed.data;
}
