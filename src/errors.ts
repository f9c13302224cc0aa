// Bad run parameters supplied by the caller (fecha_base, n, CLI flags).
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

// Upstream data that cannot be used as-is: missing sheets, bad headers,
// duplicate (client, month) observations.
export class DataQualityError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join(", ")}` : message);
    this.name = "DataQualityError";
    this.details = details;
  }
}
