export type InsightErrorCode = "INPUT" | "NOT_FOUND" | "SEQUENCING";

export class InsightError extends Error {
  constructor(readonly code: InsightErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Structurally invalid construction input (bad config, malformed profile payload). */
export class InputError extends InsightError {
  constructor(message: string) {
    super("INPUT", message);
  }
}

export class NotFoundError extends InsightError {
  constructor(readonly entity: "baseline" | "execution" | "measurement", readonly key: string) {
    super("NOT_FOUND", `No ${entity} found for ${key}`);
  }
}

/** Two-phase measurement calls made out of order. */
export class SequencingError extends InsightError {
  constructor(readonly recommendationId: string, message: string) {
    super("SEQUENCING", message);
  }
}
