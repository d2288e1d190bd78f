/**
 * Drift Detection — Error Types
 *
 * Per-record failures (NormalizationError) are collected into the report;
 * everything else aborts the run or the configuration load.
 */

import type { ResourceOrigin } from "./types.js";

export type DriftErrorCode =
  | "NORMALIZATION_FAILED"
  | "AMBIGUOUS_ADDRESS"
  | "ORIGIN_MISMATCH"
  | "INVALID_RULE_TABLE"
  | "INVALID_EQUIVALENCE_TABLE"
  | "CANCELLED"
  | "UNSUPPORTED_DOCUMENT"
  | "DOCUMENT_PARSE_FAILED";

export class DriftError extends Error {
  readonly code: DriftErrorCode;

  constructor(code: DriftErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DriftError";
    this.code = code;
  }
}

/** A raw record could not be mapped to a valid resource model. */
export class NormalizationError extends DriftError {
  constructor(
    message: string,
    public readonly hints: { address?: string; kind?: string; path?: string } = {},
  ) {
    super("NORMALIZATION_FAILED", message);
    this.name = "NormalizationError";
  }
}

/** Two or more resources of the same origin share an address. */
export class AmbiguousAddressError extends DriftError {
  constructor(
    public readonly origin: ResourceOrigin,
    public readonly addresses: string[],
  ) {
    super(
      "AMBIGUOUS_ADDRESS",
      `Duplicate ${origin} resource address${addresses.length > 1 ? "es" : ""}: ${addresses.join(", ")}`,
    );
    this.name = "AmbiguousAddressError";
  }
}

export class ClassificationRuleError extends DriftError {
  constructor(public readonly issues: string[]) {
    super("INVALID_RULE_TABLE", `Invalid classification rule table:\n  - ${issues.join("\n  - ")}`);
    this.name = "ClassificationRuleError";
  }
}

export class EquivalenceTableError extends DriftError {
  constructor(public readonly issues: string[]) {
    super("INVALID_EQUIVALENCE_TABLE", `Invalid equivalence table:\n  - ${issues.join("\n  - ")}`);
    this.name = "EquivalenceTableError";
  }
}

export class DriftCancelledError extends DriftError {
  constructor(public readonly processed: number) {
    super("CANCELLED", `Drift detection cancelled after ${processed} resources`);
    this.name = "DriftCancelledError";
  }
}

export class UnsupportedDocumentError extends DriftError {
  constructor(message: string) {
    super("UNSUPPORTED_DOCUMENT", message);
    this.name = "UnsupportedDocumentError";
  }
}

export class DocumentParseError extends DriftError {
  constructor(
    public readonly file: string,
    cause: unknown,
  ) {
    super("DOCUMENT_PARSE_FAILED", `Failed to parse ${file}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = "DocumentParseError";
  }
}
