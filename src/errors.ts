/**
 * Error types for extraction and code generation.
 *
 * Per-table extraction failures are carried as values (see ExtractionResult);
 * these classes give them a stable `code` so callers can branch without
 * matching on message text.
 */

export type TransmogErrorCode =
  | "OUT_OF_BOUNDS"
  | "UNRESOLVED_POINTER"
  | "EMPTY_SELECTION"
  | "INVALID_SELECTION"
  | "CATALOG"
  | "IMAGE"
  | "ENCODING"
  | "USAGE";

export class TransmogError extends Error {
  constructor(readonly code: TransmogErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export const hex32 = (n: number): string => `0x${(n >>> 0).toString(16).toUpperCase().padStart(8, "0")}`;

export class OutOfBoundsError extends TransmogError {
  constructor(
    readonly address: number,
    readonly width: number,
    readonly imageStart: number,
    readonly imageEnd: number,
  ) {
    super(
      "OUT_OF_BOUNDS",
      `Read of ${width} byte(s) at ${hex32(address)} falls outside image [${hex32(imageStart)}, ${hex32(imageEnd)})`,
    );
  }
}

export class UnresolvedPointerError extends TransmogError {
  constructor(
    readonly table: string,
    readonly index: number,
    reason: string,
  ) {
    super("UNRESOLVED_POINTER", `Table "${table}": pointer-table index ${index} ${reason}`);
  }
}

/** A generation request is missing its source, or its target when one is required */
export class EmptySelectionError extends TransmogError {
  constructor(readonly side: "source" | "target") {
    super("EMPTY_SELECTION", `No ${side} equipment selected`);
  }
}

export class InvalidSelectionError extends TransmogError {
  constructor(message: string) {
    super("INVALID_SELECTION", message);
  }
}

export class CatalogError extends TransmogError {
  constructor(message: string, readonly issues: string[] = []) {
    super("CATALOG", issues.length ? `${message}: ${issues.join("; ")}` : message);
  }
}

export class ImageError extends TransmogError {
  constructor(message: string) {
    super("IMAGE", message);
  }
}

export class EncodingError extends TransmogError {
  constructor(message: string) {
    super("ENCODING", message);
  }
}

/** Bad command line; the CLI prints usage alongside the message */
export class UsageError extends TransmogError {
  constructor(message: string) {
    super("USAGE", message);
  }
}

/** Normalise anything caught into a TransmogError-compatible message */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
