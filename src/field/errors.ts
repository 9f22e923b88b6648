// src/field/errors.ts
export type FieldErrorCode =
  | "MALFORMED_CONSTRUCTION"
  | "UNKNOWN_PANEL_KIND"
  | "SIZE_MISMATCH"
  | "UNEXPECTED_END_OF_INPUT"
  | "INVALID_DOCUMENT";

export class FieldError extends Error {
  public constructor(
    public readonly code: FieldErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class MalformedConstructionError extends FieldError {
  public constructor(message: string) {
    super("MALFORMED_CONSTRUCTION", message);
  }
}

export class UnknownPanelKindError extends FieldError {
  public constructor(public readonly byte: number) {
    super(
      "UNKNOWN_PANEL_KIND",
      `Unknown panel kind 0x${byte.toString(16).padStart(2, "0").toUpperCase()}`,
    );
  }
}

export class SizeMismatchError extends FieldError {
  public constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super("SIZE_MISMATCH", `Invalid size of data: expected ${expected} panels, got ${actual}`);
  }
}

export class UnexpectedEndOfInputError extends FieldError {
  public constructor(
    public readonly needed: number,
    public readonly available: number,
  ) {
    super("UNEXPECTED_END_OF_INPUT", `Unexpected EOF: need ${needed} bytes, have ${available}`);
  }
}

export class InvalidDocumentError extends FieldError {
  public constructor(message: string) {
    super("INVALID_DOCUMENT", message);
  }
}
