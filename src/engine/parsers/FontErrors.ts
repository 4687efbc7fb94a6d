/**
 * Error taxonomy for layout table loading.
 * Both kinds are fatal for the table being loaded; there is no partial table.
 */

export interface FontErrorDetails {
  /** Binary field (or reader operation) that failed */
  field: string;
  /** Observed value, when there is one */
  value?: number | string;
}

export class FontFormatError extends Error {
  readonly field: string;
  readonly value?: number | string;

  constructor(message: string, details: FontErrorDetails) {
    super(message);
    this.name = "FontFormatError";
    this.field = details.field;
    this.value = details.value;
  }
}

/**
 * A read or seek went past the end of the blob, or a count overflows it.
 */
export class MalformedFontError extends FontFormatError {
  constructor(message: string, details: FontErrorDetails) {
    super(message, details);
    this.name = "MalformedFontError";
  }
}

/**
 * A discriminator, version or cross-reference holds a value outside the set
 * the format allows.
 */
export class InvalidFontFileError extends FontFormatError {
  constructor(message: string, details: FontErrorDetails) {
    super(message, details);
    this.name = "InvalidFontFileError";
  }
}

/**
 * Throws the standard "unexpected format" error for a format discriminator.
 */
export function invalidFormat(field: string, value: number, expected: readonly number[]): never {
  const quoted = expected.map((e) => `'${e}'`);
  const list =
    quoted.length <= 1
      ? (quoted[0] ?? "")
      : `${quoted.slice(0, -1).join(", ")} or ${quoted[quoted.length - 1]}`;
  throw new InvalidFontFileError(`Invalid value for '${field}' ${value}. Should be ${list}.`, {
    field,
    value,
  });
}
