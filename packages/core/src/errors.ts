/**
 * Error types shared across packages
 */

export class UnknownEnumValueError extends Error {
  readonly enumName: string;
  readonly value: string;

  constructor(enumName: string, value: string, allowed: readonly string[]) {
    super(`Unknown ${enumName} "${value}" (expected one of: ${allowed.join(', ')})`);
    this.name = 'UnknownEnumValueError';
    this.enumName = enumName;
    this.value = value;
  }
}

export class MissingEmbeddingError extends Error {
  constructor(filename: string) {
    super(`No embedding generated for ${filename}`);
    this.name = 'MissingEmbeddingError';
  }
}

/**
 * A relational write failed after the vector was stored; the vector stays
 */
export class PartialWriteError extends Error {
  readonly vectorId: string;

  constructor(cause: unknown, vectorId: string) {
    super(`${errorMessage(cause)} (vector ${vectorId} written, relational rows discarded)`, { cause });
    this.name = 'PartialWriteError';
    this.vectorId = vectorId;
  }
}

export class UnsupportedFormatError extends Error {
  readonly format: string;

  constructor(format: string, allowed: readonly string[]) {
    super(`Unsupported output format "${format}". Use one of: ${allowed.join(', ')}`);
    this.name = 'UnsupportedFormatError';
    this.format = format;
  }
}

export class JournalStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JournalStateError';
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
