/**
 * Version directory layout could not be created, read or written.
 * Nothing downstream can proceed.
 */
export class StructuralError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "StructuralError";
  }
}

/**
 * Legacy unversioned output could not be moved into version 1
 */
export class MigrationError extends StructuralError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message, context, cause);
    this.name = "MigrationError";
  }
}

/**
 * The current pointer could not be updated. The build itself is complete.
 */
export class PointerError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "PointerError";
  }
}
