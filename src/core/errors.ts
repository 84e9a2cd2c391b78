export type HeapErrorCode =
  | "INVALID_ARGUMENT"
  | "UNDERFLOW"
  | "CONFIGURATION"
  | "EXHAUSTED"
  | "RESOURCE_EXHAUSTED";

/**
 * Base class for every error the heap raises.
 *
 * `code` is stable and machine-readable; `title` is the short human form of it.
 */
export class HeapError extends Error {
  readonly code: HeapErrorCode;
  readonly title: string;

  constructor(code: HeapErrorCode, detail: string, options?: { cause?: unknown }) {
    super(detail, options);
    this.name = new.target.name;
    this.code = code;
    this.title = codeToTitle(code);
  }
}

export class InvalidArgumentError extends HeapError {
  constructor(detail: string) {
    super("INVALID_ARGUMENT", detail);
  }
}

export class UnderflowError extends HeapError {
  constructor(detail: string) {
    super("UNDERFLOW", detail);
  }
}

export class ConfigurationError extends HeapError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super("CONFIGURATION", detail, options);
  }
}

export class ExhaustedError extends HeapError {
  constructor(detail: string) {
    super("EXHAUSTED", detail);
  }
}

export class ResourceExhaustionError extends HeapError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super("RESOURCE_EXHAUSTED", detail, options);
  }
}

export function isHeapError(e: unknown): e is HeapError {
  return e instanceof HeapError;
}

function codeToTitle(code: HeapErrorCode): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "UNDERFLOW":
      return "Underflow";
    case "CONFIGURATION":
      return "Configuration error";
    case "EXHAUSTED":
      return "Iterator exhausted";
    case "RESOURCE_EXHAUSTED":
      return "Resource exhausted";
  }
}
