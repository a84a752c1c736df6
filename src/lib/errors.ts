/**
 * Where in the input a directive was read
 */
export interface SourceLocation {
  /** Source name: a file path, or "<stdin>" */
  source: string;
  /** 1-based line number within the source */
  line: number;
}

/**
 * Base error class for all docpp errors
 */
export class DocppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DocppError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for schema validation failures
 */
export class ValidationError extends DocppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends DocppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

function locationContext(location?: SourceLocation): Record<string, unknown> {
  return location ? { source: location.source, line: location.line } : {};
}

function at(location?: SourceLocation): string {
  return location ? ` (${location.source}:${location.line})` : "";
}

/**
 * Directive class has no registry entry
 */
export class UnknownClassError extends DocppError {
  constructor(
    public readonly className: string,
    public readonly location?: SourceLocation
  ) {
    super(`Unknown directive class: ${className}${at(location)}`, "UNKNOWN_CLASS", {
      className,
      ...locationContext(location),
    });
    this.name = "UnknownClassError";
  }
}

/**
 * Directive kind is not a key of its class's data source
 */
export class UnknownKindError extends DocppError {
  constructor(
    public readonly className: string,
    public readonly kind: string,
    public readonly location?: SourceLocation
  ) {
    super(`Unknown kind '${kind}' for directive class ${className}${at(location)}`, "UNKNOWN_KIND", {
      className,
      kind,
      ...locationContext(location),
    });
    this.name = "UnknownKindError";
  }
}

/**
 * Render function failed for a resolved directive
 */
export class RenderError extends DocppError {
  constructor(
    public readonly className: string,
    public readonly kind: string,
    cause: unknown,
    public readonly location?: SourceLocation
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Failed to render ${className}/${kind}${at(location)}: ${reason}`,
      "RENDER_ERROR",
      { className, kind, reason, ...locationContext(location) },
      { cause }
    );
    this.name = "RenderError";
  }
}

/**
 * Input source could not be opened or read
 */
export class InputIOError extends DocppError {
  constructor(
    public readonly source: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot read input ${source}: ${reason}`, "INPUT_IO_ERROR", { source, reason }, { cause });
    this.name = "InputIOError";
  }
}
