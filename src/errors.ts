import * as z from "zod"

/**
 * Machine-readable reasons a descriptor could not be converted
 */
export type ConversionErrorCode =
  | "empty-variants"
  | "unsupported-union"
  | "unpaired-index"
  | "unknown-rename-policy"
  | "empty-placeholder"
  | "unterminated-placeholder"
  | "invalid-flatten"
  | "invalid-transparent"
  | "invalid-tagging"
  | "invalid-attributes"
  | "type-arguments"

/**
 * Base class for every error raised by typeweave.
 */
export class TypeweaveError extends Error {
  override name: string = "TypeweaveError"

  /** The underlying error, if this one wraps another */
  public override readonly cause: unknown

  /** Stable identifier for the failure */
  public readonly code: string

  constructor(options: { message: string; code: string; cause?: unknown }) {
    super(options.message)
    this.code = options.code
    this.cause = options.cause

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/**
 * Raised synchronously by the converter. Conversion of the offending type is aborted;
 * nothing has been added to any registry at that point.
 */
export class ConversionError extends TypeweaveError {
  override name = "ConversionError" as const
  declare readonly code: ConversionErrorCode

  /** Name of the type being converted when the error occurred */
  public readonly typeName?: string

  constructor(code: ConversionErrorCode, message: string, typeName?: string, cause?: unknown) {
    super({ message: typeName ? `${typeName}: ${message}` : message, code, cause })
    this.typeName = typeName
  }

  /**
   * Re-raise an error with the name of the enclosing type attached
   */
  static within(err: unknown, typeName: string): unknown {
    if (err instanceof ConversionError && err.typeName === undefined) {
      return new ConversionError(err.code, err.message, typeName, err.cause)
    }
    return err
  }
}

/**
 * Raised by the registry when strict dangling-reference checking is enabled.
 */
export class RegistryError extends TypeweaveError {
  override name = "RegistryError" as const

  /** Referenced names that are neither registered nor declared external */
  public readonly names: string[]

  constructor(message: string, names: string[]) {
    super({ message, code: "dangling-refs" })
    this.names = names
  }
}

/**
 * Raised when generator configuration fails validation.
 */
export class ConfigError extends TypeweaveError {
  override name = "ConfigError" as const

  constructor(message: string, cause?: unknown) {
    super({ message, code: "invalid-config", cause })
  }

  /**
   * Wrap a zod validation failure
   */
  static fromZod(err: z.ZodError): ConfigError {
    return new ConfigError(`Invalid generator config:\n${z.prettifyError(err)}`, err)
  }
}

/**
 * Raised when external source text cannot be parsed. No descriptors are produced.
 */
export class ImportError extends TypeweaveError {
  override name = "ImportError" as const

  /** Individual parser diagnostics */
  public readonly diagnostics: string[]

  constructor(diagnostics: string[]) {
    super({ message: `Parse error: ${diagnostics.join("; ")}`, code: "parse-error" })
    this.diagnostics = diagnostics
  }
}
