/**
 * Parser error types
 */

/**
 * Raised for a type expression whose brackets cannot be split.
 * Extractors catch it at the field boundary and record a field error.
 */
export class TypeSyntaxError extends Error {
  constructor(
    message: string,
    readonly expression: string
  ) {
    super(message)
    this.name = 'TypeSyntaxError'
  }
}

/**
 * Raised before any extraction when the source directory cannot be walked
 */
export class InvalidSourceDirectoryError extends Error {
  constructor(
    readonly directory: string,
    options?: { cause?: unknown }
  ) {
    super(`Invalid source directory: ${directory}`, options)
    this.name = 'InvalidSourceDirectoryError'
  }
}
