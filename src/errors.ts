/**
 * Error types raised by the store.
 * Every failure reaches the caller as a SettingsError subclass carrying a stable code.
 */

export type SettingsErrorCode =
  | 'DIRECTORY_UNAVAILABLE'
  | 'IO_FAILURE'
  | 'FILE_NOT_FOUND'
  | 'ENCODING_FAILURE'
  | 'DECODING_FAILURE'
  | 'UNSUPPORTED_FORMAT'

export interface SettingsErrorOptions {
  cause?: unknown
  context?: Record<string, unknown>
}

export class SettingsError extends Error {
  readonly code: SettingsErrorCode
  readonly context?: Record<string, unknown>

  constructor(message: string, code: SettingsErrorCode, options?: SettingsErrorOptions) {
    super(message)
    this.name = 'SettingsError'
    this.code = code
    this.context = options?.context
    if (options?.cause !== undefined) this.cause = options.cause
    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    }
  }
}

/** The OS config root could not be determined. */
export class DirectoryUnavailableError extends SettingsError {
  constructor(app: string) {
    super('no system config directory detected', 'DIRECTORY_UNAVAILABLE', { context: { app } })
    this.name = 'DirectoryUnavailableError'
  }
}

export class IoError extends SettingsError {
  readonly path: string

  constructor(message: string, path: string, cause?: unknown, code: SettingsErrorCode = 'IO_FAILURE') {
    super(message, code, { cause, context: { path } })
    this.name = 'IoError'
    this.path = path
  }
}

export class FileNotFoundError extends IoError {
  constructor(path: string, cause?: unknown) {
    super(`settings file not found: ${path}`, path, cause, 'FILE_NOT_FOUND')
    this.name = 'FileNotFoundError'
  }
}

export class EncodingError extends SettingsError {
  readonly format: string

  constructor(format: string, cause?: unknown) {
    super(`unable to encode settings as ${format}: ${describeCause(cause)}`, 'ENCODING_FAILURE', {
      cause,
      context: { format },
    })
    this.name = 'EncodingError'
    this.format = format
  }
}

export class DecodingError extends SettingsError {
  readonly format: string
  readonly path: string

  constructor(format: string, path: string, reason: unknown) {
    super(`unable to decode ${format} settings from ${path}: ${describeCause(reason)}`, 'DECODING_FAILURE', {
      cause: reason instanceof Error ? reason : undefined,
      context: { format, path },
    })
    this.name = 'DecodingError'
    this.format = format
    this.path = path
  }
}

export class UnsupportedFormatError extends SettingsError {
  readonly format: string
  readonly available: readonly string[]

  constructor(format: string, available: readonly string[]) {
    super(`no codec registered for format '${format}'. Available: ${available.join(', ')}`, 'UNSUPPORTED_FORMAT', {
      context: { format, available },
    })
    this.name = 'UnsupportedFormatError'
    this.format = format
    this.available = available
  }
}

export function isSettingsError(error: unknown): error is SettingsError {
  return error instanceof SettingsError
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  return String(cause)
}
