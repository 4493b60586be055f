export enum ProvisionErrorCode {
  PARSE_FAILED = 'PARSE_FAILED',
  COMMAND_FAILED = 'COMMAND_FAILED',
  SPAWN_FAILED = 'SPAWN_FAILED',
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  UNSUPPORTED_ARCHIVE = 'UNSUPPORTED_ARCHIVE',
  UNSUPPORTED_PLATFORM = 'UNSUPPORTED_PLATFORM',
  NOT_FOUND = 'NOT_FOUND',
  INVALID_INPUT = 'INVALID_INPUT',
}

export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode
  readonly context?: Record<string, unknown>

  constructor(
    code: ProvisionErrorCode,
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ProvisionError'
    this.code = code
    this.context = context
  }
}

export function isProvisionError(
  error: unknown,
  code?: ProvisionErrorCode,
): error is ProvisionError {
  if (!(error instanceof ProvisionError)) return false
  return code === undefined || error.code === code
}
