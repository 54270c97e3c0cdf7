/**
 * Shared Error Classes
 */

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string
  ) {
    super(message)
    this.name = this.constructor.name
    Error.captureStackTrace(this, this.constructor)
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public field?: string) {
    super(message, 400, "VALIDATION_ERROR")
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = "Unauthorized", public responseBody?: string) {
    super(message, 401, "AUTHENTICATION_ERROR")
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = "Resource") {
    super(`${resource} not found`, 404, "NOT_FOUND")
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, "CONFLICT")
  }
}

/**
 * Missing or unusable vendor configuration. The message names the field the
 * operator has to fill in.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, public field?: string) {
    super(message, 500, "CONFIGURATION_ERROR")
  }
}

/**
 * The tax authority rejected a call, or it never answered.
 * `remoteStatus` is 0 for network failures.
 */
export class RemoteApiError extends AppError {
  constructor(
    message: string,
    public remoteStatus: number,
    public responseBody: string | null = null,
    code: string = "REMOTE_API_ERROR"
  ) {
    super(message, 502, code)
  }

  get isNetworkError(): boolean {
    return this.code === "NETWORK_ERROR"
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
