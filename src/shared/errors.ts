/**
 * Application error hierarchy.
 * Every error carries the HTTP status and machine-readable code the API returns.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly errorCode: string = 'internal_error',
    public readonly statusCode: number = 500,
    public readonly details: unknown = null,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): { error: string; message: string; details: unknown } {
    return { error: this.errorCode, message: this.message, details: this.details };
  }
}

// 401

export class AuthenticationError extends AppError {
  constructor(message = 'Authentication failed', details: unknown = null) {
    super(message, 'authentication_error', 401, details);
  }
}

export class InvalidCredentialsError extends AuthenticationError {
  constructor() {
    super('Invalid username or password');
  }
}

export class TokenExpiredError extends AuthenticationError {
  constructor() {
    super('Token has expired');
  }
}

export class InvalidTokenError extends AuthenticationError {
  constructor() {
    super('Invalid token');
  }
}

// 404 / 409 / 422

export class NotFoundError extends AppError {
  constructor(resource = 'Resource', resourceId?: string) {
    const message = resourceId
      ? `${resource} with id '${resourceId}' not found`
      : `${resource} not found`;
    super(message, 'not_found', 404);
  }
}

export class AlreadyExistsError extends AppError {
  constructor(resource = 'Resource', field = 'field') {
    super(`${resource} with this ${field} already exists`, 'already_exists', 409);
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation error', details: unknown = null) {
    super(message, 'validation_error', 422, details);
  }
}

// 502: upstream vendors

export class ExternalAPIError extends AppError {
  constructor(
    public readonly service: string,
    message: string,
    details: unknown = null,
  ) {
    super(`${service} API error: ${message}`, 'external_api_error', 502, details);
  }
}

export class ElevenLabsError extends ExternalAPIError {
  constructor(message: string, details: unknown = null) {
    super('ElevenLabs', message, details);
  }
}

export class LLMProviderError extends ExternalAPIError {
  constructor(provider: string, message: string, details: unknown = null) {
    super(`LLM (${provider})`, message, details);
  }
}

export class KieAIError extends ExternalAPIError {
  constructor(message: string, details: unknown = null) {
    super('kie.ai', message, details);
  }
}

// 500: local processing

export class ProcessingError extends AppError {
  constructor(message = 'Processing error', details: unknown = null) {
    super(message, 'processing_error', 500, details);
  }
}

export class AudioProcessingError extends ProcessingError {
  constructor(message: string, details: unknown = null) {
    super(`Audio processing error: ${message}`, details);
  }
}

export class RateLimitExceededError extends AppError {
  constructor(message = 'Rate limit exceeded. Please try again later.') {
    super(message, 'rate_limit_exceeded', 429);
  }
}

export class ConfigurationError extends AppError {
  constructor(message = 'Configuration error', details: unknown = null) {
    super(message, 'configuration_error', 500, details);
  }
}

export class MissingAPIKeyError extends ConfigurationError {
  constructor(service: string) {
    super(`${service} API key is not configured. Please add it in Settings.`);
  }
}

// 400: rule violations

export class BusinessLogicError extends AppError {
  constructor(message: string, details: unknown = null) {
    super(message, 'business_logic_error', 400, details);
  }
}

export class EpisodeDeletionError extends BusinessLogicError {
  constructor(reason = 'Only the last episode can be deleted') {
    super(`Cannot delete episode: ${reason}`);
  }
}

export class MaxCharactersExceededError extends BusinessLogicError {
  constructor(maxCharacters = 5) {
    super(`Maximum number of characters (${maxCharacters}) exceeded`);
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
