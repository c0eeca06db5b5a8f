export enum AuthErrorCode {
  INCORRECT_CREDENTIALS = 'incorrect_credentials',
  NOT_AUTHORIZED = 'not_authorized',
  EXPIRED_TOKEN = 'expired_token',
  INVALID_TOKEN = 'invalid_token',
  PERMISSION_DENIED = 'permission_denied',
}

export const AuthErrorMessages: Record<AuthErrorCode, string> = {
  [AuthErrorCode.INCORRECT_CREDENTIALS]: 'Incorrect username or password.',
  [AuthErrorCode.NOT_AUTHORIZED]: 'Not authorized.',
  [AuthErrorCode.EXPIRED_TOKEN]: 'Token is expired.',
  [AuthErrorCode.INVALID_TOKEN]: 'Invalid credentials.',
  [AuthErrorCode.PERMISSION_DENIED]: 'Permission denied.',
};

/**
 * Base class for every authentication/authorization decision that is
 * reported back to the caller. Infrastructure failures never extend it.
 */
export abstract class AuthError extends Error {
  abstract readonly code: AuthErrorCode;
  abstract readonly statusCode: 401 | 403;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unknown username, deleted account or wrong password; all reported identically. */
export class IncorrectCredentialsError extends AuthError {
  readonly code = AuthErrorCode.INCORRECT_CREDENTIALS;
  readonly statusCode = 401;

  constructor() {
    super(AuthErrorMessages[AuthErrorCode.INCORRECT_CREDENTIALS]);
  }
}

/** Token missing where one is mandatory, or its subject no longer exists. */
export class NotAuthorizedError extends AuthError {
  readonly code = AuthErrorCode.NOT_AUTHORIZED;
  readonly statusCode = 401;

  constructor() {
    super(AuthErrorMessages[AuthErrorCode.NOT_AUTHORIZED]);
  }
}

export class ExpiredTokenError extends AuthError {
  readonly code = AuthErrorCode.EXPIRED_TOKEN;
  readonly statusCode = 401;

  constructor(options?: { cause?: unknown }) {
    super(AuthErrorMessages[AuthErrorCode.EXPIRED_TOKEN], options);
  }
}

export class InvalidTokenError extends AuthError {
  readonly code = AuthErrorCode.INVALID_TOKEN;
  readonly statusCode = 401;

  constructor(options?: { cause?: unknown }) {
    super(AuthErrorMessages[AuthErrorCode.INVALID_TOKEN], options);
  }
}

export class PermissionDeniedError extends AuthError {
  readonly code = AuthErrorCode.PERMISSION_DENIED;
  readonly statusCode = 403;

  constructor(readonly missingScopes: string[] = []) {
    super(AuthErrorMessages[AuthErrorCode.PERMISSION_DENIED]);
  }
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}
