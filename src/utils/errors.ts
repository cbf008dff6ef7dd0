/**
 * Error kinds shared by the stores, the auth service and the HTTP layer.
 *
 * Stores raise an AuthError for the lookups they can classify; the service
 * re-wraps every failure with its operation name so the message reads like a
 * chain, e.g. "Auth.Login: accounts.accountByEmail: account not found".
 */
export const ErrorKinds = {
  INVALID_CREDENTIALS: "INVALID_CREDENTIALS",
  ACCOUNT_NOT_FOUND: "ACCOUNT_NOT_FOUND",
  APP_NOT_FOUND: "APP_NOT_FOUND",
  SESSION_NOT_FOUND: "SESSION_NOT_FOUND",
  ACCOUNT_EXISTS: "ACCOUNT_EXISTS",
  REFRESH_TOKEN_EXPIRED: "REFRESH_TOKEN_EXPIRED",
  TOKEN_EXPIRED: "TOKEN_EXPIRED",
  HASHING_FAILURE: "HASHING_FAILURE",
  TOKEN_GENERATION_FAILURE: "TOKEN_GENERATION_FAILURE",
  PERSISTENCE_FAILURE: "PERSISTENCE_FAILURE",
  CANCELLED: "CANCELLED",
  INVALID_REQUEST: "INVALID_REQUEST",
  UNAUTHORIZED: "UNAUTHORIZED",
  FORBIDDEN: "FORBIDDEN",
} as const;

export type ErrorKind = typeof ErrorKinds[keyof typeof ErrorKinds];

export const ErrorMessages: Record<ErrorKind, string> = {
  [ErrorKinds.INVALID_CREDENTIALS]: "invalid credentials",
  [ErrorKinds.ACCOUNT_NOT_FOUND]: "account not found",
  [ErrorKinds.APP_NOT_FOUND]: "app not found",
  [ErrorKinds.SESSION_NOT_FOUND]: "session not found",
  [ErrorKinds.ACCOUNT_EXISTS]: "account already exists",
  [ErrorKinds.REFRESH_TOKEN_EXPIRED]: "refresh token expired",
  [ErrorKinds.TOKEN_EXPIRED]: "token expired",
  [ErrorKinds.HASHING_FAILURE]: "failed to hash password",
  [ErrorKinds.TOKEN_GENERATION_FAILURE]: "failed to generate token",
  [ErrorKinds.PERSISTENCE_FAILURE]: "storage failure",
  [ErrorKinds.CANCELLED]: "operation cancelled",
  [ErrorKinds.INVALID_REQUEST]: "invalid request",
  [ErrorKinds.UNAUTHORIZED]: "authentication required",
  [ErrorKinds.FORBIDDEN]: "forbidden",
};

export const ErrorStatusCodes: Record<ErrorKind, number> = {
  [ErrorKinds.INVALID_REQUEST]: 400,

  [ErrorKinds.INVALID_CREDENTIALS]: 401,
  [ErrorKinds.UNAUTHORIZED]: 401,
  [ErrorKinds.TOKEN_EXPIRED]: 401,
  [ErrorKinds.REFRESH_TOKEN_EXPIRED]: 401,
  [ErrorKinds.SESSION_NOT_FOUND]: 401,

  [ErrorKinds.FORBIDDEN]: 403,

  [ErrorKinds.ACCOUNT_NOT_FOUND]: 404,
  [ErrorKinds.APP_NOT_FOUND]: 404,

  [ErrorKinds.ACCOUNT_EXISTS]: 409,

  // client closed request
  [ErrorKinds.CANCELLED]: 499,

  [ErrorKinds.HASHING_FAILURE]: 500,
  [ErrorKinds.TOKEN_GENERATION_FAILURE]: 500,
  [ErrorKinds.PERSISTENCE_FAILURE]: 500,
};

export class AuthError extends Error {
  readonly kind: ErrorKind;
  readonly op: string;

  constructor(kind: ErrorKind, op: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : ErrorMessages[kind];
    super(`${op}: ${detail}`, cause === undefined ? undefined : { cause });
    this.name = "AuthError";
    this.kind = kind;
    this.op = op;
  }

  get status(): number {
    return ErrorStatusCodes[this.kind];
  }
}

export const isAuthError = (error: unknown, kind?: ErrorKind): error is AuthError => {
  return error instanceof AuthError && (kind === undefined || error.kind === kind);
};

/**
 * Attach the operation name to a failure. An already classified failure keeps
 * its kind; anything else gets the kind of the call site that produced it.
 * An aborted signal always wins, whatever the collaborator threw.
 */
export const wrapError = (
  op: string,
  error: unknown,
  fallback: ErrorKind,
  signal?: AbortSignal
): AuthError => {
  if (signal?.aborted) {
    return new AuthError(ErrorKinds.CANCELLED, op, error);
  }
  if (error instanceof AuthError) {
    return new AuthError(error.kind, op, error);
  }
  return new AuthError(fallback, op, error);
};

/**
 * Message safe to hand to API clients. Only the kind's fixed text is used, so
 * store and crypto details never leave the process.
 */
export const publicMessage = (error: AuthError): string => {
  return ErrorMessages[error.kind];
};
