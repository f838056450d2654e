/**
 * Failure kinds raised while verifying a repository.
 *
 * Each error carries the HTTP status it maps to; only the request handler
 * and the MCP tool wrapper translate them into responses.
 */

export type VerificationErrorKind =
  | "InvalidRepositoryURL"
  | "RepositoryNotFound"
  | "AuthenticationFailed"
  | "UpstreamError"
  | "NotJavaScriptTypeScript";

export abstract class VerificationError extends Error {
  abstract readonly kind: VerificationErrorKind;
  abstract readonly status: number;
}

export class InvalidRepositoryUrlError extends VerificationError {
  readonly kind = "InvalidRepositoryURL";
  readonly status = 400;

  constructor(readonly input: string, reason = "Invalid GitHub repository URL") {
    super(reason);
    this.name = "InvalidRepositoryUrlError";
  }
}

export class RepositoryNotFoundError extends VerificationError {
  readonly kind = "RepositoryNotFound";
  readonly status = 404;

  constructor(readonly repository: string) {
    super(`Repository ${repository} was not found on GitHub`);
    this.name = "RepositoryNotFoundError";
  }
}

export class AuthenticationFailedError extends VerificationError {
  readonly kind = "AuthenticationFailed";
  readonly status = 401;

  constructor(readonly upstreamStatus: number, readonly rateLimited = false) {
    super(
      rateLimited
        ? `GitHub API rate limit exceeded for the configured token (HTTP ${upstreamStatus})`
        : `GitHub rejected the configured token (HTTP ${upstreamStatus})`
    );
    this.name = "AuthenticationFailedError";
  }
}

export type UpstreamErrorCode = "HTTP_ERROR" | "NETWORK_ERROR" | "TIMEOUT" | "INVALID_RESPONSE";

export class UpstreamError extends VerificationError {
  readonly kind = "UpstreamError";
  readonly status = 502;

  constructor(
    message: string,
    readonly code: UpstreamErrorCode,
    readonly upstreamStatus: number | null = null
  ) {
    super(message);
    this.name = "UpstreamError";
  }
}

export class NotJavaScriptTypeScriptError extends VerificationError {
  readonly kind = "NotJavaScriptTypeScript";
  readonly status = 400;

  constructor(readonly repository: string) {
    super(`Repository ${repository} must be TypeScript/JavaScript based`);
    this.name = "NotJavaScriptTypeScriptError";
  }
}
