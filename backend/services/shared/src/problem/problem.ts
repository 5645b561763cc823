// backend/services/shared/src/problem/problem.ts
/**
 * Purpose:
 * - Transport-agnostic Problem primitives (RFC 7807).
 * - Single source of truth for:
 *   - ProblemJson wire shape
 *   - HttpProblemError, the error type handlers throw to pick a status
 *
 * Invariants:
 * - No Express/HTTP framework imports.
 * - No process.env access.
 */

export type ProblemJson = {
  type: string; // e.g. "about:blank" or a stable URN
  title: string;
  status: number;

  detail?: string;
  code?: string;
  instance?: string;
};

/**
 * Error with an HTTP status attached. The error handler renders it as
 * problem+json; `detail` is the message and goes over the wire, so keep
 * secrets and stack traces out of it.
 */
export class HttpProblemError extends Error {
  public readonly status: number;
  public readonly title: string;
  public readonly code: string;
  public readonly type: string;
  public readonly headers: Readonly<Record<string, string>>;

  public constructor(opts: {
    status: number;
    title: string;
    code: string;
    detail: string;
    type?: string;
    headers?: Record<string, string>;
  }) {
    super(opts.detail);
    this.name = new.target.name;
    this.status = opts.status;
    this.title = opts.title;
    this.code = opts.code;
    this.type = opts.type ?? "about:blank";
    this.headers = { ...(opts.headers ?? {}) };
  }

  public toProblem(instance?: string): ProblemJson {
    return {
      type: this.type,
      title: this.title,
      status: this.status,
      detail: this.message,
      code: this.code,
      instance,
    };
  }
}

export class UnauthorizedError extends HttpProblemError {
  public constructor(detail: string) {
    super({
      status: 401,
      title: "Unauthorized",
      code: "UNAUTHORIZED",
      detail,
      headers: { "WWW-Authenticate": "Bearer" },
    });
  }
}

export class ForbiddenError extends HttpProblemError {
  public constructor(detail: string) {
    super({ status: 403, title: "Forbidden", code: "FORBIDDEN", detail });
  }
}

export class NotFoundError extends HttpProblemError {
  public constructor(detail: string) {
    super({ status: 404, title: "Not Found", code: "NOT_FOUND", detail });
  }
}

export class UnprocessableError extends HttpProblemError {
  public constructor(detail: string) {
    super({
      status: 422,
      title: "Unprocessable Entity",
      code: "UNPROCESSABLE",
      detail,
    });
  }
}
