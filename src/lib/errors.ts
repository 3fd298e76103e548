export type ApiErrorKind =
  | "auth"
  | "invalid_request"
  | "not_found"
  | "quota"
  | "transient"
  | "timeout"
  | "unknown";

const NON_RETRYABLE: ReadonlySet<ApiErrorKind> = new Set(["auth", "invalid_request", "not_found"]);

// gRPC status codes as returned by google-gax.
const GRPC_KIND: Record<number, ApiErrorKind> = {
  2: "transient",
  3: "invalid_request",
  4: "timeout",
  5: "not_found",
  7: "auth",
  8: "quota",
  9: "invalid_request",
  10: "transient",
  11: "invalid_request",
  13: "transient",
  14: "transient",
  16: "auth",
};

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export class ApiCallError extends Error {
  readonly kind: ApiErrorKind;
  readonly attempts: number;

  constructor(kind: ApiErrorKind, attempts: number, cause: unknown) {
    super(`[${kind}] ${formatError(cause)} (after ${attempts} attempt${attempts === 1 ? "" : "s"})`, {
      cause,
    });
    this.name = "ApiCallError";
    this.kind = kind;
    this.attempts = attempts;
  }
}

export class UnitTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = "UnitTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

type ErrorShape = { code?: unknown; status?: unknown; message?: unknown };

function readShape(err: unknown): ErrorShape {
  if (!err || typeof err !== "object") return {};
  return {
    code: "code" in err ? err.code : undefined,
    status: "status" in err ? err.status : undefined,
    message: "message" in err ? err.message : undefined,
  };
}

export function classifyApiError(err: unknown): ApiErrorKind {
  if (err instanceof ApiCallError) return err.kind;
  if (err instanceof UnitTimeoutError) return "timeout";
  const shape = readShape(err);

  if (typeof shape.code === "number" && GRPC_KIND[shape.code]) {
    return GRPC_KIND[shape.code];
  }

  const status = typeof shape.status === "number" ? shape.status : undefined;
  if (status === 401 || status === 403) return "auth";
  if (status === 404) return "not_found";
  if (status === 429) return "quota";
  if (status === 400) return "invalid_request";
  if (status !== undefined && status >= 500) return "transient";

  const msg = String(shape.message ?? (typeof err === "string" ? err : "")).toLowerCase();
  if (msg.includes("unauthenticated") || msg.includes("permission denied") || msg.includes("invalid_grant")) {
    return "auth";
  }
  if (msg.includes("quota") || msg.includes("resource_exhausted") || msg.includes("rate limit")) {
    return "quota";
  }
  if (msg.includes("timeout") || msg.includes("timed out") || msg.includes("deadline exceeded")) {
    return "timeout";
  }
  if (msg.includes("network")) return "transient";
  if (msg.includes("fetch failed")) return "transient";
  if (msg.includes("econnreset") || msg.includes("econnrefused") || msg.includes("socket hang up")) {
    return "transient";
  }
  return "unknown";
}

export function isRetryableKind(kind: ApiErrorKind): boolean {
  return !NON_RETRYABLE.has(kind);
}

export function isRetryableApiError(err: unknown): boolean {
  return isRetryableKind(classifyApiError(err));
}

export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (!err || typeof err !== "object") return String(err);
  const shape = readShape(err);
  const code = typeof shape.code === "number" ? `code ${shape.code}` : "";
  const status = typeof shape.status === "number" ? `status ${shape.status}` : "";
  const message = typeof shape.message === "string" ? shape.message : "";
  return [code, status, message].filter(Boolean).join(" ").trim() || "unknown error";
}
