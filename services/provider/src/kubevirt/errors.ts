import { HttpError } from "../api/httpErrors.js";
import { isRecord } from "./resource.js";

/** Input that cannot be translated into a cluster resource. The caller must correct it. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** A non-2xx answer from the Kubernetes API server. */
export class KubeApiError extends Error {
  public readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = "KubeApiError";
    this.statusCode = statusCode;
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof KubeApiError && err.statusCode === 404;
}

/**
 * Normalizes whatever the Kubernetes client threw. The client reports HTTP failures with a
 * numeric `code` and the decoded `Status` object as `body`.
 */
export function toKubeApiError(err: unknown): KubeApiError | null {
  if (err instanceof KubeApiError) return err;
  if (!isRecord(err) || typeof err.code !== "number") return null;
  const body = err.body;
  let message = typeof err.message === "string" ? err.message : `Kubernetes API error ${err.code}`;
  if (isRecord(body) && typeof body.message === "string") {
    message = body.message;
  } else if (typeof body === "string" && body.length > 0) {
    try {
      const parsed: unknown = JSON.parse(body);
      if (isRecord(parsed) && typeof parsed.message === "string") message = parsed.message;
    } catch {
      // non-JSON body, keep the transport message
    }
  }
  return new KubeApiError(err.code, message);
}

/** Maps a cluster failure to the status the API exposes. Auth and lookup details stay internal. */
export function mapKubeError(err: KubeApiError, action: string): HttpError {
  switch (err.statusCode) {
    case 400:
    case 409:
    case 422:
      return new HttpError(err.statusCode, err.message);
    default:
      return new HttpError(500, `Failed to ${action} virtual machine`);
  }
}
