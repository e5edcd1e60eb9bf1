import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { ValidationError } from "../kubevirt/errors.js";
import { HttpError } from "./httpErrors.js";

export interface ErrorBody {
  message: string;
  requestId?: string;
}

/**
 * Renders every failure as `{ message }`. Client errors keep their status; anything else is
 * logged with the request id and answered with a 500 whose message is masked by default.
 */
export function createErrorHandler(exposeInternalErrors: boolean) {
  return async function handleError(err: FastifyError, request: FastifyRequest, reply: FastifyReply) {
    let status = 500;
    if (err instanceof HttpError) {
      status = err.statusCode;
    } else if (err instanceof ValidationError) {
      status = 400;
    } else if (typeof err.statusCode === "number" && err.statusCode >= 400 && err.statusCode < 500) {
      // schema validation, body limit, rate limit
      status = err.statusCode;
    }

    if (status < 500) {
      return reply.code(status).send({ message: err.message } satisfies ErrorBody);
    }

    request.log.error({ err }, "request failed");
    const body: ErrorBody = {
      message: err instanceof HttpError || exposeInternalErrors ? err.message : "Internal Server Error",
      requestId: request.id
    };
    return reply.code(status).send(body);
  };
}
