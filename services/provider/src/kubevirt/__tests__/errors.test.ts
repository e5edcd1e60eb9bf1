import { describe, expect, it } from "vitest";
import { HttpError } from "../../api/httpErrors.js";
import { isNotFound, KubeApiError, mapKubeError, toKubeApiError } from "../errors.js";

function clientError(code: number, body: unknown) {
  return Object.assign(new Error(`HTTP-Code: ${code}`), { code, body });
}

describe("toKubeApiError", () => {
  it("reads the message from a decoded Status body", () => {
    const err = toKubeApiError(clientError(409, { kind: "Status", message: "already exists" }));
    expect(err).toBeInstanceOf(KubeApiError);
    expect(err?.statusCode).toBe(409);
    expect(err?.message).toBe("already exists");
  });

  it("reads the message from a JSON string body", () => {
    expect(toKubeApiError(clientError(404, '{"message":"not found"}'))?.message).toBe("not found");
  });

  it("keeps the transport message when the body is not JSON", () => {
    expect(toKubeApiError(clientError(502, "<html>bad gateway</html>"))?.message).toBe("HTTP-Code: 502");
  });

  it("returns null for errors without a status code", () => {
    expect(toKubeApiError(new Error("ECONNREFUSED"))).toBeNull();
    expect(toKubeApiError("nope")).toBeNull();
  });

  it("passes KubeApiError through", () => {
    const err = new KubeApiError(403, "forbidden");
    expect(toKubeApiError(err)).toBe(err);
  });
});

describe("isNotFound", () => {
  it("matches only 404 API errors", () => {
    expect(isNotFound(new KubeApiError(404, "gone"))).toBe(true);
    expect(isNotFound(new KubeApiError(500, "boom"))).toBe(false);
    expect(isNotFound(new Error("gone"))).toBe(false);
  });
});

describe("mapKubeError", () => {
  it("exposes client errors with their message", () => {
    const mapped = mapKubeError(new KubeApiError(422, "spec.template is invalid"), "create");
    expect(mapped).toBeInstanceOf(HttpError);
    expect(mapped.statusCode).toBe(422);
    expect(mapped.message).toBe("spec.template is invalid");
  });

  it("masks everything else", () => {
    const mapped = mapKubeError(new KubeApiError(403, "serviceaccount cannot create"), "create");
    expect(mapped.statusCode).toBe(500);
    expect(mapped.message).toBe("Failed to create virtual machine");
  });
});
