import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import { timingSafeEqual } from "node:crypto";
import { API_PREFIX } from "./routes.js";

export interface AuthPluginOptions {
  apiKey: string;
}

const PUBLIC_PATHS = new Set([`${API_PREFIX}/health`]);

function keysMatch(candidate: string, expected: string): boolean {
  const a = Buffer.from(candidate);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

const authPluginImpl: FastifyPluginAsync<AuthPluginOptions> = async (app, opts) => {
  app.addHook("preHandler", async (request, reply) => {
    const url = (request.raw.url ?? request.url).split("?")[0];
    // Docs and the OpenAPI document stay public.
    if (!url.startsWith("/api/") || PUBLIC_PATHS.has(url)) {
      return;
    }

    const rawKey = request.headers["x-api-key"];
    const key = Array.isArray(rawKey) ? rawKey[0] : rawKey;
    if (typeof key === "string" && keysMatch(key, opts.apiKey)) return;

    reply.code(401);
    return reply.send({ message: "Unauthorized" });
  });
};

export const authPlugin = fp(authPluginImpl);
