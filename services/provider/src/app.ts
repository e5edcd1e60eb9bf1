import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import rateLimit from "@fastify/rate-limit";
import { authPlugin } from "./api/auth.js";
import { createErrorHandler } from "./api/errorHandler.js";
import { apiPlugin } from "./api/routes.js";
import type { AppDeps } from "./types/deps.js";

export interface BuildAppOptions {
  apiKey: string;
  logger: FastifyBaseLogger;
  deps: AppDeps;
  exposeInternalErrors?: boolean;
  /** Requests per minute per client across the API. */
  rateLimitMax?: number;
}

const DOCS_PREFIX = "/swagger";
const OPENAPI_PATH = "/openapi.json";

function isDocsPath(url: string): boolean {
  return url === OPENAPI_PATH || url.startsWith(DOCS_PREFIX);
}

function registerDocs(app: FastifyInstance) {
  app.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: { title: "KubeVirt VM provider API", version: "0.1.0" },
      components: {
        securitySchemes: {
          ApiKeyAuth: { type: "apiKey", name: "X-API-Key", in: "header" }
        }
      },
      security: [{ ApiKeyAuth: [] }]
    }
  });
  app.register(swaggerUi, { routePrefix: DOCS_PREFIX, uiConfig: { docExpansion: "list" } });
  app.get(OPENAPI_PATH, { schema: { hide: true } }, async () => app.swagger());
}

export function buildApp(options: BuildAppOptions) {
  const app = Fastify({
    bodyLimit: 256 * 1024,
    loggerInstance: options.logger
  });

  app.setErrorHandler(createErrorHandler(options.exposeInternalErrors ?? false));

  app.register(rateLimit, {
    global: true,
    max: options.rateLimitMax ?? 120,
    timeWindow: "1 minute",
    // Swagger UI pulls many assets on first load.
    allowList: (req) => isDocsPath(req.raw.url ?? req.url)
  });

  registerDocs(app);
  app.register(authPlugin, { apiKey: options.apiKey });
  app.register(apiPlugin, { deps: options.deps });

  return app;
}
