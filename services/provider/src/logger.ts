import pino, { type Logger } from "pino";

export interface LoggerOptions {
  level: string;
  name?: string;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino({
    name: options.name ?? "vm-provider",
    level: options.level,
    // Redact API keys from logs (request objects differ slightly between serializers).
    redact: {
      paths: ['req.headers["x-api-key"]', 'request.headers["x-api-key"]'],
      remove: true
    }
  });
}
