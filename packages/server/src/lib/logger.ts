import type { FastifyBaseLogger } from "fastify";
import type { Logger } from "@compat-bridge/shared";

// Route converter diagnostics into the request's pino logger
export function fromFastifyLogger(log: FastifyBaseLogger): Logger {
  return {
    log(level, message, ...args) {
      log[level](message, ...args);
    },
  };
}
