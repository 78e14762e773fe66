import type https from "https";
import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import type { ServerConfig } from "./lib/config";
import { ADMIN_SECRET_HEADER, isAdminSecretValid } from "./middleware/auth";
import { healthRoutes } from "./routes/health";
import { restoreRoutes } from "./routes/restore";
import { userRoutes } from "./routes/users";
import type { UserStore } from "./storage/store";

// Legacy backups with many accounts get large
const BODY_LIMIT_BYTES = 50 * 1024 * 1024;

export interface AppOptions {
  store: UserStore;
  config: Pick<ServerConfig, "CREDENTIALS_DIR" | "ADMIN_SECRET" | "MASTER_KEY">;
  https: https.ServerOptions | null;
  logger?: boolean;
}

export function buildApp(options: AppOptions): FastifyInstance<https.Server> {
  const { store, config } = options;

  const app = Fastify({
    https: options.https,
    logger: options.logger ?? true,
    bodyLimit: BODY_LIMIT_BYTES,
  });

  app.register(cors, {
    origin: (origin: string | undefined, cb: (err: Error | null, allow: boolean) => void) => {
      const allowedOrigins = [/^https?:\/\/localhost(:\d+)?$/, /^https?:\/\/127\.0\.0\.1(:\d+)?$/];

      if (!origin || allowedOrigins.some((pattern: RegExp) => pattern.test(origin))) {
        cb(null, true);
      } else {
        cb(new Error("Not allowed by CORS"), false);
      }
    },
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header("Content-Security-Policy", "default-src 'none'; frame-ancestors 'none'");
    reply.header("X-Content-Type-Options", "nosniff");
    reply.header("X-Frame-Options", "DENY");
    reply.header("Cache-Control", "no-store");
    reply.header("Strict-Transport-Security", "max-age=31536000; includeSubDomains");
    return payload;
  });

  app.register(rateLimit, {
    max: 100,
    timeWindow: "1 minute",
    errorResponseBuilder: (req, context) => ({
      statusCode: 429,
      error: "Too Many Requests",
      message: `Rate limit exceeded. Try again in ${context.after}`,
      retryAfter: context.after,
    }),
  });

  app.register(healthRoutes);

  app.register(
    async (api) => {
      api.addHook("onRequest", async (req, reply) => {
        if (!isAdminSecretValid(req.headers[ADMIN_SECRET_HEADER], config.ADMIN_SECRET)) {
          return reply.status(401).send({ error: "Missing or invalid admin secret" });
        }
      });

      api.register(restoreRoutes, {
        store,
        credentialsDir: config.CREDENTIALS_DIR,
        masterKey: config.MASTER_KEY,
      });
      api.register(userRoutes, { store });
    },
    { prefix: "/api" }
  );

  return app;
}
