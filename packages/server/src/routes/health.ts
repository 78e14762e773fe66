import type https from "https";
import type { FastifyInstance } from "fastify";

export const SERVICE_VERSION = "1.0.0";

export async function healthRoutes(fastify: FastifyInstance<https.Server>) {
  fastify.get("/health", async () => {
    return { status: "ok", version: SERVICE_VERSION };
  });
}
