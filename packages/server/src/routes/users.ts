import type https from "https";
import type { FastifyInstance } from "fastify";
import { mapUserSecrets, redactSecret } from "@compat-bridge/shared";
import type { UserStore } from "../storage/store";

export interface UserRouteOptions {
  store: UserStore;
}

export async function userRoutes(fastify: FastifyInstance<https.Server>, opts: UserRouteOptions) {
  // GET /api/users
  fastify.get("/users", async () => {
    return { usernames: await opts.store.listUsernames() };
  });

  // GET /api/users/:username
  // Secret payloads never leave the server, sealed or not.
  fastify.get<{ Params: { username: string } }>("/users/:username", async (req, reply) => {
    const user = await opts.store.getUser(req.params.username);
    if (!user) {
      return reply.status(404).send({ error: "User not found" });
    }
    return mapUserSecrets(user, redactSecret);
  });
}
