import type https from "https";
import type { FastifyInstance } from "fastify";
import {
  UnsupportedVersionError,
  convertLegacyBackup,
  deriveSealingKey,
  describeError,
  readLegacyBackup,
  sealUserSecrets,
  type LegacyBackup,
} from "@compat-bridge/shared";
import { fromFastifyLogger } from "../lib/logger";
import type { UserStore } from "../storage/store";

export interface RestoreRouteOptions {
  store: UserStore;
  credentialsDir: string;
  masterKey: string;
}

interface RestoreBody {
  version: number;
  backup: Record<string, unknown>;
  mode?: "continue" | "abort";
}

const restoreBodySchema = {
  type: "object",
  required: ["version", "backup"],
  properties: {
    version: { type: "integer" },
    backup: { type: "object" },
    mode: { type: "string", enum: ["continue", "abort"] },
  },
} as const;

export async function restoreRoutes(fastify: FastifyInstance<https.Server>, opts: RestoreRouteOptions) {
  const sealingKey = deriveSealingKey(opts.masterKey);

  // POST /api/restore
  fastify.post<{ Body: RestoreBody }>("/restore", { schema: { body: restoreBodySchema } }, async (req, reply) => {
    const { version, backup, mode = "continue" } = req.body;

    let legacy: LegacyBackup;
    try {
      legacy = readLegacyBackup(version, backup);
    } catch (error) {
      if (error instanceof UnsupportedVersionError) {
        return reply.status(400).send({ error: error.message });
      }
      throw error;
    }

    const converted = convertLegacyBackup(legacy, {
      credentialsDir: opts.credentialsDir,
      logger: fromFastifyLogger(req.log),
    });
    const failures = converted.failures.map((failure) => ({
      username: failure.username,
      error: describeError(failure.error),
    }));

    if (mode === "abort" && failures.length > 0) {
      return reply.status(422).send({
        error: "Restore aborted: some accounts could not be converted",
        failures,
      });
    }

    const users = converted.users.map((user) => sealUserSecrets(user, sealingKey));
    await opts.store.saveBackup(users, converted.folders);

    req.log.info(
      "restored %s account(s) and %s folder(s) from a v%s backup, %s failed",
      users.length,
      converted.folders.length,
      version,
      failures.length
    );

    return { restored: users.length, folders: converted.folders.length, failures };
  });
}
