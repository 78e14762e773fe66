import fs from "fs";
import path from "path";
import type https from "https";
import { buildApp } from "./app";
import { CONFIG } from "./lib/config";
import { Database, SqliteUserStore } from "./storage/sqlite";

// TLS is mandatory - refuse to start without valid certificates
let httpsOptions: https.ServerOptions;
try {
  httpsOptions = {
    key: fs.readFileSync(path.join(CONFIG.CERTS_DIR, "server-key.pem")),
    cert: fs.readFileSync(path.join(CONFIG.CERTS_DIR, "server.pem")),
    ca: fs.readFileSync(path.join(CONFIG.CERTS_DIR, "ca.pem")),
    requestCert: true,
    rejectUnauthorized: true,
  };
} catch (e) {
  console.error("FATAL: TLS certificates not found. Server cannot start in insecure mode.", e);
  console.error("Set COMPAT_BRIDGE_CERTS to a directory containing:");
  console.error("  - server-key.pem (private key)");
  console.error("  - server.pem (certificate)");
  console.error("  - ca.pem (CA certificate)");
  process.exit(1);
}

async function main(): Promise<void> {
  const db = await Database.open(path.join(CONFIG.DATA_DIR, "accounts.db"));
  const app = buildApp({ https: httpsOptions, store: new SqliteUserStore(db), config: CONFIG });

  app.addHook("onClose", async () => {
    await db.close();
  });

  if (!process.env.COMPAT_BRIDGE_MASTER_KEY) {
    app.log.warn("COMPAT_BRIDGE_MASTER_KEY is not set; secrets sealed by this process cannot be opened after a restart");
  }

  const address = await app.listen({ port: CONFIG.PORT, host: "0.0.0.0" });
  app.log.info(`compat-bridge restore service listening on ${address}`);
}

main().catch((err) => {
  console.error("FATAL: restore service failed to start:", err);
  process.exit(1);
});
