import "dotenv/config";
import { createServer } from "./server.js";
import { config, DEFAULT_SESSION_SECRET } from "./config.js";
import { DEFAULT_ACCOUNTS } from "./db/seed.js";

async function main() {
  console.log(`
  ╔═══════════════════════════════════════╗
  ║       Restaurant Ordering Server      ║
  ╚═══════════════════════════════════════╝
  `);

  if (config.nodeEnv === "production" && config.sessionSecret === DEFAULT_SESSION_SECRET) {
    console.warn("[Server] SESSION_SECRET is not set; session cookies are signed with the development secret");
  }

  const app = await createServer();

  // Graceful shutdown (onClose hook closes the database)
  const shutdown = async () => {
    console.log("[Server] Shutting down gracefully...");
    await app.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err) => {
      console.error("[Server] Shutdown failed:", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    await app.listen({ port: config.port, host: config.host });
    console.log(`[Server] Listening on http://${config.host}:${config.port}`);
    console.log(`[Server] Environment: ${config.nodeEnv}`);
    console.log(`[Server] Database: ${config.dbPath}`);
    if (config.seedData) {
      console.log("[Server] Default accounts (created on first start):");
      for (const account of DEFAULT_ACCOUNTS) {
        const role = account.isRestaurant ? "restaurant" : "customer";
        console.log(`[Server]   ${role}: ${account.username} / ${account.password}`);
      }
    }
  } catch (err) {
    console.error("[Server] Failed to start:", err);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("[Server] Fatal:", err);
  process.exit(1);
});
