/**
 * HTTP Server Entry Point
 * Restores task state, then starts the Express application.
 * Handles graceful shutdown on SIGTERM/SIGINT.
 */
import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app.js";
import { initializeApp } from "./config/init.js";
import { PORT } from "./config/env.js";

async function main(): Promise<void> {
  const context = await initializeApp();
  const server = createServer(createApp(context));

  server.listen(PORT, "0.0.0.0", () => {
    console.log(`[server] Running on 0.0.0.0:${PORT}`);
    console.log("[server] ✓ Ready to accept requests\n");
  });

  let shuttingDown = false;

  /**
   * Stops accepting requests, lets running downloads finish, then closes the store.
   */
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[server] ${signal} received, shutting down...`);

    server.close();
    context.dispatcher
      .close()
      .then(() => context.store.close())
      .then(() => process.exit(0))
      .catch((error) => {
        console.error("[server] ✗ Shutdown failed:", error);
        process.exit(1);
      });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error) => {
  console.error("[server] ✗ Startup failed:", error);
  process.exit(1);
});
