import type { Server as HTTPServer } from "node:http";
import { createAppContext, createAppServer } from "./app.js";
import { loadConfig } from "./config.js";

function isAddressInUse(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EADDRINUSE";
}

function listenOnce(server: HTTPServer, port: number, host: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    const onError = (err: Error) => {
      server.off("listening", onListening);
      reject(err);
    };
    server.once("listening", onListening);
    server.once("error", onError);
    server.listen(port, host);
  });
}

async function start() {
  const config = loadConfig();
  const ctx = createAppContext(config);
  await ctx.users.ensureAdminUser(config.admin.username, config.admin.password, config.admin.isDefault);

  const { server, wss } = createAppServer(ctx);

  // If the port is taken, walk up to MAX_PORT looking for a free one.
  let selectedPort = config.port;
  let attempts = 0;
  while (true) {
    attempts++;
    try {
      console.log(`[server] attempting to listen on http://${config.host}:${selectedPort} (attempt ${attempts})`);
      await listenOnce(server, selectedPort, config.host);
      break;
    } catch (err) {
      if (isAddressInUse(err)) {
        console.warn(`[server] port ${selectedPort} is in use, trying next...`);
        selectedPort++;
        if (selectedPort > config.maxPort) {
          throw new Error(`[server] No free port found in range ${config.port}-${config.maxPort}`);
        }
        continue;
      }
      throw err;
    }
  }
  console.log(`[server] listening on http://${config.host}:${selectedPort} (realtime at /ws)`);

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    for (const ws of wss.clients) ws.terminate();
    wss.close();
    server.close(() => {
      ctx.db.close();
      process.exit(0);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

start().catch((error: unknown) => {
  console.error("[server] failed to start:", error);
  process.exit(1);
});
