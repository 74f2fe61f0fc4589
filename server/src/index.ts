import { createServer } from "http";
import { mkdirSync } from "fs";
import { dirname } from "path";
import express from "express";
import cors from "cors";
import { config, coordinatorOptions } from "./config.js";
import { createLogger } from "./utils/logger.js";
import { GameCoordinator } from "./game/coordinator.js";
import type { Persist } from "./game/coordinator.js";
import { SnapshotStore } from "./db/snapshots.js";
import { SessionStore } from "./api/sessions.js";
import { createRouter } from "./api/routes.js";
import { initWebSocketServer } from "./ws/server.js";

const log = createLogger("main");

async function main(): Promise<void> {
  log.info("Hunt coordinator starting...");

  // 1. Coordinator, restored from the last snapshot when enabled
  const coordinator = new GameCoordinator(coordinatorOptions(config));
  let store: SnapshotStore | null = null;
  let persist: Persist | undefined;

  if (config.snapshotEnabled) {
    mkdirSync(dirname(config.dbPath), { recursive: true });
    store = new SnapshotStore(config.dbPath);
    const snapshot = store.load();
    if (snapshot) {
      await coordinator.restore(snapshot);
      log.info({ players: snapshot.players.length, savedAt: snapshot.savedAt }, "Restored snapshot");
    }
    const snapshots = store;
    persist = (s) => snapshots.save(s);
  }

  // 2. Set up Express app
  const sessions = new SessionStore(config.sessionTtlHours * 3600 * 1000);
  const app = express();
  app.use(cors());
  app.use(express.json());

  // Serve uploaded photos
  mkdirSync(config.uploadsDir, { recursive: true });
  app.use("/uploads", express.static(config.uploadsDir));

  app.use(
    createRouter({
      coordinator,
      sessions,
      uploadsDir: config.uploadsDir,
      maxPhotoSizeMb: config.maxPhotoSizeMb,
    })
  );

  // 3. HTTP + WebSocket servers
  const server = createServer(app);
  const push = initWebSocketServer(server, { coordinator, sessions });

  // 4. Reconciler (offline detection, time-up, snapshots)
  coordinator.startBackgroundTasks(persist);

  server.listen(config.port, config.host, () => {
    log.info(
      { host: config.host, port: config.port },
      `Server listening on http://${config.host}:${config.port}`
    );
    log.info(`WebSocket available at ws://${config.host}:${config.port}/ws`);
    log.info(`Health check: http://${config.host}:${config.port}/health`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    log.info({ signal }, "Shutting down...");

    coordinator.stop();
    if (persist) await coordinator.sweep(persist);
    push.close();
    store?.close();

    server.close(() => {
      log.info("HTTP server closed");
    });

    log.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      log.error({ error: (err as Error).message }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

main().catch((err) => {
  log.fatal({ error: (err as Error).message, stack: (err as Error).stack }, "Fatal error during startup");
  process.exit(1);
});
