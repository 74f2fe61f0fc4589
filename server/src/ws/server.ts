import { WebSocketServer, WebSocket } from "ws";
import type { Server as HttpServer } from "http";
import { createWsHandler } from "./handlers.js";
import { ConnectionRooms } from "./rooms.js";
import type { GameCoordinator } from "../game/coordinator.js";
import type { SessionStore } from "../api/sessions.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("ws");

export interface WsServerDeps {
  coordinator: GameCoordinator;
  sessions: SessionStore;
}

export interface PushServer {
  wss: WebSocketServer;
  rooms: ConnectionRooms;
  close(): void;
}

/**
 * Initialize the WebSocket server on the given HTTP server and forward
 * every coordinator broadcast to connected sockets.
 */
export function initWebSocketServer(server: HttpServer, deps: WsServerDeps): PushServer {
  const wss = new WebSocketServer({ server, path: "/ws" });
  const rooms = new ConnectionRooms();
  const handleWsMessage = createWsHandler({ ...deps, rooms });

  wss.on("connection", (ws: WebSocket) => {
    log.debug("New WebSocket connection");

    ws.on("message", (data) => {
      handleWsMessage(ws, data.toString()).catch((err) => {
        log.error({ error: (err as Error).message }, "Error handling WS message");
      });
    });

    ws.on("close", () => {
      rooms.leave(ws);
      log.debug(rooms.stats(), "WebSocket connection closed");
    });

    ws.on("error", (err) => {
      log.error({ error: err.message }, "WebSocket error");
      rooms.leave(ws);
    });

    // Send heartbeat ping every 30s
    const pingInterval = setInterval(() => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.ping();
      } else {
        clearInterval(pingInterval);
      }
    }, 30_000);

    ws.on("close", () => clearInterval(pingInterval));
  });

  const offBroadcast = deps.coordinator.onBroadcast((message) => {
    rooms.broadcast(message);
    if (message.type === "player:kicked" && typeof message.id === "string") {
      rooms.disconnect(message.id, "Kicked");
    }
  });

  log.info("WebSocket server initialized on /ws");

  return {
    wss,
    rooms,
    close() {
      offBroadcast();
      for (const client of wss.clients) client.terminate();
      wss.close();
    },
  };
}
