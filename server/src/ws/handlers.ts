import type { WebSocket } from "ws";
import type { GameCoordinator } from "../game/coordinator.js";
import type { SessionStore } from "../api/sessions.js";
import { sendJson } from "./rooms.js";
import type { ConnectionRooms } from "./rooms.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("wsHandlers");

export interface WsDeps {
  coordinator: GameCoordinator;
  sessions: SessionStore;
  rooms: ConnectionRooms;
}

type ClientMessage = { type: string } & Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseMessage(raw: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;
  const { type } = parsed;
  if (typeof type !== "string") return null;
  return { ...parsed, type };
}

function sendError(ws: WebSocket, message: string): void {
  sendJson(ws, { type: "error", message });
}

/**
 * Build the socket message handler.
 *
 * Clients send `{ type: "auth", token }` with a session token from
 * /api/login, or `{ type: "spectate" }` to receive broadcasts only.
 */
export function createWsHandler(deps: WsDeps) {
  const { coordinator, sessions, rooms } = deps;

  async function handleAuth(ws: WebSocket, msg: ClientMessage): Promise<void> {
    const session = typeof msg.token === "string" ? sessions.get(msg.token) : null;
    if (!session) {
      sendError(ws, "Auth failed: invalid session");
      return;
    }

    if (!session.deviceId) {
      rooms.joinSpectator(ws);
      sendJson(ws, { type: "auth:success", admin: true, game: coordinator.gameView() });
      return;
    }

    const result = await coordinator.connect(session.deviceId, (message) => sendJson(ws, message));
    if (!result.success) {
      sendError(ws, `Auth failed: ${result.error}`);
      return;
    }

    rooms.joinPlayer(session.deviceId, ws, result.unsubscribe);
    sendJson(ws, {
      type: "auth:success",
      admin: false,
      player: result.player,
      game: coordinator.gameView(),
    });
    for (const notification of result.replay) {
      sendJson(ws, { type: "notification", notification });
    }

    log.info({ deviceId: session.deviceId, replayed: result.replay.length }, "Player authenticated via WebSocket");
  }

  function handleSpectate(ws: WebSocket): void {
    rooms.joinSpectator(ws);
    sendJson(ws, {
      type: "spectate:init",
      game: coordinator.gameView(),
      leaderboard: coordinator.leaderboard(),
    });
  }

  return async function handleWsMessage(ws: WebSocket, raw: string): Promise<void> {
    const message = parseMessage(raw);
    if (!message) {
      sendError(ws, "Invalid JSON");
      return;
    }

    switch (message.type) {
      case "auth":
        await handleAuth(ws, message);
        break;

      case "spectate":
        handleSpectate(ws);
        break;

      case "ping":
        sendJson(ws, { type: "pong", at: Date.now() });
        break;

      default:
        sendError(ws, `Unknown message type: ${message.type}`);
    }
  };
}
