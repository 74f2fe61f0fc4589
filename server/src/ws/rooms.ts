import { WebSocket } from "ws";
import { createLogger } from "../utils/logger.js";
import type { BroadcastMessage } from "../utils/types.js";

const log = createLogger("rooms");

interface PlayerConnection {
  ws: WebSocket;
  deviceId: string;
  unsubscribe: () => void;
}

/**
 * Live sockets, split into authenticated players (at most one socket per
 * device) and spectators such as the admin dashboard.
 */
export class ConnectionRooms {
  // deviceId -> PlayerConnection
  private players = new Map<string, PlayerConnection>();

  // ws -> PlayerConnection (reverse lookup)
  private connectionMap = new WeakMap<WebSocket, PlayerConnection>();

  private spectators = new Set<WebSocket>();

  /**
   * Bind a socket to a player. A previous socket for the same device is
   * closed (reconnect from another session).
   */
  joinPlayer(deviceId: string, ws: WebSocket, unsubscribe: () => void): void {
    const existing = this.players.get(deviceId);
    if (existing && existing.ws !== ws) {
      this.connectionMap.delete(existing.ws);
      if (existing.ws.readyState === WebSocket.OPEN) {
        existing.ws.close(1000, "Reconnected from another session");
      }
    }

    this.spectators.delete(ws);
    const conn: PlayerConnection = { ws, deviceId, unsubscribe };
    this.players.set(deviceId, conn);
    this.connectionMap.set(ws, conn);

    log.info({ deviceId, connections: this.players.size }, "Player joined");
  }

  joinSpectator(ws: WebSocket): void {
    this.spectators.add(ws);
    log.info({ spectators: this.spectators.size }, "Spectator joined");
  }

  /** Remove a socket from whichever room it is in. */
  leave(ws: WebSocket): void {
    const conn = this.connectionMap.get(ws);
    if (conn) {
      this.connectionMap.delete(ws);
      conn.unsubscribe();
      if (this.players.get(conn.deviceId)?.ws === ws) {
        this.players.delete(conn.deviceId);
      }
      log.info({ deviceId: conn.deviceId }, "Player left");
      return;
    }

    if (this.spectators.delete(ws)) {
      log.info({ spectators: this.spectators.size }, "Spectator left");
    }
  }

  /** Drop a device's socket, e.g. after a kick. */
  disconnect(deviceId: string, reason: string): void {
    const conn = this.players.get(deviceId);
    if (!conn) return;
    this.leave(conn.ws);
    if (conn.ws.readyState === WebSocket.OPEN) conn.ws.close(1000, reason);
  }

  getDeviceId(ws: WebSocket): string | null {
    return this.connectionMap.get(ws)?.deviceId ?? null;
  }

  /** Broadcast to every player and spectator socket. */
  broadcast(message: BroadcastMessage): void {
    const payload = JSON.stringify(message);
    for (const conn of this.players.values()) {
      if (conn.ws.readyState === WebSocket.OPEN) conn.ws.send(payload);
    }
    for (const ws of this.spectators) {
      if (ws.readyState === WebSocket.OPEN) ws.send(payload);
    }
  }

  stats(): { players: number; spectators: number } {
    return { players: this.players.size, spectators: this.spectators.size };
  }
}

/** Send JSON on an open socket; false when the socket is gone. */
export function sendJson(ws: WebSocket, message: Record<string, unknown>): boolean {
  if (ws.readyState !== WebSocket.OPEN) return false;
  ws.send(JSON.stringify(message));
  return true;
}
