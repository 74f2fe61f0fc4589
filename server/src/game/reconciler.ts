import { createLogger } from "../utils/logger.js";
import type { GameContext } from "./context.js";
import type { PhaseController } from "./phase.js";

const log = createLogger("reconciler");

export interface SweepResult {
  wentOffline: string[];
  ended: boolean;
  pruned: number;
}

/**
 * Periodic housekeeping. The coordinator runs sweep() on an interval,
 * inside its executor like any other mutation.
 */
export class Reconciler {
  constructor(
    private readonly ctx: GameContext,
    private readonly phase: PhaseController
  ) {}

  sweep(now = this.ctx.now()): SweepResult {
    const wentOffline = this.markSilentPlayersOffline(now);

    let ended = false;
    if (this.phase.isExpired(now) && !this.ctx.game.emergency.active) {
      ended = this.phase.end("time_up").success;
    }

    const pruned = this.ctx.captureCooldowns.prune(now) + this.ctx.sightingCooldowns.prune(now);

    if (wentOffline.length > 0 || ended || pruned > 0) {
      log.debug({ offline: wentOffline.length, ended, pruned }, "Sweep");
    }
    return { wentOffline, ended, pruned };
  }

  private markSilentPlayersOffline(now: number): string[] {
    const { players, bus, options } = this.ctx;
    const offline: string[] = [];

    for (const player of players.all()) {
      if (!player.online || now - player.lastSeenAt <= options.onlineTimeoutMs) continue;

      player.online = false;
      if (player.status === "lobby" || player.status === "ready") {
        players.setStatus(player, "offline");
      }
      bus.log("player_offline", { id: player.deviceId, player: player.name });
      offline.push(player.deviceId);
    }
    return offline;
  }
}
