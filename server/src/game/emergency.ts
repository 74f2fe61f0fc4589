import { createLogger } from "../utils/logger.js";
import { ok, reject } from "../utils/errors.js";
import type { Result } from "../utils/errors.js";
import { emptyEmergency } from "./context.js";
import type { GameContext } from "./context.js";
import type { PhaseController } from "./phase.js";
import type { EmergencyContact, EmergencyState, Player } from "../utils/types.js";

const log = createLogger("emergency");

export const SYSTEM_ACTOR = "SYSTEM";
export const NEAREST_CONTACTS = 5;
const MAX_REASON_LENGTH = 200;

function cleanReason(reason: unknown): string {
  const text = typeof reason === "string" ? reason.trim().slice(0, MAX_REASON_LENGTH) : "";
  return text.length > 0 ? text : "Emergency";
}

/**
 * Global pause overlay. While active, captures, sightings, resume and start
 * are refused. Clearing it does not resume the game.
 */
export class EmergencyService {
  constructor(
    private readonly ctx: GameContext,
    private readonly phase: PhaseController
  ) {}

  trigger(deviceId: string, reason: unknown): Result<{ emergency: EmergencyState }> {
    const player = this.ctx.players.get(deviceId);
    if (!player) return reject("NOT_FOUND", "Player not found");
    if (this.ctx.game.emergency.active) return reject("INVALID_STATE", "Emergency already active");

    return ok({
      emergency: this.activate(player.deviceId, player.name, cleanReason(reason), this.nearestTo(player)),
    });
  }

  /** Admin/moderator variant with nobody in particular in trouble. */
  triggerSystem(reason: unknown, byName = "Admin"): Result<{ emergency: EmergencyState }> {
    if (this.ctx.game.emergency.active) return reject("INVALID_STATE", "Emergency already active");
    return ok({ emergency: this.activate(SYSTEM_ACTOR, byName, cleanReason(reason), []) });
  }

  clear(by: string): Result {
    const { game, bus, players } = this.ctx;
    if (!game.emergency.active) return reject("INVALID_STATE", "No active emergency");

    game.emergency = emptyEmergency();
    bus.log("emergency_clear", { by });
    bus.broadcast("emergency:cleared", { by });
    bus.notifyMany(players.ids(), "Emergency cleared", "info");
    log.info({ by }, "Emergency cleared");
    return ok();
  }

  status(): EmergencyState {
    const { emergency } = this.ctx.game;
    return { ...emergency, nearest: emergency.nearest.map((c) => ({ ...c })) };
  }

  /**
   * Other players ranked by signal strength to the one in trouble, using
   * whichever side of the pair heard the other more strongly.
   */
  nearestTo(subject: Player): EmergencyContact[] {
    const contacts: EmergencyContact[] = [];
    for (const other of this.ctx.players.all()) {
      if (other.deviceId === subject.deviceId) continue;
      const heard = subject.lastRssi.get(other.deviceId);
      const heardBy = other.lastRssi.get(subject.deviceId);
      if (heard === undefined && heardBy === undefined) continue;
      const rssi = Math.max(heard ?? -Infinity, heardBy ?? -Infinity);
      contacts.push({ deviceId: other.deviceId, name: other.name, rssi });
    }
    return contacts.sort((a, b) => b.rssi - a.rssi).slice(0, NEAREST_CONTACTS);
  }

  private activate(
    triggeredBy: string,
    triggeredByName: string,
    reason: string,
    nearest: EmergencyContact[]
  ): EmergencyState {
    const { game, bus, players } = this.ctx;
    game.emergency = {
      active: true,
      triggeredBy,
      triggeredByName,
      reason,
      triggeredAt: this.ctx.now(),
      nearest,
    };

    const paused = this.phase.pauseRunning("emergency");

    bus.log("emergency", { by: triggeredByName, id: triggeredBy, reason, paused, nearest });
    bus.broadcast("emergency:triggered", { by: triggeredByName, reason, nearest });
    bus.notifyMany(players.ids(), `EMERGENCY: ${triggeredByName} - ${reason}. Game paused.`, "danger");
    log.warn({ triggeredBy, reason, paused }, "Emergency triggered");
    return this.status();
  }
}
