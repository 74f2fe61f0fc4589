import { createLogger } from "../utils/logger.js";
import { ok, reject } from "../utils/errors.js";
import type { Result } from "../utils/errors.js";
import { clockLabel } from "../utils/time.js";
import { CooldownMap } from "./cooldowns.js";
import { getMode } from "./modes.js";
import type { GameContext } from "./context.js";
import type { Sighting } from "../utils/types.js";

const log = createLogger("sightings");

/**
 * Photo sightings. Storage of the photo itself happens elsewhere; this only
 * records the fact, applies the per-pair cooldown and unlocks photo-mode
 * captures.
 */
export class SightingRecorder {
  constructor(private readonly ctx: GameContext) {}

  record(spotterId: string, targetId: string, photo: string | null): Result<{ points: number }> {
    const { game, players, bus, sightingCooldowns } = this.ctx;

    const spotter = players.get(spotterId);
    const target = players.get(targetId);
    if (!spotter || !target) return reject("NOT_FOUND", "Target not found");
    if (spotter.deviceId === target.deviceId) return reject("PRECONDITION_FAILED", "Cannot spot self");

    if (game.emergency.active) return reject("EMERGENCY_BLOCKED", "Emergency active");
    if (game.phase !== "running") return reject("INVALID_STATE", "Game not running");

    if (spotter.role === "predator" && target.role !== "prey") {
      return reject("PRECONDITION_FAILED", "Preds can only spot prey");
    }
    if (spotter.role === "prey" && target.role !== "predator") {
      return reject("PRECONDITION_FAILED", "Prey can only spot preds");
    }
    if (spotter.role === "unassigned") return reject("PRECONDITION_FAILED", "Pick a role first");

    const now = this.ctx.now();
    const key = CooldownMap.pairKey(spotter.deviceId, target.deviceId);
    const wait = sightingCooldowns.remainingMs(key, now);
    if (wait > 0) return reject("PRECONDITION_FAILED", `Cooldown ${Math.ceil(wait / 1000)}s`);
    sightingCooldowns.touch(key, now);

    const points = getMode(game.mode).points.sighting;
    spotter.stats.sightings++;
    spotter.sightedTargets.add(target.deviceId);

    const sighting: Sighting = {
      spotterId: spotter.deviceId,
      spotter: spotter.name,
      targetId: target.deviceId,
      target: target.name,
      photo,
      time: clockLabel(now),
    };
    this.ctx.sightings.push(sighting);

    bus.log("sighting", { spotter: spotter.name, target: target.name, photo });
    bus.notify(spotter.deviceId, `Sighting recorded! +${points} pts`, "success");
    bus.notify(target.deviceId, `You were spotted by ${spotter.name}!`, "warning");
    bus.broadcast("sighting", { spotter: spotter.name, target: target.name, photo });
    log.info({ spotter: spotter.deviceId, target: target.deviceId }, "Sighting");

    return ok({ points });
  }

  /** Gallery, newest first. Photos of players who hid them are left out. */
  gallery(): Sighting[] {
    const { players } = this.ctx;
    return this.ctx.sightings
      .filter((s) => s.photo !== null && (players.get(s.targetId)?.consent.photoVisible ?? true))
      .reverse();
  }
}
