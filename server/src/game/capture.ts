import { createLogger } from "../utils/logger.js";
import { ok, reject } from "../utils/errors.js";
import type { Result } from "../utils/errors.js";
import { getMode } from "./modes.js";
import type { GameContext } from "./context.js";
import type { PhaseController } from "./phase.js";
import type { Player } from "../utils/types.js";

const log = createLogger("capture");

export interface CaptureOutcome {
  message: string;
  infected: boolean;
  bounty: number;
}

/**
 * Validates and applies predator/prey interactions.
 *
 * A capture runs through these checks, first failure wins:
 * 1. Both players known, distinct, predator vs prey
 * 2. No emergency, game running
 * 3. (non-infection) target free and outside any safe zone
 * 4. Signal at or above the capture threshold
 * 5. (photo mode) predator has a sighting of this target
 * 6. Predator's capture cooldown elapsed
 */
export class CaptureEngine {
  constructor(
    private readonly ctx: GameContext,
    private readonly phase: PhaseController
  ) {}

  capture(predatorId: string, preyId: string, rssi: number): Result<CaptureOutcome> {
    const { game, players, captureCooldowns } = this.ctx;
    const predator = players.get(predatorId);
    const prey = players.get(preyId);

    // 1. Identities
    if (!predator || !prey) return reject("NOT_FOUND", "Invalid players");
    if (predator.deviceId === prey.deviceId) return reject("PRECONDITION_FAILED", "Cannot capture self");
    if (predator.role !== "predator") return reject("PRECONDITION_FAILED", "Not a predator");
    if (prey.role !== "prey") return reject("PRECONDITION_FAILED", "Target is not prey");

    // 2. Phase
    if (game.emergency.active) return reject("EMERGENCY_BLOCKED", "Emergency active");
    if (game.phase !== "running") return reject("INVALID_STATE", "Game not running");

    const mode = getMode(game.mode);

    // 3. Target state
    if (!mode.infection) {
      if (prey.status === "captured") return reject("PRECONDITION_FAILED", "Already captured");
      if (prey.inSafeZone) return reject("PRECONDITION_FAILED", "Prey is in safe zone");
    }

    // 4. Range
    const threshold = game.settings.captureRssi;
    if (!Number.isFinite(rssi) || rssi < threshold) {
      return reject("PRECONDITION_FAILED", `Too far (${rssi}, need ${threshold})`);
    }

    // 5. Photo evidence
    if (mode.photoRequired && !predator.sightedTargets.has(prey.deviceId)) {
      return reject("PRECONDITION_FAILED", "Photo required first");
    }

    // 6. Cooldown
    const now = this.ctx.now();
    const wait = captureCooldowns.remainingMs(predator.deviceId, now);
    if (wait > 0) {
      return reject("PRECONDITION_FAILED", `Cooldown ${Math.ceil(wait / 1000)}s`);
    }

    captureCooldowns.touch(predator.deviceId, now);

    if (mode.infection) {
      return ok(this.infect(predator, prey, rssi));
    }
    return ok(this.applyCapture(predator, prey, rssi));
  }

  private infect(predator: Player, prey: Player, rssi: number): CaptureOutcome {
    const { players, bus } = this.ctx;

    players.setRole(prey, "predator", predator.deviceId);
    players.setStatus(prey, "active");
    prey.capturedBy = null;
    prey.stats.timesCaptured++;
    predator.stats.captures++;
    predator.stats.infections++;

    bus.log("infection", { predator: predator.name, predatorId: predator.deviceId, prey: prey.name, preyId: prey.deviceId, rssi });
    bus.notify(prey.deviceId, `INFECTED by ${predator.name}! You hunt now.`, "danger");
    bus.notify(predator.deviceId, `You infected ${prey.name}!`, "success");
    bus.broadcast("infection", { predator: predator.name, prey: prey.name });
    log.info({ predator: predator.deviceId, prey: prey.deviceId }, "Infection");

    if (players.withRole("prey").length === 0) {
      this.phase.end("all_infected");
    }

    return { message: `Infected ${prey.name}!`, infected: true, bounty: 0 };
  }

  private applyCapture(predator: Player, prey: Player, rssi: number): CaptureOutcome {
    const { game, players, bus, bounties } = this.ctx;
    const mode = getMode(game.mode);

    players.setStatus(prey, "captured");
    prey.capturedBy = predator.deviceId;
    prey.stats.timesCaptured++;
    predator.stats.captures++;

    if (mode.teams && predator.team) {
      game.teamScores[predator.team] += mode.points.capture;
    }

    const bounty = bounties.take(prey.deviceId);
    const bountyPoints = bounty ? bounty.points : 0;
    if (bounty) {
      predator.stats.bonusPoints += bounty.points;
      bus.log("bounty_claimed", { predator: predator.name, target: prey.name, points: bounty.points });
    }

    bus.log("capture", { pred: predator.name, predId: predator.deviceId, prey: prey.name, preyId: prey.deviceId, rssi });
    bus.notify(prey.deviceId, `CAPTURED by ${predator.name}!`, "danger");
    bus.notify(
      predator.deviceId,
      bounty ? `You captured ${prey.name}! Bounty +${bounty.points}` : `You captured ${prey.name}!`,
      "success"
    );
    bus.broadcast("capture", { pred: predator.name, prey: prey.name, bounty: bountyPoints });
    log.info({ predator: predator.deviceId, prey: prey.deviceId, rssi, bounty: bountyPoints }, "Capture");

    return { message: `Captured ${prey.name}!`, infected: false, bounty: bountyPoints };
  }

  /**
   * Free a captured prey through a safe zone. Returns false (no-op) when the
   * player is not captured or the mode has no captured state.
   */
  escape(preyId: string, beaconId: string | null = null): boolean {
    const { game, players, beacons, bus } = this.ctx;
    const prey = players.get(preyId);
    if (!prey || prey.status !== "captured" || getMode(game.mode).infection) return false;

    const capturedBy = prey.capturedBy;
    players.setStatus(prey, "active");
    prey.stats.escapes++;
    prey.capturedBy = null;

    const beaconName = beaconId ? (beacons.get(beaconId)?.name ?? beaconId) : "safe zone";
    bus.log("escape", { prey: prey.name, preyId: prey.deviceId, beacon: beaconName });
    bus.notify(prey.deviceId, `You ESCAPED via ${beaconName}!`, "success");
    if (capturedBy && players.has(capturedBy)) {
      bus.notify(capturedBy, `${prey.name} escaped!`, "warning");
    }
    bus.broadcast("escape", { prey: prey.name, beacon: beaconName });
    log.info({ prey: prey.deviceId, beacon: beaconId }, "Escape");
    return true;
  }

  /**
   * Moderator release: back to active without crediting an escape.
   */
  release(deviceId: string, by: string): Result {
    const { players, bus } = this.ctx;
    const player = players.get(deviceId);
    if (!player) return reject("NOT_FOUND", "Player not found");
    if (player.status !== "captured") return reject("PRECONDITION_FAILED", "Not captured");

    players.setStatus(player, "active");
    player.capturedBy = null;
    bus.log("mod_release", { player: player.name, id: player.deviceId, by });
    bus.notify(player.deviceId, "Moderator released you!", "success");
    return ok();
  }
}
