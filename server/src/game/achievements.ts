import { createLogger } from "../utils/logger.js";
import type { EventBus } from "../events/bus.js";
import type { PlayerRegistry } from "./players.js";
import type { GameEvent, Player } from "../utils/types.js";

const log = createLogger("achievements");

export type AchievementId = "first_blood" | "hat_trick" | "houdini" | "patient_zero";

export const ACHIEVEMENTS: Readonly<Record<AchievementId, string>> = {
  first_blood: "First Blood",
  hat_trick: "Hat Trick",
  houdini: "Houdini",
  patient_zero: "Patient Zero",
};

function idFrom(event: GameEvent, key: string): string | null {
  const value = event.data[key];
  return typeof value === "string" ? value : null;
}

/**
 * Awards one-off badges by watching the event log. Only reads player stats
 * and writes the achievement set; never touches game state.
 */
export class AchievementTracker {
  private firstCaptureTaken = false;
  private firstInfectionTaken = false;
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly bus: EventBus,
    private readonly players: PlayerRegistry
  ) {}

  attach(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.bus.observe((event) => this.handle(event));
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  private handle(event: GameEvent): void {
    switch (event.type) {
      case "capture": {
        const predator = this.playerFrom(event, "predId");
        if (!predator) return;
        if (!this.firstCaptureTaken) {
          this.firstCaptureTaken = true;
          this.award(predator, "first_blood");
        }
        if (predator.stats.captures >= 3) this.award(predator, "hat_trick");
        return;
      }
      case "infection": {
        const predator = this.playerFrom(event, "predatorId");
        if (!predator) return;
        if (!this.firstInfectionTaken) {
          this.firstInfectionTaken = true;
          this.award(predator, "patient_zero");
        }
        if (predator.stats.captures >= 3) this.award(predator, "hat_trick");
        return;
      }
      case "escape": {
        const prey = this.playerFrom(event, "preyId");
        if (prey && prey.stats.escapes >= 3) this.award(prey, "houdini");
        return;
      }
      case "game_reset":
        this.firstCaptureTaken = false;
        this.firstInfectionTaken = false;
        return;
    }
  }

  private playerFrom(event: GameEvent, key: string): Player | null {
    const id = idFrom(event, key);
    return id ? this.players.get(id) : null;
  }

  private award(player: Player, id: AchievementId): void {
    if (player.achievements.has(id)) return;
    player.achievements.add(id);
    const title = ACHIEVEMENTS[id];
    this.bus.notify(player.deviceId, `Achievement unlocked: ${title}!`, "success");
    this.bus.log("achievement", { id: player.deviceId, player: player.name, achievement: id });
    log.info({ deviceId: player.deviceId, achievement: id }, "Achievement unlocked");
  }
}
