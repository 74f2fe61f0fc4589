import { createLogger } from "../utils/logger.js";
import { ok, reject } from "../utils/errors.js";
import type { Result } from "../utils/errors.js";
import { clamp, secondsUntil } from "../utils/time.js";
import { isValidBeaconThreshold } from "../utils/ids.js";
import { DEFAULT_MODE, getMode, modeInfo } from "./modes.js";
import { buildLeaderboard } from "./scoring.js";
import { emptyEmergency } from "./context.js";
import type { GameContext } from "./context.js";
import type { GameModeId, GameSettings, Leaderboard, Player, Team } from "../utils/types.js";

const log = createLogger("phase");

export const MIN_DURATION_MINUTES = 1;
export const MAX_DURATION_MINUTES = 240;
export const MIN_COUNTDOWN_SECONDS = 1;
export const MAX_COUNTDOWN_SECONDS = 120;

/**
 * Runs a task after a delay. Returns a cancel function.
 * The coordinator supplies one that routes the task through its executor.
 */
export type Scheduler = (delayMs: number, task: () => void) => () => void;

export const timeoutScheduler: Scheduler = (delayMs, task) => {
  const timer = setTimeout(task, delayMs);
  return () => clearTimeout(timer);
};

export interface StartOptions {
  durationMinutes?: number;
  countdownSeconds?: number;
}

const TEAMS: readonly Team[] = ["red", "blue"];

/**
 * Owns the lobby -> countdown -> running <-> paused -> ended lifecycle.
 */
export class PhaseController {
  private cancelCountdown: (() => void) | null = null;
  // Bumped whenever a pending countdown must not commit.
  private generation = 0;

  constructor(
    private readonly ctx: GameContext,
    private readonly schedule: Scheduler
  ) {}

  // ============ Lifecycle ============

  start(options: StartOptions = {}): Result<{ countdownSeconds: number; durationMinutes: number }> {
    const { game, players, bus } = this.ctx;

    if (game.emergency.active) return reject("EMERGENCY_BLOCKED", "Emergency active");
    if (game.phase !== "lobby") return reject("INVALID_STATE", "Game not in lobby");

    const all = players.all();
    const ready = all.filter((p) => p.status === "ready");
    if (!ready.some((p) => p.role === "predator")) {
      return reject("PRECONDITION_FAILED", "Need a ready predator");
    }
    if (!ready.some((p) => p.role === "prey")) {
      return reject("PRECONDITION_FAILED", "Need a ready prey");
    }
    if (all.filter((p) => p.online).length < 2) {
      return reject("PRECONDITION_FAILED", "Need 2 online players");
    }

    const durationMinutes = Math.round(
      clamp(options.durationMinutes ?? game.durationMinutes, MIN_DURATION_MINUTES, MAX_DURATION_MINUTES)
    );
    const countdownSeconds = Math.round(
      clamp(options.countdownSeconds ?? game.countdownSeconds, MIN_COUNTDOWN_SECONDS, MAX_COUNTDOWN_SECONDS)
    );

    if (getMode(game.mode).teams) this.assignTeams();

    const now = this.ctx.now();
    game.phase = "countdown";
    game.durationMinutes = durationMinutes;
    game.countdownSeconds = countdownSeconds;
    game.countdownEndsAt = now + countdownSeconds * 1000;
    game.startedAt = null;
    game.endsAt = null;
    game.endedAt = null;
    game.pausedRemainingMs = null;

    for (const player of ready) {
      players.setStatus(player, "active");
    }

    const generation = ++this.generation;
    this.cancelCountdown = this.schedule(countdownSeconds * 1000, () => {
      this.commitCountdown(generation);
    });

    bus.log("game_countdown", { seconds: countdownSeconds, durationMinutes, mode: game.mode });
    bus.broadcast("game:countdown", { seconds: countdownSeconds, durationMinutes });
    bus.notifyMany(players.ids(), `Game starts in ${countdownSeconds}s!`, "warning");
    log.info({ countdownSeconds, durationMinutes, mode: game.mode }, "Countdown started");

    return ok({ countdownSeconds, durationMinutes });
  }

  /**
   * Countdown -> running. Does nothing if the countdown was cancelled or
   * superseded while it was waiting.
   */
  commitCountdown(generation: number): boolean {
    const { game, bus, players } = this.ctx;
    if (generation !== this.generation || game.phase !== "countdown") {
      log.debug({ generation, current: this.generation, phase: game.phase }, "Stale countdown skipped");
      return false;
    }

    const now = this.ctx.now();
    this.cancelCountdown = null;
    game.countdownEndsAt = null;
    game.startedAt = now;

    // An emergency raised during the countdown holds the game at full time.
    if (game.emergency.active) {
      game.phase = "paused";
      game.endsAt = null;
      game.pausedRemainingMs = game.durationMinutes * 60_000;
      bus.log("game_pause", { reason: "emergency", remainingMs: game.pausedRemainingMs });
      bus.broadcast("game:paused", { reason: "emergency", timeRemaining: this.timeRemaining() });
      log.info({ remainingMs: game.pausedRemainingMs }, "Countdown ended during emergency, game paused");
      return true;
    }

    game.phase = "running";
    game.endsAt = now + game.durationMinutes * 60_000;

    bus.log("game_start", { mode: game.mode, durationMinutes: game.durationMinutes });
    bus.broadcast("game:started", { endsAt: game.endsAt, mode: modeInfo(game.mode) });
    bus.notifyMany(players.ids(), "GAME ON! Run!", "danger");
    log.info({ mode: game.mode, endsAt: game.endsAt }, "Game running");
    return true;
  }

  pause(): Result {
    const { game } = this.ctx;
    if (game.phase === "running") {
      this.pauseRunning("manual");
      return ok();
    }
    if (game.phase === "countdown") {
      this.cancelPendingCountdown();
      this.returnToLobby();
      return ok();
    }
    return reject("INVALID_STATE", "Game not running");
  }

  /**
   * Freeze a running game, keeping the time left. Returns false when the game
   * was not running.
   */
  pauseRunning(reason: string): boolean {
    const { game, bus, players } = this.ctx;
    if (game.phase !== "running") return false;

    game.pausedRemainingMs = game.endsAt === null ? 0 : Math.max(0, game.endsAt - this.ctx.now());
    game.endsAt = null;
    game.phase = "paused";

    bus.log("game_pause", { reason, remainingMs: game.pausedRemainingMs });
    bus.broadcast("game:paused", { reason, timeRemaining: this.timeRemaining() });
    bus.notifyMany(players.ids(), "Game paused", "warning");
    log.info({ reason, remainingMs: game.pausedRemainingMs }, "Game paused");
    return true;
  }

  resume(): Result {
    const { game, bus, players } = this.ctx;
    if (game.emergency.active) return reject("EMERGENCY_BLOCKED", "Emergency active");
    if (game.phase !== "paused") return reject("INVALID_STATE", "Game not paused");

    const remaining = game.pausedRemainingMs ?? 0;
    game.endsAt = this.ctx.now() + remaining;
    game.pausedRemainingMs = null;
    game.phase = "running";

    bus.log("game_resume", { remainingMs: remaining });
    bus.broadcast("game:resumed", { endsAt: game.endsAt });
    bus.notifyMany(players.ids(), "Game resumed!", "info");
    log.info({ remainingMs: remaining }, "Game resumed");
    return ok();
  }

  end(reason = "manual"): Result<{ leaderboard: Leaderboard }> {
    const { game, bus, players } = this.ctx;
    if (game.phase === "ended") return reject("INVALID_STATE", "Game already ended");

    this.cancelPendingCountdown();
    game.phase = "ended";
    game.endedAt = this.ctx.now();
    game.endsAt = null;
    game.countdownEndsAt = null;
    game.pausedRemainingMs = null;

    const leaderboard = buildLeaderboard(players.all(), game);
    bus.log("game_end", { reason, leaderboard });
    bus.broadcast("game:ended", { reason, leaderboard });
    bus.notifyMany(players.ids(), "GAME OVER!", "info");
    log.info({ reason }, "Game ended");
    return ok({ leaderboard });
  }

  reset(): Result {
    const { game, bus, players } = this.ctx;
    this.cancelPendingCountdown();

    game.phase = "lobby";
    game.mode = DEFAULT_MODE;
    game.durationMinutes = getMode(DEFAULT_MODE).durationMinutes;
    game.countdownSeconds = this.ctx.options.defaultCountdownSeconds;
    game.countdownEndsAt = null;
    game.startedAt = null;
    game.endsAt = null;
    game.endedAt = null;
    game.pausedRemainingMs = null;
    game.emergency = emptyEmergency();
    game.teamScores = { red: 0, blue: 0 };

    this.ctx.captureCooldowns.clear();
    this.ctx.sightingCooldowns.clear();
    this.ctx.bounties.clear();
    this.ctx.sightings.length = 0;
    for (const player of players.all()) {
      players.resetForNewGame(player);
    }

    bus.log("game_reset", {});
    bus.broadcast("game:reset", {});
    log.info("Game reset");
    return ok();
  }

  // ============ Configuration ============

  setMode(mode: GameModeId): Result {
    const { game, bus, players } = this.ctx;
    if (game.phase !== "lobby") return reject("INVALID_STATE", "Mode locked after lobby");

    const config = getMode(mode);
    game.mode = mode;
    game.durationMinutes = config.durationMinutes;

    if (config.teams) {
      this.assignTeams();
    } else {
      for (const player of players.all()) player.team = null;
      game.teamScores = { red: 0, blue: 0 };
    }

    bus.log("mode_change", { mode, name: config.name, durationMinutes: config.durationMinutes });
    bus.broadcast("game:mode", { mode: modeInfo(mode), durationMinutes: config.durationMinutes });
    return ok();
  }

  /**
   * Split players into red/blue, alternating by device id within each role
   * so both teams get a mix of predators and prey.
   */
  assignTeams(): void {
    const { game, bus, players } = this.ctx;
    const byId = (a: Player, b: Player) => a.deviceId.localeCompare(b.deviceId);

    for (const role of ["predator", "prey"] as const) {
      players
        .withRole(role)
        .sort(byId)
        .forEach((player, i) => {
          player.team = TEAMS[i % TEAMS.length];
        });
    }
    for (const player of players.withRole("unassigned")) player.team = null;
    game.teamScores = { red: 0, blue: 0 };

    const teams: Record<string, Team> = {};
    for (const player of players.all()) {
      if (player.team) teams[player.deviceId] = player.team;
    }
    bus.log("teams_assigned", { teams });
  }

  updateSettings(patch: Partial<GameSettings>): Result<{ settings: GameSettings }> {
    const { game, bus } = this.ctx;
    for (const key of ["captureRssi", "safezoneRssi", "proximityAlertRssi"] as const) {
      const value = patch[key];
      if (value !== undefined && !isValidBeaconThreshold(value)) {
        return reject("INVALID_ARGUMENT", `Invalid ${key}`);
      }
    }

    const settings = game.settings;
    if (patch.honorSystem !== undefined) settings.honorSystem = patch.honorSystem;
    if (patch.allowRoleChange !== undefined) settings.allowRoleChange = patch.allowRoleChange;
    if (patch.captureRssi !== undefined) settings.captureRssi = patch.captureRssi;
    if (patch.safezoneRssi !== undefined) settings.safezoneRssi = patch.safezoneRssi;
    if (patch.proximityAlertRssi !== undefined) settings.proximityAlertRssi = patch.proximityAlertRssi;

    bus.log("settings_update", { ...settings });
    return ok({ settings: { ...settings } });
  }

  // ============ Queries ============

  /** Seconds left in the current countdown or game. */
  timeRemaining(): number {
    const { game } = this.ctx;
    const now = this.ctx.now();
    switch (game.phase) {
      case "countdown":
        return secondsUntil(game.countdownEndsAt, now);
      case "running":
        return secondsUntil(game.endsAt, now);
      case "paused":
        return Math.ceil((game.pausedRemainingMs ?? 0) / 1000);
      default:
        return 0;
    }
  }

  isExpired(now: number): boolean {
    const { game } = this.ctx;
    return game.phase === "running" && game.endsAt !== null && now >= game.endsAt;
  }

  /** Stop any pending countdown timer. Used on shutdown. */
  dispose(): void {
    this.cancelPendingCountdown();
  }

  // ============ Internal ============

  private cancelPendingCountdown(): void {
    this.generation++;
    if (this.cancelCountdown) {
      this.cancelCountdown();
      this.cancelCountdown = null;
    }
  }

  private returnToLobby(): void {
    const { game, bus, players } = this.ctx;
    game.phase = "lobby";
    game.countdownEndsAt = null;

    for (const player of players.all()) {
      if (player.status === "active") players.setStatus(player, "ready");
    }

    bus.log("game_cancel", {});
    bus.broadcast("game:cancelled", {});
    bus.notifyMany(players.ids(), "Countdown cancelled", "warning");
    log.info("Countdown cancelled");
  }
}
