import { timingSafeEqual } from "node:crypto";
import { createLogger } from "../utils/logger.js";
import { ok, reject } from "../utils/errors.js";
import type { Rejection, Result } from "../utils/errors.js";
import { SerialExecutor } from "../utils/serial.js";
import { normalizeDeviceId } from "../utils/ids.js";
import { encodeConsentBadge } from "../protocol/consent.js";
import { EventBus } from "../events/bus.js";
import type { BroadcastListener, PushSink } from "../events/bus.js";
import { DEFAULT_OPTIONS, createGameState, isPrivileged } from "./context.js";
import type { CoordinatorOptions, GameContext } from "./context.js";
import { PlayerRegistry, nearestHint, toPlayerView } from "./players.js";
import { BeaconRegistry } from "./beacons.js";
import { BountyBoard, DEFAULT_BOUNTY_POINTS } from "./bounties.js";
import { CooldownMap } from "./cooldowns.js";
import { PhaseController, timeoutScheduler } from "./phase.js";
import type { StartOptions } from "./phase.js";
import { CaptureEngine } from "./capture.js";
import type { CaptureOutcome } from "./capture.js";
import { ProximityResolver } from "./proximity.js";
import type { SignalReadings } from "./proximity.js";
import { EmergencyService } from "./emergency.js";
import { SightingRecorder } from "./sightings.js";
import { Reconciler } from "./reconciler.js";
import type { SweepResult } from "./reconciler.js";
import { AchievementTracker } from "./achievements.js";
import { MessageBoard } from "./messages.js";
import type { MessageSender } from "./messages.js";
import { getMode, isGameModeId, listModes, modeInfo } from "./modes.js";
import { buildLeaderboard, pointsFor } from "./scoring.js";
import { fromPlayerSnapshot, toPlayerSnapshot } from "./snapshot.js";
import type { CoordinatorSnapshot } from "./snapshot.js";
import type {
  Actor,
  Beacon,
  BeaconInput,
  BeaconUpdate,
  Bounty,
  ChatMessage,
  EmergencyState,
  GameEvent,
  GameModeConfig,
  GameSettings,
  GameView,
  Leaderboard,
  MessageTarget,
  Notification,
  Player,
  PlayerStatus,
  PlayerUpdate,
  PlayerView,
  PollResponse,
  Role,
  Sighting,
} from "../utils/types.js";

const log = createLogger("coordinator");

/** Statuses a player may pick for themselves. */
const SELF_STATUSES: readonly PlayerStatus[] = ["ready", "lobby", "dnd"];
const MAX_BOUNTY_POINTS = 10_000;

export interface TickReport {
  peers?: SignalReadings;
  beacons?: SignalReadings;
}

export type Persist = (snapshot: CoordinatorSnapshot) => void;

/**
 * The single authoritative game instance.
 *
 * Every mutation runs through one FIFO executor; pushes and broadcasts
 * produced inside a task are handed to transports after it finishes.
 * Read-only queries are synchronous.
 */
export class GameCoordinator {
  readonly options: CoordinatorOptions;

  private readonly lock = new SerialExecutor();
  private readonly ctx: GameContext;
  private readonly bus: EventBus;
  private readonly players: PlayerRegistry;
  private readonly beacons: BeaconRegistry;
  private readonly phase: PhaseController;
  private readonly captures: CaptureEngine;
  private readonly proximity: ProximityResolver;
  private readonly emergency: EmergencyService;
  private readonly sightings: SightingRecorder;
  private readonly reconciler: Reconciler;
  private readonly achievements: AchievementTracker;
  private readonly messages: MessageBoard;

  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(overrides: Partial<CoordinatorOptions> = {}) {
    const options: CoordinatorOptions = { ...DEFAULT_OPTIONS, ...overrides };
    const now = options.now;
    this.options = options;

    const bus = new EventBus({ now });
    const bounties = new BountyBoard();
    const moderators = new Set<string>();
    const captureCooldowns = new CooldownMap(options.captureCooldownMs);
    const sightingCooldowns = new CooldownMap(options.sightingCooldownMs);
    const players = new PlayerRegistry({
      bus,
      maxPlayers: options.maxPlayers,
      now,
      cooldowns: [captureCooldowns, sightingCooldowns],
      bounties,
      moderators,
    });
    const game = createGameState(options);
    const beacons = new BeaconRegistry(bus, () => game.settings.safezoneRssi);

    this.ctx = {
      game,
      players,
      beacons,
      bus,
      bounties,
      moderators,
      captureCooldowns,
      sightingCooldowns,
      sightings: [],
      options,
      now,
    };
    this.bus = bus;
    this.players = players;
    this.beacons = beacons;

    this.phase = new PhaseController(this.ctx, (delayMs, task) =>
      timeoutScheduler(delayMs, () => {
        this.exec(task).catch((err) => {
          log.error({ error: (err as Error).message }, "Scheduled task failed");
        });
      })
    );
    this.captures = new CaptureEngine(this.ctx, this.phase);
    this.proximity = new ProximityResolver(this.ctx, this.captures);
    this.emergency = new EmergencyService(this.ctx, this.phase);
    this.sightings = new SightingRecorder(this.ctx);
    this.reconciler = new Reconciler(this.ctx, this.phase);
    this.messages = new MessageBoard(bus, players, now);
    this.achievements = new AchievementTracker(bus, players);
    this.achievements.attach();
  }

  private exec<T>(task: () => T): Promise<T> {
    return this.lock.run(task).finally(() => this.bus.flush());
  }

  private view(player: Player): PlayerView {
    return toPlayerView(player, pointsFor(player, this.ctx.game), this.players);
  }

  private broadcastPlayer(player: Player): void {
    this.bus.broadcast("player:update", { player: this.view(player) });
  }

  // ============ Sessions ============

  async login(rawId: unknown): Promise<Result<{ player: PlayerView; created: boolean }>> {
    const deviceId = normalizeDeviceId(rawId);
    if (!deviceId) return reject("INVALID_ARGUMENT", "Invalid device id");

    return this.exec(() => {
      const result = this.players.getOrCreate(deviceId);
      if (!result.success) return result;

      const { player, created } = result;
      this.players.markOnline(player);
      this.bus.log("login", { id: deviceId, player: player.name });
      this.broadcastPlayer(player);
      return ok({ player: this.view(player), created });
    });
  }

  async logout(deviceId: string): Promise<Result> {
    return this.exec(() => {
      const player = this.players.get(deviceId);
      if (!player) return reject("NOT_FOUND", "Player not found");

      player.online = false;
      if (player.status === "lobby" || player.status === "ready") {
        this.players.setStatus(player, "offline");
      }
      this.bus.log("logout", { id: deviceId, player: player.name });
      this.broadcastPlayer(player);
      return ok();
    });
  }

  adminLogin(password: unknown): boolean {
    const expected = this.options.adminPassword;
    if (!expected || typeof password !== "string") return false;
    const a = Buffer.from(password);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
  }

  /**
   * Attach a live push channel. Notifications queued while the player was
   * away are drained and handed back for replay; broadcast history is not.
   */
  async connect(
    deviceId: string,
    sink: PushSink
  ): Promise<Result<{ player: PlayerView; replay: Notification[]; unsubscribe: () => void }>> {
    return this.exec(() => {
      const player = this.players.get(deviceId);
      if (!player) return reject("NOT_FOUND", "Player not found");

      const unsubscribe = this.bus.subscribe(deviceId, sink);
      const replay = this.bus.drain(deviceId);
      if (this.players.markOnline(player)) this.broadcastPlayer(player);
      return ok({ player: this.view(player), replay, unsubscribe });
    });
  }

  onBroadcast(listener: BroadcastListener): () => void {
    return this.bus.onBroadcast(listener);
  }

  // ============ Players ============

  getPlayer(deviceId: string): PlayerView | null {
    const player = this.players.get(deviceId);
    return player ? this.view(player) : null;
  }

  listPlayers(): PlayerView[] {
    return this.players
      .all()
      .sort((a, b) => a.deviceId.localeCompare(b.deviceId))
      .map((p) => this.view(p));
  }

  isModerator(deviceId: string): boolean {
    return this.ctx.moderators.has(deviceId);
  }

  async updatePlayer(actor: Actor, targetId: string, update: PlayerUpdate): Promise<Result<{ player: PlayerView }>> {
    return this.exec(() => {
      const player = this.players.get(targetId);
      if (!player) return reject("NOT_FOUND", "Player not found");

      const privileged = isPrivileged(this.ctx, actor);
      if (!privileged && actor.deviceId !== player.deviceId) {
        return reject("PERMISSION_DENIED", "Not your player");
      }

      const denied = this.checkUpdate(player, update, privileged);
      if (denied) return denied;

      if (update.nickname !== undefined) this.players.rename(player, update.nickname);
      if (update.role !== undefined) this.players.setRole(player, update.role, actor.deviceId ?? "ADMIN");
      if (update.status !== undefined) this.players.setStatus(player, update.status);
      if (update.consent !== undefined) this.players.setConsent(player, update.consent);
      if (update.inSafeZone !== undefined) this.proximity.setManualSafeZone(player, update.inSafeZone);

      this.players.touch(player);
      this.broadcastPlayer(player);
      return ok({ player: this.view(player) });
    });
  }

  private checkUpdate(player: Player, update: PlayerUpdate, privileged: boolean): Rejection | null {
    const { game } = this.ctx;
    const changesRole = update.role !== undefined && update.role !== player.role;

    if ((changesRole || update.status !== undefined) && player.status === "captured" && !privileged) {
      return reject("PRECONDITION_FAILED", "Captured - escape first");
    }

    if (changesRole) {
      if (update.role === "unassigned" && !privileged) {
        return reject("INVALID_ARGUMENT", "Pick prey or predator");
      }
      const canChange =
        game.phase === "lobby" || (game.settings.allowRoleChange && player.inSafeZone) || privileged;
      if (!canChange) return reject("PERMISSION_DENIED", "Must be in safe zone to change role");
    }

    if (update.status !== undefined && !SELF_STATUSES.includes(update.status)) {
      return reject("INVALID_ARGUMENT", "Invalid status");
    }

    if (update.inSafeZone !== undefined && !game.settings.honorSystem) {
      return reject("PRECONDITION_FAILED", "Honor system off");
    }
    return null;
  }

  async setProfilePhoto(deviceId: string, url: string): Promise<Result<{ url: string }>> {
    return this.exec(() => {
      const player = this.players.get(deviceId);
      if (!player) return reject("NOT_FOUND", "Player not found");
      player.profilePic = url;
      this.bus.log("photo_upload", { id: deviceId, player: player.name, type: "profile" });
      this.broadcastPlayer(player);
      return ok({ url });
    });
  }

  async drainNotifications(deviceId: string): Promise<Notification[]> {
    return this.exec(() => this.bus.drain(deviceId));
  }

  // ============ Tracker ============

  /**
   * Firmware poll: heartbeat, optional RSSI readings, and everything the
   * tracker needs to render. Drains the player's notification queue.
   */
  async reportTick(rawId: unknown, report: TickReport = {}): Promise<Result<PollResponse>> {
    const deviceId = normalizeDeviceId(rawId);
    if (!deviceId) return reject("INVALID_ARGUMENT", "Invalid device id");

    return this.exec(() => {
      const result = this.players.getOrCreate(deviceId);
      if (!result.success) return result;
      const { player } = result;

      if (this.players.markOnline(player, true)) {
        this.bus.log("tracker_connect", { id: deviceId, player: player.name });
      }
      if (report.peers) this.proximity.applyPeerReadings(player, report.peers);
      if (report.beacons) this.proximity.applyBeaconReadings(player, report.beacons);

      return ok(this.poll(player, this.bus.drain(deviceId)));
    });
  }

  private poll(player: Player, notifications: Notification[]): PollResponse {
    const { game } = this.ctx;
    return {
      phase: game.phase,
      role: player.role,
      status: player.status,
      name: player.name,
      inSafeZone: player.inSafeZone,
      safeZoneBeacon: player.safeZoneBeacon,
      team: player.team,
      timeRemaining: this.phase.timeRemaining(),
      notifications,
      activeBeacons: this.beacons.activeIds(),
      mode: modeInfo(game.mode),
      emergency: {
        active: game.emergency.active,
        by: game.emergency.triggeredByName,
        reason: game.emergency.reason,
      },
      consentBadge: encodeConsentBadge(player.consent),
      nearest: nearestHint(player, this.players),
      hasPhotoOf: [...player.sightedTargets].sort(),
      settings: {
        captureRssi: game.settings.captureRssi,
        safezoneRssi: game.settings.safezoneRssi,
        honorSystem: game.settings.honorSystem,
      },
    };
  }

  async attemptCapture(rawPredator: unknown, rawPrey: unknown, rssi: unknown): Promise<Result<CaptureOutcome>> {
    const predatorId = normalizeDeviceId(rawPredator);
    const preyId = normalizeDeviceId(rawPrey);
    if (!predatorId || !preyId) return reject("NOT_FOUND", "Invalid players");
    if (typeof rssi !== "number") return reject("INVALID_ARGUMENT", "rssi required");

    return this.exec(() => {
      const result = this.captures.capture(predatorId, preyId, rssi);
      if (result.success) {
        for (const id of [predatorId, preyId]) {
          const player = this.players.get(id);
          if (player) this.broadcastPlayer(player);
        }
      }
      return result;
    });
  }

  async uploadSighting(spotterId: string, rawTarget: unknown, photo: string | null): Promise<Result<{ points: number }>> {
    const targetId = normalizeDeviceId(rawTarget);
    if (!targetId) return reject("NOT_FOUND", "Target not found");
    return this.exec(() => this.sightings.record(spotterId, targetId, photo));
  }

  sightingGallery(): Sighting[] {
    return this.sightings.gallery();
  }

  // ============ Emergency ============

  async triggerEmergency(deviceId: string, reason: unknown): Promise<Result<{ emergency: EmergencyState }>> {
    return this.exec(() => this.emergency.trigger(deviceId, reason));
  }

  async triggerSystemEmergency(reason: unknown, byName = "Admin"): Promise<Result<{ emergency: EmergencyState }>> {
    return this.exec(() => this.emergency.triggerSystem(reason, byName));
  }

  async clearEmergency(by: string): Promise<Result> {
    return this.exec(() => this.emergency.clear(by));
  }

  emergencyStatus(): EmergencyState {
    return this.emergency.status();
  }

  // ============ Game ============

  async setMode(mode: unknown): Promise<Result> {
    if (!isGameModeId(mode)) return reject("INVALID_ARGUMENT", "Unknown mode");
    return this.exec(() => this.phase.setMode(mode));
  }

  async updateSettings(patch: Partial<GameSettings>): Promise<Result<{ settings: GameSettings }>> {
    return this.exec(() => this.phase.updateSettings(patch));
  }

  async startGame(options: StartOptions = {}): Promise<Result<{ countdownSeconds: number; durationMinutes: number }>> {
    return this.exec(() => this.phase.start(options));
  }

  async pauseGame(): Promise<Result> {
    return this.exec(() => this.phase.pause());
  }

  async resumeGame(): Promise<Result> {
    return this.exec(() => this.phase.resume());
  }

  async endGame(reason = "manual"): Promise<Result<{ leaderboard: Leaderboard }>> {
    return this.exec(() => this.phase.end(reason));
  }

  async resetGame(): Promise<Result> {
    return this.exec(() => {
      this.proximity.clear();
      return this.phase.reset();
    });
  }

  modes(): GameModeConfig[] {
    return listModes();
  }

  gameView(): GameView {
    const { game } = this.ctx;
    const all = this.players.all();
    return {
      phase: game.phase,
      mode: modeInfo(game.mode),
      durationMinutes: game.durationMinutes,
      countdownSeconds: game.countdownSeconds,
      startedAt: game.startedAt,
      endsAt: game.endsAt,
      timeRemaining: this.phase.timeRemaining(),
      settings: { ...game.settings },
      emergency: this.emergency.status(),
      teamScores: getMode(game.mode).teams ? { ...game.teamScores } : null,
      playerCount: all.length,
      predatorCount: all.filter((p) => p.role === "predator").length,
      preyCount: all.filter((p) => p.role === "prey").length,
      readyCount: all.filter((p) => p.status === "ready").length,
      onlineCount: all.filter((p) => p.online).length,
    };
  }

  leaderboard(): Leaderboard {
    return buildLeaderboard(this.players.all(), this.ctx.game);
  }

  events(limit = 100): GameEvent[] {
    return this.bus.recentEvents(limit);
  }

  // ============ Beacons ============

  listBeacons(): Beacon[] {
    return this.beacons.list();
  }

  async addBeacon(input: BeaconInput): Promise<Result<{ beacon: Beacon }>> {
    return this.exec(() => this.beacons.add(input));
  }

  async updateBeacon(id: string, patch: BeaconUpdate): Promise<Result<{ beacon: Beacon }>> {
    return this.exec(() => this.beacons.update(id, patch));
  }

  async deleteBeacon(id: string): Promise<Result> {
    return this.exec(() => this.beacons.delete(id));
  }

  // ============ Bounties ============

  listBounties(): Array<Bounty & { name: string }> {
    return this.ctx.bounties.list().map((b) => ({
      ...b,
      name: this.players.get(b.targetId)?.name ?? b.targetId,
    }));
  }

  async setBounty(rawTarget: unknown, points: unknown = DEFAULT_BOUNTY_POINTS, reason: unknown = ""): Promise<Result<{ bounty: Bounty }>> {
    const targetId = normalizeDeviceId(rawTarget);
    if (!targetId) return reject("NOT_FOUND", "Player not found");
    if (typeof points !== "number" || !Number.isInteger(points) || points <= 0 || points > MAX_BOUNTY_POINTS) {
      return reject("INVALID_ARGUMENT", `Points must be 1..${MAX_BOUNTY_POINTS}`);
    }
    const why = typeof reason === "string" ? reason.trim().slice(0, 100) : "";

    return this.exec(() => {
      const target = this.players.get(targetId);
      if (!target) return reject("NOT_FOUND", "Player not found");

      const bounty = this.ctx.bounties.set(targetId, points, why, this.ctx.now());
      this.bus.log("bounty_set", { target: target.name, id: targetId, points, reason: why });
      this.bus.notify(targetId, `Bounty of ${points} points placed on you!`, "warning");
      this.bus.broadcast("bounty", { target: target.name, points });
      return ok({ bounty: { ...bounty } });
    });
  }

  async removeBounty(rawTarget: unknown): Promise<Result> {
    const targetId = normalizeDeviceId(rawTarget);
    return this.exec(() => {
      if (!targetId || !this.ctx.bounties.remove(targetId)) return reject("NOT_FOUND", "No bounty");
      this.bus.log("bounty_remove", { id: targetId });
      return ok();
    });
  }

  // ============ Moderation ============

  listModerators(): string[] {
    return [...this.ctx.moderators].sort();
  }

  async addModerator(rawId: unknown): Promise<Result> {
    const deviceId = normalizeDeviceId(rawId);
    return this.exec(() => {
      const player = deviceId ? this.players.get(deviceId) : null;
      if (!player) return reject("NOT_FOUND", "Player not found");
      if (this.ctx.moderators.has(player.deviceId)) return ok();

      this.ctx.moderators.add(player.deviceId);
      this.bus.log("mod_add", { player: player.name, id: player.deviceId });
      this.bus.notify(player.deviceId, "You are now a moderator!", "success");
      return ok();
    });
  }

  async removeModerator(rawId: unknown): Promise<Result> {
    const deviceId = normalizeDeviceId(rawId);
    return this.exec(() => {
      if (!deviceId || !this.ctx.moderators.delete(deviceId)) return reject("NOT_FOUND", "Not a moderator");
      this.bus.log("mod_remove", { id: deviceId });
      this.bus.notify(deviceId, "You are no longer a moderator", "info");
      return ok();
    });
  }

  async forceRole(rawId: unknown, role: Role, by: string): Promise<Result<{ player: PlayerView }>> {
    const deviceId = normalizeDeviceId(rawId);
    return this.exec(() => {
      const player = deviceId ? this.players.get(deviceId) : null;
      if (!player) return reject("NOT_FOUND", "Player not found");

      if (this.players.setRole(player, role, by)) {
        this.bus.notify(player.deviceId, `Your role is now ${role}`, "warning");
      }
      this.broadcastPlayer(player);
      return ok({ player: this.view(player) });
    });
  }

  async kick(rawId: unknown, by: string): Promise<Result> {
    const deviceId = normalizeDeviceId(rawId);
    return this.exec(() => {
      if (!deviceId) return reject("NOT_FOUND", "Player not found");
      const player = this.players.remove(deviceId);
      if (!player) return reject("NOT_FOUND", "Player not found");

      this.proximity.forget(deviceId);
      this.bus.broadcast("player:kicked", { id: deviceId, name: player.name, by });
      return ok();
    });
  }

  async release(rawId: unknown, by: string): Promise<Result> {
    const deviceId = normalizeDeviceId(rawId);
    return this.exec(() => {
      if (!deviceId) return reject("NOT_FOUND", "Player not found");
      const result = this.captures.release(deviceId, by);
      const player = this.players.get(deviceId);
      if (result.success && player) this.broadcastPlayer(player);
      return result;
    });
  }

  // ============ Messages ============

  async sendMessage(sender: MessageSender, text: unknown, to: MessageTarget = "all"): Promise<Result<{ message: ChatMessage }>> {
    return this.exec(() => this.messages.send(sender, text, to));
  }

  messagesFor(viewer: MessageSender): ChatMessage[] {
    return this.messages.visibleTo(viewer);
  }

  // ============ Snapshots ============

  snapshot(): CoordinatorSnapshot {
    const { game } = this.ctx;
    return {
      savedAt: this.ctx.now(),
      game: {
        mode: game.mode,
        durationMinutes: game.durationMinutes,
        countdownSeconds: game.countdownSeconds,
        settings: { ...game.settings },
        teamScores: { ...game.teamScores },
      },
      players: this.players.all().map(toPlayerSnapshot),
      beacons: this.beacons.list(),
      bounties: this.ctx.bounties.list(),
      moderators: this.listModerators(),
    };
  }

  /** Load a snapshot into a fresh coordinator. Phase stays in lobby. */
  async restore(snapshot: CoordinatorSnapshot): Promise<void> {
    await this.exec(() => {
      const { game } = this.ctx;
      game.mode = snapshot.game.mode;
      game.durationMinutes = snapshot.game.durationMinutes;
      game.countdownSeconds = snapshot.game.countdownSeconds;
      game.settings = { ...snapshot.game.settings };
      game.teamScores = { ...snapshot.game.teamScores };

      for (const player of snapshot.players) this.players.restore(fromPlayerSnapshot(player));
      for (const beacon of snapshot.beacons) this.beacons.restore(beacon);
      for (const bounty of snapshot.bounties) {
        this.ctx.bounties.set(bounty.targetId, bounty.points, bounty.reason, bounty.setAt);
      }
      for (const id of snapshot.moderators) this.ctx.moderators.add(id);

      log.info(
        { players: snapshot.players.length, beacons: snapshot.beacons.length, savedAt: snapshot.savedAt },
        "Snapshot restored"
      );
    });
  }

  // ============ Background Tasks ============

  /**
   * One reconciler pass. The snapshot is taken inside the same critical
   * section and written after it.
   */
  async sweep(persist?: Persist): Promise<SweepResult> {
    const { result, snapshot } = await this.exec(() => ({
      result: this.reconciler.sweep(),
      snapshot: persist ? this.snapshot() : null,
    }));

    if (persist && snapshot) {
      try {
        persist(snapshot);
      } catch (err) {
        log.warn({ error: (err as Error).message }, "Snapshot write failed");
      }
    }
    return result;
  }

  startBackgroundTasks(persist?: Persist): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep(persist).catch((err) => {
        log.error({ error: (err as Error).message }, "Reconciler sweep failed");
      });
    }, this.options.reconcileIntervalMs);
    log.info({ intervalMs: this.options.reconcileIntervalMs }, "Background reconciler started");
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.phase.dispose();
    this.achievements.detach();
  }
}
