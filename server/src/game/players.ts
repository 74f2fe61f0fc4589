import { createLogger } from "../utils/logger.js";
import { reject, ok } from "../utils/errors.js";
import type { Result } from "../utils/errors.js";
import { fallbackName, sanitizeName } from "../utils/ids.js";
import { DEFAULT_CONSENT, encodeConsentBadge } from "../protocol/consent.js";
import type { EventBus } from "../events/bus.js";
import type { CooldownMap } from "./cooldowns.js";
import type { BountyBoard } from "./bounties.js";
import type {
  ConsentFlags,
  Player,
  PlayerStats,
  PlayerStatus,
  PlayerView,
  Role,
} from "../utils/types.js";

const log = createLogger("players");

export const DEFAULT_MAX_PLAYERS = 200;

/** Placeholder shown instead of proximity data when a player hides their location. */
export const HIDDEN_HINT = "hidden";

export interface PlayerRegistryDeps {
  bus: EventBus;
  maxPlayers: number;
  now: () => number;
  cooldowns: CooldownMap[];
  bounties: BountyBoard;
  moderators: Set<string>;
}

export function emptyStats(): PlayerStats {
  return { captures: 0, escapes: 0, timesCaptured: 0, sightings: 0, infections: 0, bonusPoints: 0 };
}

export function createPlayer(deviceId: string, now: number): Player {
  return {
    deviceId,
    nickname: "",
    name: fallbackName(deviceId),
    profilePic: null,
    role: "unassigned",
    status: "offline",
    online: false,
    inSafeZone: false,
    safeZoneBeacon: null,
    team: null,
    capturedBy: null,
    lastRssi: new Map(),
    nearestPeer: null,
    consent: { ...DEFAULT_CONSENT },
    stats: emptyStats(),
    sightedTargets: new Set(),
    achievements: new Set(),
    joinedAt: now,
    lastSeenAt: now,
    lastHeartbeatAt: null,
  };
}

/**
 * Owns player entities. Players are created lazily on first contact and only
 * removed by an explicit moderation kick.
 *
 * The registry applies changes; deciding whether a change is allowed (role
 * gating, phase checks) is the caller's job.
 */
export class PlayerRegistry {
  private players = new Map<string, Player>();

  constructor(private readonly deps: PlayerRegistryDeps) {}

  get(deviceId: string): Player | null {
    return this.players.get(deviceId) ?? null;
  }

  has(deviceId: string): boolean {
    return this.players.has(deviceId);
  }

  all(): Player[] {
    return [...this.players.values()];
  }

  ids(): string[] {
    return [...this.players.keys()];
  }

  withRole(role: Role): Player[] {
    return this.all().filter((p) => p.role === role);
  }

  getOrCreate(deviceId: string): Result<{ player: Player; created: boolean }> {
    const existing = this.players.get(deviceId);
    if (existing) return ok({ player: existing, created: false });

    if (this.players.size >= this.deps.maxPlayers) {
      log.warn({ deviceId, maxPlayers: this.deps.maxPlayers }, "Player capacity reached");
      return reject("CAPACITY_EXCEEDED", "Game is full");
    }

    const player = createPlayer(deviceId, this.deps.now());
    this.players.set(deviceId, player);
    this.deps.bus.log("player_join", { id: deviceId, name: player.name });
    return ok({ player, created: true });
  }

  /** Record that the device was heard from. */
  touch(player: Player, heartbeat = false): void {
    const now = this.deps.now();
    player.lastSeenAt = now;
    if (heartbeat) player.lastHeartbeatAt = now;
  }

  /**
   * Bring a player online. Offline players land in the lobby.
   * Returns true when the player was offline before.
   */
  markOnline(player: Player, heartbeat = false): boolean {
    const wasOffline = !player.online;
    player.online = true;
    this.touch(player, heartbeat);
    if (player.status === "offline") {
      this.setStatus(player, "lobby");
    }
    return wasOffline;
  }

  rename(player: Player, nickname: unknown): boolean {
    const cleaned = sanitizeName(nickname, player.deviceId);
    player.nickname = cleaned === fallbackName(player.deviceId) ? "" : cleaned;
    if (cleaned === player.name) return false;

    const old = player.name;
    player.name = cleaned;
    this.deps.bus.log("name_change", { id: player.deviceId, old, new: cleaned });
    return true;
  }

  setRole(player: Player, role: Role, by: string | null = null): boolean {
    if (player.role === role) return false;
    const from = player.role;
    player.role = role;
    if (role !== "prey" && player.status === "captured") {
      player.status = "active";
      player.capturedBy = null;
    }
    this.deps.bus.log("role_change", { id: player.deviceId, player: player.name, from, to: role, by });
    return true;
  }

  setStatus(player: Player, status: PlayerStatus): boolean {
    if (player.status === status) return false;
    const from = player.status;
    player.status = status;
    this.deps.bus.log("status_change", { id: player.deviceId, player: player.name, from, to: status });
    return true;
  }

  setConsent(player: Player, patch: Partial<ConsentFlags>): boolean {
    const next: ConsentFlags = {
      physicalTag: patch.physicalTag ?? player.consent.physicalTag,
      photoVisible: patch.photoVisible ?? player.consent.photoVisible,
      locationShare: patch.locationShare ?? player.consent.locationShare,
    };
    if (
      next.physicalTag === player.consent.physicalTag &&
      next.photoVisible === player.consent.photoVisible &&
      next.locationShare === player.consent.locationShare
    ) {
      return false;
    }
    player.consent = next;
    this.deps.bus.log("consent_update", {
      id: player.deviceId,
      player: player.name,
      badge: encodeConsentBadge(next),
    });
    return true;
  }

  /**
   * Moderation kick. Cascades into cooldowns, bounties, the moderator set,
   * queued notifications, and references held by other players.
   */
  remove(deviceId: string): Player | null {
    const player = this.players.get(deviceId);
    if (!player) return null;

    this.players.delete(deviceId);
    for (const cooldowns of this.deps.cooldowns) {
      cooldowns.removeInvolving(deviceId);
    }
    this.deps.bounties.remove(deviceId);
    this.deps.moderators.delete(deviceId);
    this.deps.bus.forget(deviceId);

    for (const other of this.players.values()) {
      other.sightedTargets.delete(deviceId);
      other.lastRssi.delete(deviceId);
      if (other.nearestPeer?.deviceId === deviceId) other.nearestPeer = null;
      if (other.capturedBy === deviceId) other.capturedBy = null;
    }

    this.deps.bus.log("player_kick", { id: deviceId, player: player.name });
    log.info({ deviceId }, "Player removed");
    return player;
  }

  /**
   * Zero per-game state while keeping identity and profile fields.
   */
  resetForNewGame(player: Player): void {
    player.role = "unassigned";
    player.team = null;
    player.status = player.online ? "lobby" : "offline";
    player.inSafeZone = false;
    player.safeZoneBeacon = null;
    player.capturedBy = null;
    player.stats = emptyStats();
    player.sightedTargets.clear();
    player.achievements.clear();
  }

  /** Insert a player restored from a snapshot, bypassing creation events. */
  restore(player: Player): void {
    this.players.set(player.deviceId, player);
  }
}

/**
 * Proximity hint shown for a player, honoring their location-share consent.
 */
export function nearestHint(player: Player, registry: PlayerRegistry): string | null {
  if (!player.nearestPeer) return null;
  if (!player.consent.locationShare) return HIDDEN_HINT;
  const peer = registry.get(player.nearestPeer.deviceId);
  const label = peer ? peer.name : player.nearestPeer.deviceId;
  return `${label} ${player.nearestPeer.rssi}dB`;
}

export function toPlayerView(player: Player, points: number, registry: PlayerRegistry): PlayerView {
  return {
    deviceId: player.deviceId,
    name: player.name,
    nickname: player.nickname,
    profilePic: player.profilePic,
    role: player.role,
    status: player.status,
    online: player.online,
    inSafeZone: player.inSafeZone,
    safeZoneBeacon: player.safeZoneBeacon,
    team: player.team,
    capturedBy: player.capturedBy,
    consent: { ...player.consent },
    consentBadge: encodeConsentBadge(player.consent),
    stats: { ...player.stats },
    points,
    nearest: nearestHint(player, registry),
    achievements: [...player.achievements].sort(),
    lastSeenAt: player.lastSeenAt,
  };
}
