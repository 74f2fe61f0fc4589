import { DEFAULT_MODE, getMode } from "./modes.js";
import type { EventBus } from "../events/bus.js";
import type { PlayerRegistry } from "./players.js";
import type { BeaconRegistry } from "./beacons.js";
import type { BountyBoard } from "./bounties.js";
import type { CooldownMap } from "./cooldowns.js";
import type { EmergencyState, GameSettings, GameState, Sighting } from "../utils/types.js";

export const DEFAULT_CAPTURE_RSSI = -70;
export const DEFAULT_SAFEZONE_RSSI = -75;
export const DEFAULT_PROXIMITY_ALERT_RSSI = -80;
export const DEFAULT_COUNTDOWN_SECONDS = 10;

export interface CoordinatorOptions {
  adminPassword: string;
  maxPlayers: number;
  captureRssi: number;
  safezoneRssi: number;
  proximityAlertRssi: number;
  captureCooldownMs: number;
  sightingCooldownMs: number;
  onlineTimeoutMs: number;
  reconcileIntervalMs: number;
  defaultCountdownSeconds: number;
  now: () => number;
}

export const DEFAULT_OPTIONS: CoordinatorOptions = {
  adminPassword: "",
  maxPlayers: 200,
  captureRssi: DEFAULT_CAPTURE_RSSI,
  safezoneRssi: DEFAULT_SAFEZONE_RSSI,
  proximityAlertRssi: DEFAULT_PROXIMITY_ALERT_RSSI,
  captureCooldownMs: 10_000,
  sightingCooldownMs: 60_000,
  onlineTimeoutMs: 60_000,
  reconcileIntervalMs: 5_000,
  defaultCountdownSeconds: DEFAULT_COUNTDOWN_SECONDS,
  now: () => Date.now(),
};

/**
 * Everything the game components share. Owned by exactly one coordinator;
 * components receive it at construction and never reach for globals.
 */
export interface GameContext {
  game: GameState;
  players: PlayerRegistry;
  beacons: BeaconRegistry;
  bus: EventBus;
  bounties: BountyBoard;
  moderators: Set<string>;
  captureCooldowns: CooldownMap;
  sightingCooldowns: CooldownMap;
  sightings: Sighting[];
  options: CoordinatorOptions;
  now: () => number;
}

export function emptyEmergency(): EmergencyState {
  return {
    active: false,
    triggeredBy: null,
    triggeredByName: null,
    reason: null,
    triggeredAt: null,
    nearest: [],
  };
}

export function defaultSettings(options: CoordinatorOptions): GameSettings {
  return {
    honorSystem: false,
    captureRssi: options.captureRssi,
    safezoneRssi: options.safezoneRssi,
    proximityAlertRssi: options.proximityAlertRssi,
    allowRoleChange: false,
  };
}

export function createGameState(options: CoordinatorOptions): GameState {
  return {
    phase: "lobby",
    mode: DEFAULT_MODE,
    durationMinutes: getMode(DEFAULT_MODE).durationMinutes,
    countdownSeconds: options.defaultCountdownSeconds,
    countdownEndsAt: null,
    startedAt: null,
    endsAt: null,
    endedAt: null,
    pausedRemainingMs: null,
    settings: defaultSettings(options),
    emergency: emptyEmergency(),
    teamScores: { red: 0, blue: 0 },
  };
}

/** Admins and moderators may act on other players and bypass role gating. */
export function isPrivileged(ctx: GameContext, actor: { deviceId: string | null; isAdmin: boolean }): boolean {
  return actor.isAdmin || (actor.deviceId !== null && ctx.moderators.has(actor.deviceId));
}
