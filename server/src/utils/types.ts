// ============ Game Types ============

export type GamePhase = "lobby" | "countdown" | "running" | "paused" | "ended";

export type Role = "unassigned" | "prey" | "predator";

export type PlayerStatus = "offline" | "lobby" | "ready" | "active" | "captured" | "dnd";

export type Team = "red" | "blue";

export type GameModeId = "standard" | "quick" | "endurance" | "teams" | "infection" | "photo";

export interface ScoringWeights {
  capture: number;
  escape: number;
  sighting: number;
  survivalBonus: number;
  infection: number;
}

export interface GameModeConfig {
  id: GameModeId;
  name: string;
  description: string;
  durationMinutes: number;
  points: ScoringWeights;
  infection: boolean;
  teams: boolean;
  photoRequired: boolean;
}

export interface GameSettings {
  honorSystem: boolean;
  captureRssi: number;
  safezoneRssi: number;
  proximityAlertRssi: number;
  allowRoleChange: boolean;
}

export interface EmergencyContact {
  deviceId: string;
  name: string;
  rssi: number;
}

export interface EmergencyState {
  active: boolean;
  triggeredBy: string | null; // device id, or "SYSTEM" for admin/mod triggers
  triggeredByName: string | null;
  reason: string | null;
  triggeredAt: number | null;
  nearest: EmergencyContact[];
}

export interface GameState {
  phase: GamePhase;
  mode: GameModeId;
  durationMinutes: number;
  countdownSeconds: number;
  countdownEndsAt: number | null;
  startedAt: number | null;
  endsAt: number | null;
  endedAt: number | null;
  pausedRemainingMs: number | null;
  settings: GameSettings;
  emergency: EmergencyState;
  teamScores: Record<Team, number>;
}

// ============ Player Types ============

export interface ConsentFlags {
  physicalTag: boolean;
  photoVisible: boolean;
  locationShare: boolean;
}

export interface PlayerStats {
  captures: number;
  escapes: number;
  timesCaptured: number;
  sightings: number;
  infections: number;
  bonusPoints: number;
}

export interface Player {
  deviceId: string;
  nickname: string;
  name: string;
  profilePic: string | null;
  role: Role;
  status: PlayerStatus;
  online: boolean;
  inSafeZone: boolean;
  safeZoneBeacon: string | null;
  team: Team | null;
  capturedBy: string | null;
  lastRssi: Map<string, number>;
  nearestPeer: { deviceId: string; rssi: number } | null;
  consent: ConsentFlags;
  stats: PlayerStats;
  sightedTargets: Set<string>;
  achievements: Set<string>;
  joinedAt: number;
  lastSeenAt: number;
  lastHeartbeatAt: number | null;
}

/** Serializable projection of a player, as seen by clients. */
export interface PlayerView {
  deviceId: string;
  name: string;
  nickname: string;
  profilePic: string | null;
  role: Role;
  status: PlayerStatus;
  online: boolean;
  inSafeZone: boolean;
  safeZoneBeacon: string | null;
  team: Team | null;
  capturedBy: string | null;
  consent: ConsentFlags;
  consentBadge: string;
  stats: PlayerStats;
  points: number;
  nearest: string | null;
  achievements: string[];
  lastSeenAt: number;
}

export interface Actor {
  deviceId: string | null;
  isAdmin: boolean;
}

export interface PlayerUpdate {
  nickname?: string;
  role?: Role;
  status?: PlayerStatus;
  consent?: Partial<ConsentFlags>;
  inSafeZone?: boolean;
}

// ============ Beacon Types ============

export interface Beacon {
  id: string;
  name: string;
  rssi: number; // activation threshold
  active: boolean;
}

export interface BeaconInput {
  id: string;
  name?: string;
  rssi?: number;
}

export interface BeaconUpdate {
  name?: string;
  rssi?: number;
  active?: boolean;
}

// ============ Bounty / Message Types ============

export interface Bounty {
  targetId: string;
  points: number;
  reason: string;
  setAt: number;
}

export type MessageTarget = "all" | "team" | string;

export interface ChatMessage {
  id: number;
  fromId: string;
  fromName: string;
  to: MessageTarget;
  team: Role | null;
  message: string;
  at: number;
  time: string;
}

// ============ Event / Notification Types ============

export type NotificationKind = "info" | "success" | "warning" | "danger";

export interface Notification {
  message: string;
  kind: NotificationKind;
  at: number;
  time: string;
}

export interface GameEvent {
  id: number;
  type: string;
  data: Record<string, unknown>;
  timestamp: string;
  time: string;
}

export interface BroadcastMessage {
  type: string;
  [key: string]: unknown;
}

export interface Sighting {
  spotterId: string;
  spotter: string;
  targetId: string;
  target: string;
  photo: string | null;
  time: string;
}

// ============ Leaderboard Types ============

export interface LeaderboardEntry {
  deviceId: string;
  name: string;
  profilePic: string | null;
  team: Team | null;
  points: number;
  captures: number;
  escapes: number;
  timesCaptured: number;
  sightings: number;
  infections: number;
  status: PlayerStatus;
  online: boolean;
  inSafeZone: boolean;
}

export interface Leaderboard {
  predators: LeaderboardEntry[];
  prey: LeaderboardEntry[];
  teams: Record<Team, number> | null;
}

// ============ Tracker Types ============

export interface ModeInfo {
  id: GameModeId;
  name: string;
  infection: boolean;
  teams: boolean;
  photoRequired: boolean;
}

export interface PollResponse {
  phase: GamePhase;
  role: Role;
  status: PlayerStatus;
  name: string;
  inSafeZone: boolean;
  safeZoneBeacon: string | null;
  team: Team | null;
  timeRemaining: number;
  notifications: Notification[];
  activeBeacons: string[];
  mode: ModeInfo;
  emergency: { active: boolean; by: string | null; reason: string | null };
  consentBadge: string;
  nearest: string | null;
  hasPhotoOf: string[];
  settings: { captureRssi: number; safezoneRssi: number; honorSystem: boolean };
}

export interface GameView {
  phase: GamePhase;
  mode: ModeInfo;
  durationMinutes: number;
  countdownSeconds: number;
  startedAt: number | null;
  endsAt: number | null;
  timeRemaining: number;
  settings: GameSettings;
  emergency: EmergencyState;
  teamScores: Record<Team, number> | null;
  playerCount: number;
  predatorCount: number;
  preyCount: number;
  readyCount: number;
  onlineCount: number;
}
