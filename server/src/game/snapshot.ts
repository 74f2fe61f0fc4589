import { createPlayer } from "./players.js";
import type {
  Beacon,
  Bounty,
  ConsentFlags,
  GameModeId,
  GameSettings,
  Player,
  PlayerStats,
  Role,
  Team,
} from "../utils/types.js";

// ============ Snapshot Types ============

export interface PlayerSnapshot {
  deviceId: string;
  nickname: string;
  name: string;
  profilePic: string | null;
  role: Role;
  team: Team | null;
  consent: ConsentFlags;
  stats: PlayerStats;
  achievements: string[];
  sightedTargets: string[];
  joinedAt: number;
  lastSeenAt: number;
}

export interface GameSnapshot {
  mode: GameModeId;
  durationMinutes: number;
  countdownSeconds: number;
  settings: GameSettings;
  teamScores: Record<Team, number>;
}

/**
 * Best-effort copy of the coordinator's long-lived state. Phase, timers and
 * emergencies are not carried over: a restored coordinator starts in lobby.
 */
export interface CoordinatorSnapshot {
  savedAt: number;
  game: GameSnapshot;
  players: PlayerSnapshot[];
  beacons: Beacon[];
  bounties: Bounty[];
  moderators: string[];
}

// ============ Conversion ============

export function toPlayerSnapshot(player: Player): PlayerSnapshot {
  return {
    deviceId: player.deviceId,
    nickname: player.nickname,
    name: player.name,
    profilePic: player.profilePic,
    role: player.role,
    team: player.team,
    consent: { ...player.consent },
    stats: { ...player.stats },
    achievements: [...player.achievements],
    sightedTargets: [...player.sightedTargets],
    joinedAt: player.joinedAt,
    lastSeenAt: player.lastSeenAt,
  };
}

/** Restored players come back offline, free and outside any safe zone. */
export function fromPlayerSnapshot(snapshot: PlayerSnapshot): Player {
  const player = createPlayer(snapshot.deviceId, snapshot.joinedAt);
  player.nickname = snapshot.nickname;
  player.name = snapshot.name;
  player.profilePic = snapshot.profilePic;
  player.role = snapshot.role;
  player.team = snapshot.team;
  player.consent = { ...snapshot.consent };
  player.stats = { ...snapshot.stats };
  player.achievements = new Set(snapshot.achievements);
  player.sightedTargets = new Set(snapshot.sightedTargets);
  player.lastSeenAt = snapshot.lastSeenAt;
  return player;
}
