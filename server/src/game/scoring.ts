import { getMode } from "./modes.js";
import type {
  GamePhase,
  GameState,
  Leaderboard,
  LeaderboardEntry,
  Player,
  PlayerStats,
  Role,
  ScoringWeights,
} from "../utils/types.js";

/** Extra points for a predator reaching a capture milestone. */
export const CAPTURE_MILESTONES: ReadonlyArray<{ captures: number; bonus: number }> = [
  { captures: 3, bonus: 50 },
  { captures: 5, bonus: 100 },
];

/**
 * Points for one player. Derived, never stored.
 */
export function calculatePoints(
  role: Role,
  stats: PlayerStats,
  weights: ScoringWeights,
  phase: GamePhase
): number {
  if (role === "predator") {
    let points = stats.captures * weights.capture;
    for (const milestone of CAPTURE_MILESTONES) {
      if (stats.captures >= milestone.captures) points += milestone.bonus;
    }
    points += stats.infections * weights.infection;
    points += stats.sightings * weights.sighting;
    return points + stats.bonusPoints;
  }

  if (role === "prey") {
    let points = stats.escapes * weights.escape + stats.sightings * weights.sighting + stats.bonusPoints;
    if (phase === "ended" && stats.timesCaptured === 0) {
      points += weights.survivalBonus;
    }
    return points;
  }

  return stats.bonusPoints;
}

export function pointsFor(player: Player, game: GameState): number {
  return calculatePoints(player.role, player.stats, getMode(game.mode).points, game.phase);
}

function toEntry(player: Player, game: GameState): LeaderboardEntry {
  return {
    deviceId: player.deviceId,
    name: player.name,
    profilePic: player.consent.photoVisible ? player.profilePic : null,
    team: player.team,
    points: pointsFor(player, game),
    captures: player.stats.captures,
    escapes: player.stats.escapes,
    timesCaptured: player.stats.timesCaptured,
    sightings: player.stats.sightings,
    infections: player.stats.infections,
    status: player.status,
    online: player.online,
    inSafeZone: player.inSafeZone,
  };
}

function byPointsThenName(a: LeaderboardEntry, b: LeaderboardEntry): number {
  if (a.points !== b.points) return b.points - a.points;
  return a.name.localeCompare(b.name);
}

/**
 * Leaderboard split by role. Unassigned players are left out.
 */
export function buildLeaderboard(players: Iterable<Player>, game: GameState): Leaderboard {
  const predators: LeaderboardEntry[] = [];
  const prey: LeaderboardEntry[] = [];

  for (const player of players) {
    if (player.role === "predator") predators.push(toEntry(player, game));
    else if (player.role === "prey") prey.push(toEntry(player, game));
  }

  return {
    predators: predators.sort(byPointsThenName),
    prey: prey.sort(byPointsThenName),
    teams: getMode(game.mode).teams ? { ...game.teamScores } : null,
  };
}
