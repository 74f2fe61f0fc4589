import type { GameModeConfig, GameModeId, ModeInfo } from "../utils/types.js";

export const DEFAULT_MODE: GameModeId = "standard";

const STANDARD_POINTS = { capture: 100, escape: 75, sighting: 25, survivalBonus: 200, infection: 0 };

export const GAME_MODES: Readonly<Record<GameModeId, GameModeConfig>> = {
  standard: {
    id: "standard",
    name: "Standard Hunt",
    description: "Predators capture prey, prey escape through safe zones.",
    durationMinutes: 30,
    points: STANDARD_POINTS,
    infection: false,
    teams: false,
    photoRequired: false,
  },
  quick: {
    id: "quick",
    name: "Quick Hunt",
    description: "A short round for small groups.",
    durationMinutes: 15,
    points: { ...STANDARD_POINTS, survivalBonus: 150 },
    infection: false,
    teams: false,
    photoRequired: false,
  },
  endurance: {
    id: "endurance",
    name: "Endurance",
    description: "Long game; escapes and survival are worth more.",
    durationMinutes: 90,
    points: { ...STANDARD_POINTS, escape: 100, survivalBonus: 400 },
    infection: false,
    teams: false,
    photoRequired: false,
  },
  teams: {
    id: "teams",
    name: "Team Battle",
    description: "Red vs blue; every capture scores for the predator's team.",
    durationMinutes: 30,
    points: STANDARD_POINTS,
    infection: false,
    teams: true,
    photoRequired: false,
  },
  infection: {
    id: "infection",
    name: "Infection",
    description: "Captured prey turn into predators. Last prey standing wins.",
    durationMinutes: 20,
    points: { capture: 50, escape: 0, sighting: 10, survivalBonus: 300, infection: 100 },
    infection: true,
    teams: false,
    photoRequired: false,
  },
  photo: {
    id: "photo",
    name: "Photo Hunt",
    description: "Predators must photograph a target before capturing it.",
    durationMinutes: 30,
    points: { ...STANDARD_POINTS, capture: 150, sighting: 50 },
    infection: false,
    teams: false,
    photoRequired: true,
  },
};

export function isGameModeId(value: unknown): value is GameModeId {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(GAME_MODES, value);
}

export function getMode(id: GameModeId): GameModeConfig {
  return GAME_MODES[id];
}

export function listModes(): GameModeConfig[] {
  return Object.values(GAME_MODES);
}

export function modeInfo(id: GameModeId): ModeInfo {
  const mode = GAME_MODES[id];
  return {
    id: mode.id,
    name: mode.name,
    infection: mode.infection,
    teams: mode.teams,
    photoRequired: mode.photoRequired,
  };
}
