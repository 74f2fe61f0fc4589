import dotenv from "dotenv";

// Load .env (DOTENV_CONFIG_PATH overrides the path)
dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || ".env" });

import { createLogger } from "./utils/logger.js";
import type { CoordinatorOptions } from "./game/context.js";

const log = createLogger("config");

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    log.fatal(`Missing required environment variable: ${name}`);
    process.exit(1);
  }
  return value;
}

function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function envInt(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (!raw) return defaultValue;
  const parsed = parseInt(raw, 10);
  if (isNaN(parsed)) {
    log.fatal(`Invalid integer for ${name}: ${raw}`);
    process.exit(1);
  }
  return parsed;
}

function envBool(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (!raw) return defaultValue;
  return raw.toLowerCase() === "true" || raw === "1";
}

const dataDir = optionalEnv("DATA_DIR", "./data");

export const config = {
  // Server
  port: envInt("PORT", 5000),
  host: optionalEnv("HOST", "0.0.0.0"),
  adminPassword: requireEnv("ADMIN_PASSWORD"),
  sessionTtlHours: envInt("SESSION_TTL_HOURS", 12),

  // Storage
  dataDir,
  dbPath: optionalEnv("DB_PATH", `${dataDir}/hunt.db`),
  uploadsDir: optionalEnv("UPLOADS_DIR", `${dataDir}/uploads`),
  maxPhotoSizeMb: envInt("MAX_PHOTO_SIZE_MB", 16),
  snapshotEnabled: envBool("SNAPSHOT_ENABLED", true),

  // Game
  maxPlayers: envInt("MAX_PLAYERS", 200),
  captureRssi: envInt("CAPTURE_RSSI", -70),
  safezoneRssi: envInt("SAFEZONE_RSSI", -75),
  proximityAlertRssi: envInt("PROXIMITY_ALERT_RSSI", -80),
  captureCooldownSeconds: envInt("CAPTURE_COOLDOWN_SECONDS", 10),
  sightingCooldownSeconds: envInt("SIGHTING_COOLDOWN_SECONDS", 60),
  onlineTimeoutSeconds: envInt("ONLINE_TIMEOUT_SECONDS", 60),
  reconcileIntervalMs: envInt("RECONCILE_INTERVAL_MS", 5_000),
} as const;

export type Config = typeof config;

export function coordinatorOptions(cfg: Config): Partial<CoordinatorOptions> {
  return {
    adminPassword: cfg.adminPassword,
    maxPlayers: cfg.maxPlayers,
    captureRssi: cfg.captureRssi,
    safezoneRssi: cfg.safezoneRssi,
    proximityAlertRssi: cfg.proximityAlertRssi,
    captureCooldownMs: cfg.captureCooldownSeconds * 1000,
    sightingCooldownMs: cfg.sightingCooldownSeconds * 1000,
    onlineTimeoutMs: cfg.onlineTimeoutSeconds * 1000,
    reconcileIntervalMs: cfg.reconcileIntervalMs,
  };
}
