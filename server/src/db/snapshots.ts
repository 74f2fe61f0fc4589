import Database from "better-sqlite3";
import { runMigrations } from "./migrations.js";
import { createLogger } from "../utils/logger.js";
import { DEFAULT_MODE, isGameModeId } from "../game/modes.js";
import type { CoordinatorSnapshot, PlayerSnapshot } from "../game/snapshot.js";
import type { Beacon, Bounty, Role, Team } from "../utils/types.js";

const log = createLogger("db");

function toRole(value: unknown): Role {
  return value === "prey" || value === "predator" ? value : "unassigned";
}

function toTeam(value: unknown): Team | null {
  return value === "red" || value === "blue" ? value : null;
}

function parseStringList(raw: unknown): string[] {
  if (typeof raw !== "string") return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === "string") : [];
  } catch {
    return [];
  }
}

function mapPlayer(row: Record<string, unknown>): PlayerSnapshot {
  return {
    deviceId: row.device_id as string,
    nickname: row.nickname as string,
    name: row.name as string,
    profilePic: (row.profile_pic as string | null) ?? null,
    role: toRole(row.role),
    team: toTeam(row.team),
    consent: {
      physicalTag: row.physical_tag === 1,
      photoVisible: row.photo_visible === 1,
      locationShare: row.location_share === 1,
    },
    stats: {
      captures: row.captures as number,
      escapes: row.escapes as number,
      timesCaptured: row.times_captured as number,
      sightings: row.sightings as number,
      infections: row.infections as number,
      bonusPoints: row.bonus_points as number,
    },
    achievements: parseStringList(row.achievements),
    sightedTargets: parseStringList(row.sighted_targets),
    joinedAt: row.joined_at as number,
    lastSeenAt: row.last_seen_at as number,
  };
}

/**
 * Best-effort SQLite persistence of coordinator snapshots. Each save
 * replaces the previous snapshot in one transaction.
 */
export class SnapshotStore {
  private readonly db: Database.Database;

  constructor(path: string) {
    this.db = new Database(path);
    runMigrations(this.db);
    log.info({ path }, "Snapshot store opened");
  }

  save(snapshot: CoordinatorSnapshot): void {
    const db = this.db;
    const insertPlayer = db.prepare(
      `INSERT INTO players (
        device_id, nickname, name, profile_pic, role, team,
        physical_tag, photo_visible, location_share,
        captures, escapes, times_captured, sightings, infections, bonus_points,
        achievements, sighted_targets, joined_at, last_seen_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const insertBeacon = db.prepare("INSERT INTO beacons (beacon_id, name, rssi, active) VALUES (?, ?, ?, ?)");
    const insertBounty = db.prepare("INSERT INTO bounties (target_id, points, reason, set_at) VALUES (?, ?, ?, ?)");
    const insertModerator = db.prepare("INSERT INTO moderators (device_id) VALUES (?)");
    const upsertConfig = db.prepare(
      `INSERT OR REPLACE INTO game_config (
        id, mode, duration_minutes, countdown_seconds, honor_system, allow_role_change,
        capture_rssi, safezone_rssi, proximity_alert_rssi, team_red, team_blue, saved_at
      ) VALUES (1, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );

    const write = db.transaction((s: CoordinatorSnapshot) => {
      db.exec("DELETE FROM players; DELETE FROM beacons; DELETE FROM bounties; DELETE FROM moderators;");

      for (const p of s.players) {
        insertPlayer.run(
          p.deviceId,
          p.nickname,
          p.name,
          p.profilePic,
          p.role,
          p.team,
          p.consent.physicalTag ? 1 : 0,
          p.consent.photoVisible ? 1 : 0,
          p.consent.locationShare ? 1 : 0,
          p.stats.captures,
          p.stats.escapes,
          p.stats.timesCaptured,
          p.stats.sightings,
          p.stats.infections,
          p.stats.bonusPoints,
          JSON.stringify(p.achievements),
          JSON.stringify(p.sightedTargets),
          p.joinedAt,
          p.lastSeenAt
        );
      }
      for (const b of s.beacons) {
        insertBeacon.run(b.id, b.name, b.rssi, b.active ? 1 : 0);
      }
      for (const b of s.bounties) {
        insertBounty.run(b.targetId, b.points, b.reason, b.setAt);
      }
      for (const id of s.moderators) {
        insertModerator.run(id);
      }

      const g = s.game;
      upsertConfig.run(
        g.mode,
        g.durationMinutes,
        g.countdownSeconds,
        g.settings.honorSystem ? 1 : 0,
        g.settings.allowRoleChange ? 1 : 0,
        g.settings.captureRssi,
        g.settings.safezoneRssi,
        g.settings.proximityAlertRssi,
        g.teamScores.red,
        g.teamScores.blue,
        s.savedAt
      );
    });

    write(snapshot);
    log.debug({ players: snapshot.players.length, savedAt: snapshot.savedAt }, "Snapshot saved");
  }

  /** Last saved snapshot, or null when nothing has been saved yet. */
  load(): CoordinatorSnapshot | null {
    const db = this.db;
    const config = db.prepare("SELECT * FROM game_config WHERE id = 1").get() as
      | Record<string, unknown>
      | undefined;
    if (!config) return null;

    const players = (db.prepare("SELECT * FROM players ORDER BY device_id").all() as Record<string, unknown>[])
      .map(mapPlayer);

    const beacons: Beacon[] = (db.prepare("SELECT * FROM beacons ORDER BY beacon_id").all() as Record<string, unknown>[])
      .map((row) => ({
        id: row.beacon_id as string,
        name: row.name as string,
        rssi: row.rssi as number,
        active: row.active === 1,
      }));

    const bounties: Bounty[] = (db.prepare("SELECT * FROM bounties").all() as Record<string, unknown>[])
      .map((row) => ({
        targetId: row.target_id as string,
        points: row.points as number,
        reason: row.reason as string,
        setAt: row.set_at as number,
      }));

    const moderators = (db.prepare("SELECT device_id FROM moderators ORDER BY device_id").all() as Array<{
      device_id: string;
    }>).map((row) => row.device_id);

    const mode = isGameModeId(config.mode) ? config.mode : DEFAULT_MODE;

    return {
      savedAt: config.saved_at as number,
      game: {
        mode,
        durationMinutes: config.duration_minutes as number,
        countdownSeconds: config.countdown_seconds as number,
        settings: {
          honorSystem: config.honor_system === 1,
          allowRoleChange: config.allow_role_change === 1,
          captureRssi: config.capture_rssi as number,
          safezoneRssi: config.safezone_rssi as number,
          proximityAlertRssi: config.proximity_alert_rssi as number,
        },
        teamScores: { red: config.team_red as number, blue: config.team_blue as number },
      },
      players,
      beacons,
      bounties,
      moderators,
    };
  }

  close(): void {
    this.db.close();
  }
}
