import { mkdirSync, writeFileSync } from "fs";
import { randomUUID } from "crypto";
import type { Request, Response } from "express";
import type { AuthenticatedRequest } from "./middleware.js";
import { bearerToken } from "./middleware.js";
import type { SessionStore } from "./sessions.js";
import type { GameCoordinator } from "../game/coordinator.js";
import type { SignalReadings } from "../game/proximity.js";
import { httpStatusFor } from "../utils/errors.js";
import type { Result } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { normalizeDeviceId } from "../utils/ids.js";
import type {
  BeaconUpdate,
  ConsentFlags,
  GameSettings,
  PlayerStatus,
  PlayerUpdate,
  Role,
} from "../utils/types.js";

const log = createLogger("api");

const IMAGE_TYPES: Record<string, string> = {
  "image/jpeg": ".jpg",
  "image/png": ".png",
  "image/gif": ".gif",
  "image/webp": ".webp",
};

const ROLES: readonly Role[] = ["unassigned", "prey", "predator"];
const STATUSES: readonly PlayerStatus[] = ["offline", "lobby", "ready", "active", "captured", "dnd"];

export interface ApiDeps {
  coordinator: GameCoordinator;
  sessions: SessionStore;
  uploadsDir: string;
  startedAt?: number;
}

export type Handler = (req: Request, res: Response) => void | Promise<void>;

// ============ Body Helpers ============

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalBool(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) return Number(value);
  return undefined;
}

function toRole(value: unknown): Role | undefined {
  if (value === "pred") return "predator";
  return ROLES.find((r) => r === value);
}

function toStatus(value: unknown): PlayerStatus | undefined {
  return STATUSES.find((s) => s === value);
}

function readings(value: unknown): SignalReadings | undefined {
  return isRecord(value) ? value : undefined;
}

function parsePlayerUpdate(body: Record<string, unknown>): PlayerUpdate | string {
  const update: PlayerUpdate = {};

  if (body.nickname !== undefined) {
    const nickname = optionalString(body.nickname);
    if (nickname === undefined) return "nickname must be a string";
    update.nickname = nickname;
  }
  if (body.role !== undefined) {
    const role = toRole(body.role);
    if (!role) return "Invalid role";
    update.role = role;
  }
  if (body.status !== undefined) {
    const status = toStatus(body.status);
    if (!status) return "Invalid status";
    update.status = status;
  }
  if (body.consent !== undefined) {
    if (!isRecord(body.consent)) return "consent must be an object";
    const consent: Partial<ConsentFlags> = {};
    const physicalTag = optionalBool(body.consent.physicalTag);
    const photoVisible = optionalBool(body.consent.photoVisible);
    const locationShare = optionalBool(body.consent.locationShare);
    if (physicalTag !== undefined) consent.physicalTag = physicalTag;
    if (photoVisible !== undefined) consent.photoVisible = photoVisible;
    if (locationShare !== undefined) consent.locationShare = locationShare;
    update.consent = consent;
  }
  const inSafeZone = body.inSafeZone ?? body.in_safe_zone;
  if (inSafeZone !== undefined) {
    const flag = optionalBool(inSafeZone);
    if (flag === undefined) return "inSafeZone must be a boolean";
    update.inSafeZone = flag;
  }
  return update;
}

function parseSettings(body: Record<string, unknown>): Partial<GameSettings> {
  const patch: Partial<GameSettings> = {};
  const honorSystem = optionalBool(body.honorSystem);
  const allowRoleChange = optionalBool(body.allowRoleChange);
  const captureRssi = optionalNumber(body.captureRssi);
  const safezoneRssi = optionalNumber(body.safezoneRssi);
  const proximityAlertRssi = optionalNumber(body.proximityAlertRssi);
  if (honorSystem !== undefined) patch.honorSystem = honorSystem;
  if (allowRoleChange !== undefined) patch.allowRoleChange = allowRoleChange;
  if (captureRssi !== undefined) patch.captureRssi = captureRssi;
  if (safezoneRssi !== undefined) patch.safezoneRssi = safezoneRssi;
  if (proximityAlertRssi !== undefined) patch.proximityAlertRssi = proximityAlertRssi;
  return patch;
}

/**
 * Send a coordinator result: rejections map to their HTTP status with
 * `{ error, code }`, successes are sent as-is.
 */
export function sendResult<T extends object>(res: Response, result: Result<T>): void {
  if (!result.success) {
    res.status(httpStatusFor(result.code)).json({ error: result.error, code: result.code });
    return;
  }
  res.json(result);
}

function badRequest(res: Response, error: string): void {
  res.status(400).json({ error, code: "INVALID_ARGUMENT" });
}

function actorName(req: Request, coordinator: GameCoordinator): string {
  const { auth } = req as AuthenticatedRequest;
  if (auth.isAdmin) return "ADMIN";
  return (auth.deviceId && coordinator.getPlayer(auth.deviceId)?.name) || "moderator";
}

/**
 * Wraps a handler so a thrown error is logged and answered with 500
 * instead of leaving the request hanging.
 */
export function guarded(name: string, handler: Handler): Handler {
  return async (req, res) => {
    try {
      await handler(req, res);
    } catch (err) {
      log.error({ handler: name, error: (err as Error).message }, "Handler failed");
      if (!res.headersSent) res.status(500).json({ error: "Internal server error" });
    }
  };
}

// ============ Handlers ============

export function createHandlers(deps: ApiDeps) {
  const { coordinator, sessions, uploadsDir } = deps;
  const startedAt = deps.startedAt ?? Date.now();

  function saveUpload(file: Express.Multer.File | undefined, prefix: string): string | { error: string } {
    if (!file) return { error: "No photo uploaded" };
    const ext = IMAGE_TYPES[file.mimetype];
    if (!ext) return { error: "Invalid file type" };

    const filename = `${prefix}_${randomUUID().slice(0, 8)}${ext}`;
    mkdirSync(uploadsDir, { recursive: true });
    writeFileSync(`${uploadsDir}/${filename}`, file.buffer);
    return `/uploads/${filename}`;
  }

  const handlers = {
    /** GET /health */
    health(_req: Request, res: Response): void {
      const game = coordinator.gameView();
      res.json({
        status: "ok",
        uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
        phase: game.phase,
        players: game.playerCount,
        online: game.onlineCount,
        sessions: sessions.size,
      });
    },

    // ============ Sessions ============

    /** POST /api/login */
    async login(req: Request, res: Response): Promise<void> {
      const body = bodyOf(req);
      const result = await coordinator.login(body.device_id ?? body.deviceId);
      if (!result.success) {
        sendResult(res, result);
        return;
      }
      const session = sessions.issue(result.player.deviceId, false);
      res.json({ success: true, token: session.token, player: result.player, created: result.created });
    },

    /** POST /api/admin/login */
    adminLogin(req: Request, res: Response): void {
      if (!coordinator.adminLogin(bodyOf(req).password)) {
        log.warn({ ip: req.ip }, "Admin login failed");
        res.status(401).json({ error: "Invalid password", code: "PERMISSION_DENIED" });
        return;
      }
      const session = sessions.issue(null, true);
      res.json({ success: true, token: session.token });
    },

    /** POST /api/logout */
    async logout(req: Request, res: Response): Promise<void> {
      const { auth } = req as AuthenticatedRequest;
      const token = bearerToken(req);
      if (token) sessions.revoke(token);
      if (auth.deviceId) await coordinator.logout(auth.deviceId);
      res.json({ success: true });
    },

    // ============ Players ============

    /** GET /api/player */
    getSelf(req: Request, res: Response): void {
      const { auth } = req as AuthenticatedRequest;
      const player = auth.deviceId ? coordinator.getPlayer(auth.deviceId) : null;
      if (!player) {
        res.status(404).json({ error: "Player not found", code: "NOT_FOUND" });
        return;
      }
      res.json(player);
    },

    /** PUT /api/player and PUT /api/players/:deviceId */
    async updatePlayer(req: Request, res: Response): Promise<void> {
      const { auth } = req as AuthenticatedRequest;
      const targetId = req.params.deviceId ? normalizeDeviceId(req.params.deviceId) : auth.deviceId;
      if (!targetId) {
        badRequest(res, "Invalid device id");
        return;
      }

      const update = parsePlayerUpdate(bodyOf(req));
      if (typeof update === "string") {
        badRequest(res, update);
        return;
      }

      const result = await coordinator.updatePlayer(
        { deviceId: auth.deviceId, isAdmin: auth.isAdmin },
        targetId,
        update
      );
      sendResult(res, result);
    },

    /** POST /api/player/photo */
    async uploadProfilePhoto(req: Request, res: Response): Promise<void> {
      const { auth } = req as AuthenticatedRequest;
      if (!auth.deviceId) {
        badRequest(res, "Players only");
        return;
      }
      const saved = saveUpload(req.file, `profile_${auth.deviceId}`);
      if (typeof saved !== "string") {
        badRequest(res, saved.error);
        return;
      }
      sendResult(res, await coordinator.setProfilePhoto(auth.deviceId, saved));
    },

    /** GET /api/players */
    listPlayers(_req: Request, res: Response): void {
      res.json(coordinator.listPlayers());
    },

    /** GET /api/player/notifications */
    async notifications(req: Request, res: Response): Promise<void> {
      const { auth } = req as AuthenticatedRequest;
      res.json(auth.deviceId ? await coordinator.drainNotifications(auth.deviceId) : []);
    },

    // ============ Sightings ============

    /** POST /api/sighting (multipart: photo, target_id) */
    async uploadSighting(req: Request, res: Response): Promise<void> {
      const { auth } = req as AuthenticatedRequest;
      const body = bodyOf(req);
      const targetId = normalizeDeviceId(body.target_id ?? body.targetId);
      if (!auth.deviceId || !targetId) {
        badRequest(res, "target_id required");
        return;
      }
      const saved = saveUpload(req.file, `sighting_${auth.deviceId}_${targetId}`);
      if (typeof saved !== "string") {
        badRequest(res, saved.error);
        return;
      }
      sendResult(res, await coordinator.uploadSighting(auth.deviceId, targetId, saved));
    },

    /** GET /api/sightings */
    sightings(_req: Request, res: Response): void {
      res.json(coordinator.sightingGallery());
    },

    // ============ Tracker ============

    /** POST /api/tracker/ping */
    async trackerPing(req: Request, res: Response): Promise<void> {
      const body = bodyOf(req);
      const result = await coordinator.reportTick(body.device_id, {
        peers: readings(body.player_rssi),
        beacons: readings(body.beacon_rssi),
      });
      sendResult(res, result);
    },

    /** POST /api/tracker/capture */
    async trackerCapture(req: Request, res: Response): Promise<void> {
      const body = bodyOf(req);
      const result = await coordinator.attemptCapture(body.pred_id, body.prey_id, optionalNumber(body.rssi));
      sendResult(res, result);
    },

    /** POST /api/tracker/emergency */
    async trackerEmergency(req: Request, res: Response): Promise<void> {
      const body = bodyOf(req);
      const deviceId = normalizeDeviceId(body.device_id);
      if (!deviceId) {
        badRequest(res, "Invalid device id");
        return;
      }
      sendResult(res, await coordinator.triggerEmergency(deviceId, body.reason));
    },

    // ============ Beacons ============

    /** GET /api/beacons */
    listBeacons(_req: Request, res: Response): void {
      res.json(coordinator.listBeacons());
    },

    /** POST /api/beacons */
    async addBeacon(req: Request, res: Response): Promise<void> {
      const body = bodyOf(req);
      const id = optionalString(body.id);
      if (!id) {
        badRequest(res, "id required");
        return;
      }
      const result = await coordinator.addBeacon({
        id,
        name: optionalString(body.name),
        rssi: optionalNumber(body.rssi),
      });
      if (result.success) res.status(201);
      sendResult(res, result);
    },

    /** PUT /api/beacons/:beaconId */
    async updateBeacon(req: Request, res: Response): Promise<void> {
      const body = bodyOf(req);
      const patch: BeaconUpdate = {};
      const name = optionalString(body.name);
      const rssi = optionalNumber(body.rssi);
      const active = optionalBool(body.active);
      if (name !== undefined) patch.name = name;
      if (rssi !== undefined) patch.rssi = rssi;
      if (active !== undefined) patch.active = active;
      sendResult(res, await coordinator.updateBeacon(req.params.beaconId, patch));
    },

    /** DELETE /api/beacons/:beaconId */
    async deleteBeacon(req: Request, res: Response): Promise<void> {
      sendResult(res, await coordinator.deleteBeacon(req.params.beaconId));
    },

    // ============ Game ============

    /** GET /api/game */
    gameState(_req: Request, res: Response): void {
      res.json(coordinator.gameView());
    },

    /** GET /api/modes */
    modes(_req: Request, res: Response): void {
      res.json(coordinator.modes());
    },

    /** PUT /api/game/settings */
    async updateSettings(req: Request, res: Response): Promise<void> {
      sendResult(res, await coordinator.updateSettings(parseSettings(bodyOf(req))));
    },

    /** PUT /api/game/mode */
    async setMode(req: Request, res: Response): Promise<void> {
      sendResult(res, await coordinator.setMode(bodyOf(req).mode));
    },

    /** POST /api/game/start */
    async startGame(req: Request, res: Response): Promise<void> {
      const body = bodyOf(req);
      const result = await coordinator.startGame({
        durationMinutes: optionalNumber(body.duration ?? body.durationMinutes),
        countdownSeconds: optionalNumber(body.countdown ?? body.countdownSeconds),
      });
      sendResult(res, result);
    },

    /** POST /api/game/pause */
    async pauseGame(_req: Request, res: Response): Promise<void> {
      sendResult(res, await coordinator.pauseGame());
    },

    /** POST /api/game/resume */
    async resumeGame(_req: Request, res: Response): Promise<void> {
      sendResult(res, await coordinator.resumeGame());
    },

    /** POST /api/game/end */
    async endGame(_req: Request, res: Response): Promise<void> {
      sendResult(res, await coordinator.endGame("manual"));
    },

    /** POST /api/game/reset */
    async resetGame(_req: Request, res: Response): Promise<void> {
      sendResult(res, await coordinator.resetGame());
    },

    /** GET /api/events?limit= */
    events(req: Request, res: Response): void {
      const limit = optionalNumber(req.query.limit);
      res.json(coordinator.events(limit === undefined ? 100 : Math.max(0, Math.floor(limit))));
    },

    /** GET /api/leaderboard */
    leaderboard(_req: Request, res: Response): void {
      res.json(coordinator.leaderboard());
    },

    // ============ Emergency ============

    /** GET /api/emergency */
    emergencyStatus(_req: Request, res: Response): void {
      res.json(coordinator.emergencyStatus());
    },

    /** POST /api/emergency */
    async triggerEmergency(req: Request, res: Response): Promise<void> {
      const { auth } = req as AuthenticatedRequest;
      const reason = bodyOf(req).reason;
      const result = auth.deviceId
        ? await coordinator.triggerEmergency(auth.deviceId, reason)
        : await coordinator.triggerSystemEmergency(reason, "Admin");
      sendResult(res, result);
    },

    /** POST /api/emergency/clear */
    async clearEmergency(req: Request, res: Response): Promise<void> {
      sendResult(res, await coordinator.clearEmergency(actorName(req, coordinator)));
    },

    // ============ Messages ============

    /** GET /api/messages */
    messages(req: Request, res: Response): void {
      const { auth } = req as AuthenticatedRequest;
      res.json(coordinator.messagesFor({ deviceId: auth.deviceId, isAdmin: auth.isAdmin }));
    },

    /** POST /api/messages */
    async sendMessage(req: Request, res: Response): Promise<void> {
      const { auth } = req as AuthenticatedRequest;
      const body = bodyOf(req);
      const rawTo = optionalString(body.to) ?? "all";
      const to = rawTo === "all" || rawTo === "team" ? rawTo : normalizeDeviceId(rawTo);
      if (!to) {
        badRequest(res, "Invalid recipient");
        return;
      }
      const result = await coordinator.sendMessage({ deviceId: auth.deviceId, isAdmin: auth.isAdmin }, body.message, to);
      sendResult(res, result);
    },

    // ============ Bounties ============

    /** GET /api/bounties */
    bounties(_req: Request, res: Response): void {
      res.json(coordinator.listBounties());
    },

    /** POST /api/bounties */
    async setBounty(req: Request, res: Response): Promise<void> {
      const body = bodyOf(req);
      const points = body.points === undefined ? undefined : optionalNumber(body.points);
      sendResult(res, await coordinator.setBounty(body.target_id ?? body.targetId, points, body.reason));
    },

    /** DELETE /api/bounties/:targetId */
    async removeBounty(req: Request, res: Response): Promise<void> {
      sendResult(res, await coordinator.removeBounty(req.params.targetId));
    },

    // ============ Moderation ============

    /** POST /api/mod/add */
    async addModerator(req: Request, res: Response): Promise<void> {
      sendResult(res, await coordinator.addModerator(bodyOf(req).device_id));
    },

    /** POST /api/mod/remove */
    async removeModerator(req: Request, res: Response): Promise<void> {
      sendResult(res, await coordinator.removeModerator(bodyOf(req).device_id));
    },

    /** POST /api/mod/release */
    async release(req: Request, res: Response): Promise<void> {
      sendResult(res, await coordinator.release(bodyOf(req).device_id, actorName(req, coordinator)));
    },

    /** POST /api/mod/kick */
    async kick(req: Request, res: Response): Promise<void> {
      const body = bodyOf(req);
      const result = await coordinator.kick(body.device_id, actorName(req, coordinator));
      const deviceId = normalizeDeviceId(body.device_id);
      if (result.success && deviceId) sessions.revokeDevice(deviceId);
      sendResult(res, result);
    },

    /** POST /api/mod/force-role */
    async forceRole(req: Request, res: Response): Promise<void> {
      const body = bodyOf(req);
      const role = toRole(body.role);
      if (!role) {
        badRequest(res, "Invalid role");
        return;
      }
      sendResult(res, await coordinator.forceRole(body.device_id, role, actorName(req, coordinator)));
    },
  } satisfies Record<string, Handler>;

  return handlers;
}

export type Handlers = ReturnType<typeof createHandlers>;
