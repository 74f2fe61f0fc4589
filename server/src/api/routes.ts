import { Router } from "express";
import multer from "multer";
import { adminOnly, modOnly, sessionAuth } from "./middleware.js";
import { createHandlers, guarded } from "./handlers.js";
import type { ApiDeps, Handlers } from "./handlers.js";

export interface RouterDeps extends ApiDeps {
  maxPhotoSizeMb: number;
}

export function createRouter(deps: RouterDeps): Router {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxPhotoSizeMb * 1024 * 1024 },
  });

  const handlers = createHandlers(deps);
  const h = (name: keyof Handlers) => guarded(name, handlers[name]);

  const auth = sessionAuth(deps.sessions);
  const mod = modOnly(deps.coordinator);

  const router = Router();

  // Public
  router.get("/health", h("health"));
  router.post("/api/login", h("login"));
  router.post("/api/admin/login", h("adminLogin"));
  router.get("/api/game", h("gameState"));
  router.get("/api/modes", h("modes"));
  router.get("/api/leaderboard", h("leaderboard"));
  router.get("/api/beacons", h("listBeacons"));
  router.get("/api/bounties", h("bounties"));
  router.get("/api/sightings", h("sightings"));
  router.get("/api/emergency", h("emergencyStatus"));

  // Tracker firmware (device id in the body, no session)
  router.post("/api/tracker/ping", h("trackerPing"));
  router.post("/api/tracker/capture", h("trackerCapture"));
  router.post("/api/tracker/emergency", h("trackerEmergency"));

  // Authenticated
  router.post("/api/logout", auth, h("logout"));
  router.get("/api/player", auth, h("getSelf"));
  router.put("/api/player", auth, h("updatePlayer"));
  router.post("/api/player/photo", auth, upload.single("photo"), h("uploadProfilePhoto"));
  router.get("/api/player/notifications", auth, h("notifications"));
  router.get("/api/players", auth, h("listPlayers"));
  router.put("/api/players/:deviceId", auth, h("updatePlayer"));
  router.post("/api/sighting", auth, upload.single("photo"), h("uploadSighting"));
  router.post("/api/emergency", auth, h("triggerEmergency"));
  router.get("/api/messages", auth, h("messages"));
  router.post("/api/messages", auth, h("sendMessage"));

  // Moderator
  router.get("/api/events", auth, mod, h("events"));
  router.post("/api/emergency/clear", auth, mod, h("clearEmergency"));
  router.post("/api/mod/release", auth, mod, h("release"));
  router.post("/api/mod/kick", auth, mod, h("kick"));
  router.post("/api/mod/force-role", auth, mod, h("forceRole"));

  // Admin
  router.post("/api/beacons", auth, adminOnly, h("addBeacon"));
  router.put("/api/beacons/:beaconId", auth, adminOnly, h("updateBeacon"));
  router.delete("/api/beacons/:beaconId", auth, adminOnly, h("deleteBeacon"));
  router.put("/api/game/settings", auth, adminOnly, h("updateSettings"));
  router.put("/api/game/mode", auth, adminOnly, h("setMode"));
  router.post("/api/game/start", auth, adminOnly, h("startGame"));
  router.post("/api/game/pause", auth, adminOnly, h("pauseGame"));
  router.post("/api/game/resume", auth, adminOnly, h("resumeGame"));
  router.post("/api/game/end", auth, adminOnly, h("endGame"));
  router.post("/api/game/reset", auth, adminOnly, h("resetGame"));
  router.post("/api/bounties", auth, adminOnly, h("setBounty"));
  router.delete("/api/bounties/:targetId", auth, adminOnly, h("removeBounty"));
  router.post("/api/mod/add", auth, adminOnly, h("addModerator"));
  router.post("/api/mod/remove", auth, adminOnly, h("removeModerator"));

  return router;
}
