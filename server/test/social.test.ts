import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { GameCoordinator } from "../src/game/coordinator.js";
import type { BroadcastMessage } from "../src/utils/types.js";
import { createTestCoordinator, joinAs, startRunning, useFakeTimers } from "./helpers.js";
import type { ManualClock } from "./helpers.js";

const admin = { deviceId: null, isAdmin: true };
const actor = (deviceId: string) => ({ deviceId, isAdmin: false });

describe("players, chat and moderation", () => {
  let coordinator: GameCoordinator;
  let clock: ManualClock;

  beforeEach(async () => {
    useFakeTimers();
    ({ coordinator, clock } = createTestCoordinator());
    await joinAs(coordinator, "PRED1", "predator");
    await joinAs(coordinator, "PREY1", "prey");
    await joinAs(coordinator, "PREY2", "prey");
  });

  afterEach(() => {
    coordinator.stop();
    vi.useRealTimers();
  });

  function texts(viewer: { deviceId: string | null; isAdmin: boolean }): string[] {
    return coordinator.messagesFor(viewer).map((m) => m.message);
  }

  describe("messages", () => {
    beforeEach(async () => {
      await coordinator.sendMessage(actor("PREY1"), "hide by the lake", "team");
      await coordinator.sendMessage(actor("PRED1"), "  good luck  ");
      await coordinator.sendMessage(actor("PRED1"), "psst", "PREY2");
    });

    it("shows each player only what is addressed to them", () => {
      expect(texts(actor("PREY2"))).toEqual(["hide by the lake", "good luck", "psst"]);
      expect(texts(actor("PREY1"))).toEqual(["hide by the lake", "good luck"]);
      expect(texts(actor("PRED1"))).toEqual(["good luck", "psst"]);
      expect(texts(admin)).toHaveLength(3);
    });

    it("notifies the recipient of a direct message", async () => {
      const inbox = await coordinator.drainNotifications("PREY2");
      expect(inbox.map((n) => n.message)).toEqual(["Msg from Player_RED1: psst"]);
    });

    it("pushes admin announcements to every tracker", async () => {
      const sent = await coordinator.sendMessage(admin, "Meet at the gate");

      expect(sent.success && sent.message).toMatchObject({ fromId: "ADMIN", fromName: "ADMIN", team: null });
      for (const id of ["PRED1", "PREY1", "PREY2"]) {
        const inbox = await coordinator.drainNotifications(id);
        expect(inbox.at(-1)?.message).toBe("Meet at the gate");
      }
    });

    it("rejects empty text and unknown recipients", async () => {
      expect(await coordinator.sendMessage(actor("PREY1"), "   ")).toEqual({
        success: false,
        code: "INVALID_ARGUMENT",
        error: "Empty message",
      });
      expect(await coordinator.sendMessage(actor("PREY1"), "hi", "NOBODY1")).toMatchObject({
        code: "NOT_FOUND",
        error: "Recipient not found",
      });
    });
  });

  describe("sightings", () => {
    it("scores a sighting and unlocks the target for photo captures", async () => {
      await startRunning(coordinator, clock);

      expect(await coordinator.uploadSighting("PRED1", "prey1", "/uploads/a.jpg")).toEqual({
        success: true,
        points: 25,
      });
      expect(coordinator.getPlayer("PRED1")).toMatchObject({ points: 25, stats: { sightings: 1 } });

      const poll = await coordinator.reportTick("PRED1");
      expect(poll.success && poll.hasPhotoOf).toEqual(["PREY1"]);
      expect(poll.success && poll.notifications.map((n) => n.message)).toContain("Sighting recorded! +25 pts");
    });

    it("applies a per-pair cooldown", async () => {
      await startRunning(coordinator, clock);
      await coordinator.uploadSighting("PRED1", "PREY1", null);

      clock.advance(15_000);
      expect(await coordinator.uploadSighting("PRED1", "PREY1", null)).toEqual({
        success: false,
        code: "PRECONDITION_FAILED",
        error: "Cooldown 45s",
      });
      expect((await coordinator.uploadSighting("PRED1", "PREY2", null)).success).toBe(true);
    });

    it("only allows spotting the other side while running", async () => {
      expect(await coordinator.uploadSighting("PRED1", "PREY1", null)).toMatchObject({ code: "INVALID_STATE" });

      await startRunning(coordinator, clock);
      expect(await coordinator.uploadSighting("PREY1", "PREY2", null)).toMatchObject({
        error: "Prey can only spot preds",
      });
      expect(await coordinator.uploadSighting("PREY1", "PREY1", null)).toMatchObject({ error: "Cannot spot self" });
      expect((await coordinator.uploadSighting("PREY1", "PRED1", null)).success).toBe(true);
    });

    it("leaves photo-less and hidden sightings out of the gallery", async () => {
      await startRunning(coordinator, clock);
      await coordinator.uploadSighting("PRED1", "PREY1", "/uploads/one.jpg");
      await coordinator.uploadSighting("PRED1", "PREY2", "/uploads/two.jpg");
      await coordinator.uploadSighting("PREY1", "PRED1", null);

      expect(coordinator.sightingGallery().map((s) => s.photo)).toEqual(["/uploads/two.jpg", "/uploads/one.jpg"]);

      await coordinator.updatePlayer(actor("PREY2"), "PREY2", { consent: { photoVisible: false } });
      expect(coordinator.sightingGallery().map((s) => s.target)).toEqual(["Player_REY1"]);
    });
  });

  describe("achievements", () => {
    it("awards first blood to the first capture only", async () => {
      await joinAs(coordinator, "PRED2", "predator");
      await startRunning(coordinator, clock);

      await coordinator.attemptCapture("PRED1", "PREY1", -60);
      await coordinator.attemptCapture("PRED2", "PREY2", -60);

      expect(coordinator.getPlayer("PRED1")?.achievements).toEqual(["first_blood"]);
      expect(coordinator.getPlayer("PRED2")?.achievements).toEqual([]);
      const inbox = await coordinator.drainNotifications("PRED1");
      expect(inbox.map((n) => n.message)).toContain("Achievement unlocked: First Blood!");
    });
  });

  describe("bounties", () => {
    it("validates and lists bounties with the target's name", async () => {
      expect(await coordinator.setBounty("PREY1", 0)).toEqual({
        success: false,
        code: "INVALID_ARGUMENT",
        error: "Points must be 1..10000",
      });
      expect(await coordinator.setBounty("NOBODY1", 50)).toMatchObject({ code: "NOT_FOUND" });

      await coordinator.setBounty("prey1", 50, "  too quick ");

      expect(coordinator.listBounties()).toEqual([
        { targetId: "PREY1", points: 50, reason: "too quick", setAt: clock.now(), name: "Player_REY1" },
      ]);
      const inbox = await coordinator.drainNotifications("PREY1");
      expect(inbox.at(-1)?.message).toBe("Bounty of 50 points placed on you!");
    });

    it("removes a bounty once", async () => {
      await coordinator.setBounty("PREY1", 50);

      expect(await coordinator.removeBounty("PREY1")).toEqual({ success: true });
      expect(await coordinator.removeBounty("PREY1")).toMatchObject({ code: "NOT_FOUND", error: "No bounty" });
    });
  });

  describe("live connections", () => {
    function sink(into: BroadcastMessage[], delivered = true) {
      return (message: BroadcastMessage) => {
        into.push(message);
        return delivered;
      };
    }

    it("replays only the notifications queued while away", async () => {
      const broadcasts: BroadcastMessage[] = [];
      coordinator.onBroadcast((message) => broadcasts.push(message));
      await coordinator.drainNotifications("PREY1");
      await coordinator.setBounty("PREY1", 50);
      await coordinator.sendMessage(actor("PRED1"), "psst", "PREY1");
      expect(broadcasts.map((m) => m.type)).toContain("bounty");

      const pushed: BroadcastMessage[] = [];
      const connected = await coordinator.connect("PREY1", sink(pushed));

      expect(connected.success && connected.replay.map((n) => n.message)).toEqual([
        "Bounty of 50 points placed on you!",
        "Msg from Player_RED1: psst",
      ]);
      expect(pushed).toEqual([]);
      expect(await coordinator.drainNotifications("PREY1")).toEqual([]);

      await coordinator.sendMessage(actor("PRED1"), "live", "PREY1");
      expect(pushed).toEqual([
        { type: "notification", notification: expect.objectContaining({ message: "Msg from Player_RED1: live" }) },
      ]);
      expect(await coordinator.drainNotifications("PREY1")).toEqual([]);
    });

    it("keeps what a dead socket failed to deliver for the next connection", async () => {
      await coordinator.drainNotifications("PREY1");
      const dead: BroadcastMessage[] = [];
      const first = await coordinator.connect("PREY1", sink(dead, false));
      expect(first.success && first.replay).toEqual([]);

      await coordinator.sendMessage(actor("PRED1"), "are you there", "PREY1");
      expect(dead).toHaveLength(1);

      const second = await coordinator.connect("PREY1", sink([]));
      expect(second.success && second.replay.map((n) => n.message)).toEqual(["Msg from Player_RED1: are you there"]);
      expect(await coordinator.drainNotifications("PREY1")).toEqual([]);
    });

    it("refuses unknown players", async () => {
      expect(await coordinator.connect("NOBODY1", sink([]))).toEqual({
        success: false,
        code: "NOT_FOUND",
        error: "Player not found",
      });
    });
  });

  describe("moderation", () => {
    it("lets moderators edit other players", async () => {
      expect(await coordinator.updatePlayer(actor("PRED1"), "PREY1", { nickname: "Rabbit" })).toEqual({
        success: false,
        code: "PERMISSION_DENIED",
        error: "Not your player",
      });

      expect(await coordinator.addModerator("pred1")).toEqual({ success: true });
      expect(coordinator.isModerator("PRED1")).toBe(true);

      const edited = await coordinator.updatePlayer(actor("PRED1"), "PREY1", { nickname: "Rabbit" });
      expect(edited.success && edited.player.name).toBe("Rabbit");

      expect(await coordinator.removeModerator("PRED1")).toEqual({ success: true });
      expect(await coordinator.removeModerator("PRED1")).toMatchObject({ error: "Not a moderator" });
      expect(await coordinator.addModerator("NOBODY1")).toMatchObject({ code: "NOT_FOUND" });
    });

    it("removes every trace of a kicked player", async () => {
      const broadcasts: BroadcastMessage[] = [];
      coordinator.onBroadcast((message) => broadcasts.push(message));
      await startRunning(coordinator, clock);
      await coordinator.attemptCapture("PRED1", "PREY1", -60);
      await coordinator.setBounty("PRED1", 100);
      await coordinator.addModerator("PRED1");

      expect(await coordinator.kick("PRED1", "ADMIN")).toEqual({ success: true });

      expect(coordinator.getPlayer("PRED1")).toBeNull();
      expect(coordinator.getPlayer("PREY1")?.capturedBy).toBeNull();
      expect(coordinator.listBounties()).toEqual([]);
      expect(coordinator.listModerators()).toEqual([]);
      expect(broadcasts.find((m) => m.type === "player:kicked")).toEqual({
        type: "player:kicked",
        id: "PRED1",
        name: "Player_RED1",
        by: "ADMIN",
      });
      expect(await coordinator.kick("PRED1", "ADMIN")).toMatchObject({ code: "NOT_FOUND" });
    });

    it("forces a role and tells the player", async () => {
      const forced = await coordinator.forceRole("PREY2", "predator", "ADMIN");

      expect(forced.success && forced.player.role).toBe("predator");
      const inbox = await coordinator.drainNotifications("PREY2");
      expect(inbox.at(-1)?.message).toBe("Your role is now predator");
    });
  });

  describe("self updates", () => {
    it("gates role changes once the game is running", async () => {
      await startRunning(coordinator, clock);

      expect(await coordinator.updatePlayer(actor("PREY1"), "PREY1", { role: "predator" })).toEqual({
        success: false,
        code: "PERMISSION_DENIED",
        error: "Must be in safe zone to change role",
      });
      expect(await coordinator.updatePlayer(admin, "PREY1", { role: "predator" })).toMatchObject({ success: true });
    });

    it("refuses unassigning yourself and picking a game status", async () => {
      expect(await coordinator.updatePlayer(actor("PREY1"), "PREY1", { role: "unassigned" })).toMatchObject({
        error: "Pick prey or predator",
      });
      expect(await coordinator.updatePlayer(actor("PREY1"), "PREY1", { status: "captured" })).toMatchObject({
        code: "INVALID_ARGUMENT",
        error: "Invalid status",
      });
    });

    it("keeps a captured player from changing status", async () => {
      await startRunning(coordinator, clock);
      await coordinator.attemptCapture("PRED1", "PREY1", -60);

      expect(await coordinator.updatePlayer(actor("PREY1"), "PREY1", { status: "dnd" })).toMatchObject({
        code: "PRECONDITION_FAILED",
        error: "Captured - escape first",
      });
    });

    it("updates consent and the derived badge", async () => {
      const result = await coordinator.updatePlayer(actor("PREY1"), "PREY1", {
        consent: { physicalTag: true, locationShare: false },
      });

      expect(result.success && result.player).toMatchObject({
        consent: { physicalTag: true, photoVisible: true, locationShare: false },
        consentBadge: "TNL",
      });
    });
  });
});
