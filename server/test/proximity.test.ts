import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { GameCoordinator } from "../src/game/coordinator.js";
import { createTestCoordinator, joinAs, startRunning, useFakeTimers } from "./helpers.js";
import type { ManualClock } from "./helpers.js";

describe("proximity and safe zones", () => {
  let coordinator: GameCoordinator;
  let clock: ManualClock;

  beforeEach(async () => {
    useFakeTimers();
    ({ coordinator, clock } = createTestCoordinator());
    await coordinator.addBeacon({ id: "OAK", name: "Old Oak", rssi: -75 });
    await coordinator.addBeacon({ id: "GATE", name: "Gate", rssi: -60 });
    await joinAs(coordinator, "PRED1", "predator");
    await joinAs(coordinator, "PREY1", "prey");
  });

  afterEach(() => {
    coordinator.stop();
    vi.useRealTimers();
  });

  function safeZoneEvents(): string[] {
    return coordinator
      .events()
      .filter((e) => e.type.includes("safezone"))
      .map((e) => e.type);
  }

  it("picks the strongest beacon whose threshold is met", async () => {
    await coordinator.reportTick("PREY1", { beacons: { OAK: -70, GATE: -65 } });
    expect(coordinator.getPlayer("PREY1")).toMatchObject({ inSafeZone: true, safeZoneBeacon: "OAK" });

    await coordinator.reportTick("PREY1", { beacons: { OAK: -70, GATE: -58 } });
    expect(coordinator.getPlayer("PREY1")?.safeZoneBeacon).toBe("GATE");
    expect(safeZoneEvents()).toEqual(["enter_safezone"]);
  });

  it("does not flap on repeated identical readings", async () => {
    const first = await coordinator.reportTick("PREY1", { beacons: { oak: -74 } });
    const second = await coordinator.reportTick("PREY1", { beacons: { oak: -74 } });

    expect(first.success && first.inSafeZone).toBe(true);
    expect(second.success && second.inSafeZone).toBe(true);
    expect(second.success && second.safeZoneBeacon).toBe("OAK");
    expect(safeZoneEvents()).toEqual(["enter_safezone"]);
  });

  it("leaves the zone when no beacon qualifies", async () => {
    await coordinator.reportTick("PREY1", { beacons: { OAK: -70 } });
    const poll = await coordinator.reportTick("PREY1", { beacons: { OAK: -90 } });

    expect(poll.success && poll.inSafeZone).toBe(false);
    expect(poll.success && poll.notifications.map((n) => n.message)).toEqual([
      "Left safe zone - you can be captured!",
    ]);
    expect(safeZoneEvents()).toEqual(["enter_safezone", "leave_safezone"]);
  });

  it("ignores inactive, unknown and malformed beacon readings", async () => {
    await coordinator.updateBeacon("OAK", { active: false });

    await coordinator.reportTick("PREY1", { beacons: { OAK: -40, NOPE: -40, GATE: "strong" } });

    expect(coordinator.getPlayer("PREY1")?.inSafeZone).toBe(false);
  });

  it("keeps the zone state when a tick carries no beacon data", async () => {
    await coordinator.reportTick("PREY1", { beacons: { OAK: -70 } });
    await coordinator.reportTick("PREY1");

    expect(coordinator.getPlayer("PREY1")?.inSafeZone).toBe(true);
  });

  it("reports the strongest known peer as the nearest hint", async () => {
    await coordinator.reportTick("PRED1", { peers: { PREY1: -66.4, PRED1: -10, GHOST1: -30 } });

    expect(coordinator.getPlayer("PRED1")?.nearest).toBe("Player_REY1 -66dB");
  });

  it("warns prey once per approach while the game is running", async () => {
    await startRunning(coordinator, clock);
    await coordinator.drainNotifications("PREY1");

    const close = await coordinator.reportTick("PREY1", { peers: { PRED1: -70 } });
    const stillClose = await coordinator.reportTick("PREY1", { peers: { PRED1: -65 } });
    await coordinator.reportTick("PREY1", { peers: { PRED1: -95 } });
    const again = await coordinator.reportTick("PREY1", { peers: { PRED1: -75 } });

    const messages = (poll: typeof close) => (poll.success ? poll.notifications.map((n) => n.message) : []);
    expect(messages(close)).toEqual(["Predator nearby!"]);
    expect(messages(stillClose)).toEqual([]);
    expect(messages(again)).toEqual(["Predator nearby!"]);
  });

  it("answers a poll with what the tracker renders", async () => {
    const poll = await coordinator.reportTick("prey1", {});

    expect(poll).toMatchObject({
      success: true,
      phase: "lobby",
      role: "prey",
      status: "ready",
      name: "Player_REY1",
      activeBeacons: ["GATE", "OAK"],
      mode: { id: "standard", infection: false },
      emergency: { active: false, by: null, reason: null },
      consentBadge: "STD",
      nearest: null,
      hasPhotoOf: [],
      settings: { captureRssi: -70, safezoneRssi: -75, honorSystem: false },
    });
  });

  it("creates unknown trackers on first ping and rejects bad ids", async () => {
    const poll = await coordinator.reportTick("NEW01");
    expect(poll).toMatchObject({ success: true, status: "lobby", role: "unassigned" });
    expect(coordinator.getPlayer("NEW01")?.online).toBe(true);

    expect(await coordinator.reportTick("x")).toEqual({
      success: false,
      code: "INVALID_ARGUMENT",
      error: "Invalid device id",
    });
  });

  describe("honor system", () => {
    it("refuses manual toggles while it is off", async () => {
      expect(
        await coordinator.updatePlayer({ deviceId: "PREY1", isAdmin: false }, "PREY1", { inSafeZone: true })
      ).toEqual({ success: false, code: "PRECONDITION_FAILED", error: "Honor system off" });
    });

    it("frees a captured prey who declares a safe zone", async () => {
      await coordinator.updateSettings({ honorSystem: true });
      await startRunning(coordinator, clock);
      await coordinator.attemptCapture("PRED1", "PREY1", -60);

      const result = await coordinator.updatePlayer({ deviceId: "PREY1", isAdmin: false }, "PREY1", {
        inSafeZone: true,
      });

      expect(result.success && result.player).toMatchObject({ status: "active", inSafeZone: true });
      expect(coordinator.getPlayer("PREY1")?.stats.escapes).toBe(1);
      expect(safeZoneEvents()).toEqual(["enter_safezone_manual"]);
    });
  });
});
