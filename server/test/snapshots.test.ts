import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { SnapshotStore } from "../src/db/snapshots.js";
import type { GameCoordinator } from "../src/game/coordinator.js";
import type { CoordinatorSnapshot } from "../src/game/snapshot.js";
import { createTestCoordinator, joinAs, startRunning, useFakeTimers } from "./helpers.js";
import type { ManualClock } from "./helpers.js";

describe("snapshots", () => {
  let dir: string;
  let coordinator: GameCoordinator;
  let clock: ManualClock;

  beforeEach(() => {
    useFakeTimers();
    dir = mkdtempSync(join(tmpdir(), "tracker-snapshots-"));
    ({ coordinator, clock } = createTestCoordinator());
  });

  afterEach(() => {
    coordinator.stop();
    vi.useRealTimers();
    rmSync(dir, { recursive: true, force: true });
  });

  async function playedGame(): Promise<CoordinatorSnapshot> {
    await coordinator.setMode("endurance");
    await coordinator.updateSettings({ honorSystem: true, captureRssi: -65 });
    await coordinator.addBeacon({ id: "OAK", name: "Old Oak", rssi: -72 });
    await joinAs(coordinator, "PRED1", "predator");
    await joinAs(coordinator, "PREY1", "prey");
    await coordinator.updatePlayer({ deviceId: "PRED1", isAdmin: false }, "PRED1", { nickname: "Wolf" });
    await coordinator.updatePlayer({ deviceId: "PREY1", isAdmin: false }, "PREY1", {
      consent: { photoVisible: false },
    });
    await startRunning(coordinator, clock);
    await coordinator.attemptCapture("PRED1", "PREY1", -60);
    await coordinator.setBounty("PRED1", 75, "Unstoppable");
    await coordinator.addModerator("PRED1");
    return coordinator.snapshot();
  }

  describe("SnapshotStore", () => {
    it("returns null before anything is saved", () => {
      const store = new SnapshotStore(join(dir, "game.db"));
      expect(store.load()).toBeNull();
      store.close();
    });

    it("loads back what it saved", async () => {
      const snapshot = await playedGame();
      const store = new SnapshotStore(join(dir, "game.db"));

      store.save(snapshot);

      expect(store.load()).toEqual(snapshot);
      store.close();
    });

    it("replaces the previous snapshot and survives reopening", async () => {
      const path = join(dir, "game.db");
      const first = await playedGame();
      const store = new SnapshotStore(path);
      store.save(first);

      await coordinator.kick("PREY1", "ADMIN");
      clock.advance(5_000);
      const second = coordinator.snapshot();
      store.save(second);
      store.close();

      const reopened = new SnapshotStore(path);
      const loaded = reopened.load();
      expect(loaded?.savedAt).toBe(second.savedAt);
      expect(loaded?.players.map((p) => p.deviceId)).toEqual(["PRED1"]);
      reopened.close();
    });
  });

  describe("restore", () => {
    it("brings players back offline in a fresh lobby", async () => {
      const snapshot = await playedGame();
      const { coordinator: restored } = createTestCoordinator();

      await restored.restore(snapshot);

      expect(restored.gameView()).toMatchObject({
        phase: "lobby",
        mode: { id: "endurance" },
        settings: { honorSystem: true, captureRssi: -65 },
      });
      expect(restored.getPlayer("PRED1")).toMatchObject({
        name: "Wolf",
        role: "predator",
        status: "offline",
        online: false,
        stats: { captures: 1 },
        achievements: ["first_blood"],
      });
      expect(restored.getPlayer("PREY1")).toMatchObject({
        status: "offline",
        capturedBy: null,
        consent: { photoVisible: false },
        stats: { timesCaptured: 1 },
      });
      expect(restored.listBeacons()).toEqual([{ id: "OAK", name: "Old Oak", rssi: -72, active: true }]);
      expect(restored.listBounties()).toMatchObject([{ targetId: "PRED1", points: 75, name: "Wolf" }]);
      expect(restored.listModerators()).toEqual(["PRED1"]);
      restored.stop();
    });

    it("lets restored players log back in", async () => {
      const snapshot = await playedGame();
      const { coordinator: restored } = createTestCoordinator();
      await restored.restore(snapshot);

      const login = await restored.login("PRED1");

      expect(login).toMatchObject({ success: true, created: false, player: { online: true, status: "lobby" } });
      restored.stop();
    });
  });
});
