import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { GameCoordinator } from "../src/game/coordinator.js";
import { createTestCoordinator, joinAs, settle, startRunning, useFakeTimers } from "./helpers.js";
import type { ManualClock } from "./helpers.js";

describe("game phase controller", () => {
  let coordinator: GameCoordinator;
  let clock: ManualClock;

  beforeEach(() => {
    useFakeTimers();
    ({ coordinator, clock } = createTestCoordinator());
  });

  afterEach(() => {
    coordinator.stop();
    vi.useRealTimers();
  });

  async function lobbyWithPair(): Promise<void> {
    await joinAs(coordinator, "PRED1", "predator");
    await joinAs(coordinator, "PREY1", "prey");
  }

  describe("start", () => {
    it("needs a ready predator and a ready prey", async () => {
      await joinAs(coordinator, "PREY1", "prey");
      expect(await coordinator.startGame()).toEqual({
        success: false,
        code: "PRECONDITION_FAILED",
        error: "Need a ready predator",
      });

      await joinAs(coordinator, "PRED1", "predator");
      await coordinator.updatePlayer({ deviceId: "PREY1", isAdmin: false }, "PREY1", { status: "dnd" });
      expect(await coordinator.startGame()).toMatchObject({ error: "Need a ready prey" });
    });

    it("needs two online players", async () => {
      await lobbyWithPair();
      await coordinator.logout("PREY1");
      const prey = await coordinator.updatePlayer({ deviceId: null, isAdmin: true }, "PREY1", { status: "ready" });
      expect(prey.success).toBe(true);

      expect(await coordinator.startGame()).toMatchObject({ error: "Need 2 online players" });
    });

    it("clamps duration and countdown", async () => {
      await lobbyWithPair();

      const result = await coordinator.startGame({ durationMinutes: 500, countdownSeconds: 0.2 });

      expect(result).toEqual({ success: true, countdownSeconds: 1, durationMinutes: 240 });
      expect(coordinator.gameView().phase).toBe("countdown");
      expect(coordinator.gameView().timeRemaining).toBe(1);
    });

    it("commits the countdown into a running game with the requested duration", async () => {
      await lobbyWithPair();
      await coordinator.startGame({ durationMinutes: 5, countdownSeconds: 3 });

      expect(coordinator.getPlayer("PRED1")?.status).toBe("active");
      vi.advanceTimersByTime(2_999);
      await settle(coordinator);
      expect(coordinator.gameView().phase).toBe("countdown");

      clock.advance(3_000);
      vi.advanceTimersByTime(1);
      await settle(coordinator);

      const view = coordinator.gameView();
      expect(view.phase).toBe("running");
      expect(view.timeRemaining).toBe(300);
      expect(view.endsAt).toBe(clock.now() + 300_000);
    });

    it("refuses to start outside the lobby", async () => {
      await lobbyWithPair();
      await startRunning(coordinator, clock);

      expect(await coordinator.startGame()).toEqual({
        success: false,
        code: "INVALID_STATE",
        error: "Game not in lobby",
      });
    });
  });

  describe("pause and resume", () => {
    it("pausing a countdown returns to the lobby and drops the pending start", async () => {
      await lobbyWithPair();
      await coordinator.startGame({ countdownSeconds: 2 });

      expect(await coordinator.pauseGame()).toEqual({ success: true });
      expect(coordinator.gameView().phase).toBe("lobby");
      expect(coordinator.getPlayer("PREY1")?.status).toBe("ready");

      vi.advanceTimersByTime(5_000);
      await settle(coordinator);
      expect(coordinator.gameView().phase).toBe("lobby");
    });

    it("keeps the remaining time across a pause", async () => {
      await lobbyWithPair();
      await startRunning(coordinator, clock, 5);

      clock.advance(60_000);
      await coordinator.pauseGame();
      expect(coordinator.gameView()).toMatchObject({ phase: "paused", timeRemaining: 240, endsAt: null });

      clock.advance(600_000);
      expect(await coordinator.resumeGame()).toEqual({ success: true });
      expect(coordinator.gameView()).toMatchObject({ phase: "running", timeRemaining: 240 });
    });

    it("rejects pause and resume in the wrong phase", async () => {
      expect(await coordinator.pauseGame()).toMatchObject({ code: "INVALID_STATE", error: "Game not running" });
      expect(await coordinator.resumeGame()).toMatchObject({ code: "INVALID_STATE", error: "Game not paused" });
    });
  });

  describe("end and reset", () => {
    it("ends once and reports the leaderboard", async () => {
      await lobbyWithPair();
      await startRunning(coordinator, clock);

      const ended = await coordinator.endGame();
      expect(ended.success && ended.leaderboard.prey[0]).toMatchObject({ deviceId: "PREY1", points: 200 });
      expect(await coordinator.endGame()).toMatchObject({ code: "INVALID_STATE", error: "Game already ended" });
    });

    it("reset followed by start reproduces the fresh duration default", async () => {
      const fresh = coordinator.gameView().durationMinutes;
      await coordinator.setMode("quick");
      await lobbyWithPair();
      await startRunning(coordinator, clock, 7);
      await coordinator.endGame();

      expect(await coordinator.resetGame()).toEqual({ success: true });
      expect(coordinator.gameView()).toMatchObject({ phase: "lobby", durationMinutes: fresh });
      expect(coordinator.getPlayer("PRED1")).toMatchObject({ role: "unassigned", status: "lobby" });

      await lobbyWithPair();
      const restarted = await coordinator.startGame();
      expect(restarted).toMatchObject({ success: true, durationMinutes: fresh });
    });

    it("zeroes stats but keeps names and settings", async () => {
      await lobbyWithPair();
      await coordinator.updatePlayer({ deviceId: "PRED1", isAdmin: false }, "PRED1", { nickname: "Wolf" });
      await coordinator.updateSettings({ captureRssi: -65 });
      await startRunning(coordinator, clock);
      await coordinator.attemptCapture("PRED1", "PREY1", -60);

      await coordinator.resetGame();

      expect(coordinator.getPlayer("PRED1")).toMatchObject({ name: "Wolf", stats: { captures: 0 } });
      expect(coordinator.gameView().settings.captureRssi).toBe(-65);
    });
  });

  describe("modes and settings", () => {
    it("locks the mode after the lobby", async () => {
      await lobbyWithPair();
      expect(await coordinator.setMode("endurance")).toEqual({ success: true });
      expect(coordinator.gameView()).toMatchObject({ durationMinutes: 90, mode: { id: "endurance" } });

      await startRunning(coordinator, clock);
      expect(await coordinator.setMode("quick")).toMatchObject({
        code: "INVALID_STATE",
        error: "Mode locked after lobby",
      });
      expect(await coordinator.setMode("chess")).toMatchObject({ code: "INVALID_ARGUMENT" });
    });

    it("alternates teams within each role", async () => {
      await joinAs(coordinator, "PRED1", "predator");
      await joinAs(coordinator, "PRED2", "predator");
      await joinAs(coordinator, "PREY1", "prey");
      await joinAs(coordinator, "PREY2", "prey");
      await coordinator.login("IDLE1");

      await coordinator.setMode("teams");

      expect(coordinator.listPlayers().map((p) => [p.deviceId, p.team])).toEqual([
        ["IDLE1", null],
        ["PRED1", "red"],
        ["PRED2", "blue"],
        ["PREY1", "red"],
        ["PREY2", "blue"],
      ]);
    });

    it("validates signal thresholds", async () => {
      expect(await coordinator.updateSettings({ safezoneRssi: -5 })).toEqual({
        success: false,
        code: "INVALID_ARGUMENT",
        error: "Invalid safezoneRssi",
      });

      const updated = await coordinator.updateSettings({ honorSystem: true, captureRssi: -60 });
      expect(updated.success && updated.settings).toMatchObject({ honorSystem: true, captureRssi: -60 });
    });
  });

  describe("background reconciler", () => {
    it("ends the game when time is up", async () => {
      await lobbyWithPair();
      await startRunning(coordinator, clock, 1);

      clock.advance(59_000);
      expect((await coordinator.sweep()).ended).toBe(false);

      // keep both players fresh so only the clock matters
      await coordinator.reportTick("PRED1");
      await coordinator.reportTick("PREY1");
      clock.advance(1_000);
      const result = await coordinator.sweep();

      expect(result).toEqual({ wentOffline: [], ended: true, pruned: 0 });
      expect(coordinator.gameView().phase).toBe("ended");
    });

    it("marks silent players offline", async () => {
      await lobbyWithPair();
      clock.advance(30_000);
      await coordinator.reportTick("PRED1");
      clock.advance(31_000);

      const result = await coordinator.sweep();

      expect(result.wentOffline).toEqual(["PREY1"]);
      expect(coordinator.getPlayer("PREY1")).toMatchObject({ online: false, status: "offline" });
      expect(coordinator.getPlayer("PRED1")?.online).toBe(true);
    });

    it("runs sweeps on an interval once started", async () => {
      await lobbyWithPair();
      const persist = vi.fn();

      coordinator.startBackgroundTasks(persist);
      vi.advanceTimersByTime(5_000);
      // the snapshot is written after the sweep's own task completes
      await settle(coordinator);
      await settle(coordinator);

      expect(persist).toHaveBeenCalledTimes(1);
      expect(persist.mock.calls[0][0]).toMatchObject({ savedAt: clock.now(), moderators: [] });
    });

    it("survives a failing snapshot write", async () => {
      const persist = vi.fn(() => {
        throw new Error("disk full");
      });

      await expect(coordinator.sweep(persist)).resolves.toEqual({ wentOffline: [], ended: false, pruned: 0 });
      expect(persist).toHaveBeenCalledTimes(1);
    });
  });
});
