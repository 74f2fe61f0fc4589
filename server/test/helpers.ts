import { expect, vi } from "vitest";
import { GameCoordinator } from "../src/game/coordinator.js";
import type { CoordinatorOptions } from "../src/game/context.js";
import type { Role } from "../src/utils/types.js";

export const START_TIME = 1_700_000_000_000;

/** Hand-driven clock injected as the coordinator's `now`. */
export class ManualClock {
  private t = START_TIME;

  readonly now = (): number => this.t;

  advance(ms: number): void {
    this.t += ms;
  }
}

export function createTestCoordinator(overrides: Partial<CoordinatorOptions> = {}) {
  const clock = new ManualClock();
  const coordinator = new GameCoordinator({ adminPassword: "test-secret", now: clock.now, ...overrides });
  return { coordinator, clock };
}

/**
 * Wait until every task queued on the coordinator so far has run. The
 * executor is FIFO, so a no-op mutation queued now finishes last.
 */
export async function settle(coordinator: GameCoordinator): Promise<void> {
  await coordinator.drainNotifications("SETTLE0");
}

/** Log a player in and put them in the lobby with a role, ready to play. */
export async function joinAs(coordinator: GameCoordinator, deviceId: string, role: Role): Promise<void> {
  const login = await coordinator.login(deviceId);
  expect(login.success).toBe(true);
  const update = await coordinator.updatePlayer({ deviceId, isAdmin: false }, deviceId, { role, status: "ready" });
  expect(update.success).toBe(true);
}

/**
 * Start a game and let its countdown commit. Requires fake timers.
 */
export async function startRunning(
  coordinator: GameCoordinator,
  clock: ManualClock,
  durationMinutes = 5,
  countdownSeconds = 1
): Promise<void> {
  const started = await coordinator.startGame({ durationMinutes, countdownSeconds });
  expect(started.success).toBe(true);
  clock.advance(countdownSeconds * 1000);
  vi.advanceTimersByTime(countdownSeconds * 1000);
  await settle(coordinator);
  expect(coordinator.gameView().phase).toBe("running");
}

/** Fake only the timer functions; time itself comes from ManualClock. */
export function useFakeTimers(): void {
  vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "setInterval", "clearInterval"] });
}
