import { describe, expect, it } from "vitest";
import { EventBus } from "../src/events/bus.js";
import type { BroadcastMessage } from "../src/utils/types.js";

describe("EventBus", () => {
  const now = () => 1_700_000_000_000;

  it("keeps the newest notifications when the queue overflows", () => {
    const bus = new EventBus({ now, notificationCap: 3 });
    for (let i = 1; i <= 5; i++) bus.notify("AB12", `n${i}`);

    expect(bus.drain("AB12").map((n) => n.message)).toEqual(["n3", "n4", "n5"]);
    expect(bus.drain("AB12")).toEqual([]);
  });

  it("evicts the oldest events past the log cap", () => {
    const bus = new EventBus({ now, eventLogCap: 2 });
    bus.log("a");
    bus.log("b");
    bus.log("c");

    const events = bus.recentEvents();
    expect(events.map((e) => e.type)).toEqual(["b", "c"]);
    expect(events.map((e) => e.id)).toEqual([2, 3]);
    expect(bus.recentEvents(1).map((e) => e.type)).toEqual(["c"]);
    expect(bus.recentEvents(0)).toEqual([]);
  });

  it("holds broadcasts until flush", () => {
    const bus = new EventBus({ now });
    const seen: BroadcastMessage[] = [];
    bus.onBroadcast((message) => seen.push(message));

    bus.log("capture", { pred: "A" });
    bus.broadcast("game:paused", { reason: "manual" });
    expect(seen).toEqual([]);

    bus.flush();
    expect(seen.map((m) => m.type)).toEqual(["event", "game:paused"]);
    expect(seen[1]).toEqual({ type: "game:paused", reason: "manual" });
  });

  it("does not broadcast quiet events", () => {
    const bus = new EventBus({ now });
    const seen: BroadcastMessage[] = [];
    bus.onBroadcast((message) => seen.push(message));

    bus.log("settings_update", {}, false);
    bus.flush();
    expect(seen).toEqual([]);
    expect(bus.recentEvents().map((e) => e.type)).toEqual(["settings_update"]);
  });

  it("pushes to a live sink on flush instead of queueing", () => {
    const bus = new EventBus({ now });
    const pushed: BroadcastMessage[] = [];
    bus.subscribe("AB12", (message) => {
      pushed.push(message);
      return true;
    });

    bus.notify("AB12", "hello", "success");
    expect(pushed).toEqual([]);
    bus.flush();

    expect(pushed).toHaveLength(1);
    expect(pushed[0].type).toBe("notification");
    expect(bus.drain("AB12")).toEqual([]);
  });

  it("queues a notification the sink could not deliver", () => {
    const bus = new EventBus({ now });
    bus.subscribe("AB12", () => false);

    bus.notify("AB12", "lost socket");
    bus.flush();

    expect(bus.drain("AB12").map((n) => n.message)).toEqual(["lost socket"]);
  });

  it("only detaches the sink that subscribed", () => {
    const bus = new EventBus({ now });
    const unsubscribeOld = bus.subscribe("AB12", () => true);
    const received: BroadcastMessage[] = [];
    bus.subscribe("AB12", (message) => {
      received.push(message);
      return true;
    });

    unsubscribeOld();
    bus.notify("AB12", "still here");
    bus.flush();

    expect(received).toHaveLength(1);
    expect(bus.drain("AB12")).toEqual([]);
  });

  it("runs observers for every logged event", () => {
    const bus = new EventBus({ now });
    const types: string[] = [];
    const stop = bus.observe((event) => types.push(event.type));

    bus.log("login");
    stop();
    bus.log("logout");

    expect(types).toEqual(["login"]);
  });

  it("forgets everything held for a removed player", () => {
    const bus = new EventBus({ now });
    bus.subscribe("AB12", () => true);
    bus.notify("CD34", "queued");

    bus.forget("AB12");
    bus.forget("CD34");

    expect(bus.drain("CD34")).toEqual([]);
    bus.notify("AB12", "after kick");
    bus.flush();
    expect(bus.drain("AB12").map((n) => n.message)).toEqual(["after kick"]);
  });
});
