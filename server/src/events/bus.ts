import { createLogger } from "../utils/logger.js";
import { clockLabel } from "../utils/time.js";
import type {
  BroadcastMessage,
  GameEvent,
  Notification,
  NotificationKind,
} from "../utils/types.js";

const log = createLogger("bus");

export const NOTIFICATION_QUEUE_CAP = 20;
export const EVENT_LOG_CAP = 500;

/**
 * A live push channel for one player. Returns false when the message could
 * not be handed to the transport (socket closed), in which case the
 * notification goes back into the player's queue.
 */
export type PushSink = (message: BroadcastMessage) => boolean;
export type BroadcastListener = (message: BroadcastMessage) => void;
export type EventObserver = (event: GameEvent) => void;

export interface EventBusOptions {
  notificationCap?: number;
  eventLogCap?: number;
  now?: () => number;
}

/**
 * Notification/event bus.
 *
 * - Per-player notification queues, bounded (drop oldest), drained on read.
 * - A broadcast channel every connected client observes.
 * - An audit log of the last N events, independent of delivery.
 *
 * Outbound traffic produced while the coordinator holds its lock is buffered
 * in an outbox and only handed to transports by flush().
 */
export class EventBus {
  private readonly notificationCap: number;
  private readonly eventLogCap: number;
  private readonly now: () => number;

  private events: GameEvent[] = [];
  private eventCounter = 0;
  private queues = new Map<string, Notification[]>();
  private sinks = new Map<string, PushSink>();
  private broadcastListeners = new Set<BroadcastListener>();
  private observers = new Set<EventObserver>();
  private outbox: Array<() => void> = [];

  constructor(options: EventBusOptions = {}) {
    this.notificationCap = options.notificationCap ?? NOTIFICATION_QUEUE_CAP;
    this.eventLogCap = options.eventLogCap ?? EVENT_LOG_CAP;
    this.now = options.now ?? Date.now;
  }

  // ============ Audit Log ============

  /**
   * Append an event to the audit log, run observers, and (by default) broadcast it.
   */
  log(type: string, data: Record<string, unknown> = {}, broadcast = true): GameEvent {
    const at = this.now();
    const event: GameEvent = {
      id: ++this.eventCounter,
      type,
      data,
      timestamp: new Date(at).toISOString(),
      time: clockLabel(at),
    };

    this.events.push(event);
    if (this.events.length > this.eventLogCap) {
      this.events.splice(0, this.events.length - this.eventLogCap);
    }

    log.debug({ type, ...data }, "event");

    for (const observer of this.observers) {
      observer(event);
    }

    if (broadcast) {
      this.broadcast("event", { event });
    }
    return event;
  }

  recentEvents(limit = 100): GameEvent[] {
    if (limit <= 0) return [];
    return this.events.slice(-limit);
  }

  observe(observer: EventObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  // ============ Per-Player Notifications ============

  notify(deviceId: string, message: string, kind: NotificationKind = "info"): void {
    const at = this.now();
    this.deliver(deviceId, { message, kind, at, time: clockLabel(at) });
  }

  notifyMany(deviceIds: Iterable<string>, message: string, kind: NotificationKind = "info"): void {
    const at = this.now();
    const notification: Notification = { message, kind, at, time: clockLabel(at) };
    for (const deviceId of deviceIds) {
      this.deliver(deviceId, { ...notification });
    }
  }

  /** Take (and clear) everything queued for a player. */
  drain(deviceId: string): Notification[] {
    const queue = this.queues.get(deviceId);
    if (!queue || queue.length === 0) return [];
    this.queues.delete(deviceId);
    return queue;
  }

  /** Drop everything the bus holds for a removed player. */
  forget(deviceId: string): void {
    this.queues.delete(deviceId);
    this.sinks.delete(deviceId);
  }

  private deliver(deviceId: string, notification: Notification): void {
    const sink = this.sinks.get(deviceId);
    if (!sink) {
      this.enqueue(deviceId, notification);
      return;
    }

    this.outbox.push(() => {
      const delivered = sink({ type: "notification", notification });
      if (!delivered) {
        this.enqueue(deviceId, notification);
      }
    });
  }

  private enqueue(deviceId: string, notification: Notification): void {
    let queue = this.queues.get(deviceId);
    if (!queue) {
      queue = [];
      this.queues.set(deviceId, queue);
    }
    queue.push(notification);
    if (queue.length > this.notificationCap) {
      queue.splice(0, queue.length - this.notificationCap);
    }
  }

  // ============ Push Subscriptions ============

  /**
   * Attach a live push channel for a player. A newer subscription replaces
   * the older one. Returns an unsubscribe function that only detaches this
   * particular sink.
   */
  subscribe(deviceId: string, sink: PushSink): () => void {
    this.sinks.set(deviceId, sink);
    return () => {
      if (this.sinks.get(deviceId) === sink) {
        this.sinks.delete(deviceId);
      }
    };
  }

  // ============ Broadcast ============

  broadcast(type: string, payload: Record<string, unknown> = {}): void {
    const message: BroadcastMessage = { ...payload, type };
    this.outbox.push(() => {
      for (const listener of this.broadcastListeners) {
        listener(message);
      }
    });
  }

  onBroadcast(listener: BroadcastListener): () => void {
    this.broadcastListeners.add(listener);
    return () => {
      this.broadcastListeners.delete(listener);
    };
  }

  // ============ Dispatch ============

  /**
   * Hand buffered pushes and broadcasts to their transports.
   * Called by the coordinator after each critical section.
   */
  flush(): void {
    if (this.outbox.length === 0) return;
    const batch = this.outbox;
    this.outbox = [];
    for (const send of batch) {
      try {
        send();
      } catch (err) {
        log.error({ error: (err as Error).message }, "Outbound delivery failed");
      }
    }
  }
}
