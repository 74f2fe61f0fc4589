import { ok, reject } from "../utils/errors.js";
import type { Result } from "../utils/errors.js";
import { clockLabel } from "../utils/time.js";
import type { EventBus } from "../events/bus.js";
import type { PlayerRegistry } from "./players.js";
import type { ChatMessage, MessageTarget } from "../utils/types.js";

export const MESSAGE_MAX_LENGTH = 500;
export const MESSAGE_LOG_CAP = 500;
export const MESSAGE_VIEW_LIMIT = 100;
export const ADMIN_SENDER = "ADMIN";

export interface MessageSender {
  deviceId: string | null;
  isAdmin: boolean;
}

/**
 * Chat board: messages to everyone, to the sender's role, or to one player.
 */
export class MessageBoard {
  private messages: ChatMessage[] = [];
  private counter = 0;

  constructor(
    private readonly bus: EventBus,
    private readonly players: PlayerRegistry,
    private readonly now: () => number
  ) {}

  send(sender: MessageSender, text: unknown, to: MessageTarget = "all"): Result<{ message: ChatMessage }> {
    const content = typeof text === "string" ? text.trim().slice(0, MESSAGE_MAX_LENGTH) : "";
    if (!content) return reject("INVALID_ARGUMENT", "Empty message");

    let fromId = ADMIN_SENDER;
    let fromName = ADMIN_SENDER;
    let team: ChatMessage["team"] = null;

    if (!sender.isAdmin || sender.deviceId) {
      const player = sender.deviceId ? this.players.get(sender.deviceId) : null;
      if (!player) return reject("NOT_FOUND", "Player not found");
      fromId = player.deviceId;
      fromName = player.name;
      team = player.role;
    }

    if (to !== "all" && to !== "team" && !this.players.has(to)) {
      return reject("NOT_FOUND", "Recipient not found");
    }

    const at = this.now();
    const message: ChatMessage = {
      id: ++this.counter,
      fromId,
      fromName,
      to,
      team,
      message: content,
      at,
      time: clockLabel(at),
    };
    this.messages.push(message);
    if (this.messages.length > MESSAGE_LOG_CAP) {
      this.messages.splice(0, this.messages.length - MESSAGE_LOG_CAP);
    }

    this.bus.broadcast("message", { message });

    // Admin announcements also reach trackers, which only see notifications.
    if (sender.isAdmin && to === "all") {
      this.bus.notifyMany(this.players.ids(), content, "info");
    } else if (to !== "all" && to !== "team") {
      this.bus.notify(to, `Msg from ${fromName}: ${content}`, "info");
    }

    return ok({ message });
  }

  /** Messages the viewer may read, oldest first, from the last window. */
  visibleTo(viewer: MessageSender): ChatMessage[] {
    const recent = this.messages.slice(-MESSAGE_VIEW_LIMIT);
    if (viewer.isAdmin) return recent;

    const player = viewer.deviceId ? this.players.get(viewer.deviceId) : null;
    if (!player) return recent.filter((m) => m.to === "all");

    return recent.filter(
      (m) =>
        m.to === "all" ||
        (m.to === "team" && m.team === player.role) ||
        m.to === player.deviceId ||
        m.fromId === player.deviceId
    );
  }
}
