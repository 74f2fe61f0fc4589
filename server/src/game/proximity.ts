import { createLogger } from "../utils/logger.js";
import { normalizeBeaconId, normalizeDeviceId } from "../utils/ids.js";
import { CooldownMap } from "./cooldowns.js";
import type { GameContext } from "./context.js";
import type { CaptureEngine } from "./capture.js";
import type { Beacon, Player } from "../utils/types.js";

const log = createLogger("proximity");

export type SignalReadings = Record<string, unknown>;

/**
 * Keep only well-formed readings: valid id and a finite number.
 */
function cleanReadings(
  readings: SignalReadings,
  normalize: (id: unknown) => string | null
): Map<string, number> {
  const clean = new Map<string, number>();
  for (const [rawId, value] of Object.entries(readings)) {
    const id = normalize(rawId);
    if (!id || typeof value !== "number" || !Number.isFinite(value)) continue;
    clean.set(id, Math.round(value));
  }
  return clean;
}

/**
 * Turns per-tick RSSI reports into safe-zone transitions and proximity hints.
 */
export class ProximityResolver {
  // "prey:predator" pairs currently above the alert threshold
  private nearPairs = new Set<string>();

  constructor(
    private readonly ctx: GameContext,
    private readonly capture: CaptureEngine
  ) {}

  /**
   * Strongest active beacon whose threshold the reading meets.
   */
  strongestQualifying(readings: Map<string, number>): { beacon: Beacon; rssi: number } | null {
    let best: { beacon: Beacon; rssi: number } | null = null;
    for (const [beaconId, rssi] of readings) {
      const beacon = this.ctx.beacons.get(beaconId);
      if (!beacon || !beacon.active || rssi < beacon.rssi) continue;
      if (!best || rssi > best.rssi) best = { beacon, rssi };
    }
    return best;
  }

  applyBeaconReadings(player: Player, readings: SignalReadings): void {
    const nearest = this.strongestQualifying(cleanReadings(readings, normalizeBeaconId));

    if (nearest && !player.inSafeZone) {
      this.enterSafeZone(player, nearest.beacon);
    } else if (!nearest && player.inSafeZone) {
      this.leaveSafeZone(player, false);
    } else if (nearest) {
      player.safeZoneBeacon = nearest.beacon.id;
    }
  }

  /**
   * Honor-system toggle from the dashboard. Returns true if anything changed.
   */
  setManualSafeZone(player: Player, inZone: boolean): boolean {
    if (inZone === player.inSafeZone) return false;
    if (inZone) {
      player.inSafeZone = true;
      player.safeZoneBeacon = null;
      this.ctx.bus.log("enter_safezone_manual", { player: player.name, id: player.deviceId });
      if (player.status === "captured") this.capture.escape(player.deviceId, null);
    } else {
      this.leaveSafeZone(player, true);
    }
    return true;
  }

  applyPeerReadings(player: Player, readings: SignalReadings): void {
    const clean = cleanReadings(readings, normalizeDeviceId);
    clean.delete(player.deviceId);

    let nearest: { deviceId: string; rssi: number } | null = null;
    for (const [peerId, rssi] of clean) {
      player.lastRssi.set(peerId, rssi);
      if (!this.ctx.players.has(peerId)) continue;
      if (!nearest || rssi > nearest.rssi) nearest = { deviceId: peerId, rssi };
    }
    player.nearestPeer = nearest;

    if (player.role === "prey") this.checkProximityAlert(player, clean);
  }

  /** Drop alert state involving a removed player. */
  forget(deviceId: string): void {
    for (const key of this.nearPairs) {
      if (key.split(":").includes(deviceId)) this.nearPairs.delete(key);
    }
  }

  clear(): void {
    this.nearPairs.clear();
  }

  // ============ Internal ============

  private enterSafeZone(player: Player, beacon: Beacon): void {
    const { bus } = this.ctx;
    player.inSafeZone = true;
    player.safeZoneBeacon = beacon.id;

    bus.log("enter_safezone", { player: player.name, id: player.deviceId, beacon: beacon.name });
    bus.notify(player.deviceId, `Entered safe zone: ${beacon.name}`, "success");
    log.debug({ deviceId: player.deviceId, beaconId: beacon.id }, "Entered safe zone");

    if (player.status === "captured") {
      this.capture.escape(player.deviceId, beacon.id);
    }
  }

  private leaveSafeZone(player: Player, manual: boolean): void {
    const { bus } = this.ctx;
    player.inSafeZone = false;
    player.safeZoneBeacon = null;

    bus.log(manual ? "leave_safezone_manual" : "leave_safezone", { player: player.name, id: player.deviceId });
    bus.notify(player.deviceId, "Left safe zone - you can be captured!", "warning");
    log.debug({ deviceId: player.deviceId }, "Left safe zone");
  }

  /**
   * Warn a free prey once when a predator's signal rises past the alert
   * threshold. Re-arms after the signal drops back below it.
   */
  private checkProximityAlert(prey: Player, readings: Map<string, number>): void {
    const { game, players, bus } = this.ctx;
    const threshold = game.settings.proximityAlertRssi;
    const exposed = game.phase === "running" && prey.status === "active" && !prey.inSafeZone;

    for (const key of this.nearPairs) {
      const [preyId, predatorId] = key.split(":");
      if (preyId !== prey.deviceId) continue;
      const rssi = readings.get(predatorId);
      if (rssi === undefined || rssi < threshold) this.nearPairs.delete(key);
    }

    for (const [peerId, rssi] of readings) {
      if (rssi < threshold || players.get(peerId)?.role !== "predator") continue;
      const key = CooldownMap.pairKey(prey.deviceId, peerId);
      if (this.nearPairs.has(key)) continue;
      this.nearPairs.add(key);
      if (exposed) {
        bus.notify(prey.deviceId, "Predator nearby!", "warning");
      }
    }
  }
}
