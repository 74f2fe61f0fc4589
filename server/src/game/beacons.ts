import { createLogger } from "../utils/logger.js";
import { ok, reject } from "../utils/errors.js";
import type { Result } from "../utils/errors.js";
import { isValidBeaconThreshold, normalizeBeaconId, MIN_BEACON_RSSI, MAX_BEACON_RSSI } from "../utils/ids.js";
import type { EventBus } from "../events/bus.js";
import type { Beacon, BeaconInput, BeaconUpdate } from "../utils/types.js";

const log = createLogger("beacons");

const MAX_BEACON_NAME = 32;

function cleanBeaconName(raw: unknown, fallback: string): string {
  if (typeof raw !== "string") return fallback;
  const name = raw.trim().slice(0, MAX_BEACON_NAME);
  return name.length > 0 ? name : fallback;
}

const BAD_THRESHOLD = `Threshold must be ${MIN_BEACON_RSSI}..${MAX_BEACON_RSSI}`;

/**
 * Safe-zone beacon definitions. Independent of game phase.
 */
export class BeaconRegistry {
  private beacons = new Map<string, Beacon>();

  constructor(
    private readonly bus: EventBus,
    private readonly defaultThreshold: () => number
  ) {}

  get(id: string): Beacon | null {
    return this.beacons.get(id) ?? null;
  }

  list(): Beacon[] {
    return [...this.beacons.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  activeIds(): string[] {
    return this.list()
      .filter((b) => b.active)
      .map((b) => b.id);
  }

  add(input: BeaconInput): Result<{ beacon: Beacon }> {
    const id = normalizeBeaconId(input.id);
    if (!id) return reject("INVALID_ARGUMENT", "Invalid beacon id");
    if (this.beacons.has(id)) return reject("INVALID_STATE", "Beacon exists");

    const rssi = input.rssi ?? this.defaultThreshold();
    if (!isValidBeaconThreshold(rssi)) return reject("INVALID_ARGUMENT", BAD_THRESHOLD);

    const beacon: Beacon = { id, name: cleanBeaconName(input.name, id), rssi, active: true };
    this.beacons.set(id, beacon);
    this.bus.log("beacon_add", { id, name: beacon.name, rssi });
    log.info({ beaconId: id, rssi }, "Beacon added");
    return ok({ beacon: { ...beacon } });
  }

  update(rawId: string, patch: BeaconUpdate): Result<{ beacon: Beacon }> {
    const id = normalizeBeaconId(rawId);
    const beacon = id ? this.beacons.get(id) : undefined;
    if (!beacon) return reject("NOT_FOUND", "Beacon not found");

    if (patch.rssi !== undefined && !isValidBeaconThreshold(patch.rssi)) {
      return reject("INVALID_ARGUMENT", BAD_THRESHOLD);
    }

    if (patch.name !== undefined) beacon.name = cleanBeaconName(patch.name, beacon.id);
    if (patch.rssi !== undefined) beacon.rssi = patch.rssi;
    if (patch.active !== undefined) beacon.active = patch.active;

    this.bus.log("beacon_update", { id: beacon.id, name: beacon.name, rssi: beacon.rssi, active: beacon.active });
    return ok({ beacon: { ...beacon } });
  }

  delete(rawId: string): Result {
    const id = normalizeBeaconId(rawId);
    if (!id || !this.beacons.delete(id)) return reject("NOT_FOUND", "Beacon not found");
    this.bus.log("beacon_delete", { id });
    log.info({ beaconId: id }, "Beacon deleted");
    return ok();
  }

  /** Load a beacon from a snapshot without validation or events. */
  restore(beacon: Beacon): void {
    this.beacons.set(beacon.id, { ...beacon });
  }
}
