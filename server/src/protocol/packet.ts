import { STANDARD_BADGE, decodeConsentBadge } from "./consent.js";
import type { Role } from "../utils/types.js";

/**
 * Radio beacon packet broadcast by trackers and safe-zone beacons.
 *
 * Field order is fixed: deviceId | role | consent
 *   T9EF0|pred|STD
 *   TA2B3|prey|TNP
 *   CAFE1|SAFEZONE
 * Role and consent always occupy separate fields. Decoders must split the
 * whole packet before looking at the role; a legacy two-field player packet
 * decodes with the standard badge.
 */
export const PACKET_DELIMITER = "|";

export type WireRole = "pred" | "prey" | "unknown";
export type BeaconKind = "SAFEZONE" | "BEACON";

export type DecodedPacket =
  | { kind: "player"; deviceId: string; role: WireRole; consent: string }
  | { kind: "beacon"; beaconId: string; beaconKind: BeaconKind };

const WIRE_ROLES: readonly WireRole[] = ["pred", "prey", "unknown"];
const BEACON_KINDS: readonly BeaconKind[] = ["SAFEZONE", "BEACON"];

export function toWireRole(role: Role): WireRole {
  if (role === "predator") return "pred";
  if (role === "prey") return "prey";
  return "unknown";
}

export function fromWireRole(role: WireRole): Role {
  if (role === "pred") return "predator";
  if (role === "prey") return "prey";
  return "unassigned";
}

function isWireRole(value: string): value is WireRole {
  return (WIRE_ROLES as readonly string[]).includes(value);
}

function isBeaconKind(value: string): value is BeaconKind {
  return (BEACON_KINDS as readonly string[]).includes(value);
}

export function encodePlayerPacket(deviceId: string, role: Role, consentBadge: string): string {
  return [deviceId, toWireRole(role), consentBadge].join(PACKET_DELIMITER);
}

export function encodeBeaconPacket(beaconId: string, kind: BeaconKind = "SAFEZONE"): string {
  return [beaconId, kind].join(PACKET_DELIMITER);
}

export function decodePacket(raw: string): DecodedPacket | null {
  const fields = raw.trim().split(PACKET_DELIMITER);
  if (fields.length < 2 || fields.length > 3) return null;

  const [id, type] = fields;
  if (id.length === 0) return null;

  if (isBeaconKind(type)) {
    if (fields.length !== 2) return null;
    return { kind: "beacon", beaconId: id, beaconKind: type };
  }

  if (!isWireRole(type)) return null;

  const badge = fields.length === 3 ? fields[2] : STANDARD_BADGE;
  if (decodeConsentBadge(badge) === null) return null;

  return { kind: "player", deviceId: id, role: type, consent: badge };
}
