import type { ConsentFlags } from "../utils/types.js";

/**
 * Consent badge wire format.
 *
 * One short code per non-default flag, always in this order:
 *   T  = physical contact ok
 *   NP = photos not visible
 *   NL = location hidden
 * A player with default flags is "STD". Codes never contain "|", so the badge
 * is safe to carry as its own field of a "|"-delimited packet.
 */
export const STANDARD_BADGE = "STD";

const BADGE_ORDER = ["T", "NP", "NL"] as const;

export type ConsentCode = (typeof BADGE_ORDER)[number];

export const DEFAULT_CONSENT: Readonly<ConsentFlags> = Object.freeze({
  physicalTag: false,
  photoVisible: true,
  locationShare: true,
});

export function encodeConsentBadge(flags: ConsentFlags): string {
  const codes: ConsentCode[] = [];
  if (flags.physicalTag) codes.push("T");
  if (!flags.photoVisible) codes.push("NP");
  if (!flags.locationShare) codes.push("NL");
  return codes.length > 0 ? codes.join("") : STANDARD_BADGE;
}

/**
 * Decode a badge back to flags. Returns null for anything that is not a
 * canonical encoding (codes out of order, repeated, or unknown).
 */
export function decodeConsentBadge(badge: string): ConsentFlags | null {
  if (badge === STANDARD_BADGE) return { ...DEFAULT_CONSENT };
  if (badge.length === 0) return null;

  const flags: ConsentFlags = { ...DEFAULT_CONSENT };
  let rest = badge;
  let nextCode = 0;

  while (rest.length > 0) {
    let matched = false;
    for (let i = nextCode; i < BADGE_ORDER.length; i++) {
      const code = BADGE_ORDER[i];
      if (rest.startsWith(code)) {
        if (code === "T") flags.physicalTag = true;
        if (code === "NP") flags.photoVisible = false;
        if (code === "NL") flags.locationShare = false;
        rest = rest.slice(code.length);
        nextCode = i + 1;
        matched = true;
        break;
      }
    }
    if (!matched) return null;
  }

  return flags;
}
