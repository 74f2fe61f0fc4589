import { describe, expect, it } from "vitest";
import { DEFAULT_CONSENT, decodeConsentBadge, encodeConsentBadge } from "../src/protocol/consent.js";
import { decodePacket, encodeBeaconPacket, encodePlayerPacket } from "../src/protocol/packet.js";

describe("consent badge", () => {
  it("encodes default flags as STD", () => {
    expect(encodeConsentBadge({ ...DEFAULT_CONSENT })).toBe("STD");
  });

  it("emits codes in T, NP, NL order", () => {
    expect(encodeConsentBadge({ physicalTag: true, photoVisible: false, locationShare: false })).toBe("TNPNL");
    expect(encodeConsentBadge({ physicalTag: false, photoVisible: true, locationShare: false })).toBe("NL");
    expect(encodeConsentBadge({ physicalTag: true, photoVisible: false, locationShare: true })).toBe("TNP");
  });

  it("decodes canonical badges", () => {
    expect(decodeConsentBadge("STD")).toEqual({ physicalTag: false, photoVisible: true, locationShare: true });
    expect(decodeConsentBadge("TNL")).toEqual({ physicalTag: true, photoVisible: true, locationShare: false });
  });

  it("rejects out-of-order, repeated and unknown codes", () => {
    expect(decodeConsentBadge("NPT")).toBeNull();
    expect(decodeConsentBadge("TT")).toBeNull();
    expect(decodeConsentBadge("XYZ")).toBeNull();
    expect(decodeConsentBadge("")).toBeNull();
  });
});

describe("tracker radio packet", () => {
  it("keeps deviceId|role|consent field order", () => {
    expect(encodePlayerPacket("T9EF0", "predator", "STD")).toBe("T9EF0|pred|STD");
    expect(encodePlayerPacket("TA2B3", "unassigned", "NP")).toBe("TA2B3|unknown|NP");
    expect(encodeBeaconPacket("CAFE1")).toBe("CAFE1|SAFEZONE");
  });

  it("decodes a player packet with a multi-code badge", () => {
    expect(decodePacket("TA2B3|prey|TNP")).toEqual({
      kind: "player",
      deviceId: "TA2B3",
      role: "prey",
      consent: "TNP",
    });
  });

  it("decodes a legacy two-field player packet with the standard badge", () => {
    expect(decodePacket("T9EF0|pred")).toEqual({
      kind: "player",
      deviceId: "T9EF0",
      role: "pred",
      consent: "STD",
    });
  });

  it("decodes beacon packets", () => {
    expect(decodePacket("CAFE1|SAFEZONE")).toEqual({ kind: "beacon", beaconId: "CAFE1", beaconKind: "SAFEZONE" });
    expect(decodePacket("CAFE1|SAFEZONE|STD")).toBeNull();
  });

  it("never reads consent from the role field", () => {
    expect(decodePacket("T9EF0|STD|pred")).toBeNull();
    expect(decodePacket("T9EF0|TNP")).toBeNull();
    expect(decodePacket("T9EF0|pred|prey")).toBeNull();
  });

  it("rejects malformed packets", () => {
    expect(decodePacket("T9EF0")).toBeNull();
    expect(decodePacket("|pred|STD")).toBeNull();
    expect(decodePacket("T9EF0|pred|STD|extra")).toBeNull();
  });
});
