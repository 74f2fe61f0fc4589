const DEVICE_ID_PATTERN = /^[A-Z0-9]{4,10}$/;
const BEACON_ID_PATTERN = /^[A-Z0-9_-]{2,16}$/;
const NAME_DISALLOWED = /[^A-Za-z0-9 _.-]/g;

export const MAX_NAME_LENGTH = 20;
export const MIN_BEACON_RSSI = -120;
export const MAX_BEACON_RSSI = -20;

/**
 * Normalize a tracker/device identifier: trimmed, upper-cased, 4-10 alphanumerics.
 */
export function normalizeDeviceId(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const normalized = value.trim().toUpperCase();
  return DEVICE_ID_PATTERN.test(normalized) ? normalized : null;
}

/**
 * Normalize a safe-zone beacon identifier.
 */
export function normalizeBeaconId(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const normalized = value.trim().toUpperCase();
  return BEACON_ID_PATTERN.test(normalized) ? normalized : null;
}

export function isValidBeaconThreshold(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= MIN_BEACON_RSSI &&
    value <= MAX_BEACON_RSSI
  );
}

export function fallbackName(deviceId: string): string {
  return `Player_${deviceId.slice(-4)}`;
}

/**
 * Clean a display name down to the characters trackers can render.
 * Returns the device-derived fallback when nothing usable is left.
 */
export function sanitizeName(raw: unknown, deviceId: string): string {
  const text = typeof raw === "string" ? raw : "";
  const cleaned = text
    .trim()
    .replace(NAME_DISALLOWED, "")
    .replace(/\s+/g, " ")
    .trim()
    .slice(0, MAX_NAME_LENGTH)
    .trim();
  return cleaned.length > 0 ? cleaned : fallbackName(deviceId);
}
