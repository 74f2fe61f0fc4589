/**
 * Rejection taxonomy shared by every coordinator operation.
 *
 * Operations return rejections as values; nothing in the game core throws for
 * a bad request. Reasons stay short so a tracker display can show them as-is.
 */
export type ErrorCode =
  | "NOT_FOUND"
  | "INVALID_STATE"
  | "PERMISSION_DENIED"
  | "PRECONDITION_FAILED"
  | "CAPACITY_EXCEEDED"
  | "EMERGENCY_BLOCKED"
  | "INVALID_ARGUMENT";

export interface Rejection {
  success: false;
  code: ErrorCode;
  error: string;
}

export type Result<T extends object = Record<never, never>> = ({ success: true } & T) | Rejection;

export function reject(code: ErrorCode, error: string): Rejection {
  return { success: false, code, error };
}

export function ok(): { success: true };
export function ok<T extends object>(value: T): { success: true } & T;
export function ok<T extends object>(value?: T): { success: true } {
  return { success: true, ...value };
}

const HTTP_STATUS: Record<ErrorCode, number> = {
  NOT_FOUND: 404,
  INVALID_STATE: 409,
  PERMISSION_DENIED: 403,
  PRECONDITION_FAILED: 422,
  CAPACITY_EXCEEDED: 503,
  EMERGENCY_BLOCKED: 423,
  INVALID_ARGUMENT: 400,
};

export function httpStatusFor(code: ErrorCode): number {
  return HTTP_STATUS[code];
}
