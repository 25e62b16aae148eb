import { errorMessage, isVehicleServiceError } from "../errors.js";

/** Substrings the vehicle cloud puts in login errors when the account is rate-limited. */
export const THROTTLE_MARKERS: readonly string[] = ["throttled", "login.error.throttled"];

export type LoginFaultClass = "throttled" | "transient";

export function containsThrottleMarker(message: string): boolean {
  const lower = message.toLowerCase();
  return THROTTLE_MARKERS.some((marker) => lower.includes(marker.toLowerCase()));
}

/**
 * Decide whether a login fault is worth retrying.
 *
 * A structured service error tagged `throttled` wins outright. Everything
 * else falls back to matching the message, and a throttle marker anywhere in
 * the text outranks whatever other error it also describes.
 */
export function classifyLoginFault(err: unknown): LoginFaultClass {
  if (isVehicleServiceError(err) && err.kind === "throttled") {
    return "throttled";
  }
  return containsThrottleMarker(errorMessage(err)) ? "throttled" : "transient";
}
