// ---------------------------------------------------------------------------
// Shared domain types
// ---------------------------------------------------------------------------

export const REGIONS = ["DE", "US", "CA", "CN"] as const;
export type Region = (typeof REGIONS)[number];

export const API_LEVELS = [0, 1] as const;
export type ApiLevel = (typeof API_LEVELS)[number];

/**
 * Account credentials resolved from flags, environment and config file.
 * Frozen once resolved.
 */
export interface Credentials {
  readonly identity: string;
  readonly secret: string;
  readonly region: Region;
  /** Security PIN, needed only for lock/unlock and pre-heater actions. */
  readonly spin?: string;
  readonly apiLevel: ApiLevel;
}

/** Parameters passed to a vehicle action after validation. */
export type ActionParams = Record<string, string | number | boolean | undefined>;

/** Raw result of a dispatched action: success flag, or the refresh-only "disabled" sentinel. */
export type ActionSignal = boolean | "disabled";

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface ActionRequestOptions extends RequestOptions {
  /** Attach the S-PIN even when the catalog does not ask for it. */
  requiresPin?: boolean;
}
