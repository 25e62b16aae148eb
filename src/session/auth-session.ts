import { setTimeout as delay } from "node:timers/promises";
import type { Level, Logger } from "pino";
import type { VehicleServiceClient } from "../client/vehicle-service.js";
import {
  ConfigError,
  ExhaustedRetriesError,
  ThrottledError,
  TransientLoginError,
  errorMessage,
} from "../errors.js";
import defaultLogger from "../logger.js";
import type { Credentials } from "../types.js";
import { classifyLoginFault } from "./throttle.js";

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 10_000;

export const LOGIN_FAILURE_HINT =
  "Check your username, password and country. You may need to open the vehicle app, or log in via a web browser, to accept updated terms and conditions.";

export type SessionState = "idle" | "authenticating" | "authenticated" | "throttled" | "failed";

export type LoginOutcome =
  | { status: "success"; authenticatedAt: Date; attempts: number }
  | { status: "throttled"; message: string; error: ThrottledError }
  | { status: "exhausted"; error: ExhaustedRetriesError };

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface AuthSessionOptions {
  maxAttempts?: number;
  retryDelayMs?: number;
  logger?: Logger;
  sleep?: SleepFn;
  now?: () => Date;
  /** Level for failures that will be retried. The final failure always logs at `error`. */
  attemptLogLevel?: Level;
}

const abortableSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Login state machine for one CLI invocation.
 *
 * Transient failures are retried up to `maxAttempts` with a fixed delay.
 * A throttled account stops the loop at once and stays terminal: later
 * calls to {@link AuthSession.login} return the same outcome without
 * touching the service.
 */
export class AuthSession {
  readonly maxAttempts: number;
  readonly retryDelayMs: number;

  private _state: SessionState = "idle";
  private _attemptsMade = 0;
  private _authenticatedAt?: Date;
  private throttledOutcome?: Extract<LoginOutcome, { status: "throttled" }>;

  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;
  private readonly attemptLogLevel: Level;

  constructor(
    private readonly client: VehicleServiceClient,
    private readonly credentials: Credentials,
    options: AuthSessionOptions = {}
  ) {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;

    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigError(`maxAttempts must be an integer >= 1, got ${maxAttempts}`);
    }
    if (!Number.isFinite(retryDelayMs) || retryDelayMs < 0) {
      throw new ConfigError(`retryDelayMs must be a non-negative number, got ${retryDelayMs}`);
    }

    this.maxAttempts = maxAttempts;
    this.retryDelayMs = retryDelayMs;
    this.logger = options.logger ?? defaultLogger;
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? (() => new Date());
    this.attemptLogLevel = options.attemptLogLevel ?? "warn";
  }

  get state(): SessionState {
    return this._state;
  }

  get attemptsMade(): number {
    return this._attemptsMade;
  }

  get authenticatedAt(): Date | undefined {
    return this._authenticatedAt;
  }

  /**
   * Log in, retrying transient failures.
   *
   * Only a cancellation escapes as a rejection; every other condition is
   * reported through the returned {@link LoginOutcome}.
   */
  async login(options: { signal?: AbortSignal } = {}): Promise<LoginOutcome> {
    if (this._state === "throttled" && this.throttledOutcome) {
      return this.throttledOutcome;
    }
    if (this._state === "authenticated" && this._authenticatedAt) {
      return { status: "success", authenticatedAt: this._authenticatedAt, attempts: this._attemptsMade };
    }

    this._state = "authenticating";
    this._attemptsMade = 0;

    try {
      return await this.runAttempts(options.signal);
    } catch (err) {
      this._state = "idle";
      throw err;
    }
  }

  private async runAttempts(signal?: AbortSignal): Promise<LoginOutcome> {
    const { identity, secret, region } = this.credentials;

    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted();
      this._attemptsMade = attempt;

      let failure: TransientLoginError;
      try {
        this.logger.debug({ attempt, maxAttempts: this.maxAttempts }, "Requesting login to vehicle service");
        const loggedIn = await this.client.attemptLogin(identity, secret, region, { signal });
        if (loggedIn) {
          return this.markAuthenticated(attempt);
        }
        failure = new TransientLoginError("Login rejected by vehicle service", attempt);
      } catch (err) {
        signal?.throwIfAborted();
        if (classifyLoginFault(err) === "throttled") {
          return this.markThrottled(err);
        }
        failure = new TransientLoginError(errorMessage(err), attempt, { cause: err });
      }

      if (attempt >= this.maxAttempts) {
        return this.markExhausted(failure);
      }

      this.logger[this.attemptLogLevel](
        { attempt, maxAttempts: this.maxAttempts, delayMs: this.retryDelayMs, err: failure.message },
        `Login to vehicle service failed, trying again in ${this.retryDelayMs / 1000} seconds`
      );

      signal?.throwIfAborted();
      await this.sleep(this.retryDelayMs, signal);
    }
  }

  private markAuthenticated(attempts: number): LoginOutcome {
    const authenticatedAt = this.now();
    this._state = "authenticated";
    this._authenticatedAt = authenticatedAt;
    this.logger.debug({ attempts }, "Login to vehicle service successful");
    return { status: "success", authenticatedAt, attempts };
  }

  private markThrottled(cause: unknown): LoginOutcome {
    const message = errorMessage(cause);
    const error = new ThrottledError(message, { cause });
    this._state = "throttled";
    this.throttledOutcome = { status: "throttled", message, error };
    this.logger.error({ err: message }, "Account is throttled. Please wait before trying again.");
    return this.throttledOutcome;
  }

  private markExhausted(lastError: TransientLoginError): LoginOutcome {
    this._state = "failed";
    this.logger.error(
      { attempts: this._attemptsMade, err: lastError.message },
      `Failed to log in to the vehicle service. ${LOGIN_FAILURE_HINT}`
    );
    return { status: "exhausted", error: new ExhaustedRetriesError(this._attemptsMade, lastError) };
  }
}
