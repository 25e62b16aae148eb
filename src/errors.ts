/**
 * Error hierarchy for vehicle-connect.
 *
 * Every error raised by the session, the command gate or the service client
 * extends {@link VehicleConnectError}, so callers can branch on `code` and
 * `retryable` without string matching.
 */

import type { ZodIssue } from "zod";

export type ErrorContext = Record<string, unknown>;

export class VehicleConnectError extends Error {
  public readonly timestamp: Date;

  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false,
    public readonly context?: ErrorContext,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

// ==========================================
// Login
// ==========================================

/** The account is rate-limited. Retrying inside this process only extends the lockout. */
export class ThrottledError extends VehicleConnectError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "ACCOUNT_THROTTLED", false, undefined, options);
  }
}

export class TransientLoginError extends VehicleConnectError {
  constructor(message: string, public readonly attempt: number, options?: { cause?: unknown }) {
    super(message, "LOGIN_FAILED", true, { attempt }, options);
  }
}

export class ExhaustedRetriesError extends VehicleConnectError {
  constructor(public readonly attempts: number, lastError: VehicleConnectError) {
    super(
      `Login failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${lastError.message}`,
      "LOGIN_RETRIES_EXHAUSTED",
      false,
      { attempts },
      { cause: lastError }
    );
  }
}

// ==========================================
// Commands
// ==========================================

export class PreconditionNotMetError extends VehicleConnectError {
  constructor(message: string, public readonly requirement: string, context?: ErrorContext) {
    super(message, "PRECONDITION_NOT_MET", false, { requirement, ...context });
  }
}

export interface ValidationIssue {
  field: string;
  message: string;
}

export class ValidationFailedError extends VehicleConnectError {
  constructor(message: string, public readonly issues: ValidationIssue[] = [], context?: ErrorContext) {
    super(message, "VALIDATION_FAILED", false, { issues, ...context });
  }

  static fromZodIssues(action: string, zodIssues: ZodIssue[]): ValidationFailedError {
    const issues = zodIssues.map((issue) => ({
      field: issue.path.length > 0 ? issue.path.join(".") : "(params)",
      message: issue.message,
    }));
    const summary = issues.map((i) => `${i.field}: ${i.message}`).join("; ");
    return new ValidationFailedError(`Invalid parameters for ${action}: ${summary}`, issues, { action });
  }
}

export class ActionFailedError extends VehicleConnectError {
  constructor(message: string, public readonly action: string, options?: { cause?: unknown }) {
    super(message, "ACTION_FAILED", false, { action }, options);
  }
}

// ==========================================
// Service client
// ==========================================

export type ServiceFaultKind = "throttled" | "transient" | "other";

export class VehicleServiceError extends VehicleConnectError {
  constructor(
    message: string,
    public readonly kind: ServiceFaultKind,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, "VEHICLE_SERVICE_ERROR", kind === "transient", { kind, status }, options);
  }
}

// ==========================================
// Configuration
// ==========================================

export class ConfigError extends VehicleConnectError {
  constructor(message: string, context?: ErrorContext) {
    super(message, "CONFIG_ERROR", false, context);
  }
}

export function isVehicleServiceError(err: unknown): err is VehicleServiceError {
  return err instanceof VehicleServiceError;
}

/**
 * Normalize anything thrown into a {@link VehicleConnectError}.
 */
export function toVehicleConnectError(err: unknown): VehicleConnectError {
  if (err instanceof VehicleConnectError) return err;
  if (err instanceof Error) {
    return new VehicleConnectError(err.message, "INTERNAL_ERROR", false, undefined, { cause: err });
  }
  return new VehicleConnectError(String(err), "INTERNAL_ERROR");
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
