/**
 * {@link VehicleServiceClient} over the vehicle cloud's JSON REST API.
 *
 * Endpoints (relative to `baseUrl`):
 *   POST /auth/login                        -> { token }
 *   GET  /vehicles                          -> { vehicles: VehicleSummary[] }
 *   GET  /vehicles/{vin}/status             -> raw status JSON
 *   GET  /vehicles/{vin}/trips              -> raw trip JSON
 *   POST /vehicles/{vin}/actions/{action}   -> { result: "success" | "failure" | "disabled" }
 */

import nodeFetch, { type RequestInit } from "node-fetch";
import type { Logger } from "pino";
import { z } from "zod";
import { ACTIONS, type ActionName } from "../commands/actions.js";
import { VehicleServiceError, errorMessage, type ServiceFaultKind } from "../errors.js";
import defaultLogger from "../logger.js";
import { containsThrottleMarker } from "../session/throttle.js";
import type { ActionParams, ActionRequestOptions, ActionSignal, ApiLevel, Region, RequestOptions } from "../types.js";
import { VehicleSummarySchema, type VehicleServiceClient, type VehicleSummary } from "./vehicle-service.js";

export const DEFAULT_TIMEOUT_MS = 30_000;

const LoginResponseSchema = z.object({ token: z.string().min(1) });
const VehicleListSchema = z.object({ vehicles: z.array(VehicleSummarySchema) });
const ActionResponseSchema = z.object({ result: z.enum(["success", "failure", "disabled"]) });

export interface HttpVehicleServiceClientConfig {
  /** Service origin and path prefix, without trailing slash. */
  baseUrl: string;
  apiLevel: ApiLevel;
  spin?: string;
  timeoutMs?: number;
  fetch?: typeof nodeFetch;
  logger?: Logger;
}

interface SendOptions extends RequestOptions {
  body?: Record<string, unknown>;
  authenticated?: boolean;
}

/** A response whose body has been read in full. */
interface ServiceResponse {
  ok: boolean;
  status: number;
  text: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Merge the request timeout with the caller's abort signal. Either one
 * aborting cancels the request.
 */
function mergeSignals(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  if (!signal) return timeoutSignal;

  const controller = new AbortController();
  const onAbort = (source: AbortSignal) => () => {
    if (!controller.signal.aborted) controller.abort(source.reason);
  };

  timeoutSignal.addEventListener("abort", onAbort(timeoutSignal), { once: true });
  signal.addEventListener("abort", onAbort(signal), { once: true });

  if (signal.aborted) controller.abort(signal.reason);

  return controller.signal;
}

function faultKindForStatus(status: number, body: string): ServiceFaultKind {
  if (status === 429 || containsThrottleMarker(body)) return "throttled";
  if (status >= 500) return "transient";
  return "other";
}

function serviceError(status: number, body: string): VehicleServiceError {
  return new VehicleServiceError(`Vehicle service error ${status}: ${body}`, faultKindForStatus(status, body), status);
}

function parseBody<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): T {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new VehicleServiceError(`Unexpected ${what} response: not JSON`, "other", undefined, { cause: err });
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new VehicleServiceError(`Unexpected ${what} response: ${parsed.error.message}`, "other");
  }
  return parsed.data;
}

function parseJson(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class HttpVehicleServiceClient implements VehicleServiceClient {
  private token?: string;
  private readonly fetch: typeof nodeFetch;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly config: HttpVehicleServiceClientConfig) {
    this.fetch = config.fetch ?? nodeFetch;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = config.logger ?? defaultLogger;
  }

  get isLoggedIn(): boolean {
    return this.token !== undefined;
  }

  async attemptLogin(identity: string, secret: string, region: Region, opts?: RequestOptions): Promise<boolean> {
    const response = await this.send("POST", "/auth/login", {
      body: { username: identity, password: secret, country: region, apiLevel: this.config.apiLevel },
      authenticated: false,
      signal: opts?.signal,
    });
    const { text } = response;

    if (response.ok) {
      this.token = parseBody(text, LoginResponseSchema, "login").token;
      return true;
    }

    const kind = faultKindForStatus(response.status, text);
    if (kind === "other" && (response.status === 401 || response.status === 403)) {
      this.logger.debug({ status: response.status }, "Login rejected by vehicle service");
      return false;
    }
    throw serviceError(response.status, text);
  }

  async executeAction(
    vehicleId: string,
    actionName: ActionName,
    params: ActionParams,
    opts?: ActionRequestOptions
  ): Promise<ActionSignal> {
    const body: Record<string, unknown> = { ...params };
    const requiresPin = opts?.requiresPin === true || ACTIONS[actionName].requiresPin;
    if (requiresPin && this.config.spin) {
      body.spin = this.config.spin;
    }

    const text = this.expectOk(
      await this.send("POST", `/vehicles/${encodeURIComponent(vehicleId)}/actions/${actionName}`, {
        body,
        signal: opts?.signal,
      })
    );
    const { result } = parseBody(text, ActionResponseSchema, "action");
    if (result === "disabled") return "disabled";
    return result === "success";
  }

  async listVehicles(opts?: RequestOptions): Promise<VehicleSummary[]> {
    const text = this.expectOk(await this.send("GET", "/vehicles", { signal: opts?.signal }));
    return parseBody(text, VehicleListSchema, "vehicle list").vehicles;
  }

  async getVehicleStatus(vin: string, opts?: RequestOptions): Promise<unknown> {
    const text = this.expectOk(
      await this.send("GET", `/vehicles/${encodeURIComponent(vin)}/status`, { signal: opts?.signal })
    );
    return parseJson(text);
  }

  async getTripData(vin: string, opts?: RequestOptions): Promise<unknown> {
    const text = this.expectOk(
      await this.send("GET", `/vehicles/${encodeURIComponent(vin)}/trips`, { signal: opts?.signal })
    );
    return parseJson(text);
  }

  private expectOk(response: ServiceResponse): string {
    if (!response.ok) {
      throw serviceError(response.status, response.text);
    }
    return response.text;
  }

  /** One request, body included. The timeout and the caller's signal also cover the body read. */
  private async send(method: "GET" | "POST", path: string, opts: SendOptions = {}): Promise<ServiceResponse> {
    const { body, authenticated = true, signal } = opts;

    const headers: Record<string, string> = {
      Accept: "application/json",
    };
    if (authenticated) {
      if (!this.isLoggedIn) {
        throw new VehicleServiceError("Not logged in", "other");
      }
      headers.Authorization = `Bearer ${this.token}`;
    }

    const init: RequestInit = { method, headers, signal: mergeSignals(this.timeoutMs, signal) };
    if (body && method === "POST") {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(body);
    }

    this.logger.debug({ method, path }, "Vehicle service request");
    try {
      const response = await this.fetch(`${this.config.baseUrl}${path}`, init);
      return { ok: response.ok, status: response.status, text: await response.text() };
    } catch (err) {
      signal?.throwIfAborted();
      throw new VehicleServiceError(`Vehicle service request failed: ${errorMessage(err)}`, "transient", undefined, {
        cause: err,
      });
    }
  }
}
