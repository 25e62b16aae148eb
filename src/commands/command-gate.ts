import type { Logger } from "pino";
import {
  ActionFailedError,
  PreconditionNotMetError,
  ValidationFailedError,
  errorMessage,
} from "../errors.js";
import defaultLogger from "../logger.js";
import type { ActionParams, ActionSignal, Credentials } from "../types.js";
import { ACTIONS, type ActionCatalog, type ActionDefinition, type ActionName } from "./actions.js";

export interface CommandRequest {
  readonly vehicleId: string;
  readonly action: ActionName;
  readonly params: Readonly<ActionParams>;
  /** Forces the S-PIN check even where the catalog does not ask for it. */
  readonly requiresPin?: boolean;
}

export type CommandOutcome =
  | { status: "succeeded"; action: ActionName }
  | { status: "failed"; action: ActionName; error: ActionFailedError }
  | { status: "disabled"; action: ActionName };

/** Sends one validated action. `requiresPin` tells the transport to attach the S-PIN. */
export type Dispatch = (params: ActionParams, requiresPin: boolean) => Promise<ActionSignal>;

export interface CommandGateOptions {
  credentials: Pick<Credentials, "spin">;
  catalog?: ActionCatalog;
  logger?: Logger;
}

/**
 * Precondition, dispatch and classification pipeline shared by every
 * vehicle action. Holds no per-call state and never retries.
 */
export class CommandGate {
  private readonly catalog: ActionCatalog;
  private readonly logger: Logger;

  constructor(private readonly options: CommandGateOptions) {
    this.catalog = options.catalog ?? ACTIONS;
    this.logger = options.logger ?? defaultLogger;
  }

  definition(action: string): ActionDefinition {
    const found = Object.values(this.catalog).find((def) => def.name === action);
    if (!found) {
      throw new ValidationFailedError(`Unknown action: ${action}`, [{ field: "action", message: "Unknown action" }]);
    }
    return found;
  }

  /** A request can add the S-PIN requirement but never lift the catalog's. */
  requiresPin(request: CommandRequest): boolean {
    return request.requiresPin === true || this.definition(request.action).requiresPin;
  }

  /**
   * Static checks only: S-PIN presence and parameter shape. Makes no I/O,
   * so callers may run it before logging in.
   *
   * @returns The validated params with defaults applied.
   * @throws {@link PreconditionNotMetError} when an S-PIN is required but not configured.
   * @throws {@link ValidationFailedError} when the params violate the action's schema.
   */
  check(request: CommandRequest): ActionParams {
    const def = this.definition(request.action);

    if (this.requiresPin(request) && !this.options.credentials.spin) {
      throw new PreconditionNotMetError(`S-PIN required for ${def.name}`, "spin", { action: def.name });
    }

    const parsed = def.schema.safeParse(request.params);
    if (!parsed.success) {
      throw ValidationFailedError.fromZodIssues(def.name, parsed.error.issues);
    }
    return parsed.data;
  }

  async execute(request: CommandRequest, dispatch: Dispatch): Promise<CommandOutcome> {
    const params = this.check(request);
    const def = this.definition(request.action);
    const action = def.name;

    let signal: ActionSignal;
    try {
      this.logger.debug({ action, vehicleId: request.vehicleId, params }, "Dispatching vehicle action");
      signal = await dispatch(params, this.requiresPin(request));
    } catch (err) {
      this.logger.debug({ action, err: errorMessage(err) }, "Vehicle action raised");
      return {
        status: "failed",
        action,
        error: new ActionFailedError(`${def.messages.failure}: ${errorMessage(err)}`, action, { cause: err }),
      };
    }

    if (signal === true) {
      return { status: "succeeded", action };
    }
    if (signal === "disabled") {
      if (def.allowsDisabled) {
        return { status: "disabled", action };
      }
      return {
        status: "failed",
        action,
        error: new ActionFailedError(`${def.messages.failure}: service reported the action as disabled`, action),
      };
    }
    return { status: "failed", action, error: new ActionFailedError(def.messages.failure, action) };
  }
}
