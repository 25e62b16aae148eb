import { z } from "zod";
import type { ActionParams } from "../types.js";

// ---------------------------------------------------------------------------
// Reusable Zod schemas
// ---------------------------------------------------------------------------

const Flag = z.boolean().default(false);

const NoParamsSchema = z.object({}).strict();

const ClimateStartSchema = z
  .object({
    tempC: z.coerce.number().int().default(21),
    tempF: z.coerce.number().int().optional(),
    glassHeating: Flag,
    seatFL: Flag,
    seatFR: Flag,
    seatRL: Flag,
    seatRR: Flag,
    climatisationAtUnlock: Flag,
  })
  .strict();

const ChargeStartSchema = z.object({ timer: Flag }).strict();

export const CHARGE_TARGET_MIN = 20;
export const CHARGE_TARGET_MAX = 100;

const ChargeTargetSchema = z
  .object({
    target: z.coerce
      .number({ invalid_type_error: "Target charge must be a number" })
      .int("Target charge must be a whole percentage")
      .min(CHARGE_TARGET_MIN, `Target charge must be between ${CHARGE_TARGET_MIN}% and ${CHARGE_TARGET_MAX}%`)
      .max(CHARGE_TARGET_MAX, `Target charge must be between ${CHARGE_TARGET_MIN}% and ${CHARGE_TARGET_MAX}%`),
  })
  .strict();

export const CHARGING_MODES = ["manual", "timer"] as const;
export type ChargingMode = (typeof CHARGING_MODES)[number];

const ChargingModeSchema = z
  .object({
    mode: z.enum(CHARGING_MODES, {
      errorMap: () => ({ message: "Mode must be 'manual' or 'timer'" }),
    }),
  })
  .strict();

const PreheaterStartSchema = z
  .object({
    duration: z.coerce.number().int().positive("Duration must be a positive number of minutes").default(30),
  })
  .strict();

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export interface ActionMessages {
  progress: string;
  success: string;
  failure: string;
  disabled?: string;
}

export interface ActionDefinition {
  name: ActionName;
  description: string;
  /** Physically consequential actions need the account's S-PIN. */
  requiresPin: boolean;
  /** Only the refresh action may answer with the "disabled" sentinel. */
  allowsDisabled: boolean;
  schema: z.ZodType<ActionParams, z.ZodTypeDef, unknown>;
  /** Placeholders for `{name}` in messages, beyond `{vin}` and the validated params. */
  messageValues?: (params: ActionParams) => Record<string, string>;
  messages: ActionMessages;
}

export const ACTION_NAMES = [
  "lock",
  "unlock",
  "climate-start",
  "climate-stop",
  "charge-start",
  "set-charge-target",
  "set-charging-mode",
  "preheater-start",
  "preheater-stop",
  "window-heating-start",
  "window-heating-stop",
  "refresh-data",
] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

export type ActionCatalog = Readonly<Record<ActionName, ActionDefinition>>;

export const ACTIONS: ActionCatalog = {
  lock: {
    name: "lock",
    description: "Lock vehicle (requires S-PIN)",
    requiresPin: true,
    allowsDisabled: false,
    schema: NoParamsSchema,
    messages: {
      progress: "Locking vehicle {vin}...",
      success: "Vehicle locked successfully",
      failure: "Failed to lock vehicle",
    },
  },
  unlock: {
    name: "unlock",
    description: "Unlock vehicle (requires S-PIN)",
    requiresPin: true,
    allowsDisabled: false,
    schema: NoParamsSchema,
    messages: {
      progress: "Unlocking vehicle {vin}...",
      success: "Vehicle unlocked successfully",
      failure: "Failed to unlock vehicle",
    },
  },
  "climate-start": {
    name: "climate-start",
    description: "Start climate control",
    requiresPin: false,
    allowsDisabled: false,
    schema: ClimateStartSchema,
    messages: {
      progress: "Starting climate control for {vin}...",
      success: "Climate control started successfully",
      failure: "Failed to start climate control",
    },
  },
  "climate-stop": {
    name: "climate-stop",
    description: "Stop climate control",
    requiresPin: false,
    allowsDisabled: false,
    schema: NoParamsSchema,
    messages: {
      progress: "Stopping climate control for {vin}...",
      success: "Climate control stopped successfully",
      failure: "Failed to stop climate control",
    },
  },
  "charge-start": {
    name: "charge-start",
    description: "Start charging",
    requiresPin: false,
    allowsDisabled: false,
    schema: ChargeStartSchema,
    messageValues: (params) => ({ chargeKind: params.timer === true ? "timer" : "manual" }),
    messages: {
      progress: "Starting {chargeKind} charging for {vin}...",
      success: "Charging started successfully",
      failure: "Failed to start charging",
    },
  },
  "set-charge-target": {
    name: "set-charge-target",
    description: "Set target state of charge (20-100)",
    requiresPin: false,
    allowsDisabled: false,
    schema: ChargeTargetSchema,
    messages: {
      progress: "Setting target charge to {target}% for {vin}...",
      success: "Target charge set to {target}% successfully",
      failure: "Failed to set target charge",
    },
  },
  "set-charging-mode": {
    name: "set-charging-mode",
    description: "Set charging mode (manual or timer)",
    requiresPin: false,
    allowsDisabled: false,
    schema: ChargingModeSchema,
    messages: {
      progress: "Setting charging mode to '{mode}' for {vin}...",
      success: "Charging mode set to '{mode}' successfully",
      failure: "Failed to set charging mode",
    },
  },
  "preheater-start": {
    name: "preheater-start",
    description: "Start pre-heater (requires S-PIN)",
    requiresPin: true,
    allowsDisabled: false,
    schema: PreheaterStartSchema,
    messages: {
      progress: "Starting pre-heater for {vin}...",
      success: "Pre-heater started successfully",
      failure: "Failed to start pre-heater",
    },
  },
  "preheater-stop": {
    name: "preheater-stop",
    description: "Stop pre-heater (requires S-PIN)",
    requiresPin: true,
    allowsDisabled: false,
    schema: NoParamsSchema,
    messages: {
      progress: "Stopping pre-heater for {vin}...",
      success: "Pre-heater stopped successfully",
      failure: "Failed to stop pre-heater",
    },
  },
  "window-heating-start": {
    name: "window-heating-start",
    description: "Start window heating",
    requiresPin: false,
    allowsDisabled: false,
    schema: NoParamsSchema,
    messages: {
      progress: "Starting window heating for {vin}...",
      success: "Window heating started successfully",
      failure: "Failed to start window heating",
    },
  },
  "window-heating-stop": {
    name: "window-heating-stop",
    description: "Stop window heating",
    requiresPin: false,
    allowsDisabled: false,
    schema: NoParamsSchema,
    messages: {
      progress: "Stopping window heating for {vin}...",
      success: "Window heating stopped successfully",
      failure: "Failed to stop window heating",
    },
  },
  "refresh-data": {
    name: "refresh-data",
    description: "Request fresh data from vehicle",
    requiresPin: false,
    allowsDisabled: true,
    schema: NoParamsSchema,
    messages: {
      progress: "Requesting fresh data from vehicle {vin}...",
      success: "Data refresh initiated successfully",
      failure: "Failed to refresh vehicle data",
      disabled: "Data refresh is disabled for this vehicle",
    },
  },
};

export function isActionName(value: string): value is ActionName {
  return (ACTION_NAMES as readonly string[]).includes(value);
}

type MessageValues = Readonly<Record<string, string | number | boolean | undefined>>;

/** Fill `{name}` placeholders; unknown names stay as written. */
export function formatMessage(template: string, values: MessageValues): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
    const value = values[name];
    return value === undefined ? placeholder : String(value);
  });
}

export function actionMessage(def: ActionDefinition, template: string, vin: string, params: ActionParams): string {
  return formatMessage(template, { ...params, ...def.messageValues?.(params), vin });
}
