import { VehicleStatusSchema, type VehicleStatus, type VehicleSummary } from "../client/vehicle-service.js";
import { ACTIONS, actionMessage } from "../commands/actions.js";
import type { CommandOutcome } from "../commands/command-gate.js";
import { LOGIN_FAILURE_HINT, type LoginOutcome } from "../session/auth-session.js";
import type { ActionParams } from "../types.js";

type LoginFailure = Exclude<LoginOutcome, { status: "success" }>;

export function toJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function renderLoginFailure(outcome: LoginFailure, json: boolean): string {
  if (outcome.status === "throttled") {
    const message = "Account is throttled. Please wait before retrying.";
    if (json) return toJson({ status: "throttled", message, detail: outcome.message });
    return `ERROR: ${message}\nService said: ${outcome.message}`;
  }

  const message = `${outcome.error.message}. ${LOGIN_FAILURE_HINT}`;
  if (json) return toJson({ status: "login_failed", attempts: outcome.error.attempts, message });
  return `ERROR: ${message}`;
}

function outcomeMessage(outcome: CommandOutcome, vin: string, params: ActionParams): string {
  const def = ACTIONS[outcome.action];
  switch (outcome.status) {
    case "succeeded":
      return actionMessage(def, def.messages.success, vin, params);
    case "disabled":
      return actionMessage(def, def.messages.disabled ?? "Action is disabled for this vehicle", vin, params);
    case "failed":
      return outcome.error.message;
  }
}

export function renderOutcome(outcome: CommandOutcome, vin: string, params: ActionParams, json: boolean): string {
  const message = outcomeMessage(outcome, vin, params);
  if (json) {
    return toJson({ status: outcome.status, action: outcome.action, vin, message });
  }
  return message;
}

export function renderVehicleList(vehicles: VehicleSummary[], raw: boolean, json: boolean): string {
  if (json) return toJson(vehicles);
  if (vehicles.length === 0) return "No vehicles found.";

  return vehicles
    .map((vehicle, i) => {
      const lines = [`--- Vehicle ${i + 1} ---`, `VIN: ${vehicle.vin}`];
      if (vehicle.title !== undefined) lines.push(`Title: ${vehicle.title}`);
      if (vehicle.model !== undefined) lines.push(`Model: ${vehicle.model}`);
      if (vehicle.modelYear !== undefined) lines.push(`Model Year: ${vehicle.modelYear}`);
      if (vehicle.csid !== undefined) lines.push(`CSID: ${vehicle.csid}`);
      if (raw) lines.push(toJson(vehicle));
      return lines.join("\n");
    })
    .join("\n\n");
}

export function renderSection(title: string, data: unknown, json: boolean): string {
  if (json) return toJson(data);
  return `=== ${title} ===\n${toJson(data)}`;
}

function field(label: string, value: string | number | boolean | undefined, unit = ""): string[] {
  if (value === undefined) return [];
  if (typeof value === "boolean") return [`${label}: ${value ? "Yes" : "No"}`];
  return [`${label}: ${value}${unit}`];
}

function overviewLines(status: VehicleStatus): string[] {
  const { position } = status;
  return [
    ...field("Last Update", status.lastUpdateTime),
    ...field("Mileage", status.mileage, " km"),
    ...field("Range", status.range, " km"),
    ...(position ? [`Position: Lat ${position.latitude.toFixed(6)}, Lon ${position.longitude.toFixed(6)}`] : []),
    ...field("Position Time", position?.timestamp),
    ...field("Fuel Level", status.tankLevel, "%"),
    ...field("Battery Charge", status.stateOfCharge, "%"),
    ...field("Charging State", status.chargingState),
    ...field("Remaining Charge Time", status.remainingChargingTime, " min"),
    ...field("Climate State", status.climatisationState),
    ...field("Outdoor Temperature", status.outdoorTemperature, "°C"),
  ];
}

/**
 * Summary of the known status fields. `--raw` appends the full response;
 * a payload that is not a status object is printed as JSON.
 */
export function renderVehicleStatus(vin: string, status: unknown, raw: boolean, json: boolean): string {
  const title = `Vehicle Status ${vin}`;
  if (json) return toJson(status);

  const parsed = VehicleStatusSchema.safeParse(status);
  if (!parsed.success) return renderSection(title, status, false);
  const s = parsed.data;

  const overview = overviewLines(s);
  const security = [...field("Doors/Trunk", s.doorsTrunkStatus), ...field("Windows Open", s.anyWindowOpen)];
  const maintenance = [
    ...field("Service Due", s.serviceInspectionTime, " days"),
    ...field("Service Due", s.serviceInspectionDistance, " km"),
    ...field("Oil Level", s.oilLevel, "%"),
  ];

  const blocks = [[`=== ${title} ===`, ...overview].join("\n")];
  if (security.length > 0) blocks.push(["--- Security Status ---", ...security].join("\n"));
  if (maintenance.length > 0) blocks.push(["--- Maintenance ---", ...maintenance].join("\n"));
  if (overview.length + security.length + maintenance.length === 0 && !raw) {
    blocks.push("No status fields reported. Use --raw to see the full response.");
  }
  if (raw) blocks.push(`--- Raw Data ---\n${toJson(status)}`);
  return blocks.join("\n\n");
}
