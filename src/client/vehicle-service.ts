import { z } from "zod";
import type { ActionName } from "../commands/actions.js";
import type { ActionParams, ActionRequestOptions, ActionSignal, Region, RequestOptions } from "../types.js";

export const VehicleSummarySchema = z.object({
  vin: z.string(),
  title: z.string().optional(),
  model: z.string().optional(),
  modelYear: z.union([z.number(), z.string()]).optional(),
  csid: z.string().optional(),
});

export type VehicleSummary = z.infer<typeof VehicleSummarySchema>;

/**
 * The status fields the CLI summarises. Vehicles report only what they
 * support, so every field is optional and unknown keys pass through.
 */
export const VehicleStatusSchema = z
  .object({
    lastUpdateTime: z.string().optional(),
    mileage: z.number().optional(),
    range: z.number().optional(),
    position: z
      .object({ latitude: z.number(), longitude: z.number(), timestamp: z.string().optional() })
      .optional(),
    tankLevel: z.number().optional(),
    stateOfCharge: z.number().optional(),
    chargingState: z.string().optional(),
    remainingChargingTime: z.number().optional(),
    climatisationState: z.string().optional(),
    outdoorTemperature: z.number().optional(),
    doorsTrunkStatus: z.string().optional(),
    anyWindowOpen: z.boolean().optional(),
    serviceInspectionTime: z.number().optional(),
    serviceInspectionDistance: z.number().optional(),
    oilLevel: z.number().optional(),
  })
  .passthrough();

export type VehicleStatus = z.infer<typeof VehicleStatusSchema>;

/**
 * Everything the CLI needs from the vehicle cloud. Implementations own
 * transport, request signing, timeouts and response parsing.
 *
 * Faults should be thrown as {@link import("../errors.js").VehicleServiceError}
 * so the session can classify them by `kind`; any other thrown value is
 * classified by its message.
 */
export interface VehicleServiceClient {
  /** Single login attempt. `false` means the credentials were rejected. */
  attemptLogin(identity: string, secret: string, region: Region, opts?: RequestOptions): Promise<boolean>;

  executeAction(
    vehicleId: string,
    actionName: ActionName,
    params: ActionParams,
    opts?: ActionRequestOptions
  ): Promise<ActionSignal>;

  listVehicles(opts?: RequestOptions): Promise<VehicleSummary[]>;

  getVehicleStatus(vin: string, opts?: RequestOptions): Promise<unknown>;

  getTripData(vin: string, opts?: RequestOptions): Promise<unknown>;
}
