import { z } from "zod";
import { list, optionalNumber, optionalString, optionalTimestamp } from "./common";

export const deviceSchema = z.object({
  id: optionalString,
  displayName: optionalString,
  lastSuccessfulSync: optionalTimestamp,
  deviceFamily: optionalString,
  hardwareVersion: optionalString,
  softwareVersion: optionalString,
  modelName: optionalString,
  manufacturer: optionalString,
  deviceStatus: optionalString,
  createdDate: optionalTimestamp,
});

export const deviceProfilesSchema = z.object({
  deviceProfiles: list(deviceSchema),
  itemCount: optionalNumber,
});

export type Device = z.infer<typeof deviceSchema>;
export type DeviceProfiles = z.infer<typeof deviceProfilesSchema>;
