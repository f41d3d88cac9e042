import { z } from "zod";

/** Absent and null wire values both decode as `undefined`. */
export function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);
}

/** Absent and null arrays both decode as empty. */
export function list<T extends z.ZodTypeAny>(schema: T) {
  return optional(z.array(schema)).transform((items): z.output<T>[] => items ?? []);
}

export const timestamp = z.string().pipe(z.coerce.date());

export const optionalString = optional(z.string());
export const optionalNumber = optional(z.number());
export const optionalBoolean = optional(z.boolean());
export const optionalTimestamp = optional(timestamp);

export const caloriesBurnedSummarySchema = z.object({
  period: optionalString,
  totalCalories: optionalNumber,
});

export const heartRateSummarySchema = z.object({
  period: optionalString,
  averageHeartRate: optionalNumber,
  peakHeartRate: optionalNumber,
  lowestHeartRate: optionalNumber,
});

export const distanceSummarySchema = z.object({
  period: optionalString,
  totalDistance: optionalNumber,
  totalDistanceOnFoot: optionalNumber,
  actualDistance: optionalNumber,
  elevationGain: optionalNumber,
  elevationLoss: optionalNumber,
  maxElevation: optionalNumber,
  minElevation: optionalNumber,
  waypointDistance: optionalNumber,
  speed: optionalNumber,
  pace: optionalNumber,
  overallPace: optionalNumber,
});

export const heartRateZonesSchema = z.object({
  underHealthyHeart: optionalNumber,
  underAerobic: optionalNumber,
  aerobic: optionalNumber,
  anaerobic: optionalNumber,
  fitnessZone: optionalNumber,
  healthyHeart: optionalNumber,
  redline: optionalNumber,
  overRedline: optionalNumber,
});

export type CaloriesBurnedSummary = z.infer<typeof caloriesBurnedSummarySchema>;
export type HeartRateSummary = z.infer<typeof heartRateSummarySchema>;
export type DistanceSummary = z.infer<typeof distanceSummarySchema>;
export type HeartRateZones = z.infer<typeof heartRateZonesSchema>;
