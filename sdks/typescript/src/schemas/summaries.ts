import { z } from "zod";
import {
  caloriesBurnedSummarySchema,
  distanceSummarySchema,
  heartRateSummarySchema,
  list,
  optional,
  optionalBoolean,
  optionalNumber,
  optionalString,
  optionalTimestamp,
} from "./common";

export const PERIODS = ["hourly", "daily"] as const;
export type Period = (typeof PERIODS)[number];

export function isPeriod(value: string): value is Period {
  return PERIODS.some((period) => period === value);
}

// The service has been seen to send the calorie and heart-rate blocks with a
// leading capital; both spellings are read.
export const summarySchema = z
  .object({
    userId: optionalString,
    period: optionalString,
    startTime: optionalTimestamp,
    endTime: optionalTimestamp,
    parentDay: optionalTimestamp,
    isTransitDay: optionalBoolean,
    duration: optionalString,
    stepsTaken: optionalNumber,
    floorsClimbed: optionalNumber,
    activeHours: optionalNumber,
    uvExposure: optionalString,
    caloriesBurnedSummary: optional(caloriesBurnedSummarySchema),
    CaloriesBurnedSummary: optional(caloriesBurnedSummarySchema),
    heartRateSummary: optional(heartRateSummarySchema),
    HeartRateSummary: optional(heartRateSummarySchema),
    distanceSummary: optional(distanceSummarySchema),
  })
  .transform(({ CaloriesBurnedSummary: legacyCalories, HeartRateSummary: legacyHeartRate, ...summary }) => ({
    ...summary,
    caloriesBurnedSummary: summary.caloriesBurnedSummary ?? legacyCalories,
    heartRateSummary: summary.heartRateSummary ?? legacyHeartRate,
  }));

export const summariesSchema = z.object({
  summaries: list(summarySchema),
  itemCount: optionalNumber,
  nextPage: optionalString,
});

export type Summary = z.infer<typeof summarySchema>;
export type Summaries = z.infer<typeof summariesSchema>;
