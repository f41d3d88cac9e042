import { z } from "zod";
import {
  caloriesBurnedSummarySchema,
  distanceSummarySchema,
  heartRateSummarySchema,
  heartRateZonesSchema,
  list,
  optional,
  optionalBoolean,
  optionalNumber,
  optionalString,
  optionalTimestamp,
} from "./common";
import type { CaloriesBurnedSummary, DistanceSummary, HeartRateSummary } from "./common";
import { summarySchema } from "./summaries";
import type { Summary } from "./summaries";

export const ACTIVITY_KINDS = ["sleep", "run", "bike", "golf", "freePlay", "guidedWorkout"] as const;
export type ActivityKind = (typeof ACTIVITY_KINDS)[number] | "unknown";

/** The service's `activityType` name for each kind. */
export const ACTIVITY_TYPE_NAMES: Record<(typeof ACTIVITY_KINDS)[number], string> = {
  sleep: "Sleep",
  run: "Run",
  bike: "Bike",
  golf: "Golf",
  freePlay: "FreePlay",
  guidedWorkout: "GuidedWorkout",
};

export function activityKindOf(activityType: string | undefined): ActivityKind {
  if (!activityType) {
    return "unknown";
  }
  const normalized = activityType.toLowerCase();
  const match = ACTIVITY_KINDS.find((kind) => ACTIVITY_TYPE_NAMES[kind].toLowerCase() === normalized);
  return match ?? "unknown";
}

export const locationSchema = z.object({
  speedOverGround: optionalNumber,
  latitude: optionalNumber,
  longitude: optionalNumber,
  elevationFromMeanSeaLevel: optionalNumber,
  estimatedHorizontalError: optionalNumber,
  estimatedVerticalError: optionalNumber,
});

export const mapPointSchema = z.object({
  secondsSinceStart: optionalNumber,
  mapPointType: optionalString,
  ordinal: optionalNumber,
  actualDistance: optionalNumber,
  totalDistance: optionalNumber,
  heartRate: optionalNumber,
  pace: optionalNumber,
  scaledPace: optionalNumber,
  speed: optionalNumber,
  location: optional(locationSchema),
  isPaused: optionalBoolean,
  isResume: optionalBoolean,
});

export const performanceSummarySchema = z.object({
  finishHeartRate: optionalNumber,
  recoveryHeartRateAt1Minute: optionalNumber,
  recoveryHeartRateAt2Minutes: optionalNumber,
  heartRateZones: optional(heartRateZonesSchema),
});

export const activitySegmentSchema = z.object({
  segmentId: optionalNumber,
  segmentType: optionalString,
  dayId: optionalTimestamp,
  startTime: optionalTimestamp,
  endTime: optionalTimestamp,
  duration: optionalString,
  pausedDuration: optionalString,
  sleepTime: optionalNumber,
  sleepType: optionalString,
  heartRateSummary: optional(heartRateSummarySchema),
  caloriesBurnedSummary: optional(caloriesBurnedSummarySchema),
  distanceSummary: optional(distanceSummarySchema),
  heartRateZones: optional(heartRateZonesSchema),
  splitDistance: optionalNumber,
  circuitOrdinal: optionalNumber,
  circuitType: optionalNumber,
  holeNumber: optionalNumber,
  stepCount: optionalNumber,
  distanceWalked: optionalNumber,
});

export type Location = z.infer<typeof locationSchema>;
export type MapPoint = z.infer<typeof mapPointSchema>;
export type PerformanceSummary = z.infer<typeof performanceSummarySchema>;
export type ActivitySegment = z.infer<typeof activitySegmentSchema>;

/**
 * A recorded session of any kind. Kind-specific fields (sleep, golf, guided
 * workout) are simply absent on the other kinds.
 */
export interface Activity {
  kind: ActivityKind;
  id?: string;
  userId?: string;
  deviceId?: string;
  activityType?: string;
  name?: string;
  createdBy?: string;
  startTime?: Date;
  endTime?: Date;
  dayId?: Date;
  createdTime?: Date;
  duration?: string;
  pausedDuration?: string;
  uvExposure?: string;
  splitDistance?: number;
  heartRateSummary?: HeartRateSummary;
  caloriesBurnedSummary?: CaloriesBurnedSummary;
  distanceSummary?: DistanceSummary;
  performanceSummary?: PerformanceSummary;
  activitySegments: ActivitySegment[];
  minuteSummaries: Summary[];
  mapPoints: MapPoint[];
  childActivities: Activity[];

  // sleep
  awakeDuration?: string;
  sleepDuration?: string;
  numberOfWakeups?: number;
  fallAsleepDuration?: string;
  sleepEfficiencyPercentage?: number;
  totalRestlessSleepDuration?: string;
  totalRestfulSleepDuration?: string;
  restingHeartRate?: number;
  fallAsleepTime?: Date;
  wakeupTime?: Date;

  // guided workout
  roundsPerformed?: number;
  repetitionsPerformed?: number;
  workoutPlanId?: string;

  // golf
  totalStepCount?: number;
  totalDistanceWalked?: number;
  parOrBetterCount?: number;
  longestDriveDistance?: number;
  longestStrokeDistance?: number;
}

export const activitySchema: z.ZodType<Activity, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      id: optionalString,
      userId: optionalString,
      deviceId: optionalString,
      activityType: optionalString,
      name: optionalString,
      createdBy: optionalString,
      startTime: optionalTimestamp,
      endTime: optionalTimestamp,
      dayId: optionalTimestamp,
      createdTime: optionalTimestamp,
      duration: optionalString,
      pausedDuration: optionalString,
      uvExposure: optionalString,
      splitDistance: optionalNumber,
      heartRateSummary: optional(heartRateSummarySchema),
      caloriesBurnedSummary: optional(caloriesBurnedSummarySchema),
      distanceSummary: optional(distanceSummarySchema),
      performanceSummary: optional(performanceSummarySchema),
      activitySegments: list(activitySegmentSchema),
      minuteSummaries: list(summarySchema),
      mapPoints: list(mapPointSchema),
      childActivities: list(activitySchema),
      awakeDuration: optionalString,
      sleepDuration: optionalString,
      numberOfWakeups: optionalNumber,
      fallAsleepDuration: optionalString,
      sleepEfficiencyPercentage: optionalNumber,
      totalRestlessSleepDuration: optionalString,
      totalRestfulSleepDuration: optionalString,
      restingHeartRate: optionalNumber,
      fallAsleepTime: optionalTimestamp,
      wakeupTime: optionalTimestamp,
      roundsPerformed: optionalNumber,
      repetitionsPerformed: optionalNumber,
      workoutPlanId: optionalString,
      totalStepCount: optionalNumber,
      totalDistanceWalked: optionalNumber,
      parOrBetterCount: optionalNumber,
      longestDriveDistance: optionalNumber,
      longestStrokeDistance: optionalNumber,
    })
    .transform((activity) => ({ kind: activityKindOf(activity.activityType), ...activity })),
);

const ACTIVITY_GROUPS = [
  ["sleepActivities", "sleep"],
  ["runActivities", "run"],
  ["bikeActivities", "bike"],
  ["golfActivities", "golf"],
  ["freePlayActivities", "freePlay"],
  ["guidedWorkoutActivities", "guidedWorkout"],
] as const;

/**
 * The wire listing keeps one array per kind; it is flattened into a single
 * list with each entry tagged by the group it came from.
 */
export const activitiesSchema = z
  .object({
    sleepActivities: list(activitySchema),
    runActivities: list(activitySchema),
    bikeActivities: list(activitySchema),
    golfActivities: list(activitySchema),
    freePlayActivities: list(activitySchema),
    guidedWorkoutActivities: list(activitySchema),
    itemCount: optionalNumber,
    nextPage: optionalString,
  })
  .transform((listing) => ({
    activities: ACTIVITY_GROUPS.flatMap(([group, kind]): Activity[] =>
      listing[group].map((activity) => ({ ...activity, kind })),
    ),
    itemCount: listing.itemCount,
    nextPage: listing.nextPage,
  }));

export type Activities = z.infer<typeof activitiesSchema>;
