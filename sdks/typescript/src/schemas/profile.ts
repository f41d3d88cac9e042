import { z } from "zod";
import { optionalNumber, optionalString, optionalTimestamp } from "./common";

// The first name travels as `firstString` on the wire.
export const profileSchema = z
  .object({
    firstString: optionalString,
    firstName: optionalString,
    middleName: optionalString,
    lastName: optionalString,
    birthdate: optionalTimestamp,
    postalCode: optionalString,
    gender: optionalString,
    height: optionalNumber,
    weight: optionalNumber,
    preferredLocale: optionalString,
    lastUpdateTime: optionalTimestamp,
  })
  .transform(({ firstString, firstName, ...profile }) => ({
    firstName: firstString ?? firstName,
    ...profile,
  }));

export type Profile = z.infer<typeof profileSchema>;
