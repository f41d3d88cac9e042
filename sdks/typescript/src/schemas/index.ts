export * from "./common";
export * from "./summaries";
export * from "./profile";
export * from "./devices";
export * from "./activities";
