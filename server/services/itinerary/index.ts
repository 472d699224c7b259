export * from "./types";
export * from "./dates";
export * from "./parser";
export * from "./prompt";
export * from "./timeslots";
export * from "./costEstimate";
export * from "./anchorPoints";
export * from "./coordinates";
export * from "./reconciler";
