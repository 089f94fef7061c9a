export * from "./job.js";
export * from "./field-map.js";
export * from "./scan-log.js";
export * from "./normalizer.js";
export * from "./dedupe.js";
export * from "./store.js";
export * from "./sync.js";
export * from "./comparator.js";
export * from "./chains.js";
export * from "./transitions.js";
export * from "./kpis.js";
export * from "./pipeline.js";
export {
  parseCalendarDate,
  parseTimestamp,
  parseClockTime,
  combineDateAndTime,
  daysBetween,
  todayIsoDate
} from "./dates.js";
