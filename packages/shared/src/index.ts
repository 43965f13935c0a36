/**
 * Shared infrastructure for Corroborate services.
 */

// Logging
export {
  type LogEntry,
  Logger,
  type LoggerConfig,
  LogLevel,
  type LogMetadata,
  type PerformanceTimer,
} from "./logger/Logger";

// Time
export { type Clock, ManualClock, SystemClock } from "./utils/time/Clock";
