export { EventLogger } from "./logger.js";
export type { EventCallback, EventLoggerOptions, SessionEvent, SessionEventType } from "./logger.js";
