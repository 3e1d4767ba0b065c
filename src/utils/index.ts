/**
 * Utilities Module
 */

export { debug, setDebugEnabled, isDebugEnabled } from "./debug.js";
export type { DebugLogger } from "./debug.js";

export { sleep } from "./sleep.js";
export { createDeadline, type Deadline } from "./deadline.js";
