/**
 * Health Module
 *
 * Per-provider health state machine fed by request outcomes and by a
 * jittered background probe loop.
 */

export {
  createHealthMonitor,
  type HealthMonitor,
  type HealthMonitorConfig,
} from "./monitor.js";

export {
  createHealthRecord,
  computeCooldownMs,
  healthSignal,
  applySuccess,
  applyFailure,
  type Transition,
} from "./transitions.js";

export {
  createProbeLoop,
  jitteredInterval,
  type ProbeLoop,
  type ProbeLoopConfig,
  type ProbeFn,
  type ProbeResult,
} from "./probe.js";
