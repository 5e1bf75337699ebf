/**
 * Human review state machine.
 */

export {
  ReviewGate,
  type Addendum,
  type AddendumInput,
  type ReviewEntry,
  type ReviewGateError,
  type ReviewGateErrorCode,
  type ReviewGateOptions,
  type ReviewGateStats,
} from "./gate.js";
