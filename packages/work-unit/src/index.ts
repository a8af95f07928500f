// ═══════════════════════════════════════════════════════════════════════════
// Work Unit
// ═══════════════════════════════════════════════════════════════════════════
//
// A work unit pairs one publish strategy (plugin) with one item. It owns the
// accepted/visible/enabled/checked state derived from the strategy's
// acceptance evaluation and forwards validate, execute and finalize to it.

export { createWorkUnit, WorkUnit } from "./work-unit.js"

// ═══════════════════════════════════════════════════════════════════════════
// Contracts
// ═══════════════════════════════════════════════════════════════════════════

export type {
  AcceptResult,
  PublishItem,
  PublishStrategy,
  Settings,
  WorkUnitState,
} from "./types.js"

// ═══════════════════════════════════════════════════════════════════════════
// Acceptance
// ═══════════════════════════════════════════════════════════════════════════

export { AcceptResultSchema, normalizeAcceptResult } from "./accept-result.js"
export { applyAcceptResult, INITIAL_WORK_UNIT_STATE } from "./transition.js"

// ═══════════════════════════════════════════════════════════════════════════
// Collections & Errors
// ═══════════════════════════════════════════════════════════════════════════

export type { RegistrationStage, WorkUnitErrorContext } from "./errors.js"
export { WorkUnitError } from "./errors.js"
export { WorkUnitSet } from "./work-unit-set.js"
