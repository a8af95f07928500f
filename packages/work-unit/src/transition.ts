import type { AcceptResult, WorkUnitState } from "./types.js"

// ═══════════════════════════════════════════════════════════════════════════
// Acceptance Transition
// ═══════════════════════════════════════════════════════════════════════════
//
// (state, acceptResult) → state'
//
// Acceptance is the only transition a work unit has. It runs once per
// evaluation pass, and a driver re-runs it whenever settings change, so it
// has to be safe to repeat:
// - an accepted result refreshes visible/enabled every time
// - checked is taken from the result only when entering the accepted state,
//   so a user's toggle survives later passes
// - a rejection forces the unit off and locks it; visible is left alone

export const INITIAL_WORK_UNIT_STATE: Readonly<WorkUnitState> = Object.freeze({
  accepted: false,
  visible: true,
  enabled: true,
  checked: true,
})

/**
 * Applies one acceptance evaluation to a work unit's state.
 *
 * @example
 * ```typescript
 * const state = applyAcceptResult(INITIAL_WORK_UNIT_STATE, {
 *   accepted: true,
 *   checked: false,
 * })
 * // { accepted: true, visible: true, enabled: true, checked: false }
 * ```
 */
export function applyAcceptResult(
  state: Readonly<WorkUnitState>,
  result: AcceptResult,
): WorkUnitState {
  if (!result.accepted) {
    return {
      accepted: false,
      visible: state.visible,
      enabled: false,
      checked: false,
    }
  }

  return {
    accepted: true,
    visible: result.visible ?? true,
    enabled: result.enabled ?? true,
    checked: state.accepted ? state.checked : (result.checked ?? true),
  }
}
