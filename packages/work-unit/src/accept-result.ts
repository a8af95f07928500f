import { z } from "zod"
import type { AcceptResult } from "./types.js"

// Present flags are coerced by truthiness; only a missing one stays absent
const optionalFlag = z
  .unknown()
  .transform(value => (value === undefined ? undefined : Boolean(value)))

/**
 * Runtime shape of a strategy's accept result.
 *
 * Plugins written without type checking may hand back any values, so every
 * flag is read by truthiness: `accepted: 1` accepts, `visible: null` hides.
 */
export const AcceptResultSchema = z.object({
  accepted: z.unknown().transform(value => Boolean(value)),
  visible: optionalFlag,
  enabled: optionalFlag,
  checked: optionalFlag,
  extraInfo: z.unknown(),
})

/**
 * Coerces whatever a strategy returned from `runAccept` into an
 * `AcceptResult`. Values that aren't objects at all are rejections.
 */
export function normalizeAcceptResult(raw: unknown): AcceptResult {
  const parsed = AcceptResultSchema.safeParse(raw)
  if (!parsed.success) {
    return { accepted: false }
  }

  const { accepted, visible, enabled, checked, extraInfo } = parsed.data
  const result: AcceptResult = { accepted }
  if (visible !== undefined) result.visible = visible
  if (enabled !== undefined) result.enabled = enabled
  if (checked !== undefined) result.checked = checked
  if (extraInfo !== undefined) result.extraInfo = extraInfo
  return result
}
