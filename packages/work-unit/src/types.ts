import type { Logger } from "@logtape/logtape"
import type { WorkUnit } from "./work-unit.js"

/**
 * Configuration handed to every lifecycle call of a work unit.
 */
export type Settings = Record<string, unknown>

/**
 * What a strategy reports back from an acceptance evaluation.
 *
 * A missing `accepted` flag is a rejection. The other flags fall back to
 * `true` when an accepted result leaves them out.
 */
export interface AcceptResult {
  accepted?: boolean
  visible?: boolean
  enabled?: boolean
  checked?: boolean
  /**
   * Free-form diagnostic payload, attached to the acceptance log record.
   */
  extraInfo?: unknown
}

/**
 * The derived state of a work unit.
 */
export interface WorkUnitState {
  /** The strategy's latest evaluation accepted the unit. */
  accepted: boolean
  /** Surfaced to a user. Invisible units are still processed. */
  visible: boolean
  /** A user may toggle `checked`. */
  enabled: boolean
  /** Slated to run. */
  checked: boolean
}

/**
 * The data node a work unit operates on.
 */
export interface PublishItem {
  readonly name: string
  addWorkUnit(unit: WorkUnit): void
}

/**
 * A publish plugin: the behavior bound to a work unit.
 *
 * The `run*` methods receive the unit's settings and target. Whatever they
 * throw reaches the pipeline driver untouched.
 */
export interface PublishStrategy<
  TItem extends PublishItem = PublishItem,
  TSettings extends Settings = Settings,
> {
  readonly name: string
  readonly logger: Logger

  addWorkUnit(unit: WorkUnit<TItem, TSettings>): void
  /**
   * Withdraws a unit registered through `addWorkUnit`. Called when the
   * target refuses a freshly created unit.
   */
  removeWorkUnit(unit: WorkUnit<TItem, TSettings>): void

  /**
   * Typed as `AcceptResult`, but the unit normalizes whatever comes back:
   * flags are read by truthiness and a non-object result is a rejection.
   */
  runAccept(settings: TSettings, item: TItem): AcceptResult
  runValidate(settings: TSettings, item: TItem): boolean
  runPublish(settings: TSettings, item: TItem): void
  runFinalize(settings: TSettings, item: TItem): void
}
