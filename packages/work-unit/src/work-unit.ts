import { getLogger } from "@logtape/logtape"
import { normalizeAcceptResult } from "./accept-result.js"
import { WorkUnitError } from "./errors.js"
import { applyAcceptResult, INITIAL_WORK_UNIT_STATE } from "./transition.js"
import type {
  PublishItem,
  PublishStrategy,
  Settings,
  WorkUnitState,
} from "./types.js"

const logger = getLogger(["@publish-flow", "work-unit"])

/**
 * A unit of work: one publish strategy operating on one item.
 *
 * The unit carries the derived UI state (visible, enabled, checked) that the
 * strategy's acceptance evaluation produces, and forwards validate, execute
 * and finalize to the strategy with its current settings and target.
 *
 * Units are created through `WorkUnit.create` (or `createWorkUnit`), which
 * registers the unit with both its strategy and its target.
 *
 * @example
 * ```typescript
 * const unit = createWorkUnit(strategy, item, { publishDir: "/tmp/out" })
 *
 * unit.accept()
 * if (unit.checked && unit.validate()) {
 *   unit.execute()
 *   unit.finalize()
 * }
 * ```
 */
export class WorkUnit<
  TItem extends PublishItem = PublishItem,
  TSettings extends Settings = Settings,
> {
  readonly #strategy: PublishStrategy<TItem, TSettings>
  readonly #target: TItem
  #settings: TSettings
  #state: WorkUnitState = { ...INITIAL_WORK_UNIT_STATE }

  private constructor(
    strategy: PublishStrategy<TItem, TSettings>,
    target: TItem,
    settings: TSettings,
  ) {
    this.#strategy = strategy
    this.#target = target
    this.#settings = settings
  }

  /**
   * Creates a unit and registers it with its strategy, then its target.
   *
   * Registration is all-or-nothing: if the target refuses the unit, it is
   * withdrawn from the strategy before the error is thrown.
   *
   * @throws {WorkUnitError} when either registration call throws; the
   *   original error is the `cause`, and a failed withdrawal is attached as
   *   `rollbackError`
   */
  static create<
    TItem extends PublishItem,
    TSettings extends Settings = Settings,
  >(
    strategy: PublishStrategy<TItem, TSettings>,
    target: TItem,
    settings: TSettings,
  ): WorkUnit<TItem, TSettings> {
    const unit = new WorkUnit(strategy, target, settings)
    const context = { strategy: strategy.name, target: target.name }

    try {
      strategy.addWorkUnit(unit)
    } catch (error) {
      throw new WorkUnitError(
        "Strategy refused work unit",
        { ...context, stage: "strategy" },
        { cause: error },
      )
    }

    try {
      target.addWorkUnit(unit)
    } catch (error) {
      try {
        strategy.removeWorkUnit(unit)
      } catch (rollbackError) {
        logger.error("Could not withdraw {unit} from its strategy", {
          unit: unit.toString(),
          error: rollbackError,
        })
        throw new WorkUnitError(
          "Target refused work unit; withdrawal from strategy failed",
          { ...context, stage: "target" },
          { cause: error, rollbackError },
        )
      }
      throw new WorkUnitError(
        "Target refused work unit",
        { ...context, stage: "target" },
        { cause: error },
      )
    }

    logger.debug("Created {unit}", { unit: unit.toString(), ...context })
    return unit
  }

  get strategy(): PublishStrategy<TItem, TSettings> {
    return this.#strategy
  }

  get target(): TItem {
    return this.#target
  }

  get settings(): TSettings {
    return this.#settings
  }

  /**
   * Replaces the settings wholesale. Nothing from the previous mapping is
   * carried over.
   */
  set settings(settings: TSettings) {
    this.#settings = settings
  }

  get accepted(): boolean {
    return this.#state.accepted
  }

  /**
   * Whether this unit should be shown to a user. Invisible units are still
   * processed.
   */
  get visible(): boolean {
    return this.#state.visible
  }

  /**
   * Whether a user may change `checked`.
   */
  get enabled(): boolean {
    return this.#state.enabled
  }

  /**
   * Whether this unit is slated to run.
   */
  get checked(): boolean {
    return this.#state.checked
  }

  /**
   * Applies a user's toggle. Disabled units keep their current value.
   *
   * @returns whether the value was applied
   */
  setChecked(checked: boolean): boolean {
    if (!this.#state.enabled) {
      logger.debug("Ignored toggle of disabled {unit}", {
        unit: this.toString(),
        checked,
      })
      return false
    }
    this.#state = { ...this.#state, checked }
    return true
  }

  snapshot(): Readonly<WorkUnitState> {
    return Object.freeze({ ...this.#state })
  }

  /**
   * True when both units are bound to the same strategy instance.
   */
  isSameType(other: WorkUnit<PublishItem, Settings>): boolean {
    return this.#strategy === other.strategy
  }

  /**
   * Runs the strategy's acceptance evaluation and updates this unit's state.
   *
   * Safe to call repeatedly. While the unit stays accepted, a user's
   * `checked` toggle is kept; a rejection forces the unit unchecked and
   * disabled.
   */
  accept(): void {
    const strategy = this.#strategy
    const result = normalizeAcceptResult(
      strategy.runAccept(this.#settings, this.#target),
    )

    const properties = {
      strategy: strategy.name,
      target: this.#target.name,
      extraInfo: result.extraInfo,
    }
    if (result.accepted) {
      strategy.logger.info(
        "Plugin '{strategy}' accepted {target}",
        properties,
      )
    } else {
      strategy.logger.info(
        "Plugin '{strategy}' rejected {target}",
        properties,
      )
    }

    this.#state = applyAcceptResult(this.#state, result)
  }

  /**
   * @returns the strategy's verdict, unchanged
   */
  validate(): boolean {
    return this.#strategy.runValidate(this.#settings, this.#target)
  }

  execute(): void {
    this.#strategy.runPublish(this.#settings, this.#target)
  }

  finalize(): void {
    this.#strategy.runFinalize(this.#settings, this.#target)
  }

  toString(): string {
    return `<WorkUnit: ${this.#strategy.name} for ${this.#target.name}>`
  }
}

/**
 * Creates a work unit and registers it with its strategy and target.
 * See `WorkUnit.create`.
 */
export function createWorkUnit<
  TItem extends PublishItem,
  TSettings extends Settings = Settings,
>(
  strategy: PublishStrategy<TItem, TSettings>,
  target: TItem,
  settings: TSettings,
): WorkUnit<TItem, TSettings> {
  return WorkUnit.create(strategy, target, settings)
}
