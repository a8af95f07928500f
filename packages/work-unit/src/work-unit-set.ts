import type { PublishItem, PublishStrategy, Settings } from "./types.js"
import type { WorkUnit } from "./work-unit.js"

/**
 * Insertion-ordered collection of work units, keyed by identity.
 *
 * Strategies and items can back their `addWorkUnit` / `removeWorkUnit`
 * hooks with one of these to enumerate the units bound to them.
 */
export class WorkUnitSet<
  U extends WorkUnit<PublishItem, Settings> = WorkUnit,
> implements Iterable<U>
{
  readonly #units = new Set<U>()

  /**
   * @returns false if the unit was already present
   */
  add(unit: U): boolean {
    if (this.#units.has(unit)) return false
    this.#units.add(unit)
    return true
  }

  /**
   * @returns false if the unit wasn't present
   */
  remove(unit: U): boolean {
    return this.#units.delete(unit)
  }

  has(unit: U): boolean {
    return this.#units.has(unit)
  }

  get size(): number {
    return this.#units.size
  }

  values(): U[] {
    return [...this.#units]
  }

  /**
   * Units bound to the given strategy instance.
   */
  ofType(strategy: PublishStrategy<PublishItem, Settings>): U[] {
    return this.values().filter(unit => unit.strategy === strategy)
  }

  [Symbol.iterator](): Iterator<U> {
    return this.#units.values()
  }
}
