/**
 * Test utilities for work units.
 * This file is not exported from the package - it's for internal testing only.
 */
import { getLogger } from "@logtape/logtape"
import { type Mock, vi } from "vitest"
import type {
  AcceptResult,
  PublishItem,
  PublishStrategy,
  Settings,
} from "./types.js"
import type { WorkUnit } from "./work-unit.js"
import { WorkUnitSet } from "./work-unit-set.js"

type Run<R> = (settings: Settings, item: PublishItem) => R

export type FakeStrategy = PublishStrategy & {
  units: WorkUnitSet
  addWorkUnit: Mock<(unit: WorkUnit) => void>
  removeWorkUnit: Mock<(unit: WorkUnit) => void>
  runAccept: Mock<Run<AcceptResult>>
  runValidate: Mock<Run<boolean>>
  runPublish: Mock<Run<void>>
  runFinalize: Mock<Run<void>>
}

export type FakeItem = PublishItem & {
  units: WorkUnitSet
  addWorkUnit: Mock<(unit: WorkUnit) => void>
}

/**
 * Creates a strategy that accepts everything and validates successfully.
 * Its logger lives under the `["test-strategy", name]` category.
 */
export function createFakeStrategy(name = "publish-files"): FakeStrategy {
  const units = new WorkUnitSet()

  return {
    name,
    logger: getLogger(["test-strategy", name]),
    units,
    addWorkUnit: vi.fn((unit: WorkUnit) => {
      units.add(unit)
    }),
    removeWorkUnit: vi.fn((unit: WorkUnit) => {
      units.remove(unit)
    }),
    runAccept: vi.fn<Run<AcceptResult>>(() => ({ accepted: true })),
    runValidate: vi.fn<Run<boolean>>(() => true),
    runPublish: vi.fn<Run<void>>(),
    runFinalize: vi.fn<Run<void>>(),
  }
}

export function createFakeItem(name = "shot_010.exr"): FakeItem {
  const units = new WorkUnitSet()

  return {
    name,
    units,
    addWorkUnit: vi.fn((unit: WorkUnit) => {
      units.add(unit)
    }),
  }
}
