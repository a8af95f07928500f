/**
 * Which registration call refused a new work unit.
 */
export type RegistrationStage = "strategy" | "target"

/**
 * Context information for work unit errors.
 */
export interface WorkUnitErrorContext {
  stage?: RegistrationStage
  strategy?: string
  target?: string
}

/**
 * Error class for work unit operations with structured context.
 */
export class WorkUnitError extends Error {
  public readonly context: WorkUnitErrorContext
  /**
   * Set when undoing a partial registration failed as well. The registration
   * failure itself stays the `cause`.
   */
  public readonly rollbackError?: unknown

  constructor(
    message: string,
    context: WorkUnitErrorContext = {},
    options?: ErrorOptions & { rollbackError?: unknown },
  ) {
    const contextStr = Object.entries(context)
      .filter(([, v]) => v !== undefined)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(", ")
    const fullMessage = contextStr ? `${message} (${contextStr})` : message
    super(fullMessage, options)
    this.name = "WorkUnitError"
    this.context = context
    if (options && "rollbackError" in options) {
      this.rollbackError = options.rollbackError
    }
  }
}
