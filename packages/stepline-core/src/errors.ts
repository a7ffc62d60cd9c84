/**
 * Thrown when the engine is used in a way its contract forbids, such as
 * scheduling a run without jobs. Execution failures are never thrown; they
 * are reported as result data.
 */
export class PipelineContractError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = 'PipelineContractError'
  }
}
