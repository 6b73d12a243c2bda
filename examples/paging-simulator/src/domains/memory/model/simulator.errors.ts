import { BaseError } from "@pagesim/errors"

export type SimulatorErrorCode = "no_processes" | "simulator_busy"

export class SimulatorError extends BaseError<SimulatorErrorCode> {
  static noProcesses(): SimulatorError {
    return new SimulatorError("No processes to access; create one first", {
      code: "no_processes",
      isRetryable: false,
    })
  }

  static simulatorBusy(operation: string, cause?: unknown): SimulatorError {
    return new SimulatorError("Simulator is busy, try again", {
      code: "simulator_busy",
      context: { operation },
      cause,
      isRetryable: true,
    })
  }
}
