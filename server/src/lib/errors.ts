export class FlowError extends Error {
  constructor(message: string, public readonly code: string = 'FLOW_ERROR') {
    super(message);
    this.name = 'FlowError';
  }
}

/** The run's prerequisite data could not be found; fatal before the first stage. */
export class InputResolutionError extends FlowError {
  constructor(message: string) {
    super(message, 'INPUT_RESOLUTION');
    this.name = 'InputResolutionError';
  }
}

export class UnknownFlowError extends FlowError {
  constructor(public readonly flowType: string) {
    super(`Unknown flow type: ${flowType}`, 'UNKNOWN_FLOW');
    this.name = 'UnknownFlowError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
