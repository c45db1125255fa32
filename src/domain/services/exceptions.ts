export class ProcessingError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = "ProcessingError";
  }
}

export class StepExecutionError extends ProcessingError {
  stepName: string;
  originalError: Error;
  context: Record<string, unknown>;

  constructor(stepName: string, originalError: Error, context: Record<string, unknown> = {}) {
    const message = `Step '${stepName}' failed: ${originalError.message}`;
    super(message);
    this.name = "StepExecutionError";
    this.stepName = stepName;
    this.originalError = originalError;
    this.context = context;
  }
}

export class InvalidTransitionError extends ProcessingError {
  constructor(stepName: string, signal: string) {
    super(`No transition from step '${stepName}' on signal '${signal}'`);
    this.name = "InvalidTransitionError";
  }
}

export class StructuredOutputError extends ProcessingError {
  agentName: string;
  reason: string;
  rawOutput: string;

  constructor(agentName: string, reason: string, rawOutput: string) {
    super(`Agent '${agentName}' returned malformed output: ${reason}`);
    this.name = "StructuredOutputError";
    this.agentName = agentName;
    this.reason = reason;
    this.rawOutput = rawOutput.substring(0, 500);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
