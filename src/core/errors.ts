export type LeadErrorCode =
  | 'CONFIGURATION_MISSING'
  | 'SOURCE_UNAVAILABLE'
  | 'PERSISTENCE_FAILURE'
  | 'JOB_ALREADY_RUNNING'
  | 'INVALID_REQUEST'
  | 'ORCHESTRATOR_FAULT';

export class LeadAggregationError extends Error {
  constructor(
    readonly code: LeadErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'LeadAggregationError';
  }
}

export class ConfigurationMissingError extends LeadAggregationError {
  constructor(readonly component: string) {
    super('CONFIGURATION_MISSING', `${component} is not configured`);
    this.name = 'ConfigurationMissingError';
  }
}

export class SourceUnavailableError extends LeadAggregationError {
  constructor(readonly source: string, cause: unknown) {
    super('SOURCE_UNAVAILABLE', `${source} unavailable: ${describeError(cause)}`, { cause });
    this.name = 'SourceUnavailableError';
  }
}

export class PersistenceFailureError extends LeadAggregationError {
  constructor(readonly leadName: string, cause: unknown) {
    super('PERSISTENCE_FAILURE', `could not persist "${leadName}": ${describeError(cause)}`, { cause });
    this.name = 'PersistenceFailureError';
  }
}

export class JobAlreadyRunningError extends LeadAggregationError {
  constructor() {
    super('JOB_ALREADY_RUNNING', 'A search job is already in progress');
    this.name = 'JobAlreadyRunningError';
  }
}

export class RequestValidationError extends LeadAggregationError {
  constructor(message: string) {
    super('INVALID_REQUEST', message);
    this.name = 'RequestValidationError';
  }
}

export class OrchestratorFaultError extends LeadAggregationError {
  constructor(cause: unknown) {
    super('ORCHESTRATOR_FAULT', describeError(cause), { cause });
    this.name = 'OrchestratorFaultError';
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
};
