export abstract class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** An insert or delete did not go through. A failed insert drops the event. */
export class StorageWriteFailure extends PipelineError {
  constructor(
    public readonly operation: string,
    cause: unknown
  ) {
    super(`Unable to ${operation}: ${errorMessage(cause)}`, { cause });
  }
}

/** A query failed; callers see an empty result. */
export class StorageReadFailure extends PipelineError {
  constructor(
    public readonly operation: string,
    cause: unknown
  ) {
    super(`Unable to ${operation}: ${errorMessage(cause)}`, { cause });
  }
}

export class TransportFailure extends PipelineError {
  constructor(
    public readonly reason: string,
    public readonly events: number,
    cause?: unknown
  ) {
    super(`Unable to send ${events} events: ${reason}`, { cause });
  }
}

export class ServerRejection extends PipelineError {
  constructor(
    public readonly status: number,
    public readonly events: number
  ) {
    super(`Server rejected ${events} events with status ${status}`);
  }
}

export class MalformedCommand extends PipelineError {
  constructor(public readonly missing: string[]) {
    super(`Event has missing or invalid fields: ${missing.join(', ')}`);
  }
}

export class ConfigError extends PipelineError {
  constructor(
    public readonly variable: string,
    value: string
  ) {
    super(`Invalid value "${value}" for ${variable}: expected a non-negative integer`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
