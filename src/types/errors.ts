// ===== ERROR TYPES =====

export class PipelineClosedError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation}: pipeline no longer accepts text`);
    this.name = 'PipelineClosedError';
  }
}

export class SynthesisError extends Error {
  public cause?: Error;

  constructor(engine: string, text: string, originalError: Error) {
    super(`${engine} failed to synthesize "${text.slice(0, 40)}": ${originalError.message}`);
    this.name = 'SynthesisError';
    this.cause = originalError;
  }
}

export class AudioDeviceError extends Error {
  public cause?: Error;

  constructor(operation: 'open' | 'write' | 'close', originalError: Error) {
    super(`Audio device ${operation} failed: ${originalError.message}`);
    this.name = 'AudioDeviceError';
    this.cause = originalError;
  }
}

export class ConfigError extends Error {
  constructor(public errors: string[]) {
    super(`Invalid configuration: ${errors.join(', ')}`);
    this.name = 'ConfigError';
  }
}

export class DocumentReadError extends Error {
  public cause?: Error;

  constructor(source: string, originalError: Error) {
    super(`Failed to read ${source}: ${originalError.message}`);
    this.name = 'DocumentReadError';
    this.cause = originalError;
  }
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
