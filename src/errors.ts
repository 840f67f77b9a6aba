export class AudioFormatFault extends Error {
  readonly sampleRate: number;

  constructor(message: string, sampleRate: number) {
    super(message);
    this.name = 'AudioFormatFault';
    this.sampleRate = sampleRate;
  }
}

export class AudioDeviceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AudioDeviceError';
  }
}

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class ServerReportedError extends Error {
  readonly code?: string;

  constructor(message: string, code?: string) {
    super(message);
    this.name = 'ServerReportedError';
    this.code = code;
  }
}

export function toError(err: unknown, fallbackMessage = 'unknown error'): Error {
  if (err instanceof Error) return err;
  if (typeof err === 'string') return new Error(err);
  try {
    return new Error(JSON.stringify(err));
  } catch {
    return new Error(fallbackMessage);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
