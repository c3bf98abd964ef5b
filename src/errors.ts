export type DetectorErrorCode =
  | 'invalid-frame'
  | 'dimension-mismatch'
  | 'camera-unavailable'
  | 'camera-timeout'
  | 'camera-stalled'
  | 'io-error'
  | 'event-backlog'
  | 'no-frame'
  | 'invalid-command';

export class DetectorError extends Error {
  readonly code: DetectorErrorCode;

  constructor(code: DetectorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DetectorError';
    this.code = code;
  }
}

export class InvalidFrameError extends DetectorError {
  constructor(message: string) {
    super('invalid-frame', message);
    this.name = 'InvalidFrameError';
  }
}

export class DimensionMismatchError extends DetectorError {
  constructor(
    readonly previous: { width: number; height: number },
    readonly current: { width: number; height: number }
  ) {
    super(
      'dimension-mismatch',
      `Frame dimensions changed from ${previous.width}x${previous.height} to ${current.width}x${current.height}`
    );
    this.name = 'DimensionMismatchError';
  }
}

export class CameraUnavailableError extends DetectorError {
  constructor(readonly deviceIndex: number, reason: string, options?: { cause?: unknown }) {
    super('camera-unavailable', `Camera ${deviceIndex} unavailable: ${reason}`, options);
    this.name = 'CameraUnavailableError';
  }
}

/** Thrown by a camera handle when no frame arrives within the requested wait. */
export class CameraTimeoutError extends DetectorError {
  constructor(readonly timeoutMs: number) {
    super('camera-timeout', `No frame received within ${timeoutMs}ms`);
    this.name = 'CameraTimeoutError';
  }
}

export class CameraStalledError extends DetectorError {
  constructor(readonly attempts: number, readonly timeoutMs: number) {
    super('camera-stalled', `Camera stalled: ${attempts} consecutive waits of ${timeoutMs}ms expired`);
    this.name = 'CameraStalledError';
  }
}

export class SnapshotIoError extends DetectorError {
  constructor(readonly target: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown');
    super('io-error', `Failed to write snapshot ${target}: ${reason}`, options);
    this.name = 'SnapshotIoError';
  }
}

export function describeError(error: unknown): { code: string; message: string } {
  if (error instanceof DetectorError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    const errno = 'code' in error ? error.code : undefined;
    return { code: typeof errno === 'string' ? errno : 'internal', message: error.message };
  }
  return { code: 'internal', message: String(error) };
}
