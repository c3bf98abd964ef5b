export type Resolution = {
  width: number;
  height: number;
};

/** Raw camera frame, RGBA samples in row-major order. */
export interface Frame {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
  readonly ts: number;
}

export interface PreprocessedFrame {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
  readonly blurRadius: number;
  readonly ts: number;
}

export interface MotionRegion {
  x: number;
  y: number;
  width: number;
  height: number;
  area: number;
}

export interface DetectionConfig {
  sensitivity: number;
  minArea: number;
  deviceIndex: number;
}

export type DetectionState = 'idle' | 'running' | 'stopping';

export interface MotionEvent {
  readonly sequence: number;
  readonly ts: number;
  readonly regions: readonly MotionRegion[];
  readonly snapshot: boolean;
}

export interface StatusSnapshot {
  state: DetectionState;
  fps: number;
  resolution: Resolution | null;
  motionEvents: number;
  lastMotionAt: number | null;
  motionPresent: boolean;
  backlog: boolean;
  config: DetectionConfig;
  ts: number;
}

export type NoticeCode =
  | 'invalid-frame'
  | 'dimension-mismatch'
  | 'camera-unavailable'
  | 'camera-stalled'
  | 'io-error'
  | 'event-backlog'
  | 'snapshot-saved';

export interface DetectorNotice {
  code: NoticeCode;
  message: string;
  fatal: boolean;
  ts: number;
  details?: Record<string, unknown>;
}

export type ChannelMessage =
  | { type: 'status'; status: StatusSnapshot }
  | { type: 'motion'; event: MotionEvent }
  | { type: 'notice'; notice: DetectorNotice };

export type DetectionCommand =
  | { type: 'start' }
  | { type: 'stop' }
  | { type: 'set-sensitivity'; value: number }
  | { type: 'set-min-area'; value: number }
  | { type: 'set-device'; value: number }
  | { type: 'snapshot-now' };

export type CommandType = DetectionCommand['type'];

export type CommandResult =
  | { ok: true; command: DetectionCommand; config: DetectionConfig; path?: string }
  | { ok: false; command: DetectionCommand; error: { code: string; message: string } };
