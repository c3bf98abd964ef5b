import { performance } from 'node:perf_hooks';
import {
  CameraStalledError,
  CameraTimeoutError,
  CameraUnavailableError,
  DimensionMismatchError,
  InvalidFrameError,
  describeError
} from './errors.js';
import logger from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { StateChannel } from './stateChannel.js';
import type {
  CommandResult,
  DetectionCommand,
  DetectionConfig,
  DetectionState,
  DetectorNotice,
  Frame,
  MotionRegion,
  NoticeCode,
  PreprocessedFrame,
  Resolution,
  StatusSnapshot
} from './types.js';
import { analyze, type AnalyzeOptions } from './video/analyze.js';
import type { CameraDevice, CameraHandle, CameraProvider } from './video/camera.js';
import { decide } from './video/decide.js';
import { preprocess } from './video/preprocess.js';
import type { SnapshotSink } from './video/snapshots.js';

export const MAX_MIN_AREA = 10_000_000;
const DEFAULT_FRAME_TIMEOUT_MS = 2000;
const DEFAULT_STALL_RETRIES = 1;
const DEFAULT_STATUS_INTERVAL_MS = 200;
const DEFAULT_FPS_SMOOTHING = 0.2;

export const DEFAULT_DETECTION_CONFIG: DetectionConfig = {
  sensitivity: 0.8,
  minArea: 500,
  deviceIndex: 0
};

export interface CoordinatorOptions {
  camera: CameraProvider;
  channel: StateChannel;
  /** `null` disables snapshot capture. */
  snapshots?: SnapshotSink | null;
  config?: Partial<DetectionConfig>;
  analysis?: AnalyzeOptions & { blurRadius?: number };
  frameTimeoutMs?: number;
  stallRetries?: number;
  statusIntervalMs?: number;
  fpsSmoothing?: number;
  now?: () => number;
  log?: typeof logger;
  metrics?: MetricsRegistry;
}

export type EpisodeOutcome = { reason: 'stopped' } | { reason: 'fatal'; notice: DetectorNotice };

type PendingCommand = {
  command: DetectionCommand;
  resolve: (result: CommandResult) => void;
};

type Episode = {
  promise: Promise<EpisodeOutcome>;
  resolve: (outcome: EpisodeOutcome) => void;
};

export class DetectionCoordinator {
  private readonly camera: CameraProvider;
  private readonly channel: StateChannel;
  private readonly snapshots: SnapshotSink | null;
  private readonly analysis: AnalyzeOptions & { blurRadius?: number };
  private readonly frameTimeoutMs: number;
  private readonly stallRetries: number;
  private readonly statusIntervalMs: number;
  private readonly fpsSmoothing: number;
  private readonly now: () => number;
  private readonly log: typeof logger;
  private readonly metrics: MetricsRegistry;

  private state: DetectionState = 'idle';
  private config: DetectionConfig;
  private previous: PreprocessedFrame | null = null;
  private lastRaw: Frame | null = null;
  private presence = false;
  private sequence = 0;
  private motionEvents = 0;
  private lastMotionAt: number | null = null;
  private resolution: Resolution | null = null;
  private fps = 0;
  private lastFrameAt: number | null = null;
  private lastStatusAt: number | null = null;
  /** Consecutive frame waits that expired; survives fetches abandoned for queued commands. */
  private stallTimeouts = 0;
  private heldDevice: number | null = null;

  private commandChain: Promise<unknown> = Promise.resolve();
  private readonly loopQueue: PendingCommand[] = [];
  private readonly stopWaiters: PendingCommand[] = [];
  private readonly pendingSnapshots = new Set<Promise<void>>();
  private loop: Promise<void> | null = null;
  private episode: Episode | null = null;
  private lastOutcome: EpisodeOutcome = { reason: 'stopped' };
  private stopRequested = false;
  private restartDevice: { index: number; pending: PendingCommand } | null = null;

  constructor(options: CoordinatorOptions) {
    this.camera = options.camera;
    this.channel = options.channel;
    this.snapshots = options.snapshots ?? null;
    this.analysis = options.analysis ?? {};
    this.frameTimeoutMs = Math.max(1, options.frameTimeoutMs ?? DEFAULT_FRAME_TIMEOUT_MS);
    this.stallRetries = Math.max(0, Math.floor(options.stallRetries ?? DEFAULT_STALL_RETRIES));
    this.statusIntervalMs = Math.max(0, options.statusIntervalMs ?? DEFAULT_STATUS_INTERVAL_MS);
    const smoothing = options.fpsSmoothing ?? DEFAULT_FPS_SMOOTHING;
    this.fpsSmoothing = smoothing > 0 && smoothing <= 1 ? smoothing : DEFAULT_FPS_SMOOTHING;
    this.now = options.now ?? Date.now;
    this.log = options.log ?? logger;
    this.metrics = options.metrics ?? metrics;

    const initial = { ...DEFAULT_DETECTION_CONFIG, ...options.config };
    this.config = {
      sensitivity: clampSensitivity(initial.sensitivity),
      minArea: clampMinArea(initial.minArea),
      deviceIndex: clampDeviceIndex(initial.deviceIndex)
    };
  }

  getState(): DetectionState {
    return this.state;
  }

  getConfig(): DetectionConfig {
    return { ...this.config };
  }

  getStatus(): StatusSnapshot {
    return {
      state: this.state,
      fps: Math.round(this.fps * 100) / 100,
      resolution: this.resolution ? { ...this.resolution } : null,
      motionEvents: this.motionEvents,
      lastMotionAt: this.lastMotionAt,
      motionPresent: this.presence,
      backlog: this.channel.hasBacklog(),
      config: this.getConfig(),
      ts: this.now()
    };
  }

  /**
   * Queues a command. While running it is applied between two cycles; while idle it is applied
   * right away. Commands are applied one at a time in submission order.
   */
  submit(command: DetectionCommand): Promise<CommandResult> {
    const result = this.commandChain.then(() => this.dispatch(command));
    this.commandChain = result;
    return result;
  }

  start() {
    return this.submit({ type: 'start' });
  }

  stop() {
    return this.submit({ type: 'stop' });
  }

  /**
   * Lists cameras without probing the one this coordinator holds. The held device is reported
   * with the resolution of its latest frame, `null` before the first one.
   */
  async listDevices(): Promise<CameraDevice[]> {
    const held = this.heldDevice;
    if (held === null) {
      return this.camera.listDevices();
    }

    const others = await this.camera.listDevices({ skip: [held] });
    const resolution = this.resolution ? { ...this.resolution } : null;
    return [...others.filter(device => device.index !== held), { index: held, resolution }].sort(
      (a, b) => a.index - b.index
    );
  }

  /** Resolves once the current running episode ends; immediately when idle. */
  waitForIdle(): Promise<EpisodeOutcome> {
    return this.episode ? this.episode.promise : Promise.resolve(this.lastOutcome);
  }

  private dispatch(command: DetectionCommand): Promise<CommandResult> {
    if (this.loop) {
      return new Promise(resolve => {
        this.loopQueue.push({ command, resolve });
      });
    }
    return this.applyIdle(command);
  }

  private async applyIdle(command: DetectionCommand): Promise<CommandResult> {
    switch (command.type) {
      case 'start':
        try {
          await this.beginEpisode();
          return this.accept(command);
        } catch (error) {
          return this.reject(command, error);
        }
      case 'stop':
        return this.accept(command);
      case 'snapshot-now':
        return this.reject(command, { code: 'no-frame', message: 'No frame has been captured' });
      default:
        return this.applyConfig(command);
    }
  }

  private applyConfig(command: DetectionCommand): CommandResult {
    switch (command.type) {
      case 'set-sensitivity':
        if (!Number.isFinite(command.value)) {
          return this.reject(command, invalidValue(command));
        }
        this.config = { ...this.config, sensitivity: clampSensitivity(command.value) };
        return this.accept(command);
      case 'set-min-area':
        if (!Number.isFinite(command.value)) {
          return this.reject(command, invalidValue(command));
        }
        this.config = { ...this.config, minArea: clampMinArea(command.value) };
        return this.accept(command);
      case 'set-device':
        if (!Number.isFinite(command.value)) {
          return this.reject(command, invalidValue(command));
        }
        this.config = { ...this.config, deviceIndex: clampDeviceIndex(command.value) };
        return this.accept(command);
      default:
        return this.reject(command, {
          code: 'invalid-command',
          message: `Command ${command.type} cannot be applied here`
        });
    }
  }

  private async beginEpisode() {
    const deviceIndex = this.config.deviceIndex;
    let handle: CameraHandle;
    this.heldDevice = deviceIndex;
    try {
      handle = await this.camera.open(deviceIndex);
    } catch (error) {
      this.heldDevice = null;
      if (error instanceof CameraUnavailableError) {
        throw error;
      }
      throw new CameraUnavailableError(deviceIndex, describeError(error).message, { cause: error });
    }

    this.state = 'running';
    this.sequence = 0;
    this.previous = null;
    this.lastRaw = null;
    this.presence = false;
    this.fps = 0;
    this.lastFrameAt = null;
    this.resolution = null;
    this.stallTimeouts = 0;
    this.stopRequested = false;

    let resolveEpisode: (outcome: EpisodeOutcome) => void = () => undefined;
    const promise = new Promise<EpisodeOutcome>(resolve => {
      resolveEpisode = resolve;
    });
    this.episode = { promise, resolve: resolveEpisode };

    this.log.info({ deviceIndex, config: this.config }, 'Detection started');
    this.publishStatus(true);
    this.loop = this.run(handle);
  }

  private async run(handle: CameraHandle) {
    let outcome: EpisodeOutcome = { reason: 'stopped' };

    try {
      while (true) {
        await this.applyQueuedCommands();
        if (this.stopRequested) {
          break;
        }

        const fatal = await this.cycle(handle);
        if (fatal) {
          outcome = { reason: 'fatal', notice: fatal };
          break;
        }

        // let timers and I/O run between cycles even when frames are already queued
        await new Promise<void>(resolve => setImmediate(resolve));
      }
    } catch (error) {
      const { message } = describeError(error);
      const notice = this.notice('camera-unavailable', `Detection loop failed: ${message}`, true);
      this.channel.publishNotice(notice);
      outcome = { reason: 'fatal', notice };
    }

    await this.teardown(handle, outcome);
  }

  private async applyQueuedCommands() {
    while (this.loopQueue.length > 0 && !this.stopRequested) {
      const pending = this.loopQueue.shift();
      if (!pending) {
        break;
      }
      const { command } = pending;

      switch (command.type) {
        case 'start':
          pending.resolve(this.accept(command));
          break;
        case 'stop':
          this.stopRequested = true;
          this.stopWaiters.push(pending);
          break;
        case 'snapshot-now':
          this.snapshotNow(command, pending);
          break;
        case 'set-device': {
          if (!Number.isFinite(command.value)) {
            pending.resolve(this.reject(command, invalidValue(command)));
            break;
          }
          const index = clampDeviceIndex(command.value);
          if (index === this.config.deviceIndex) {
            pending.resolve(this.accept(command));
            break;
          }
          this.stopRequested = true;
          this.restartDevice = { index, pending };
          break;
        }
        default:
          pending.resolve(this.applyConfig(command));
      }
    }
  }

  /** One capture-analyze-decide pass. Returns a notice when the episode has to end. */
  private async cycle(handle: CameraHandle): Promise<DetectorNotice | null> {
    const startedAt = performance.now();
    const config = { ...this.config };

    let frame: Frame;
    try {
      frame = await this.fetchFrame(handle);
    } catch (error) {
      if (error instanceof InvalidFrameError) {
        this.channel.publishNotice(this.notice('invalid-frame', error.message, false));
        return null;
      }
      if (error instanceof FetchAborted) {
        return null;
      }
      const notice =
        error instanceof CameraStalledError
          ? this.notice('camera-stalled', error.message, true, { attempts: error.attempts })
          : this.notice('camera-unavailable', describeError(error).message, true);
      this.channel.publishNotice(notice);
      return notice;
    }

    this.trackFrameRate();

    let current: PreprocessedFrame;
    try {
      current = preprocess(frame, { blurRadius: this.analysis.blurRadius });
    } catch (error) {
      if (error instanceof InvalidFrameError) {
        this.channel.publishNotice(this.notice('invalid-frame', error.message, false));
        this.publishStatus();
        return null;
      }
      throw error;
    }

    this.lastRaw = frame;
    this.resolution = { width: frame.width, height: frame.height };
    this.metrics.incrementCounter('frames');

    const previous = this.previous;
    this.previous = current;
    if (!previous) {
      this.publishStatus();
      return null;
    }

    let regions: MotionRegion[];
    try {
      regions = analyze(previous, current, config.sensitivity, this.analysis);
    } catch (error) {
      if (error instanceof DimensionMismatchError) {
        this.channel.publishNotice(
          this.notice('dimension-mismatch', error.message, false, {
            previous: error.previous,
            current: error.current
          })
        );
        this.publishStatus();
        return null;
      }
      throw error;
    }

    const ts = this.now();
    const decision = decide(regions, config, this.presence, {
      sequence: this.sequence + 1,
      ts,
      snapshot: this.snapshots !== null
    });
    this.presence = decision.presence;

    if (decision.event) {
      this.sequence = decision.event.sequence;
      this.motionEvents += 1;
      this.lastMotionAt = ts;
      if (this.snapshots) {
        this.trackSnapshot(this.writeSnapshot(frame, ts, decision.event.sequence));
      }
      this.channel.publishEvent(decision.event);
    }

    this.metrics.observeLatency('detector.cycle', performance.now() - startedAt);
    this.publishStatus();
    return null;
  }

  private async fetchFrame(handle: CameraHandle): Promise<Frame> {
    while (true) {
      try {
        const frame = await handle.nextFrame(this.frameTimeoutMs);
        this.stallTimeouts = 0;
        return frame;
      } catch (error) {
        if (!(error instanceof CameraTimeoutError)) {
          throw error;
        }
        this.stallTimeouts += 1;
        if (this.stallTimeouts > this.stallRetries) {
          throw new CameraStalledError(this.stallTimeouts, this.frameTimeoutMs);
        }
        this.channel.publishNotice(
          this.notice('camera-stalled', `No frame within ${this.frameTimeoutMs}ms, retrying`, false, {
            attempt: this.stallTimeouts
          })
        );
        // hand control back so queued commands are not held up by a silent camera
        if (this.loopQueue.length > 0) {
          throw new FetchAborted();
        }
      }
    }
  }

  private snapshotNow(command: DetectionCommand, pending: PendingCommand) {
    const frame = this.lastRaw;
    const sink = this.snapshots;
    if (!frame) {
      pending.resolve(this.reject(command, { code: 'no-frame', message: 'No frame has been captured' }));
      return;
    }
    if (!sink) {
      pending.resolve(
        this.reject(command, { code: 'io-error', message: 'Snapshot capture is disabled' })
      );
      return;
    }

    const ts = this.now();
    const write = this.metrics.time('snapshot.write', () => sink.save(frame, ts)).then(
      path => {
        this.channel.publishNotice(
          this.notice('snapshot-saved', `Snapshot saved to ${path}`, false, { path })
        );
        pending.resolve({ ...this.accept(command), path });
      },
      error => {
        const { message } = describeError(error);
        this.channel.publishNotice(this.notice('io-error', message, false));
        pending.resolve(this.reject(command, { code: 'io-error', message }));
      }
    );
    this.trackSnapshot(write);
  }

  private async writeSnapshot(frame: Frame, ts: number, sequence: number) {
    const sink = this.snapshots;
    if (!sink) {
      return;
    }
    try {
      const path = await this.metrics.time('snapshot.write', () => sink.save(frame, ts));
      this.channel.publishNotice(
        this.notice('snapshot-saved', `Snapshot saved to ${path}`, false, { path, sequence })
      );
    } catch (error) {
      this.metrics.incrementCounter('snapshots.failed');
      this.channel.publishNotice(
        this.notice('io-error', describeError(error).message, false, { sequence })
      );
    }
  }

  private trackSnapshot(write: Promise<void>) {
    this.pendingSnapshots.add(write);
    void write.finally(() => {
      this.pendingSnapshots.delete(write);
    });
  }

  private async teardown(handle: CameraHandle, outcome: EpisodeOutcome) {
    this.state = 'stopping';
    this.publishStatus(true);

    await Promise.allSettled(Array.from(this.pendingSnapshots));

    try {
      await handle.close();
    } catch (error) {
      this.log.warn({ err: error }, 'Failed to release camera');
    }

    this.heldDevice = null;
    this.previous = null;
    this.lastRaw = null;
    this.presence = false;
    this.fps = 0;
    this.lastFrameAt = null;
    this.stopRequested = false;
    this.state = 'idle';
    this.loop = null;
    this.lastOutcome = outcome;

    this.log.info({ reason: outcome.reason }, 'Detection stopped');
    this.publishStatus(true);

    const episode = this.episode;
    this.episode = null;
    episode?.resolve(outcome);

    for (const waiter of this.stopWaiters.splice(0)) {
      waiter.resolve(this.accept(waiter.command));
    }

    const restart = this.restartDevice;
    this.restartDevice = null;
    if (restart) {
      this.config = { ...this.config, deviceIndex: restart.index };
      try {
        await this.beginEpisode();
        restart.pending.resolve(this.accept(restart.pending.command));
      } catch (error) {
        restart.pending.resolve(this.reject(restart.pending.command, error));
      }
    }

    // commands queued behind the episode's end are applied in the new state
    for (const pending of this.loopQueue.splice(0)) {
      if (this.loop) {
        this.loopQueue.push(pending);
      } else {
        pending.resolve(await this.applyIdle(pending.command));
      }
    }
  }

  private trackFrameRate() {
    const now = this.now();
    if (this.lastFrameAt !== null) {
      const interval = now - this.lastFrameAt;
      if (interval > 0) {
        const instant = 1000 / interval;
        this.fps = this.fps === 0 ? instant : this.fps + this.fpsSmoothing * (instant - this.fps);
      }
    }
    this.lastFrameAt = now;
    this.metrics.setGauge('fps', this.fps);
  }

  private publishStatus(force = false) {
    const now = this.now();
    if (
      !force &&
      this.statusIntervalMs > 0 &&
      this.lastStatusAt !== null &&
      now - this.lastStatusAt < this.statusIntervalMs
    ) {
      return;
    }
    this.lastStatusAt = now;
    const status = this.getStatus();
    this.metrics.setGauge('backlog', status.backlog ? 1 : 0);
    this.channel.publishStatus(status);
  }

  private notice(
    code: NoticeCode,
    message: string,
    fatal: boolean,
    details?: Record<string, unknown>
  ): DetectorNotice {
    return { code, message, fatal, ts: this.now(), ...(details ? { details } : {}) };
  }

  private accept(command: DetectionCommand): Extract<CommandResult, { ok: true }> {
    this.metrics.recordCommand(command.type, 'ok');
    return { ok: true, command, config: this.getConfig() };
  }

  private reject(command: DetectionCommand, error: unknown): CommandResult {
    this.metrics.recordCommand(command.type, 'rejected');
    const described =
      error && typeof error === 'object' && !(error instanceof Error) && 'code' in error && 'message' in error
        ? { code: String(error.code), message: String(error.message) }
        : describeError(error);
    this.log.warn({ command: command.type, error: described }, 'Command rejected');
    return { ok: false, command, error: described };
  }
}

class FetchAborted extends Error {
  constructor() {
    super('Frame fetch abandoned for pending commands');
  }
}

function invalidValue(command: DetectionCommand) {
  return { code: 'invalid-command', message: `Command ${command.type} needs a finite numeric value` };
}

export function clampSensitivity(value: number): number {
  if (!Number.isFinite(value)) {
    return DEFAULT_DETECTION_CONFIG.sensitivity;
  }
  return Math.min(1, Math.max(0, value));
}

export function clampMinArea(value: number): number {
  if (!Number.isFinite(value)) {
    return DEFAULT_DETECTION_CONFIG.minArea;
  }
  return Math.min(MAX_MIN_AREA, Math.max(1, Math.round(value)));
}

export function clampDeviceIndex(value: number): number {
  if (!Number.isFinite(value)) {
    return DEFAULT_DETECTION_CONFIG.deviceIndex;
  }
  return Math.max(0, Math.round(value));
}
