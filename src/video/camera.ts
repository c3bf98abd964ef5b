import type ffmpeg from 'fluent-ffmpeg';
import { CameraTimeoutError, CameraUnavailableError, InvalidFrameError } from '../errors.js';
import logger from '../logger.js';
import metrics from '../metrics/index.js';
import type { Frame, Resolution } from '../types.js';
import {
  FrameSource,
  type CameraInputFormat,
  type CommandFactoryOptions,
  type SourceExit
} from './source.js';
import { decodePngFrame } from './utils.js';

export interface CameraDevice {
  index: number;
  /** `null` while the device is held by a running episode that has not read a frame yet. */
  resolution: Resolution | null;
}

export type ListDevicesOptions = {
  /** Indices that must not be opened, such as the device a running episode holds. */
  skip?: readonly number[];
};

export interface CameraHandle {
  readonly deviceIndex: number;
  /** Rejects with `CameraTimeoutError` when no frame arrives in time, `CameraUnavailableError` once the device is gone. */
  nextFrame(timeoutMs: number): Promise<Frame>;
  close(): Promise<void>;
}

export interface CameraProvider {
  listDevices(options?: ListDevicesOptions): Promise<CameraDevice[]>;
  /** Rejects with `CameraUnavailableError` when the device cannot be acquired. */
  open(index: number): Promise<CameraHandle>;
}

export type FfmpegCameraOptions = {
  framesPerSecond: number;
  width?: number;
  height?: number;
  inputFormat?: CameraInputFormat;
  startTimeoutMs: number;
  probeCount: number;
  maxQueuedFrames: number;
  forceKillTimeoutMs?: number;
  platform?: NodeJS.Platform;
  commandFactory?: (options: CommandFactoryOptions) => ffmpeg.FfmpegCommand;
};

type Queued = Frame | InvalidFrameError;
type Waiter = {
  resolve: (frame: Frame) => void;
  reject: (error: Error) => void;
};

export class FfmpegCameraHandle implements CameraHandle {
  private readonly queue: Queued[] = [];
  private readonly waiters: Waiter[] = [];
  private failure: CameraUnavailableError | null = null;
  private closed = false;

  constructor(
    readonly deviceIndex: number,
    private readonly source: FrameSource,
    private readonly maxQueuedFrames: number
  ) {
    source.on('frame', (png: Buffer) => this.push(png));
    source.on('exit', (exit: SourceExit) => {
      const reason = exit.error ? `${exit.reason}: ${exit.error.message}` : exit.reason;
      this.fail(new CameraUnavailableError(deviceIndex, `capture ended (${reason})`, { cause: exit.error ?? undefined }));
    });
    source.on('error', (error: Error) => {
      logger.warn({ err: error, deviceIndex }, 'Camera stream reported an error');
    });
  }

  nextFrame(timeoutMs: number): Promise<Frame> {
    const queued = this.queue.shift();
    if (queued instanceof InvalidFrameError) {
      return Promise.reject(queued);
    }
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise<Frame>((resolve, reject) => {
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        reject(new CameraTimeoutError(timeoutMs));
      }, timeoutMs);

      const waiter: Waiter = {
        resolve: frame => {
          clearTimeout(timer);
          resolve(frame);
        },
        reject: error => {
          clearTimeout(timer);
          reject(error);
        }
      };
      this.waiters.push(waiter);
    });
  }

  /** Waits for the first frame without consuming it. */
  async awaitFirstFrame(timeoutMs: number): Promise<Frame> {
    const frame = await this.nextFrame(timeoutMs);
    this.queue.unshift(frame);
    return frame;
  }

  async close() {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.fail(new CameraUnavailableError(this.deviceIndex, 'handle closed'));
    this.queue.length = 0;
    await this.source.stop();
  }

  private push(png: Buffer) {
    if (this.closed) {
      return;
    }

    let item: Queued;
    try {
      item = decodePngFrame(png, Date.now());
    } catch (error) {
      item = error instanceof InvalidFrameError ? error : new InvalidFrameError(String(error));
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      if (item instanceof InvalidFrameError) {
        waiter.reject(item);
      } else {
        waiter.resolve(item);
      }
      return;
    }

    this.queue.push(item);
    while (this.queue.length > this.maxQueuedFrames) {
      this.queue.shift();
      metrics.incrementCounter('camera.droppedFrames');
    }
  }

  private fail(error: CameraUnavailableError) {
    if (this.failure) {
      return;
    }
    this.failure = error;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }
}

export class FfmpegCameraProvider implements CameraProvider {
  constructor(private readonly options: FfmpegCameraOptions) {}

  async open(index: number): Promise<CameraHandle> {
    return this.openHandle(index);
  }

  /** Probes indices `0..probeCount-1`, reading one frame from each to learn its resolution. */
  async listDevices(options: ListDevicesOptions = {}): Promise<CameraDevice[]> {
    const devices: CameraDevice[] = [];
    const skip = new Set(options.skip ?? []);

    for (let index = 0; index < this.options.probeCount; index += 1) {
      if (skip.has(index)) {
        continue;
      }
      let handle: FfmpegCameraHandle;
      try {
        handle = await this.openHandle(index);
      } catch (error) {
        logger.debug({ err: error, index }, 'Camera probe failed');
        continue;
      }

      try {
        const frame = await handle.awaitFirstFrame(this.options.startTimeoutMs);
        devices.push({ index, resolution: { width: frame.width, height: frame.height } });
      } finally {
        await handle.close();
      }
    }

    return devices;
  }

  private async openHandle(index: number): Promise<FfmpegCameraHandle> {
    if (!Number.isInteger(index) || index < 0) {
      throw new CameraUnavailableError(index, 'device index must be a non-negative integer');
    }

    const { input, inputFormat, inputOptions } = resolveCameraInput(
      index,
      this.options.platform ?? process.platform,
      this.options.inputFormat
    );

    const source = new FrameSource({
      input,
      inputFormat,
      inputOptions,
      framesPerSecond: this.options.framesPerSecond,
      width: this.options.width,
      height: this.options.height,
      forceKillTimeoutMs: this.options.forceKillTimeoutMs,
      commandFactory: this.options.commandFactory
    });
    const handle = new FfmpegCameraHandle(index, source, Math.max(1, this.options.maxQueuedFrames));
    source.start();

    try {
      await handle.awaitFirstFrame(this.options.startTimeoutMs);
    } catch (error) {
      await handle.close();
      if (error instanceof CameraUnavailableError) {
        throw error;
      }
      const reason =
        error instanceof CameraTimeoutError
          ? `no frame within ${this.options.startTimeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
      throw new CameraUnavailableError(index, reason, { cause: error });
    }

    logger.info({ deviceIndex: index, input, inputFormat }, 'Camera acquired');
    return handle;
  }
}

export function defaultInputFormat(platform: NodeJS.Platform): CameraInputFormat {
  switch (platform) {
    case 'darwin':
      return 'avfoundation';
    case 'win32':
      return 'dshow';
    default:
      return 'v4l2';
  }
}

export function resolveCameraInput(
  index: number,
  platform: NodeJS.Platform,
  override?: CameraInputFormat
): { input: string; inputFormat: CameraInputFormat; inputOptions: string[] } {
  const inputFormat = override ?? defaultInputFormat(platform);
  switch (inputFormat) {
    case 'avfoundation':
      return { input: `${index}:none`, inputFormat, inputOptions: [] };
    case 'dshow':
      return { input: 'video=default', inputFormat, inputOptions: ['-video_device_number', String(index)] };
    default:
      return { input: `/dev/video${index}`, inputFormat, inputOptions: [] };
  }
}
