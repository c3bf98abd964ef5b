import ffmpeg from 'fluent-ffmpeg';
import { EventEmitter } from 'node:events';
import { Readable } from 'node:stream';
import metrics from '../metrics/index.js';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const DEFAULT_MAX_BUFFER_BYTES = 16 * 1024 * 1024;
const DEFAULT_FORCE_KILL_TIMEOUT_MS = 3000;

export type CameraInputFormat = 'v4l2' | 'avfoundation' | 'dshow';

export type CommandFactoryOptions = {
  input: string;
  inputFormat: CameraInputFormat;
  inputOptions: string[];
  framesPerSecond: number;
  width?: number;
  height?: number;
};

export type FrameSourceOptions = CommandFactoryOptions & {
  maxBufferBytes?: number;
  forceKillTimeoutMs?: number;
  commandFactory?: (options: CommandFactoryOptions) => ffmpeg.FfmpegCommand;
};

export type SourceExit = {
  reason: 'ffmpeg-error' | 'ffmpeg-ended' | 'ffmpeg-exit' | 'stream-error' | 'stream-closed' | 'ffmpeg-missing';
  error: Error | null;
  exitCode: number | null;
};

/**
 * Runs one ffmpeg process that captures a camera and writes PNG frames to stdout. Emits
 * `frame` with every complete PNG, `error` on stream corruption and `exit` once when the
 * process or its stream goes away without `stop()` having been called.
 */
export class FrameSource extends EventEmitter {
  private command: ffmpeg.FfmpegCommand | null = null;
  private commandCleanup: (() => void) | null = null;
  private stream: Readable | null = null;
  private streamCleanup: (() => void) | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private killTimer: NodeJS.Timeout | null = null;
  private exited = false;
  private stopping = false;

  constructor(private readonly options: FrameSourceOptions) {
    super();
  }

  start() {
    if (this.command) {
      return;
    }

    this.stopping = false;
    this.exited = false;

    let command: ffmpeg.FfmpegCommand;
    try {
      command = this.createCommand();
    } catch (error) {
      this.reportExit(isMissingBinary(error) ? 'ffmpeg-missing' : 'ffmpeg-error', toError(error));
      return;
    }

    this.command = command;

    const onError = (err: Error) => {
      this.reportExit(isMissingBinary(err) ? 'ffmpeg-missing' : 'ffmpeg-error', err);
    };
    const onEnd = () => {
      this.reportExit('ffmpeg-ended', null);
    };
    const onClose = (code: number | null) => {
      this.reportExit(code === 0 ? 'ffmpeg-ended' : 'ffmpeg-exit', null, code);
    };

    command.once('error', onError);
    command.once('end', onEnd);
    command.once('close', onClose);

    this.commandCleanup = () => {
      command.off('error', onError);
      command.off('end', onEnd);
      command.off('close', onClose);
    };

    try {
      const stream = command.pipe();
      if (!(stream instanceof Readable)) {
        throw new Error('ffmpeg did not provide a readable output stream');
      }
      this.consume(stream);
    } catch (error) {
      this.reportExit('ffmpeg-error', toError(error));
    }
  }

  consume(stream: Readable) {
    this.cleanupStream();
    this.stream = stream;
    this.buffer = Buffer.alloc(0);

    const onData = (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk]);
      const { frames, remainder, corrupted } = extractFrames(
        this.buffer,
        this.options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES
      );
      this.buffer = remainder;

      for (const frame of frames) {
        metrics.incrementCounter('camera.pngFrames');
        this.emit('frame', frame);
      }

      if (corrupted) {
        metrics.incrementCounter('camera.corruptedStreams');
        this.emit('error', new Error('Corrupted frame data in capture stream'));
      }
    };

    const onError = (err: Error) => {
      this.reportExit('stream-error', err);
    };

    const onClose = () => {
      this.reportExit('stream-closed', null);
    };

    stream.on('data', onData);
    stream.once('error', onError);
    stream.once('end', onClose);
    stream.once('close', onClose);

    this.streamCleanup = () => {
      stream.off('data', onData);
      stream.off('error', onError);
      stream.off('end', onClose);
      stream.off('close', onClose);
    };
  }

  async stop() {
    this.stopping = true;
    this.cleanupStream();

    const command = this.command;
    this.command = null;
    this.commandCleanup?.();
    this.commandCleanup = null;

    if (!command) {
      return;
    }

    await new Promise<void>(resolve => {
      const finish = () => {
        if (this.killTimer) {
          clearTimeout(this.killTimer);
          this.killTimer = null;
        }
        resolve();
      };

      command.on('error', finish);
      command.once('end', finish);
      command.once('close', finish);

      try {
        command.kill('SIGTERM');
      } catch {
        finish();
        return;
      }

      const delay = this.options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS;
      this.killTimer = setTimeout(() => {
        this.killTimer = null;
        try {
          command.kill('SIGKILL');
        } catch {
          // already gone
        }
        resolve();
      }, delay);
      this.killTimer.unref?.();
    });
  }

  private createCommand() {
    const { input, inputFormat, inputOptions, framesPerSecond, width, height } = this.options;
    if (this.options.commandFactory) {
      return this.options.commandFactory({
        input,
        inputFormat,
        inputOptions,
        framesPerSecond,
        width,
        height
      });
    }

    const command = ffmpeg(input).inputFormat(inputFormat);
    const options = [...inputOptions];
    if (width && height) {
      options.push('-video_size', `${width}x${height}`);
    }
    if (options.length > 0) {
      command.inputOptions(options);
    }

    return command
      .outputOptions('-vf', `fps=${framesPerSecond}`)
      .outputOptions('-f', 'image2pipe')
      .outputOptions('-vcodec', 'png');
  }

  private reportExit(reason: SourceExit['reason'], error: Error | null, exitCode: number | null = null) {
    if (this.stopping || this.exited) {
      return;
    }
    this.exited = true;
    this.cleanupStream();
    this.commandCleanup?.();
    this.commandCleanup = null;
    this.command = null;
    const exit: SourceExit = { reason, error, exitCode };
    this.emit('exit', exit);
  }

  private cleanupStream() {
    if (!this.stream) {
      return;
    }

    this.streamCleanup?.();
    this.streamCleanup = null;

    if (!this.stream.destroyed) {
      this.stream.destroy();
    }

    this.stream = null;
    this.buffer = Buffer.alloc(0);
  }
}

export function extractFrames(buffer: Buffer, maxBufferBytes = DEFAULT_MAX_BUFFER_BYTES) {
  let working = buffer;
  const frames: Buffer[] = [];
  let corrupted = false;

  while (true) {
    const pngStart = working.indexOf(PNG_SIGNATURE);

    if (pngStart === -1) {
      if (working.length > maxBufferBytes) {
        corrupted = true;
        working = Buffer.alloc(0);
      }
      break;
    }

    if (pngStart > 0) {
      working = working.subarray(pngStart);
    }

    const frame = slicePng(working);
    if (!frame) {
      if (working.length > maxBufferBytes) {
        corrupted = true;
        working = Buffer.alloc(0);
      }
      break;
    }

    frames.push(frame.png);
    working = frame.remainder;
  }

  return { frames, remainder: working, corrupted };
}

export type SliceResult = {
  png: Buffer;
  remainder: Buffer;
};

export function slicePng(buffer: Buffer): SliceResult | null {
  if (buffer.length < PNG_SIGNATURE.length) {
    return null;
  }

  if (!buffer.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    return null;
  }

  let offset = PNG_SIGNATURE.length;

  while (offset + 8 <= buffer.length) {
    const length = buffer.readUInt32BE(offset);
    const chunkType = buffer.toString('ascii', offset + 4, offset + 8);
    const chunkEnd = offset + 8 + length + 4;

    if (chunkEnd > buffer.length) {
      return null;
    }

    offset = chunkEnd;

    if (chunkType === 'IEND') {
      return {
        png: buffer.subarray(0, offset),
        remainder: buffer.subarray(offset)
      };
    }
  }

  return null;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isMissingBinary(error: unknown) {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
