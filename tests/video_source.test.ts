import type { FfmpegCommand } from 'fluent-ffmpeg';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DetectionCoordinator } from '../src/coordinator.js';
import { CameraTimeoutError, CameraUnavailableError, InvalidFrameError } from '../src/errors.js';
import metrics from '../src/metrics/index.js';
import { StateChannel } from '../src/stateChannel.js';
import {
  FfmpegCameraProvider,
  defaultInputFormat,
  resolveCameraInput,
  type CameraHandle
} from '../src/video/camera.js';
import { FrameSource, extractFrames, slicePng, type CommandFactoryOptions, type SourceExit } from '../src/video/source.js';
import { decodePngFrame, encodePngFrame } from '../src/video/utils.js';
import { GRAY, solidFrame, type Rgb } from './helpers/frames.js';

function pngOf(rgb: Rgb = GRAY, width = 4, height = 3) {
  return encodePngFrame(solidFrame(width, height, rgb));
}

// signature plus a bare IEND chunk: sliceable, but not a decodable image
const HOLLOW_PNG = Buffer.concat([
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
  Buffer.from([0, 0, 0, 0]),
  Buffer.from('IEND', 'ascii'),
  Buffer.from([0xae, 0x42, 0x60, 0x82])
]);

function tick() {
  return new Promise<void>(resolve => setImmediate(resolve));
}

async function waitFor(predicate: () => boolean, timeoutMs = 1000) {
  const started = Date.now();
  while (!predicate()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error('Timed out waiting for predicate');
    }
    await tick();
  }
}

describe('FrameSource', () => {
  beforeEach(() => {
    metrics.reset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('FrameSourceBuildsCommandFromOptions', () => {
    const commandFactory = vi.fn((_options: CommandFactoryOptions) => new FakeCommand() as unknown as FfmpegCommand);
    const source = new FrameSource({
      input: '/dev/video1',
      inputFormat: 'v4l2',
      inputOptions: [],
      framesPerSecond: 10,
      width: 640,
      height: 480,
      commandFactory
    });

    source.start();
    source.start();

    expect(commandFactory).toHaveBeenCalledTimes(1);
    expect(commandFactory).toHaveBeenCalledWith({
      input: '/dev/video1',
      inputFormat: 'v4l2',
      inputOptions: [],
      framesPerSecond: 10,
      width: 640,
      height: 480
    });
  });

  it('FrameSourceReassemblesSplitFrames', async () => {
    const command = new FakeCommand();
    const source = new FrameSource({
      input: 'noop',
      inputFormat: 'v4l2',
      inputOptions: [],
      framesPerSecond: 1,
      forceKillTimeoutMs: 0,
      commandFactory: () => command as unknown as FfmpegCommand
    });
    const frames: Buffer[] = [];
    source.on('frame', (frame: Buffer) => frames.push(frame));

    source.start();
    const first = pngOf([10, 10, 10]);
    const second = pngOf([200, 200, 200]);
    command.pushFrame(first.subarray(0, 20));
    command.pushFrame(Buffer.concat([first.subarray(20), second]));

    await waitFor(() => frames.length === 2);
    expect(frames[0].equals(first)).toBe(true);
    expect(frames[1].equals(second)).toBe(true);
    expect(metrics.snapshot().counters['camera.pngFrames']).toBe(2);

    await source.stop();
  });

  it('FrameSourceReportsExitOnce', () => {
    const command = new FakeCommand();
    const source = new FrameSource({
      input: 'noop',
      inputFormat: 'v4l2',
      inputOptions: [],
      framesPerSecond: 1,
      commandFactory: () => command as unknown as FfmpegCommand
    });
    const exits: SourceExit[] = [];
    source.on('exit', (exit: SourceExit) => exits.push(exit));

    source.start();
    command.emitClose(1);
    command.emitClose(1);

    expect(exits).toEqual([{ reason: 'ffmpeg-exit', error: null, exitCode: 1 }]);
  });

  it('FrameSourceMissingBinary', () => {
    const missing = Object.assign(new Error('spawn ffmpeg ENOENT'), { code: 'ENOENT' });
    const source = new FrameSource({
      input: 'noop',
      inputFormat: 'v4l2',
      inputOptions: [],
      framesPerSecond: 1,
      commandFactory: () => {
        throw missing;
      }
    });
    const exits: SourceExit[] = [];
    source.on('exit', (exit: SourceExit) => exits.push(exit));

    source.start();

    expect(exits).toEqual([{ reason: 'ffmpeg-missing', error: missing, exitCode: null }]);
  });

  it('FrameSourceStopEscalatesToSigkill', async () => {
    const command = new FakeCommand();
    const source = new FrameSource({
      input: 'noop',
      inputFormat: 'v4l2',
      inputOptions: [],
      framesPerSecond: 1,
      forceKillTimeoutMs: 0,
      commandFactory: () => command as unknown as FfmpegCommand
    });
    const exits: SourceExit[] = [];
    source.on('exit', (exit: SourceExit) => exits.push(exit));

    source.start();
    await source.stop();
    command.emitClose(null, 'SIGKILL');

    expect(command.killedSignals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(exits).toEqual([]);
  });

  it('FrameSourceStopResolvesOnClose', async () => {
    const command = new FakeCommand();
    command.closeOnKill = true;
    const source = new FrameSource({
      input: 'noop',
      inputFormat: 'v4l2',
      inputOptions: [],
      framesPerSecond: 1,
      forceKillTimeoutMs: 60_000,
      commandFactory: () => command as unknown as FfmpegCommand
    });

    source.start();
    await source.stop();

    expect(command.killedSignals).toEqual(['SIGTERM']);
  });
});

describe('PngFraming', () => {
  it('SlicePngSplitsAtIend', () => {
    const png = pngOf();
    const trailing = Buffer.from([1, 2, 3]);

    const sliced = slicePng(Buffer.concat([png, trailing]));
    expect(sliced?.png.equals(png)).toBe(true);
    expect(sliced?.remainder.equals(trailing)).toBe(true);

    expect(slicePng(png.subarray(0, png.length - 1))).toBeNull();
    expect(slicePng(Buffer.from('not a png at all'))).toBeNull();
  });

  it('ExtractFramesSkipsGarbage', () => {
    const png = pngOf();
    const { frames, remainder, corrupted } = extractFrames(
      Buffer.concat([Buffer.from('noise'), png, png.subarray(0, 10)])
    );

    expect(frames).toHaveLength(1);
    expect(frames[0].equals(png)).toBe(true);
    expect(remainder.equals(png.subarray(0, 10))).toBe(true);
    expect(corrupted).toBe(false);
  });

  it('ExtractFramesFlagsOversizedBuffer', () => {
    const { frames, remainder, corrupted } = extractFrames(Buffer.alloc(64, 7), 32);

    expect(frames).toEqual([]);
    expect(remainder).toHaveLength(0);
    expect(corrupted).toBe(true);
  });

  it('DecodePngFrameRoundTrip', () => {
    const frame = decodePngFrame(pngOf([1, 2, 3], 2, 2), 77);

    expect(frame.width).toBe(2);
    expect(frame.height).toBe(2);
    expect(frame.ts).toBe(77);
    expect(Array.from(frame.data.subarray(0, 4))).toEqual([1, 2, 3, 255]);
    expect(() => decodePngFrame(HOLLOW_PNG)).toThrow(InvalidFrameError);
  });
});

describe('FfmpegCameraProvider', () => {
  let handles: CameraHandle[] = [];

  beforeEach(() => {
    metrics.reset();
    handles = [];
  });

  afterEach(async () => {
    await Promise.all(handles.map(handle => handle.close()));
  });

  function createProvider(
    onCommand: (command: FakeCommand, options: CommandFactoryOptions) => void,
    overrides: Partial<ConstructorParameters<typeof FfmpegCameraProvider>[0]> = {}
  ) {
    const commands: FakeCommand[] = [];
    const provider = new FfmpegCameraProvider({
      framesPerSecond: 10,
      startTimeoutMs: 50,
      probeCount: 2,
      maxQueuedFrames: 4,
      forceKillTimeoutMs: 0,
      platform: 'linux',
      commandFactory: options => {
        const command = new FakeCommand();
        commands.push(command);
        onCommand(command, options);
        return command as unknown as FfmpegCommand;
      },
      ...overrides
    });
    return { provider, commands };
  }

  it('CameraOpenDeliversDecodedFrames', async () => {
    const { provider, commands } = createProvider(command => command.pushFrame(pngOf([10, 10, 10])));

    const handle = await provider.open(0);
    handles.push(handle);
    commands[0].pushFrame(pngOf([90, 90, 90]));

    const first = await handle.nextFrame(100);
    const second = await handle.nextFrame(100);

    expect(handle.deviceIndex).toBe(0);
    expect([first.width, first.height]).toEqual([4, 3]);
    expect(first.data[0]).toBe(10);
    expect(second.data[0]).toBe(90);
  });

  it('CameraOpenTimesOutWithoutFrames', async () => {
    const { provider, commands } = createProvider(() => undefined, { startTimeoutMs: 20 });

    await expect(provider.open(1)).rejects.toThrow('Camera 1 unavailable: no frame within 20ms');
    expect(commands[0].killedSignals).toContain('SIGTERM');
  });

  it('CameraOpenFailsWhenFfmpegExits', async () => {
    const { provider } = createProvider(command => {
      setImmediate(() => command.emitClose(1));
    });

    const failure = provider.open(0);
    await expect(failure).rejects.toBeInstanceOf(CameraUnavailableError);
    await expect(failure).rejects.toThrow('capture ended (ffmpeg-exit)');
  });

  it('CameraOpenRejectsNegativeIndex', async () => {
    const { provider, commands } = createProvider(() => undefined);

    await expect(provider.open(-1)).rejects.toThrow('device index must be a non-negative integer');
    expect(commands).toHaveLength(0);
  });

  it('CameraHandleTimeoutAndExit', async () => {
    const { provider, commands } = createProvider(command => command.pushFrame(pngOf()));

    const handle = await provider.open(0);
    handles.push(handle);
    await handle.nextFrame(100);

    await expect(handle.nextFrame(10)).rejects.toBeInstanceOf(CameraTimeoutError);

    commands[0].emitClose(1);
    await expect(handle.nextFrame(100)).rejects.toBeInstanceOf(CameraUnavailableError);
  });

  it('CameraHandleQueuesUndecodableFrames', async () => {
    const { provider, commands } = createProvider(command => command.pushFrame(pngOf()));

    const handle = await provider.open(0);
    handles.push(handle);
    commands[0].pushFrame(HOLLOW_PNG);
    commands[0].pushFrame(pngOf([90, 90, 90]));

    await handle.nextFrame(100);
    await expect(handle.nextFrame(100)).rejects.toBeInstanceOf(InvalidFrameError);
    const after = await handle.nextFrame(100);
    expect(after.data[0]).toBe(90);
  });

  it('CameraHandleDropsOldestFrames', async () => {
    const { provider, commands } = createProvider(command => command.pushFrame(pngOf([10, 10, 10])), {
      maxQueuedFrames: 2
    });

    const handle = await provider.open(0);
    handles.push(handle);
    commands[0].pushFrame(Buffer.concat([pngOf([20, 20, 20]), pngOf([30, 30, 30])]));
    await waitFor(() => metrics.snapshot().counters['camera.droppedFrames'] === 1);

    const next = await handle.nextFrame(100);
    expect(next.data[0]).toBe(20);
  });

  it('CameraListDevicesProbesIndices', async () => {
    const inputs: string[] = [];
    const { provider } = createProvider(
      (command, options) => {
        inputs.push(options.input);
        if (options.input === '/dev/video0') {
          command.pushFrame(pngOf(GRAY, 6, 5));
        }
      },
      { startTimeoutMs: 20 }
    );

    await expect(provider.listDevices()).resolves.toEqual([{ index: 0, resolution: { width: 6, height: 5 } }]);
    expect(inputs).toEqual(['/dev/video0', '/dev/video1']);
  });

  it('CoordinatorListingSkipsHeldCamera', async () => {
    const inputs: string[] = [];
    const { provider } = createProvider(
      (command, options) => {
        inputs.push(options.input);
        if (options.input === '/dev/video0') {
          command.pushFrame(pngOf(GRAY, 6, 5));
        }
      },
      { startTimeoutMs: 20 }
    );
    const coordinator = new DetectionCoordinator({
      camera: provider,
      channel: new StateChannel(),
      config: { deviceIndex: 0 },
      frameTimeoutMs: 50,
      stallRetries: 1000
    });

    try {
      await expect(coordinator.start()).resolves.toMatchObject({ ok: true });
      await waitFor(() => coordinator.getStatus().resolution !== null);

      await expect(coordinator.listDevices()).resolves.toEqual([{ index: 0, resolution: { width: 6, height: 5 } }]);
      expect(inputs).toEqual(['/dev/video0', '/dev/video1']);
    } finally {
      await coordinator.stop();
    }
  });

  it('CameraInputPerPlatform', () => {
    expect(defaultInputFormat('linux')).toBe('v4l2');
    expect(defaultInputFormat('darwin')).toBe('avfoundation');
    expect(defaultInputFormat('win32')).toBe('dshow');

    expect(resolveCameraInput(2, 'linux')).toEqual({ input: '/dev/video2', inputFormat: 'v4l2', inputOptions: [] });
    expect(resolveCameraInput(2, 'darwin')).toEqual({ input: '2:none', inputFormat: 'avfoundation', inputOptions: [] });
    expect(resolveCameraInput(2, 'win32')).toEqual({
      input: 'video=default',
      inputFormat: 'dshow',
      inputOptions: ['-video_device_number', '2']
    });
    expect(resolveCameraInput(0, 'win32', 'v4l2').input).toBe('/dev/video0');
  });
});

class FakeCommand extends EventEmitter {
  public readonly killedSignals: NodeJS.Signals[] = [];
  public readonly stream: PassThrough;
  public closeOnKill = false;

  constructor() {
    super();
    this.stream = new PassThrough();
  }

  pipe() {
    return this.stream;
  }

  kill(signal: NodeJS.Signals) {
    this.killedSignals.push(signal);
    if (this.closeOnKill) {
      setImmediate(() => this.emitClose(null, signal));
    }
    return this;
  }

  pushFrame(frame: Buffer) {
    this.stream.write(frame);
  }

  emitClose(code: number | null, signal: NodeJS.Signals | null = null) {
    this.emit('close', code, signal);
  }
}
