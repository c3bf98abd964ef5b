#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import { ConfigManager, defaultConfigPath, type ConfigReloadEvent, type MotionwatchConfig } from './config/index.js';
import { DetectionCoordinator } from './coordinator.js';
import { MotionEventStore, startEventRecorder } from './db.js';
import { describeError } from './errors.js';
import logger, { setLogLevel } from './logger.js';
import { startHttpServer } from './server/http.js';
import { StateChannel } from './stateChannel.js';
import type { ChannelMessage, DetectionConfig, MotionEvent } from './types.js';
import { FfmpegCameraProvider, type CameraProvider } from './video/camera.js';
import { largestRegion } from './video/decide.js';
import { SnapshotStore, type SnapshotSink } from './video/snapshots.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

/** Collaborators the CLI normally builds from configuration; tests pass their own. */
export interface CliDependencies {
  camera?: (config: MotionwatchConfig) => CameraProvider;
  snapshots?: (directory: string) => SnapshotSink;
  configPath?: string;
  /** Replaces SIGINT/SIGTERM as the shutdown trigger. */
  shutdown?: AbortSignal;
}

export type CliOptions = {
  device?: number;
  sensitivity?: number;
  minArea?: number;
  port?: number;
  configPath?: string;
  verbose: boolean;
  gui: boolean;
  snapshots: boolean;
  listDevices: boolean;
  help: boolean;
  version: boolean;
};

const USAGE_LINES = [
  'motionwatch - camera motion detector',
  '',
  'Usage:',
  '  motionwatch [options]',
  '',
  'Options:',
  '  -d, --device <index>       Camera index (default 0)',
  '  -s, --sensitivity <0..1>   Detection sensitivity, higher catches smaller changes (default 0.8)',
  '  -m, --min-area <pixels>    Smallest changed region that counts as motion (default 500)',
  '  -v, --verbose              Print settings and available cameras before starting',
  '  -g, --gui                  Serve the control panel API instead of printing events',
  '      --port <port>          Control panel port (default from config)',
  '      --no-snapshots         Do not save a picture on each motion event',
  '      --list-devices         Print the available cameras and exit',
  '      --config <path>        Configuration file (default config/default.json)',
  '  -h, --help                 Show this help',
  '  -V, --version              Print the version'
];

const VALUE_FLAGS = new Map<string, 'device' | 'sensitivity' | 'minArea' | 'port' | 'configPath'>([
  ['-d', 'device'],
  ['--device', 'device'],
  ['-s', 'sensitivity'],
  ['--sensitivity', 'sensitivity'],
  ['-m', 'minArea'],
  ['--min-area', 'minArea'],
  ['--port', 'port'],
  ['--config', 'configPath']
]);

const SWITCHES = new Map<string, 'verbose' | 'gui' | 'listDevices' | 'help' | 'version'>([
  ['-v', 'verbose'],
  ['--verbose', 'verbose'],
  ['-g', 'gui'],
  ['--gui', 'gui'],
  ['--list-devices', 'listDevices'],
  ['-h', 'help'],
  ['--help', 'help'],
  ['-V', 'version'],
  ['--version', 'version']
]);

/** Parses argv into options, or returns the message explaining why it could not. */
export function parseCliArgs(argv: string[]): CliOptions | string {
  const options: CliOptions = {
    verbose: false,
    gui: false,
    snapshots: true,
    listDevices: false,
    help: false,
    version: false
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    const [flag, inline] = splitInlineValue(token);

    const toggle = SWITCHES.get(flag);
    if (toggle) {
      if (inline !== undefined) {
        return `Option ${flag} does not take a value`;
      }
      options[toggle] = true;
      continue;
    }

    if (flag === '--no-snapshots') {
      options.snapshots = false;
      continue;
    }

    const key = VALUE_FLAGS.get(flag);
    if (!key) {
      return `Unknown option: ${token}`;
    }

    let raw = inline;
    if (raw === undefined) {
      index += 1;
      raw = argv[index];
    }
    if (raw === undefined || raw === '') {
      return `Option ${flag} requires a value`;
    }

    if (key === 'configPath') {
      options.configPath = raw;
      continue;
    }

    const value = Number(raw);
    if (!Number.isFinite(value)) {
      return `Option ${flag} expects a number, got "${raw}"`;
    }

    if ((key === 'device' || key === 'port') && (!Number.isInteger(value) || value < 0)) {
      return `Option ${flag} expects a non-negative integer, got "${raw}"`;
    }
    if (key === 'port' && value > 65535) {
      return `Option ${flag} must be at most 65535`;
    }
    if (key === 'sensitivity' && (value < 0 || value > 1)) {
      return `Option ${flag} must be between 0 and 1`;
    }
    if (key === 'minArea' && value < 1) {
      return `Option ${flag} must be at least 1`;
    }

    options[key] = value;
  }

  return options;
}

function splitInlineValue(token: string): [string, string | undefined] {
  if (!token.startsWith('--')) {
    return [token, undefined];
  }
  const equals = token.indexOf('=');
  if (equals === -1) {
    return [token, undefined];
  }
  return [token.slice(0, equals), token.slice(equals + 1)];
}

export function readVersion(): string {
  const packagePath = fileURLToPath(new URL('../package.json', import.meta.url));
  const parsed: unknown = JSON.parse(fs.readFileSync(packagePath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

function pad(value: number) {
  return String(value).padStart(2, '0');
}

export function formatTimestamp(ts: number): string {
  const date = new Date(ts);
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatMotionLine(event: MotionEvent): string {
  const largest = largestRegion(event);
  const where = largest ? `${largest.width}x${largest.height}@${largest.x},${largest.y}` : 'none';
  return `[${formatTimestamp(event.ts)}] MOTION DETECTED! (#${event.sequence}) regions=${event.regions.length} largest=${where}`;
}

function printMessage(message: ChannelMessage, io: CliIo, verbose: boolean) {
  switch (message.type) {
    case 'motion':
      io.stdout.write(`${formatMotionLine(message.event)}\n`);
      return;
    case 'notice': {
      const { notice } = message;
      if (notice.code === 'snapshot-saved') {
        const savedTo = notice.details?.path;
        if (typeof savedTo === 'string') {
          io.stdout.write(`  snapshot saved: ${savedTo}\n`);
        }
        return;
      }
      if (notice.fatal) {
        io.stderr.write(`Error: ${notice.message}\n`);
        return;
      }
      if (verbose) {
        io.stderr.write(`[${formatTimestamp(notice.ts)}] warning (${notice.code}): ${notice.message}\n`);
      }
      return;
    }
    case 'status':
      return;
  }
}

function waitForShutdown(signal: AbortSignal | undefined): { promise: Promise<string>; dispose: () => void } {
  if (signal) {
    let onAbort: () => void = () => undefined;
    const promise = new Promise<string>(resolve => {
      if (signal.aborted) {
        resolve('abort');
        return;
      }
      onAbort = () => resolve('abort');
      signal.addEventListener('abort', onAbort, { once: true });
    });
    return { promise, dispose: () => signal.removeEventListener('abort', onAbort) };
  }

  const handlers = new Map<NodeJS.Signals, () => void>();
  const promise = new Promise<string>(resolve => {
    for (const name of ['SIGINT', 'SIGTERM'] as const) {
      const handler = () => resolve(name);
      handlers.set(name, handler);
      process.once(name, handler);
    }
  });
  return {
    promise,
    dispose: () => {
      for (const [name, handler] of handlers) {
        process.off(name, handler);
      }
    }
  };
}

function createCameraProvider(config: MotionwatchConfig): CameraProvider {
  return new FfmpegCameraProvider({
    framesPerSecond: config.camera.framesPerSecond,
    width: config.camera.width,
    height: config.camera.height,
    inputFormat: config.camera.inputFormat,
    startTimeoutMs: config.camera.startTimeoutMs,
    probeCount: config.camera.probeCount,
    maxQueuedFrames: config.camera.maxQueuedFrames
  });
}

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  deps: CliDependencies = {}
): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (typeof parsed === 'string') {
    io.stderr.write(`motionwatch: ${parsed}\n`);
    io.stderr.write('Try "motionwatch --help" for usage.\n');
    return 2;
  }

  if (parsed.help) {
    io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
    return 0;
  }

  if (parsed.version) {
    io.stdout.write(`motionwatch ${readVersion()}\n`);
    return 0;
  }

  let configManager: ConfigManager;
  try {
    configManager = new ConfigManager(parsed.configPath ?? deps.configPath ?? defaultConfigPath());
  } catch (error) {
    io.stderr.write(`Failed to load configuration: ${describeError(error).message}\n`);
    return 1;
  }

  const config = configManager.getConfig();
  if (parsed.verbose) {
    setLogLevel('debug');
  }

  const camera = (deps.camera ?? createCameraProvider)(config);

  if (parsed.listDevices) {
    await printDevices(camera, io);
    return 0;
  }

  const detection: DetectionConfig = {
    sensitivity: parsed.sensitivity ?? config.detection.sensitivity,
    minArea: parsed.minArea ?? config.detection.minArea,
    deviceIndex: parsed.device ?? config.detection.deviceIndex
  };
  const snapshotsEnabled = parsed.snapshots && config.snapshots.enabled;
  const snapshots = snapshotsEnabled
    ? (deps.snapshots ?? (directory => new SnapshotStore({ directory })))(config.snapshots.directory)
    : null;

  if (parsed.verbose) {
    io.stdout.write(
      `Settings: device=${detection.deviceIndex} sensitivity=${detection.sensitivity} ` +
        `min-area=${detection.minArea} snapshots=${snapshotsEnabled ? config.snapshots.directory : 'off'}\n`
    );
    await printDevices(camera, io);
  }

  const channel = new StateChannel({ backlogLimit: config.channel.backlogLimit });
  const coordinator = new DetectionCoordinator({
    camera,
    channel,
    snapshots,
    config: detection,
    analysis: {
      blurRadius: config.analysis.blurRadius,
      baseThreshold: config.analysis.baseThreshold,
      dilateIterations: config.analysis.dilateIterations
    },
    frameTimeoutMs: config.camera.frameTimeoutMs,
    stallRetries: config.camera.stallRetries,
    statusIntervalMs: config.status.intervalMs,
    fpsSmoothing: config.status.fpsSmoothing
  });

  const stopWatching = configManager.watch();
  const onReload = ({ previous, next }: ConfigReloadEvent) => {
    if (next.detection.sensitivity !== previous.detection.sensitivity) {
      void coordinator.submit({ type: 'set-sensitivity', value: next.detection.sensitivity });
    }
    if (next.detection.minArea !== previous.detection.minArea) {
      void coordinator.submit({ type: 'set-min-area', value: next.detection.minArea });
    }
  };
  const onConfigError = (error: Error) => {
    logger.warn({ err: error }, 'Configuration reload rejected');
  };
  configManager.on('reload', onReload);
  configManager.on('error', onConfigError);

  try {
    if (parsed.gui) {
      return await runControlPanel(parsed, config, { channel, coordinator }, io, deps);
    }
    return await runDetection(parsed, { channel, coordinator }, io, deps);
  } finally {
    configManager.off('reload', onReload);
    configManager.off('error', onConfigError);
    stopWatching();
    channel.close();
  }
}

async function printDevices(camera: CameraProvider, io: CliIo) {
  const devices = await camera.listDevices();
  if (devices.length === 0) {
    io.stdout.write('No cameras found\n');
    return;
  }
  io.stdout.write('Available cameras:\n');
  for (const device of devices) {
    const size = device.resolution ? `${device.resolution.width}x${device.resolution.height}` : 'resolution unknown';
    io.stdout.write(`  [${device.index}] ${size}\n`);
  }
}

type Runtime = {
  channel: StateChannel;
  coordinator: DetectionCoordinator;
};

async function runDetection(
  options: CliOptions,
  { channel, coordinator }: Runtime,
  io: CliIo,
  deps: CliDependencies
): Promise<number> {
  const subscription = channel.subscribe();
  const printer = (async () => {
    for await (const message of subscription) {
      printMessage(message, io, options.verbose);
    }
  })();

  const finish = async () => {
    subscription.finish();
    await printer;
  };

  const started = await coordinator.start();
  if (!started.ok) {
    await finish();
    io.stderr.write(`Error: ${started.error.message}\n`);
    return 1;
  }

  io.stdout.write(`Monitoring camera ${started.config.deviceIndex}. Press Ctrl+C to stop.\n`);

  const shutdown = waitForShutdown(deps.shutdown);
  try {
    const ended = await Promise.race([
      coordinator.waitForIdle().then(outcome => ({ kind: 'episode' as const, outcome })),
      shutdown.promise.then(signal => ({ kind: 'signal' as const, signal }))
    ]);

    if (ended.kind === 'signal') {
      logger.info({ signal: ended.signal }, 'Shutdown requested');
      await coordinator.stop();
      await finish();
      return 0;
    }

    await finish();
    return ended.outcome.reason === 'fatal' ? 1 : 0;
  } finally {
    shutdown.dispose();
  }
}

async function runControlPanel(
  options: CliOptions,
  config: MotionwatchConfig,
  { channel, coordinator }: Runtime,
  io: CliIo,
  deps: CliDependencies
): Promise<number> {
  const store = new MotionEventStore(options.configPath ? config.database.path : undefined);
  const recorder = startEventRecorder(channel, store, {
    deviceIndex: () => coordinator.getConfig().deviceIndex
  });

  let server: Awaited<ReturnType<typeof startHttpServer>>;
  try {
    server = await startHttpServer({
      host: config.server.host,
      port: options.port ?? config.server.port,
      coordinator,
      channel,
      store
    });
  } catch (error) {
    await recorder.stop();
    store.close();
    io.stderr.write(`Error: control panel failed to start: ${describeError(error).message}\n`);
    return 1;
  }

  io.stdout.write(`Control panel listening on http://${config.server.host}:${server.port}\n`);

  const shutdown = waitForShutdown(deps.shutdown);
  try {
    const signal = await shutdown.promise;
    logger.info({ signal }, 'Shutdown requested');
    await coordinator.stop();
    return 0;
  } finally {
    shutdown.dispose();
    await server.close();
    await recorder.stop();
    store.close();
  }
}

function isMainModule() {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  const modulePath = fileURLToPath(import.meta.url);
  try {
    return fs.realpathSync(path.resolve(entry)) === modulePath;
  } catch {
    return path.resolve(entry) === modulePath;
  }
}

if (isMainModule()) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      process.stderr.write(`${describeError(error).message}\n`);
      process.exit(1);
    }
  );
}
