import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import type { DetectionConfig } from '../types.js';
import type { CameraInputFormat } from '../video/source.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DatabaseConfig = {
  path: string;
};

export type AnalysisConfig = {
  blurRadius: number;
  baseThreshold: number;
  dilateIterations: number;
};

export type CameraConfig = {
  framesPerSecond: number;
  width?: number;
  height?: number;
  inputFormat?: CameraInputFormat;
  startTimeoutMs: number;
  frameTimeoutMs: number;
  stallRetries: number;
  probeCount: number;
  maxQueuedFrames: number;
};

export type SnapshotsConfig = {
  enabled: boolean;
  directory: string;
};

export type ChannelConfig = {
  backlogLimit: number;
};

export type StatusConfig = {
  intervalMs: number;
  fpsSmoothing: number;
};

export type ServerConfig = {
  host: string;
  port: number;
};

export type MotionwatchConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  detection: DetectionConfig;
  analysis: AnalysisConfig;
  camera: CameraConfig;
  snapshots: SnapshotsConfig;
  channel: ChannelConfig;
  status: StatusConfig;
  server: ServerConfig;
};

type JsonType = 'object' | 'number' | 'integer' | 'string' | 'boolean';

type JsonSchema = {
  type: JsonType;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
};

const section = (properties: Record<string, JsonSchema>, optional: string[] = []): JsonSchema => ({
  type: 'object',
  additionalProperties: false,
  required: Object.keys(properties).filter(key => !optional.includes(key)),
  properties
});

const motionwatchConfigSchema: JsonSchema = section({
  app: section({ name: { type: 'string' } }),
  logging: section({
    level: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']
    }
  }),
  database: section({ path: { type: 'string' } }),
  detection: section({
    sensitivity: { type: 'number', minimum: 0, maximum: 1 },
    minArea: { type: 'integer', minimum: 1, maximum: 10_000_000 },
    deviceIndex: { type: 'integer', minimum: 0 }
  }),
  analysis: section({
    blurRadius: { type: 'integer', minimum: 0, maximum: 15 },
    baseThreshold: { type: 'number', minimum: 1, maximum: 255 },
    dilateIterations: { type: 'integer', minimum: 0, maximum: 10 }
  }),
  camera: section(
    {
      framesPerSecond: { type: 'number', minimum: 1, maximum: 120 },
      width: { type: 'integer', minimum: 1 },
      height: { type: 'integer', minimum: 1 },
      inputFormat: { type: 'string', enum: ['v4l2', 'avfoundation', 'dshow'] },
      startTimeoutMs: { type: 'integer', minimum: 1 },
      frameTimeoutMs: { type: 'integer', minimum: 1 },
      stallRetries: { type: 'integer', minimum: 0 },
      probeCount: { type: 'integer', minimum: 0, maximum: 64 },
      maxQueuedFrames: { type: 'integer', minimum: 1 }
    },
    ['width', 'height', 'inputFormat']
  ),
  snapshots: section({
    enabled: { type: 'boolean' },
    directory: { type: 'string' }
  }),
  channel: section({ backlogLimit: { type: 'integer', minimum: 1 } }),
  status: section({
    intervalMs: { type: 'integer', minimum: 0 },
    fpsSmoothing: { type: 'number', minimum: 0.01, maximum: 1 }
  }),
  server: section({
    host: { type: 'string' },
    port: { type: 'integer', minimum: 0, maximum: 65535 }
  })
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const errors: string[] = [];

  if (schema.type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    if (schema.additionalProperties === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (schema.type === 'number' || schema.type === 'integer') {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (schema.type === 'integer' && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (schema.type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }
  return errors;
}

function validateLogicalConfig(config: MotionwatchConfig) {
  const messages: string[] = [];
  const { width, height } = config.camera;

  if ((width === undefined) !== (height === undefined)) {
    messages.push('config.camera.width and config.camera.height must be set together');
  }

  if (config.snapshots.enabled && config.snapshots.directory.trim().length === 0) {
    messages.push('config.snapshots.directory must not be empty while snapshots are enabled');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export function validateConfig(config: unknown): asserts config is MotionwatchConfig {
  const errors = validateAgainstSchema(motionwatchConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  // the schema walk above guarantees the shape
  validateLogicalConfig(config as MotionwatchConfig);
}

export function parseConfig(contents: string): MotionwatchConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): MotionwatchConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

export type ConfigReloadEvent = {
  previous: MotionwatchConfig;
  next: MotionwatchConfig;
};

/**
 * Holds the validated configuration file and, while watched, reloads it on change. A reload
 * that fails validation emits `error` and writes the last good contents back.
 */
export class ConfigManager extends EventEmitter {
  private currentConfig: MotionwatchConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;
  private lastGoodRaw: string;
  private restoring = false;
  private restoreTimer: NodeJS.Timeout | null = null;

  constructor(filePath = defaultConfigPath()) {
    super();
    this.filePath = path.resolve(filePath);
    const { config, raw } = this.loadFromDisk();
    this.currentConfig = config;
    this.lastGoodRaw = raw;
  }

  getConfig(): MotionwatchConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): MotionwatchConfig {
    const { config: next, raw } = this.loadFromDisk();
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.lastGoodRaw = raw;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        }
        this.restorePreviousConfig();
      }
    }, 100);
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.restoreTimer) {
      clearTimeout(this.restoreTimer);
      this.restoreTimer = null;
    }
    this.restoring = false;
  }

  private createWatcher(): fs.FSWatcher {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (this.restoring) {
        return;
      }

      if (eventType === 'rename') {
        this.closeWatcher();
        this.watcher = this.createWatcher();
      }
      this.scheduleReload();
    });
  }

  private loadFromDisk(): { config: MotionwatchConfig; raw: string } {
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    const config = parseConfig(contents);
    return { config, raw: contents };
  }

  private restorePreviousConfig() {
    this.restoring = true;
    try {
      fs.writeFileSync(this.filePath, this.lastGoodRaw, 'utf-8');
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.emit('error', err);
      }
    } finally {
      if (this.restoreTimer) {
        clearTimeout(this.restoreTimer);
      }
      this.restoreTimer = setTimeout(() => {
        this.restoring = false;
        this.restoreTimer = null;
      }, 200);
    }
  }
}

export function defaultConfigPath() {
  return path.resolve(process.cwd(), 'config/default.json');
}

