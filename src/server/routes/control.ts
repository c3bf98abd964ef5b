import type { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import type { DetectionCoordinator } from '../../coordinator.js';
import type { ListMotionEventsOptions, MotionEventStore } from '../../db.js';
import { describeError } from '../../errors.js';
import logger from '../../logger.js';
import metricsModule, { type MetricsRegistry } from '../../metrics/index.js';
import type { StateChannel, Subscription } from '../../stateChannel.js';
import type { ChannelMessage, CommandResult, DetectionCommand } from '../../types.js';

type Handler = (req: IncomingMessage, res: ServerResponse, url: URL) => boolean;

type ClientState = {
  heartbeat: NodeJS.Timeout;
  subscription: Subscription;
};

export interface ControlRouterOptions {
  coordinator: DetectionCoordinator;
  channel: StateChannel;
  store?: MotionEventStore | null;
  metrics?: MetricsRegistry;
  heartbeatMs?: number;
}

const MAX_BODY_BYTES = 16 * 1024;

export class ControlRouter {
  private readonly coordinator: DetectionCoordinator;
  private readonly channel: StateChannel;
  private readonly store: MotionEventStore | null;
  private readonly metrics: MetricsRegistry;
  private readonly heartbeatMs: number;
  private readonly clients = new Map<ServerResponse, ClientState>();
  private readonly handlers: Handler[];

  constructor(options: ControlRouterOptions) {
    this.coordinator = options.coordinator;
    this.channel = options.channel;
    this.store = options.store ?? null;
    this.metrics = options.metrics ?? metricsModule;
    this.heartbeatMs = options.heartbeatMs ?? 15000;
    this.handlers = [
      (req, res, url) => this.handleStatus(req, res, url),
      (req, res, url) => this.handleDevices(req, res, url),
      (req, res, url) => this.handleEvents(req, res, url),
      (req, res, url) => this.handleMetrics(req, res, url),
      (req, res, url) => this.handleCommand(req, res, url),
      (req, res, url) => this.handleStream(req, res, url)
    ];
  }

  handle(req: IncomingMessage, res: ServerResponse): boolean {
    if (!req.url) {
      return false;
    }

    const url = new URL(req.url, 'http://localhost');
    for (const handler of this.handlers) {
      if (handler(req, res, url)) {
        return true;
      }
    }

    return false;
  }

  get clientCount() {
    return this.clients.size;
  }

  close() {
    for (const [client, state] of this.clients) {
      clearInterval(state.heartbeat);
      state.subscription.close();
      client.end();
    }
    this.clients.clear();
  }

  private handleStatus(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/status') {
      return false;
    }
    sendJson(res, 200, { status: this.coordinator.getStatus() });
    return true;
  }

  private handleDevices(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/devices') {
      return false;
    }

    respond(res, async () => {
      const devices = await this.coordinator.listDevices();
      return [200, { devices, active: this.coordinator.getConfig().deviceIndex }];
    });
    return true;
  }

  private handleEvents(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/events') {
      return false;
    }

    if (!this.store) {
      sendJson(res, 503, { error: 'Event log unavailable' });
      return true;
    }

    const result = this.store.listMotionEvents(parseListOptions(url));
    sendJson(res, 200, { items: result.items, total: result.total });
    return true;
  }

  private handleMetrics(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/metrics') {
      return false;
    }

    if (url.searchParams.get('format') === 'prometheus') {
      res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4' });
      res.end(this.metrics.exportPrometheus());
      return true;
    }

    sendJson(res, 200, { metrics: this.metrics.snapshot() });
    return true;
  }

  private handleCommand(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (url.pathname !== '/api/commands') {
      return false;
    }

    if (req.method !== 'POST') {
      res.setHeader('Allow', 'POST');
      sendJson(res, 405, { error: 'Method not allowed' });
      return true;
    }

    respond(res, async () => {
      let body: unknown;
      try {
        body = await readJsonBody(req);
      } catch (error) {
        return [400, { error: `Invalid JSON body: ${describeError(error).message}` }];
      }

      const parsed = parseCommand(body);
      if (typeof parsed === 'string') {
        return [400, { error: parsed }];
      }

      const result = await this.coordinator.submit(parsed);
      return [commandStatus(result), { result }];
    });
    return true;
  }

  private handleStream(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/stream') {
      return false;
    }

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    });
    res.write(': connected\n\n');

    const subscription = this.channel.subscribe();
    if (!this.channel.latestStatus()) {
      writeSse(res, 'status', this.coordinator.getStatus());
    }
    this.sendHeartbeat(res);

    const heartbeat = setInterval(() => {
      if (!this.sendHeartbeat(res)) {
        cleanup();
      }
    }, this.heartbeatMs);

    if (typeof heartbeat.unref === 'function') {
      heartbeat.unref();
    }

    this.clients.set(res, { heartbeat, subscription });

    let cleanedUp = false;
    const cleanup = () => {
      if (cleanedUp) {
        return;
      }
      cleanedUp = true;

      res.off('error', cleanup);
      res.off('close', cleanup);

      clearInterval(heartbeat);
      subscription.close();
      this.clients.delete(res);
    };

    res.on('error', cleanup);
    res.on('close', cleanup);

    const pump = async () => {
      for await (const message of subscription) {
        if (!writeSse(res, message.type, messagePayload(message))) {
          break;
        }
      }
      cleanup();
    };
    pump().catch(error => {
      logger.warn({ err: error }, 'Control stream failed');
      cleanup();
    });

    return true;
  }

  private sendHeartbeat(res: ServerResponse): boolean {
    return writeSse(res, 'heartbeat', { ts: Date.now() });
  }
}

export function createControlRouter(options: ControlRouterOptions) {
  return new ControlRouter(options);
}

const COMMAND_TYPES: DetectionCommand['type'][] = [
  'start',
  'stop',
  'set-sensitivity',
  'set-min-area',
  'set-device',
  'snapshot-now'
];

/** Turns a request body into a command, or returns why it is not one. */
export function parseCommand(body: unknown): DetectionCommand | string {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return 'Command body must be an object';
  }

  const type = 'type' in body && typeof body.type === 'string' ? body.type : '';
  const value = 'value' in body ? body.value : undefined;

  if (type === 'start' || type === 'stop' || type === 'snapshot-now') {
    return { type };
  }

  if (type === 'set-sensitivity' || type === 'set-min-area' || type === 'set-device') {
    const numeric = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof numeric !== 'number' || !Number.isFinite(numeric)) {
      return `Command ${type} requires a numeric value`;
    }
    return { type, value: numeric };
  }

  return `Unknown command type; expected one of ${COMMAND_TYPES.join(', ')}`;
}

function commandStatus(result: CommandResult) {
  if (result.ok) {
    return 202;
  }
  return result.error.code === 'invalid-command' ? 400 : 409;
}

function messagePayload(message: ChannelMessage) {
  switch (message.type) {
    case 'status':
      return message.status;
    case 'motion':
      return message.event;
    case 'notice':
      return message.notice;
  }
}

function parseListOptions(url: URL): ListMotionEventsOptions {
  const options: ListMotionEventsOptions = {};
  const numeric = (key: string) => {
    const raw = url.searchParams.get(key);
    if (raw === null || raw.trim() === '') {
      return undefined;
    }
    const value = Number(raw);
    return Number.isFinite(value) ? value : undefined;
  };

  options.limit = numeric('limit');
  options.offset = numeric('offset');
  options.since = numeric('since');
  options.until = numeric('until');
  return options;
}

function respond(res: ServerResponse, work: () => Promise<[number, Record<string, unknown>]>) {
  void work().then(
    ([status, payload]) => sendJson(res, status, payload),
    error => {
      logger.error({ err: error }, 'Control request failed');
      sendJson(res, 500, { error: 'Internal server error' });
    }
  );
}

function writeSse(res: ServerResponse, event: string, payload: unknown): boolean {
  if (res.writableEnded || res.destroyed) {
    return false;
  }

  try {
    res.write(`event: ${event}\n`);
    res.write(`data: ${JSON.stringify(payload)}\n\n`);
    return true;
  } catch {
    return false;
  }
}

function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    req.on('data', (chunk: Buffer | string) => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      size += buffer.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error('body too large'));
        req.destroy();
        return;
      }
      chunks.push(buffer);
    });

    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString('utf8');
      if (!raw) {
        resolve({});
        return;
      }

      try {
        resolve(JSON.parse(raw));
      } catch (error) {
        reject(error);
      }
    });

    req.on('error', reject);
  });
}

function sendJson(res: ServerResponse, status: number, payload: Record<string, unknown>) {
  if (!res.headersSent) {
    res.writeHead(status, { 'Content-Type': 'application/json' });
  }
  res.end(JSON.stringify(payload));
}
