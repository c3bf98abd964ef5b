import logger from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import type { ChannelMessage, DetectorNotice, MotionEvent, StatusSnapshot } from './types.js';

export const DEFAULT_BACKLOG_LIMIT = 256;

export interface StateChannelOptions {
  backlogLimit?: number;
  log?: typeof logger;
  metrics?: MetricsRegistry;
}

type Waiter = (message: ChannelMessage | null) => void;

interface SubscriptionHooks {
  backlogLimit: number;
  onBacklog: (subscription: Subscription, pending: number) => void;
  onClose: (subscription: Subscription) => void;
}

/**
 * One observer's ordered view of the channel. Statuses coalesce at the tail of the queue;
 * motion events and notices are never dropped.
 */
export class Subscription implements AsyncIterable<ChannelMessage> {
  private readonly queue: ChannelMessage[] = [];
  private readonly waiters: Waiter[] = [];
  private readonly hooks: SubscriptionHooks;
  private pendingCritical = 0;
  private backlogged = false;
  private closed = false;
  private finishing = false;

  constructor(hooks: SubscriptionHooks) {
    this.hooks = hooks;
  }

  get isClosed() {
    return this.closed;
  }

  get pending() {
    return this.queue.length;
  }

  get inBacklog() {
    return this.backlogged;
  }

  /** @internal called by the channel */
  deliver(message: ChannelMessage) {
    if (this.closed || this.finishing) {
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(message);
      return;
    }

    if (message.type === 'status') {
      const tail = this.queue[this.queue.length - 1];
      if (tail && tail.type === 'status') {
        this.queue[this.queue.length - 1] = message;
      } else {
        this.queue.push(message);
      }
      return;
    }

    this.queue.push(message);
    this.pendingCritical += 1;

    if (!this.backlogged && this.pendingCritical > this.hooks.backlogLimit) {
      this.backlogged = true;
      this.queue.push({
        type: 'notice',
        notice: {
          code: 'event-backlog',
          message: `Observer is ${this.pendingCritical} messages behind`,
          fatal: false,
          ts: Date.now(),
          details: { pending: this.pendingCritical, limit: this.hooks.backlogLimit }
        }
      });
      this.pendingCritical += 1;
      this.hooks.onBacklog(this, this.pendingCritical);
    }
  }

  poll(): ChannelMessage | undefined {
    const message = this.queue.shift();
    if (message && message.type !== 'status') {
      this.pendingCritical -= 1;
      if (this.backlogged && this.pendingCritical < this.hooks.backlogLimit / 2) {
        this.backlogged = false;
      }
    }
    return message;
  }

  /** Resolves with the next message, or `null` once closed or after `timeoutMs` without one. */
  next(timeoutMs?: number): Promise<ChannelMessage | null> {
    const queued = this.poll();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.finishing) {
      this.close();
    }
    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise(resolve => {
      let timer: NodeJS.Timeout | null = null;
      const waiter: Waiter = message => {
        if (timer) {
          clearTimeout(timer);
        }
        resolve(message);
      };
      this.waiters.push(waiter);

      if (typeof timeoutMs === 'number' && timeoutMs >= 0) {
        timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
          }
          resolve(null);
        }, timeoutMs);
      }
    });
  }

  /** Stops taking new messages; what is already queued is still handed out before the end. */
  finish() {
    if (this.closed || this.finishing) {
      return;
    }
    this.finishing = true;
    if (this.queue.length === 0) {
      this.close();
    }
  }

  close() {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.queue.length = 0;
    this.pendingCritical = 0;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
    this.hooks.onClose(this);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<ChannelMessage, void, undefined> {
    while (true) {
      const message = await this.next();
      if (message === null) {
        return;
      }
      yield message;
    }
  }
}

export class StateChannel {
  private readonly subscriptions = new Set<Subscription>();
  private readonly backlogLimit: number;
  private readonly log: typeof logger;
  private readonly metrics: MetricsRegistry;
  private latest: StatusSnapshot | null = null;

  constructor(options: StateChannelOptions = {}) {
    const limit = options.backlogLimit ?? DEFAULT_BACKLOG_LIMIT;
    this.backlogLimit = Number.isFinite(limit) && limit >= 1 ? Math.floor(limit) : DEFAULT_BACKLOG_LIMIT;
    this.log = options.log ?? logger;
    this.metrics = options.metrics ?? metrics;
  }

  get subscriberCount() {
    return this.subscriptions.size;
  }

  latestStatus(): StatusSnapshot | null {
    return this.latest;
  }

  hasBacklog(): boolean {
    for (const subscription of this.subscriptions) {
      if (subscription.inBacklog) {
        return true;
      }
    }
    return false;
  }

  subscribe(): Subscription {
    const subscription = new Subscription({
      backlogLimit: this.backlogLimit,
      onBacklog: (_subscription, pending) => {
        this.metrics.recordNotice('event-backlog');
        this.log.warn({ pending, limit: this.backlogLimit }, 'Channel observer is lagging');
      },
      onClose: closed => {
        this.subscriptions.delete(closed);
        this.metrics.setGauge('channel.subscribers', this.subscriptions.size);
      }
    });

    if (this.latest) {
      subscription.deliver({ type: 'status', status: this.latest });
    }
    this.subscriptions.add(subscription);
    this.metrics.setGauge('channel.subscribers', this.subscriptions.size);
    return subscription;
  }

  publishStatus(status: StatusSnapshot) {
    this.latest = status;
    this.broadcast({ type: 'status', status });
  }

  publishEvent(event: MotionEvent) {
    this.metrics.recordMotionEvent(event);
    this.log.info(
      { sequence: event.sequence, regions: event.regions.length, snapshot: event.snapshot },
      'Motion detected'
    );
    this.broadcast({ type: 'motion', event });
  }

  publishNotice(notice: DetectorNotice) {
    this.metrics.recordNotice(notice.code);
    if (notice.fatal) {
      this.log.error({ code: notice.code, details: notice.details }, notice.message);
    } else if (notice.code === 'snapshot-saved') {
      this.log.info({ details: notice.details }, notice.message);
    } else {
      this.log.warn({ code: notice.code, details: notice.details }, notice.message);
    }
    this.broadcast({ type: 'notice', notice });
  }

  close() {
    for (const subscription of Array.from(this.subscriptions)) {
      subscription.close();
    }
  }

  private broadcast(message: ChannelMessage) {
    for (const subscription of this.subscriptions) {
      try {
        subscription.deliver(message);
      } catch (error) {
        this.log.error({ err: error, type: message.type }, 'Failed to deliver channel message');
      }
    }
    this.metrics.setGauge('channel.backlog', this.hasBacklog() ? 1 : 0);
  }
}
