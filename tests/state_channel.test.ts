import { beforeEach, describe, expect, it } from 'vitest';
import metrics from '../src/metrics/index.js';
import { StateChannel } from '../src/stateChannel.js';
import type { ChannelMessage, DetectorNotice, MotionEvent, StatusSnapshot } from '../src/types.js';
import { drain } from './helpers/fakeCamera.js';

function status(fps: number): StatusSnapshot {
  return {
    state: 'running',
    fps,
    resolution: { width: 100, height: 100 },
    motionEvents: 0,
    lastMotionAt: null,
    motionPresent: false,
    backlog: false,
    config: { sensitivity: 0.5, minArea: 300, deviceIndex: 0 },
    ts: fps
  };
}

function event(sequence: number): MotionEvent {
  return {
    sequence,
    ts: sequence * 1000,
    regions: [{ x: 0, y: 0, width: 10, height: 10, area: 100 }],
    snapshot: false
  };
}

const stalled: DetectorNotice = {
  code: 'camera-stalled',
  message: 'No frame within 50ms, retrying',
  fatal: false,
  ts: 5
};

describe('StateChannel', () => {
  beforeEach(() => {
    metrics.reset();
  });

  it('StatusLatestWins', () => {
    const channel = new StateChannel();
    const subscription = channel.subscribe();

    channel.publishStatus(status(1));
    channel.publishStatus(status(2));

    expect(subscription.pending).toBe(1);
    expect(subscription.poll()).toEqual({ type: 'status', status: status(2) });
    expect(subscription.poll()).toBeUndefined();
  });

  it('MessagesStayInPublishOrder', () => {
    const channel = new StateChannel();
    const subscription = channel.subscribe();

    channel.publishStatus(status(1));
    channel.publishEvent(event(1));
    channel.publishStatus(status(2));
    channel.publishStatus(status(3));
    channel.publishNotice(stalled);

    const messages = drain(subscription);
    expect(messages.map(message => message.type)).toEqual(['status', 'motion', 'status', 'notice']);
    expect(messages[2]).toEqual({ type: 'status', status: status(3) });
  });

  it('NewSubscriberReceivesLatestStatus', () => {
    const channel = new StateChannel();
    channel.publishStatus(status(7));
    channel.publishEvent(event(1));

    const subscription = channel.subscribe();
    expect(drain(subscription)).toEqual([{ type: 'status', status: status(7) }]);
    expect(channel.latestStatus()).toEqual(status(7));
  });

  it('BacklogNoticeIsRaisedOnce', () => {
    const channel = new StateChannel({ backlogLimit: 2 });
    const subscription = channel.subscribe();

    for (let sequence = 1; sequence <= 5; sequence += 1) {
      channel.publishEvent(event(sequence));
    }

    expect(channel.hasBacklog()).toBe(true);
    expect(subscription.inBacklog).toBe(true);

    const messages = drain(subscription);
    expect(messages).toHaveLength(6);
    const notices = messages.filter(message => message.type === 'notice');
    expect(notices).toHaveLength(1);
    expect(messages[3].type).toBe('notice');
    if (messages[3].type === 'notice') {
      expect(messages[3].notice.code).toBe('event-backlog');
      expect(messages[3].notice.details).toEqual({ pending: 3, limit: 2 });
    }

    expect(channel.hasBacklog()).toBe(false);
    expect(metrics.snapshot().events.total).toBe(5);
  });

  it('SlowSubscriberDoesNotAffectOthers', () => {
    const channel = new StateChannel({ backlogLimit: 2 });
    const slow = channel.subscribe();
    const fast = channel.subscribe();

    for (let sequence = 1; sequence <= 3; sequence += 1) {
      channel.publishEvent(event(sequence));
      drain(fast);
    }

    expect(slow.inBacklog).toBe(true);
    expect(fast.inBacklog).toBe(false);
    expect(slow.pending).toBe(4);
  });

  it('NextResolvesNullOnTimeout', async () => {
    const channel = new StateChannel();
    const subscription = channel.subscribe();

    await expect(subscription.next(10)).resolves.toBeNull();

    const pending = subscription.next(1000);
    channel.publishEvent(event(1));
    await expect(pending).resolves.toEqual({ type: 'motion', event: event(1) });
  });

  it('AsyncIterationEndsOnClose', async () => {
    const channel = new StateChannel();
    const subscription = channel.subscribe();
    const received: ChannelMessage[] = [];

    const reader = (async () => {
      for await (const message of subscription) {
        received.push(message);
      }
    })();

    channel.publishEvent(event(1));
    channel.publishNotice(stalled);
    await new Promise(resolve => setImmediate(resolve));
    channel.close();
    await reader;

    expect(received.map(message => message.type)).toEqual(['motion', 'notice']);
    expect(subscription.isClosed).toBe(true);
    expect(channel.subscriberCount).toBe(0);
  });

  it('FinishHandsOutQueuedMessages', async () => {
    const channel = new StateChannel();
    const subscription = channel.subscribe();

    channel.publishEvent(event(1));
    channel.publishEvent(event(2));
    subscription.finish();
    channel.publishEvent(event(3));

    const received: number[] = [];
    for await (const message of subscription) {
      if (message.type === 'motion') {
        received.push(message.event.sequence);
      }
    }

    expect(received).toEqual([1, 2]);
    expect(subscription.isClosed).toBe(true);
    expect(channel.subscriberCount).toBe(0);
  });

  it('ClosedSubscriptionStopsReceiving', async () => {
    const channel = new StateChannel();
    const subscription = channel.subscribe();
    subscription.close();

    channel.publishEvent(event(1));

    expect(subscription.pending).toBe(0);
    await expect(subscription.next()).resolves.toBeNull();
    expect(channel.subscriberCount).toBe(0);
  });

  it('PublishWithoutSubscribersKeepsLatestStatus', () => {
    const channel = new StateChannel();
    expect(() => channel.publishEvent(event(1))).not.toThrow();
    channel.publishStatus(status(3));
    expect(channel.latestStatus()).toEqual(status(3));
    expect(metrics.snapshot().notices).toEqual({});
  });
});
