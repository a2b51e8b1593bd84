import type { SnapshotMessage } from '@tagfield/shared';
import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { Coordinator } from '../src/game/Coordinator.js';
import { type FeedConnection, SnapshotFeed } from '../src/realtime/SnapshotFeed.js';

function createMockConnection(readyState = 1) {
  const send = vi.fn<(data: string) => void>();
  const connection: FeedConnection = { send, readyState, OPEN: 1 };
  return { connection, send };
}

function lastMessage(send: Mock<(data: string) => void>): SnapshotMessage {
  const raw = send.mock.calls.at(-1)?.[0];
  if (raw === undefined) {
    throw new Error('Nothing was sent');
  }
  return JSON.parse(raw);
}

describe('SnapshotFeed', () => {
  let coordinator: Coordinator;
  let feed: SnapshotFeed;

  beforeEach(() => {
    coordinator = new Coordinator({ random: () => 0.999999 });
    feed = new SnapshotFeed(coordinator);
  });

  it('should send the current state on connect', async () => {
    const { connection, send } = createMockConnection();

    await feed.addConnection(connection);

    expect(send).toHaveBeenCalledTimes(1);
    const message = lastMessage(send);
    expect(message.type).toBe('snapshot');
    expect(message.summary.phase).toBe('sleep');
    expect(message.devices).toEqual([]);
  });

  it('should forward coordinator changes', async () => {
    const { connection, send } = createMockConnection();
    await feed.addConnection(connection);

    await coordinator.enterPreparing({ humanPercentage: 40, timeoutSeconds: 10, durationMinutes: 5 });

    expect(send).toHaveBeenCalledTimes(2);
    expect(lastMessage(send).summary.phase).toBe('prepare');
  });

  it('should skip connections that are not open', async () => {
    const { connection, send } = createMockConnection(3);

    await feed.addConnection(connection);
    await coordinator.reset();

    expect(send).not.toHaveBeenCalled();
  });

  it('should stop sending to a removed connection', async () => {
    const { connection, send } = createMockConnection();
    await feed.addConnection(connection);

    feed.removeConnection(connection);
    await coordinator.reset();

    expect(send).toHaveBeenCalledTimes(1);
    expect(feed.connectionCount).toBe(0);
  });

  it('should stop listening once closed', async () => {
    const { connection, send } = createMockConnection();
    await feed.addConnection(connection);

    feed.close();
    await coordinator.reset();

    expect(send).toHaveBeenCalledTimes(1);
  });
});
