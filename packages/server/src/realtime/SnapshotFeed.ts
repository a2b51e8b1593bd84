import { type SnapshotMessage, serializeSnapshotMessage } from '@tagfield/shared';
import type { Coordinator } from '../game/Coordinator.js';
import { logger } from '../utils/logger.js';

/**
 * Minimal view of a WebSocket the feed writes to.
 */
export interface FeedConnection {
  send(data: string): void;
  readonly readyState: number;
  readonly OPEN: number;
}

/**
 * Pushes a snapshot of the activity to operator consoles: once on connect and
 * after every change the coordinator announces.
 */
export class SnapshotFeed {
  private readonly connections = new Set<FeedConnection>();
  private readonly coordinator: Coordinator;
  private readonly unsubscribe: () => void;

  constructor(coordinator: Coordinator) {
    this.coordinator = coordinator;
    this.unsubscribe = coordinator.subscribe((snapshot) => this.broadcast(snapshot));
  }

  /**
   * Start sending snapshots to a connection, beginning with the current state.
   */
  async addConnection(connection: FeedConnection): Promise<void> {
    this.connections.add(connection);
    logger.debug('Snapshot feed connection added', { connections: this.connections.size });
    const snapshot = await this.coordinator.currentSnapshot();
    this.send(connection, snapshot);
  }

  removeConnection(connection: FeedConnection): void {
    this.connections.delete(connection);
    logger.debug('Snapshot feed connection removed', { connections: this.connections.size });
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  broadcast(snapshot: SnapshotMessage): void {
    for (const connection of this.connections) {
      this.send(connection, snapshot);
    }
  }

  /**
   * Stop listening to the coordinator and forget every connection.
   */
  close(): void {
    this.unsubscribe();
    this.connections.clear();
  }

  private send(connection: FeedConnection, snapshot: SnapshotMessage): void {
    if (connection.readyState === connection.OPEN) {
      connection.send(serializeSnapshotMessage(snapshot));
    }
  }
}
