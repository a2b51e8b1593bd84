/**
 * @fileoverview Simulated wearable that polls the coordinator like the real firmware.
 * Used to bench-test a running server without flashing hardware.
 */

import {
  DEVICE_POLL_INTERVAL_MS,
  DEVICE_POLL_PATH,
  type DevicePoll,
  type DevicePollResponse,
  encodePollQuery,
  type Phase,
  parseDevicePollResponse,
  type Role,
  type TeamRole,
} from '@tagfield/shared';
import { logger } from './utils/logger.js';

/**
 * Configuration for a simulated device.
 */
export interface SimulatorConfig {
  /** Base URL of the coordinator, e.g. http://localhost:5000 */
  serverUrl: string;
  id: string;
  ip: string;
  rssi: number;
  health: number;
  battery: number;
  pollIntervalMs: number;
}

const DEFAULT_CONFIG: Omit<SimulatorConfig, 'serverUrl' | 'id'> = {
  ip: '127.0.0.1',
  rssi: -60,
  health: 100,
  battery: 100,
  pollIntervalMs: DEVICE_POLL_INTERVAL_MS,
};

/**
 * Error raised when the coordinator refuses a poll or answers with something unreadable.
 */
export class SimulatorError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'SimulatorError';
    this.status = status;
  }
}

function errorMessage(body: unknown, fallback: string): string {
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return fallback;
}

export class DeviceSimulator {
  private readonly config: SimulatorConfig;
  private readonly fetchImpl: typeof fetch;
  private lastResponse: DevicePollResponse | null = null;
  private requestedRole: TeamRole | null = null;
  private pollTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    config: Partial<SimulatorConfig> & Pick<SimulatorConfig, 'serverUrl' | 'id'>,
    fetchImpl: typeof fetch = fetch
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.fetchImpl = fetchImpl;
  }

  get id(): string {
    return this.config.id;
  }

  /** Role from the last response, neutral before the first one */
  get role(): Role {
    return this.lastResponse?.role ?? 'neutral';
  }

  /** Phase from the last response, null before the first one */
  get phase(): Phase | null {
    return this.lastResponse?.status ?? null;
  }

  get response(): DevicePollResponse | null {
    return this.lastResponse;
  }

  get isRunning(): boolean {
    return this.pollTimer !== null;
  }

  /**
   * Ask to switch group on the next poll (e.g. a human that has been tagged).
   */
  requestRole(role: TeamRole): void {
    this.requestedRole = role;
  }

  setHealth(health: number): void {
    this.config.health = health;
  }

  /**
   * Payload the next poll will carry.
   */
  buildPoll(): DevicePoll {
    return {
      id: this.config.id,
      ip: this.config.ip,
      rssi: this.config.rssi,
      role: this.requestedRole ?? this.role,
      status: this.phase ?? 'wait',
      health: this.config.health,
      battery: this.config.battery,
      comment: '',
    };
  }

  /**
   * Send one poll and record the answer.
   * @throws {SimulatorError} on a non-2xx status or an unreadable body
   */
  async pollOnce(): Promise<DevicePollResponse> {
    const url = `${this.config.serverUrl}${DEVICE_POLL_PATH}?${encodePollQuery(this.buildPoll())}`;
    const response = await this.fetchImpl(url);
    const body: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      throw new SimulatorError(errorMessage(body, `Poll failed with status ${response.status}`), response.status);
    }

    const parsed = parseDevicePollResponse(body);
    if (!parsed) {
      throw new SimulatorError('Malformed poll response', response.status);
    }

    this.onResponse(parsed);
    return parsed;
  }

  /**
   * Start polling on the configured interval.
   */
  start(): void {
    if (this.pollTimer) {
      return;
    }
    logger.info('Simulated device starting', { id: this.config.id, serverUrl: this.config.serverUrl });
    this.pollTimer = setInterval(() => {
      this.pollOnce().catch((error: unknown) => {
        logger.warn('Poll failed', {
          id: this.config.id,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }, this.config.pollIntervalMs);
  }

  stop(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
      logger.info('Simulated device stopped', { id: this.config.id });
    }
  }

  private onResponse(next: DevicePollResponse): void {
    const previous = this.lastResponse;

    if (previous?.status !== next.status) {
      logger.info('Phase changed', { id: this.config.id, phase: next.status });
    }
    if (previous?.role !== next.role) {
      logger.info('Role changed', { id: this.config.id, role: next.role });
    }

    // A request is settled once granted, or once the phase no longer allows it.
    if (this.requestedRole === next.role || next.status !== 'active') {
      this.requestedRole = null;
    }

    this.lastResponse = next;
  }
}
