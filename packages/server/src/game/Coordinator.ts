/**
 * @fileoverview Composition root of the game core.
 *
 * The registry and the phase state form one unit of shared state. Every
 * operation below runs as a single exclusive section (read phase → mutate →
 * build response) on the injected mutex, so a poll never sees a role from one
 * phase paired with the label of another.
 */

import {
  DevicePollSchema,
  type DeviceView,
  type GameSummary,
  type SnapshotMessage,
} from '@tagfield/shared';
import { logger } from '../utils/logger.js';
import { Mutex } from '../utils/Mutex.js';
import { DeviceRegistry, resolveInactiveRole } from './DeviceRegistry.js';
import { InvalidPollError, toInputIssues } from './errors.js';
import { PhaseController } from './PhaseController.js';
import { RoleAssigner } from './RoleAssigner.js';
import {
  type Clock,
  type DeviceId,
  type DeviceRecord,
  type GameSettings,
  type RandomSource,
  type Role,
  systemClock,
  type TeamRole,
} from './types.js';
import { type PollResult, toDeviceView } from './views.js';

export interface CoordinatorOptions {
  /** Settings in force until the operator prepares an activity */
  settings?: GameSettings;
  random?: RandomSource;
  clock?: Clock;
  mutex?: Mutex;
}

/**
 * Receives the summary and device list after every state change.
 */
export type SnapshotListener = (snapshot: SnapshotMessage) => void;

export class Coordinator {
  private readonly registry: DeviceRegistry;
  private readonly controller: PhaseController;
  private readonly mutex: Mutex;
  private readonly clock: Clock;
  private readonly listeners = new Set<SnapshotListener>();

  constructor(options: CoordinatorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.mutex = options.mutex ?? new Mutex();
    this.registry = new DeviceRegistry(this.clock);
    this.controller = new PhaseController(this.registry, new RoleAssigner(options.random), {
      clock: this.clock,
      ...(options.settings ? { settings: options.settings } : {}),
    });
  }

  /**
   * Record a device check-in and resolve its role for the current phase.
   * @param input - Decoded poll payload
   * @throws {InvalidPollError} if a field is missing or malformed
   */
  async pollDevice(input: unknown): Promise<PollResult> {
    const parsed = DevicePollSchema.safeParse(input);
    if (!parsed.success) {
      const { issues } = parsed.error;
      const missing = issues.some(
        (issue) => issue.code === 'invalid_type' && issue.received === 'undefined'
      );
      throw new InvalidPollError(
        missing ? 'Missing required fields' : 'Invalid field values',
        toInputIssues(issues)
      );
    }
    const poll = parsed.data;

    const { result, snapshot } = await this.mutex.runExclusive(() => {
      const phase = this.controller.phase;
      const previousRole = this.registry.previousRole(poll.id);

      let role: Role;
      if (phase === 'active') {
        role = this.controller.resolveActiveRole(
          poll.id,
          poll.role,
          this.registry.get(poll.id)?.servedRole
        );
      } else {
        role = resolveInactiveRole(phase, previousRole);
      }

      this.registry.upsert(poll, role, phase);
      logger.debug('Device polled', { id: poll.id, role, phase });

      const now = this.clock();
      const pollResult: PollResult = {
        role,
        phase,
        timeoutSeconds: this.controller.settings.timeoutSeconds,
        durationMinutes: this.controller.settings.durationMinutes,
        remainingSeconds: this.controller.remainingSeconds(now),
        outcome: this.controller.outcome(),
      };

      // Telemetry-only polls are not broadcast; new devices and role changes are.
      const changed = previousRole !== role;
      return { result: pollResult, snapshot: changed ? this.buildSnapshot() : null };
    });

    if (snapshot) {
      this.publish(snapshot);
    }
    return result;
  }

  reset(): Promise<GameSummary> {
    return this.transition(() => this.controller.reset());
  }

  /**
   * @throws {InvalidSettingsError} if a value is not an integer in range
   * @throws {PhaseTransitionError} if the activity has ended
   */
  enterPreparing(settings: GameSettings): Promise<GameSummary> {
    return this.transition(() => this.controller.enterPreparing(settings));
  }

  /**
   * @throws {PhaseTransitionError} if the activity has ended
   */
  enterActive(): Promise<GameSummary> {
    return this.transition(() => {
      this.controller.enterActive();
    });
  }

  /**
   * @throws {InvalidSettingsError} if the delta is not an integer
   */
  extendDuration(deltaMinutes: number): Promise<GameSummary> {
    return this.transition(() => {
      this.controller.extendDuration(deltaMinutes);
    });
  }

  /**
   * @returns whether a minute was taken off, and the resulting summary
   */
  async shortenDuration(): Promise<{ accepted: boolean; summary: GameSummary }> {
    return this.decision(() => this.controller.shortenDuration());
  }

  enterEnded(): Promise<GameSummary> {
    return this.transition(() => this.controller.enterEnded());
  }

  /**
   * Operator move of a device into the other group while active.
   */
  async reassign(id: DeviceId, role: TeamRole): Promise<{ accepted: boolean; summary: GameSummary }> {
    return this.decision(() => this.controller.reassign(id, role));
  }

  /**
   * Copies of every device record, sorted by id.
   */
  snapshot(): Promise<DeviceRecord[]> {
    return this.mutex.runExclusive(() => this.registry.snapshot());
  }

  summary(): Promise<GameSummary> {
    return this.mutex.runExclusive(() => this.buildSummary());
  }

  /**
   * Summary and device views read in one section.
   */
  currentSnapshot(): Promise<SnapshotMessage> {
    return this.mutex.runExclusive(() => this.buildSnapshot());
  }

  /**
   * Register a listener for state changes.
   * @returns a function that removes the listener
   */
  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async transition(task: () => void): Promise<GameSummary> {
    const snapshot = await this.mutex.runExclusive(() => {
      task();
      return this.buildSnapshot();
    });
    this.publish(snapshot);
    return snapshot.summary;
  }

  private async decision(task: () => boolean): Promise<{ accepted: boolean; summary: GameSummary }> {
    const { accepted, snapshot } = await this.mutex.runExclusive(() => {
      const result = task();
      return { accepted: result, snapshot: this.buildSnapshot() };
    });
    if (accepted) {
      this.publish(snapshot);
    }
    return { accepted, summary: snapshot.summary };
  }

  private buildSummary(): GameSummary {
    const startedAt = this.controller.startedAt;
    const humans = this.controller.members('human').filter((id) => this.registry.has(id));
    const zombies = this.controller.members('zombie').filter((id) => this.registry.has(id));
    return {
      phase: this.controller.phase,
      settings: this.controller.settings,
      startedAt: startedAt ? startedAt.toISOString() : null,
      deviceCount: this.registry.size,
      humans,
      zombies,
      humanHealth: this.totalHealth(humans),
      zombieHealth: this.totalHealth(zombies),
      remainingSeconds: this.controller.remainingSeconds(this.clock()),
      outcome: this.controller.outcome(),
    };
  }

  private totalHealth(ids: readonly DeviceId[]): number {
    return ids.reduce((total, id) => total + (this.registry.get(id)?.health ?? 0), 0);
  }

  private buildSnapshot(): SnapshotMessage {
    const devices: DeviceView[] = this.registry.snapshot().map(toDeviceView);
    return { type: 'snapshot', summary: this.buildSummary(), devices };
  }

  private publish(snapshot: SnapshotMessage): void {
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        logger.error('Snapshot listener failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
