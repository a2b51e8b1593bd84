import { DEFAULT_GAME_SETTINGS, GameSettingsSchema } from '@tagfield/shared';
import { logger } from '../utils/logger.js';
import type { DeviceRegistry } from './DeviceRegistry.js';
import { InvalidSettingsError, PhaseTransitionError, toInputIssues } from './errors.js';
import type { RoleAssigner } from './RoleAssigner.js';
import {
  type Clock,
  type DeviceId,
  type GameSettings,
  type Outcome,
  type Partition,
  type Phase,
  type PhaseState,
  type Role,
  systemClock,
  type TeamRole,
} from './types.js';

export interface PhaseControllerOptions {
  settings?: GameSettings;
  clock?: Clock;
}

/**
 * Owns the activity phase, its settings and the two groups, and applies the
 * side effects of every transition to the device registry.
 *
 * Phases run sleep → prepare → active → end. End is terminal: only `reset()`
 * leaves it.
 */
export class PhaseController {
  private readonly state: PhaseState;
  private readonly registry: DeviceRegistry;
  private readonly assigner: RoleAssigner;
  private readonly clock: Clock;

  constructor(registry: DeviceRegistry, assigner: RoleAssigner, options: PhaseControllerOptions = {}) {
    this.registry = registry;
    this.assigner = assigner;
    this.clock = options.clock ?? systemClock;
    this.state = {
      phase: 'sleep',
      settings: options.settings ?? DEFAULT_GAME_SETTINGS,
      startedAt: null,
      humanGroup: new Set(),
      zombieGroup: new Set(),
      displaced: new Map(),
    };
  }

  get phase(): Phase {
    return this.state.phase;
  }

  get settings(): GameSettings {
    return this.state.settings;
  }

  get startedAt(): Date | null {
    return this.state.startedAt;
  }

  /**
   * Back to sleep: every device neutral, groups and activity clock cleared.
   */
  reset(): void {
    this.changePhase('sleep');
    this.state.humanGroup.clear();
    this.state.zombieGroup.clear();
    this.state.displaced.clear();
    this.state.startedAt = null;
    this.registry.neutralizeAll();
    this.registry.stampAll('sleep');
  }

  /**
   * Store new settings and move to prepare. Roles are left untouched.
   * @throws {InvalidSettingsError} if a value is not an integer in range
   * @throws {PhaseTransitionError} if the activity has ended
   */
  enterPreparing(settings: GameSettings): void {
    this.assertNotEnded('prepare');

    const result = GameSettingsSchema.safeParse(settings);
    if (!result.success) {
      throw new InvalidSettingsError(toInputIssues(result.error.issues));
    }

    this.state.settings = result.data;
    this.changePhase('prepare');
    this.registry.stampAll('prepare');
    logger.info('Settings stored', { ...result.data });
  }

  /**
   * Move to active. On entry from another phase the known devices are
   * partitioned into the two groups; repeating it while active changes nothing.
   * @returns the partition computed on entry, or null if already active
   * @throws {PhaseTransitionError} if the activity has ended
   */
  enterActive(): Partition | null {
    this.assertNotEnded('active');

    if (this.state.startedAt === null) {
      this.state.startedAt = this.clock();
    }

    if (this.state.phase === 'active') {
      this.registry.stampAll('active');
      return null;
    }

    const partition = this.assigner.partition(this.registry.ids(), this.state.settings.humanPercentage);
    this.state.humanGroup.clear();
    this.state.zombieGroup.clear();
    this.state.displaced.clear();
    for (const id of partition.humans) {
      this.state.humanGroup.add(id);
      this.registry.setRole(id, 'human');
    }
    for (const id of partition.zombies) {
      this.state.zombieGroup.add(id);
      this.registry.setRole(id, 'zombie');
    }

    this.changePhase('active');
    this.registry.stampAll('active');
    return partition;
  }

  /**
   * Add minutes to the configured duration, whatever the phase.
   * @returns the new duration
   * @throws {InvalidSettingsError} if delta is not an integer
   */
  extendDuration(deltaMinutes: number): number {
    if (!Number.isInteger(deltaMinutes)) {
      throw new InvalidSettingsError([{ path: 'minutes', message: 'Expected an integer' }]);
    }
    const durationMinutes = this.state.settings.durationMinutes + deltaMinutes;
    this.state.settings = { ...this.state.settings, durationMinutes };
    logger.info('Duration extended', { deltaMinutes, durationMinutes });
    return durationMinutes;
  }

  /**
   * Take one minute off the duration, never going below one minute.
   * @returns false if the duration was already at its minimum
   */
  shortenDuration(): boolean {
    const { durationMinutes } = this.state.settings;
    if (durationMinutes <= 1) {
      logger.warn('Cannot shorten duration below one minute');
      return false;
    }
    this.state.settings = { ...this.state.settings, durationMinutes: durationMinutes - 1 };
    logger.info('Duration shortened', { durationMinutes: durationMinutes - 1 });
    return true;
  }

  /**
   * Move to end. The groups stay as last computed for reporting.
   */
  enterEnded(): void {
    this.changePhase('end');
    this.registry.stampAll('end');
  }

  /**
   * Role of a device polling during the active phase.
   *
   * Devices send back the role they were last served, and after an operator
   * move the group they were taken out of. A hint naming either is an echo;
   * any other hint is handled as a swap request.
   */
  resolveActiveRole(id: DeviceId, hint: string, servedRole: Role | undefined): Role {
    if (hint !== servedRole && hint !== this.state.displaced.get(id)) {
      this.requestSwap(id, hint);
    }
    this.state.displaced.delete(id);
    return this.roleOf(id);
  }

  /**
   * Client-requested swap; updates the device record when accepted.
   */
  requestSwap(id: DeviceId, requested: string): boolean {
    const accepted = this.assigner.requestSwap(this.state, id, requested);
    if (accepted) {
      this.registry.setRole(id, this.roleOf(id));
    }
    return accepted;
  }

  /**
   * Operator move; updates the device record when accepted.
   */
  reassign(id: DeviceId, target: TeamRole): boolean {
    const accepted = this.assigner.reassign(this.state, id, target);
    if (accepted) {
      this.registry.setRole(id, target);
      this.state.displaced.set(id, target === 'human' ? 'zombie' : 'human');
    }
    return accepted;
  }

  /**
   * Role given by group membership; neutral for a device in neither group.
   */
  roleOf(id: DeviceId): Role {
    if (this.state.humanGroup.has(id)) return 'human';
    if (this.state.zombieGroup.has(id)) return 'zombie';
    return 'neutral';
  }

  /**
   * Group members sorted by id.
   */
  members(role: TeamRole): DeviceId[] {
    const group = role === 'human' ? this.state.humanGroup : this.state.zombieGroup;
    return [...group].sort();
  }

  /**
   * Whole seconds left while active, null in any other phase.
   */
  remainingSeconds(now: Date = this.clock()): number | null {
    if (this.state.phase !== 'active' || this.state.startedAt === null) {
      return null;
    }
    const elapsedSeconds = (now.getTime() - this.state.startedAt.getTime()) / 1000;
    return Math.max(0, Math.floor(this.state.settings.durationMinutes * 60 - elapsedSeconds));
  }

  /**
   * Winner by group size once ended, null in any other phase.
   */
  outcome(): Outcome | null {
    if (this.state.phase !== 'end') {
      return null;
    }
    const humans = this.state.humanGroup.size;
    const zombies = this.state.zombieGroup.size;
    if (humans > zombies) return 'hwin';
    if (zombies > humans) return 'zwin';
    return 'draw';
  }

  private assertNotEnded(target: Phase): void {
    if (this.state.phase === 'end') {
      throw new PhaseTransitionError('end', target);
    }
  }

  private changePhase(next: Phase): void {
    const previous = this.state.phase;
    this.state.phase = next;
    logger.info('Phase changed', { from: previous, to: next, devices: this.registry.size });
  }
}
