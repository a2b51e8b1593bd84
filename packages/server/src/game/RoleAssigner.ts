import { logger } from '../utils/logger.js';
import type { DeviceId, Partition, PhaseState, RandomSource, TeamRole } from './types.js';

/**
 * Check whether a client-supplied label names one of the two groups.
 */
export function isTeamRole(label: string): label is TeamRole {
  return label === 'human' || label === 'zombie';
}

/**
 * Number of humans for a partition of `total` devices.
 * Rounds half up in integer arithmetic, then keeps at least one human when
 * there is any device at all. There is no matching floor for zombies.
 */
export function humanTarget(total: number, humanPercentage: number): number {
  if (total <= 0) {
    return 0;
  }
  const rounded = Math.floor((total * humanPercentage + 50) / 100);
  return Math.min(total, Math.max(1, rounded));
}

/**
 * Splits devices into the two groups and validates in-flight moves between them.
 */
export class RoleAssigner {
  private readonly random: RandomSource;

  constructor(random: RandomSource = Math.random) {
    this.random = random;
  }

  /**
   * Shuffle the ids and take the first `humanTarget` as humans, the rest as zombies.
   */
  partition(ids: readonly DeviceId[], humanPercentage: number): Partition {
    const shuffled = this.shuffle(ids);
    const humanCount = humanTarget(shuffled.length, humanPercentage);

    logger.info('Roles partitioned', {
      devices: shuffled.length,
      humans: humanCount,
      zombies: shuffled.length - humanCount,
    });

    return {
      humans: shuffled.slice(0, humanCount),
      zombies: shuffled.slice(humanCount),
    };
  }

  /**
   * Fisher-Yates shuffle on a copy.
   */
  shuffle(ids: readonly DeviceId[]): DeviceId[] {
    const result = [...ids];
    for (let i = result.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      const current = result[i];
      const swapWith = result[j];
      if (current === undefined || swapWith === undefined) {
        continue;
      }
      result[i] = swapWith;
      result[j] = current;
    }
    return result;
  }

  /**
   * Client-requested move into the other group.
   *
   * Only accepted while active, for a `human` / `zombie` label naming the group
   * the device is not currently in. Anything else is a silent no-op.
   * @returns true if the device changed group
   */
  requestSwap(state: PhaseState, id: DeviceId, requested: string): boolean {
    if (state.phase !== 'active' || !isTeamRole(requested)) {
      return false;
    }

    const [from, to] = groupsFor(state, requested);
    if (!from.has(id)) {
      logger.debug('Role swap rejected', { id, requested });
      return false;
    }

    from.delete(id);
    to.add(id);
    logger.info('Role swap accepted', { id, role: requested });
    return true;
  }

  /**
   * Operator-driven move into the other group while active.
   * Refused when it would leave the source group empty.
   * @returns true if the device changed group
   */
  reassign(state: PhaseState, id: DeviceId, target: TeamRole): boolean {
    if (state.phase !== 'active') {
      return false;
    }

    const [from, to] = groupsFor(state, target);
    if (!from.has(id) || from.size <= 1) {
      logger.debug('Reassignment rejected', { id, target, sourceSize: from.size });
      return false;
    }

    from.delete(id);
    to.add(id);
    logger.info('Device reassigned', { id, role: target });
    return true;
  }
}

/**
 * Source and destination groups for a move into `target`.
 */
function groupsFor(state: PhaseState, target: TeamRole): [Set<DeviceId>, Set<DeviceId>] {
  return target === 'human'
    ? [state.zombieGroup, state.humanGroup]
    : [state.humanGroup, state.zombieGroup];
}
