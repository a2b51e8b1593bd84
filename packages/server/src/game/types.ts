import type { DeviceId, GameSettings, Phase, Role, TeamRole } from '@tagfield/shared';

// Re-export shared types for convenience
export type {
  DeviceId,
  GameSettings,
  Outcome,
  Phase,
  Role,
  TeamRole,
} from '@tagfield/shared';

/**
 * Server-side state of one wearable, mutated in place on every poll and phase change.
 */
export interface DeviceRecord {
  readonly id: DeviceId;
  ip: string;
  rssi: number;
  role: Role;
  /** Role last answered to the device, which it echoes on its next poll */
  servedRole: Role;
  /** Phase label stamped by the server */
  status: Phase;
  /** Status label the device itself last reported */
  reportedStatus: string;
  health: number;
  battery: number;
  comment: string;
  lastSeen: Date;
}

/**
 * Activity state owned by the PhaseController.
 * The two groups are disjoint at all times.
 */
export interface PhaseState {
  phase: Phase;
  settings: GameSettings;
  /** First entry into the active phase, cleared on reset */
  startedAt: Date | null;
  readonly humanGroup: Set<DeviceId>;
  readonly zombieGroup: Set<DeviceId>;
  /** Group an operator moved each device out of, until the device is told its new role */
  readonly displaced: Map<DeviceId, TeamRole>;
}

/**
 * Result of splitting the known devices into the two groups.
 */
export interface Partition {
  readonly humans: readonly DeviceId[];
  readonly zombies: readonly DeviceId[];
}

/**
 * Uniform random number in [0, 1), injectable so tests can fix the shuffle.
 */
export type RandomSource = () => number;

/**
 * Source of the current time.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
