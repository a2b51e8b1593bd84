/**
 * @fileoverview Core types shared between the coordinator server and the device simulator.
 * These describe the activity vocabulary and the read models handed to operator consoles.
 */

/**
 * Client-supplied device identifier, stable across polls.
 */
export type DeviceId = string;

/**
 * Team a device plays for.
 * - neutral: not taking part in a running activity
 * - human / zombie: the two opposing groups of an active activity
 */
export type Role = 'neutral' | 'human' | 'zombie';

/**
 * A role that belongs to one of the two groups.
 */
export type TeamRole = Exclude<Role, 'neutral'>;

/**
 * Activity phase. The label is also the status stamped onto every device record.
 */
export type Phase = 'sleep' | 'prepare' | 'active' | 'end';

/**
 * Result reported once the activity has ended.
 * - hwin: humans outnumber zombies
 * - zwin: zombies outnumber humans
 * - draw: equal group sizes
 */
export type Outcome = 'hwin' | 'zwin' | 'draw';

/**
 * Operator-tunable activity parameters.
 */
export interface GameSettings {
  /** Share of devices assigned to the human group, 0-100 */
  readonly humanPercentage: number;
  /** Advisory timeout handed to devices, in seconds */
  readonly timeoutSeconds: number;
  /** Activity length, in minutes */
  readonly durationMinutes: number;
}

/**
 * Serialized device record as shown to operator consoles.
 */
export interface DeviceView {
  readonly id: DeviceId;
  readonly ip: string;
  readonly rssi: number;
  readonly role: Role;
  readonly status: Phase;
  readonly reportedStatus: string;
  readonly health: number;
  readonly battery: number;
  readonly comment: string;
  /** ISO-8601 timestamp of the last poll */
  readonly lastSeen: string;
}

/**
 * Activity overview used by the status endpoint and the snapshot feed.
 */
export interface GameSummary {
  readonly phase: Phase;
  readonly settings: GameSettings;
  /** ISO-8601 timestamp of the first entry into the active phase */
  readonly startedAt: string | null;
  readonly deviceCount: number;
  readonly humans: readonly DeviceId[];
  readonly zombies: readonly DeviceId[];
  /** Sum of the last reported health of each group's members */
  readonly humanHealth: number;
  readonly zombieHealth: number;
  readonly remainingSeconds: number | null;
  readonly outcome: Outcome | null;
}
