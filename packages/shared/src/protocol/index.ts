/**
 * @fileoverview Wire protocol between wearables, operator consoles and the coordinator.
 * Uses Zod for runtime validation of incoming payloads.
 *
 * Devices check in with `GET /api/device?data=<json>`; the JSON field names and the
 * snake_case response keys are fixed by the deployed firmware.
 */

import { z } from 'zod';
import type { DeviceView, GameSummary } from '../types/index.js';

// ============ Labels ============

export const RoleSchema = z.enum(['neutral', 'human', 'zombie']);

export const TeamRoleSchema = z.enum(['human', 'zombie']);

export const PhaseSchema = z.enum(['sleep', 'prepare', 'active', 'end']);

export const OutcomeSchema = z.enum(['hwin', 'zwin', 'draw']);

// ============ Device poll ============

/**
 * Check-in payload sent by a wearable on every poll.
 * `role` is a free label: only `human` / `zombie` during an active phase have an effect.
 */
export const DevicePollSchema = z.object({
  id: z.string().min(1),
  ip: z.string(),
  rssi: z.number().int(),
  role: z.string(),
  status: z.string(),
  health: z.number().int(),
  battery: z.number().int(),
  comment: z.string(),
});

export type DevicePoll = z.infer<typeof DevicePollSchema>;

/**
 * Response to a poll, in the shape the firmware parses.
 */
export const DevicePollResponseSchema = z.object({
  role: RoleSchema,
  status: PhaseSchema,
  game_timeout: z.number().int(),
  game_duration: z.number().int(),
  /** Seconds left while the activity is active */
  remaining_seconds: z.number().int().optional(),
  /** Winner label once the activity has ended */
  outcome: OutcomeSchema.optional(),
});

export type DevicePollResponse = z.infer<typeof DevicePollResponseSchema>;

// ============ Operator inputs ============

/**
 * Integer that may arrive as a JSON number or as a form field string.
 */
export const IntegerInput = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/, 'Expected an integer')
    .transform((value) => Number.parseInt(value, 10)),
]);

export const GameSettingsSchema = z.object({
  humanPercentage: z.number().int().min(0).max(100),
  timeoutSeconds: z.number().int().min(0),
  durationMinutes: z.number().int().min(1),
});

/**
 * Body of the prepare action. Field names follow the operator form.
 */
export const PrepareRequestSchema = z
  .object({
    human_percentage: IntegerInput,
    game_timeout: IntegerInput,
    game_duration: IntegerInput,
  })
  .transform((body) => ({
    humanPercentage: body.human_percentage,
    timeoutSeconds: body.game_timeout,
    durationMinutes: body.game_duration,
  }))
  .pipe(GameSettingsSchema);

export const ExtendRequestSchema = z.object({
  minutes: IntegerInput.optional(),
});

export const ReassignRequestSchema = z.object({
  id: z.string().min(1),
  role: TeamRoleSchema,
});

export type ReassignRequest = z.infer<typeof ReassignRequestSchema>;

// ============ Snapshot feed (server → console) ============

export interface SnapshotMessage {
  readonly type: 'snapshot';
  readonly summary: GameSummary;
  readonly devices: readonly DeviceView[];
}

// ============ Utilities ============

/**
 * Parse and validate a device poll payload.
 * @param data - Raw parsed JSON
 * @returns Validated poll or null if invalid
 */
export function parseDevicePoll(data: unknown): DevicePoll | null {
  const result = DevicePollSchema.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Parse and validate a poll response.
 * @param data - Raw parsed JSON
 * @returns Validated response or null if invalid
 */
export function parseDevicePollResponse(data: unknown): DevicePollResponse | null {
  const result = DevicePollResponseSchema.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Build the query string a wearable appends to the poll path.
 */
export function encodePollQuery(poll: DevicePoll): string {
  return `data=${encodeURIComponent(JSON.stringify(poll))}`;
}

/**
 * Serialize a snapshot message to a JSON string.
 */
export function serializeSnapshotMessage(message: SnapshotMessage): string {
  return JSON.stringify(message);
}
