/**
 * @fileoverview Main entry point for the shared package.
 * Re-exports all types, protocol definitions, and constants.
 */

// Constants
export {
  DEFAULT_DURATION_MINUTES,
  DEFAULT_GAME_SETTINGS,
  DEFAULT_HUMAN_PERCENTAGE,
  DEFAULT_SERVER_PORT,
  DEFAULT_TIMEOUT_SECONDS,
  DEVICE_POLL_INTERVAL_MS,
  DEVICE_POLL_PATH,
  SNAPSHOT_FEED_PATH,
} from './constants.js';
// Protocol
export {
  // Schemas
  DevicePollResponseSchema,
  DevicePollSchema,
  ExtendRequestSchema,
  GameSettingsSchema,
  IntegerInput,
  OutcomeSchema,
  PhaseSchema,
  PrepareRequestSchema,
  ReassignRequestSchema,
  RoleSchema,
  TeamRoleSchema,
  // Utilities
  encodePollQuery,
  parseDevicePoll,
  parseDevicePollResponse,
  serializeSnapshotMessage,
} from './protocol/index.js';
export type {
  DevicePoll,
  DevicePollResponse,
  ReassignRequest,
  SnapshotMessage,
} from './protocol/index.js';
// Types
export type {
  DeviceId,
  DeviceView,
  GameSettings,
  GameSummary,
  Outcome,
  Phase,
  Role,
  TeamRole,
} from './types/index.js';
