import type { DevicePollResponse, DeviceView } from '@tagfield/shared';
import type { DeviceRecord, Outcome, Phase, Role } from './types.js';

/**
 * What a polling device is told after its check-in.
 */
export interface PollResult {
  role: Role;
  phase: Phase;
  timeoutSeconds: number;
  durationMinutes: number;
  remainingSeconds: number | null;
  outcome: Outcome | null;
}

export function toDeviceView(record: DeviceRecord): DeviceView {
  return {
    id: record.id,
    ip: record.ip,
    rssi: record.rssi,
    role: record.role,
    status: record.status,
    reportedStatus: record.reportedStatus,
    health: record.health,
    battery: record.battery,
    comment: record.comment,
    lastSeen: record.lastSeen.toISOString(),
  };
}

/**
 * Map a poll result onto the firmware's response keys.
 */
export function toPollResponse(result: PollResult): DevicePollResponse {
  const response: DevicePollResponse = {
    role: result.role,
    status: result.phase,
    game_timeout: result.timeoutSeconds,
    game_duration: result.durationMinutes,
  };
  if (result.remainingSeconds !== null) {
    response.remaining_seconds = result.remainingSeconds;
  }
  if (result.outcome !== null) {
    response.outcome = result.outcome;
  }
  return response;
}
