import type { DevicePoll } from '@tagfield/shared';
import { type Clock, type DeviceId, type DeviceRecord, type Phase, type Role, systemClock } from './types.js';

/**
 * Role a device gets outside the active phase.
 * - sleep: always neutral
 * - prepare / end: the role from the device's previous record, neutral if first seen
 *
 * The active phase is resolved from group membership instead (see PhaseController).
 */
export function resolveInactiveRole(phase: Exclude<Phase, 'active'>, previous: Role | undefined): Role {
  if (phase === 'sleep') {
    return 'neutral';
  }
  return previous ?? 'neutral';
}

function compareIds(a: DeviceRecord, b: DeviceRecord): number {
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/**
 * In-memory registry of every device that has ever polled.
 * Records are created on first poll and mutated in place afterwards; nothing is evicted.
 */
export class DeviceRegistry {
  private readonly devices = new Map<DeviceId, DeviceRecord>();
  private readonly clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  /**
   * Create or update the record for a poll.
   * The status is always the current phase label; the client's own status is
   * only kept as `reportedStatus`.
   */
  upsert(poll: DevicePoll, role: Role, phase: Phase): DeviceRecord {
    const now = this.clock();
    const existing = this.devices.get(poll.id);

    if (existing) {
      existing.ip = poll.ip;
      existing.rssi = poll.rssi;
      existing.role = role;
      existing.servedRole = role;
      existing.status = phase;
      existing.reportedStatus = poll.status;
      existing.health = poll.health;
      existing.battery = poll.battery;
      existing.comment = poll.comment;
      existing.lastSeen = now;
      return existing;
    }

    const record: DeviceRecord = {
      id: poll.id,
      ip: poll.ip,
      rssi: poll.rssi,
      role,
      servedRole: role,
      status: phase,
      reportedStatus: poll.status,
      health: poll.health,
      battery: poll.battery,
      comment: poll.comment,
      lastSeen: now,
    };
    this.devices.set(poll.id, record);
    return record;
  }

  get(id: DeviceId): DeviceRecord | undefined {
    return this.devices.get(id);
  }

  has(id: DeviceId): boolean {
    return this.devices.has(id);
  }

  /**
   * Role stored on the device's last record, if any.
   */
  previousRole(id: DeviceId): Role | undefined {
    return this.devices.get(id)?.role;
  }

  /**
   * Set the role of a known device. Unknown ids are ignored.
   * @returns true if a record was updated
   */
  setRole(id: DeviceId, role: Role): boolean {
    const record = this.devices.get(id);
    if (!record) {
      return false;
    }
    record.role = role;
    return true;
  }

  /**
   * Stamp a phase label onto every record.
   */
  stampAll(phase: Phase): void {
    for (const record of this.devices.values()) {
      record.status = phase;
    }
  }

  /**
   * Put every record back to the neutral role.
   */
  neutralizeAll(): void {
    for (const record of this.devices.values()) {
      record.role = 'neutral';
    }
  }

  ids(): DeviceId[] {
    return [...this.devices.keys()];
  }

  get size(): number {
    return this.devices.size;
  }

  /**
   * Copies of all records, sorted by id.
   */
  snapshot(): DeviceRecord[] {
    return [...this.devices.values()].map((record) => ({ ...record })).sort(compareIds);
  }
}
