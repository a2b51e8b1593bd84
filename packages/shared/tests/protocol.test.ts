import { describe, expect, it } from 'vitest';
import {
  type DevicePoll,
  DevicePollSchema,
  encodePollQuery,
  ExtendRequestSchema,
  parseDevicePoll,
  parseDevicePollResponse,
  PrepareRequestSchema,
  ReassignRequestSchema,
} from '../src/index.js';

const validPoll: DevicePoll = {
  id: 'a1b2c3',
  ip: '192.168.4.20',
  rssi: -61,
  role: 'neutral',
  status: 'wait',
  health: 100,
  battery: 87,
  comment: '',
};

describe('DevicePollSchema', () => {
  it('should accept a complete poll', () => {
    expect(parseDevicePoll(validPoll)).toEqual(validPoll);
  });

  it('should accept any role label', () => {
    const poll = parseDevicePoll({ ...validPoll, role: 'pinger' });

    expect(poll?.role).toBe('pinger');
  });

  it('should reject a poll without battery', () => {
    const { battery: _battery, ...withoutBattery } = validPoll;

    expect(parseDevicePoll(withoutBattery)).toBeNull();
  });

  it('should reject a non-integer rssi', () => {
    const result = DevicePollSchema.safeParse({ ...validPoll, rssi: -61.5 });

    expect(result.success).toBe(false);
  });

  it('should reject an empty id', () => {
    expect(parseDevicePoll({ ...validPoll, id: '' })).toBeNull();
  });
});

describe('encodePollQuery', () => {
  it('should produce a data parameter that decodes back to the poll', () => {
    const query = encodePollQuery(validPoll);
    const params = new URLSearchParams(query);

    expect(query.startsWith('data=')).toBe(true);
    expect(JSON.parse(params.get('data') ?? '')).toEqual(validPoll);
  });
});

describe('parseDevicePollResponse', () => {
  it('should accept the firmware response shape', () => {
    const response = parseDevicePollResponse({
      role: 'human',
      status: 'active',
      game_timeout: 30,
      game_duration: 15,
      remaining_seconds: 840,
    });

    expect(response?.remaining_seconds).toBe(840);
  });

  it('should reject an unknown phase label', () => {
    expect(
      parseDevicePollResponse({ role: 'human', status: 'game', game_timeout: 30, game_duration: 15 })
    ).toBeNull();
  });
});

describe('PrepareRequestSchema', () => {
  it('should read integers sent as form strings', () => {
    const result = PrepareRequestSchema.parse({
      human_percentage: '67',
      game_timeout: '30',
      game_duration: ' 15 ',
    });

    expect(result).toEqual({ humanPercentage: 67, timeoutSeconds: 30, durationMinutes: 15 });
  });

  it('should read integers sent as JSON numbers', () => {
    const result = PrepareRequestSchema.parse({
      human_percentage: 50,
      game_timeout: 0,
      game_duration: 1,
    });

    expect(result).toEqual({ humanPercentage: 50, timeoutSeconds: 0, durationMinutes: 1 });
  });

  it('should reject a decimal string', () => {
    const result = PrepareRequestSchema.safeParse({
      human_percentage: '12.5',
      game_timeout: '30',
      game_duration: '15',
    });

    expect(result.success).toBe(false);
  });

  it('should reject a non-numeric value', () => {
    const result = PrepareRequestSchema.safeParse({
      human_percentage: 'half',
      game_timeout: '30',
      game_duration: '15',
    });

    expect(result.success).toBe(false);
  });

  it('should reject a percentage above 100', () => {
    const result = PrepareRequestSchema.safeParse({
      human_percentage: 101,
      game_timeout: 30,
      game_duration: 15,
    });

    expect(result.success).toBe(false);
  });

  it('should reject a missing field', () => {
    const result = PrepareRequestSchema.safeParse({ human_percentage: 50, game_timeout: 30 });

    expect(result.success).toBe(false);
  });
});

describe('ExtendRequestSchema', () => {
  it('should leave minutes undefined when absent', () => {
    expect(ExtendRequestSchema.parse({})).toEqual({});
  });

  it('should accept a negative string', () => {
    expect(ExtendRequestSchema.parse({ minutes: '-2' })).toEqual({ minutes: -2 });
  });
});

describe('ReassignRequestSchema', () => {
  it('should only accept the two team roles', () => {
    expect(ReassignRequestSchema.safeParse({ id: 'd1', role: 'zombie' }).success).toBe(true);
    expect(ReassignRequestSchema.safeParse({ id: 'd1', role: 'neutral' }).success).toBe(false);
  });
});
