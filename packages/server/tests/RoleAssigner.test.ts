import { DEFAULT_GAME_SETTINGS } from '@tagfield/shared';
import { describe, expect, it } from 'vitest';
import { humanTarget, isTeamRole, RoleAssigner } from '../src/game/RoleAssigner.js';
import type { Phase, PhaseState } from '../src/game/types.js';

// j = i for every step, so the shuffle keeps insertion order
const keepOrder = () => 0.999999;

function makeState(phase: Phase, humans: string[], zombies: string[]): PhaseState {
  return {
    phase,
    settings: DEFAULT_GAME_SETTINGS,
    startedAt: null,
    humanGroup: new Set(humans),
    zombieGroup: new Set(zombies),
    displaced: new Map(),
  };
}

describe('humanTarget', () => {
  it('should round half up', () => {
    expect(humanTarget(3, 67)).toBe(2);
    expect(humanTarget(3, 50)).toBe(2);
    expect(humanTarget(4, 50)).toBe(2);
    expect(humanTarget(10, 25)).toBe(3);
  });

  it('should keep at least one human', () => {
    expect(humanTarget(5, 0)).toBe(1);
    expect(humanTarget(1, 10)).toBe(1);
  });

  it('should allow zero zombies', () => {
    expect(humanTarget(3, 100)).toBe(3);
  });

  it('should be zero without devices', () => {
    expect(humanTarget(0, 50)).toBe(0);
  });
});

describe('isTeamRole', () => {
  it('should only accept the two group labels', () => {
    expect(isTeamRole('human')).toBe(true);
    expect(isTeamRole('zombie')).toBe(true);
    expect(isTeamRole('neutral')).toBe(false);
    expect(isTeamRole('Human')).toBe(false);
  });
});

describe('RoleAssigner', () => {
  describe('shuffle', () => {
    it('should keep order when the random source returns its maximum', () => {
      const assigner = new RoleAssigner(keepOrder);

      expect(assigner.shuffle(['d1', 'd2', 'd3'])).toEqual(['d1', 'd2', 'd3']);
    });

    it('should follow the random source', () => {
      const assigner = new RoleAssigner(() => 0);

      expect(assigner.shuffle(['d1', 'd2', 'd3'])).toEqual(['d2', 'd3', 'd1']);
    });

    it('should not modify its input', () => {
      const assigner = new RoleAssigner(() => 0);
      const ids = ['d1', 'd2', 'd3'];

      assigner.shuffle(ids);

      expect(ids).toEqual(['d1', 'd2', 'd3']);
    });
  });

  describe('partition', () => {
    it('should take the first shuffled ids as humans', () => {
      const assigner = new RoleAssigner(keepOrder);

      expect(assigner.partition(['d1', 'd2', 'd3'], 67)).toEqual({
        humans: ['d1', 'd2'],
        zombies: ['d3'],
      });
    });

    it('should produce disjoint groups covering every id', () => {
      const assigner = new RoleAssigner();
      const ids = Array.from({ length: 9 }, (_, i) => `dev-${i}`);

      const { humans, zombies } = assigner.partition(ids, 40);

      expect(humans).toHaveLength(4);
      expect(zombies).toHaveLength(5);
      expect(new Set([...humans, ...zombies])).toEqual(new Set(ids));
      expect(humans.some((id) => zombies.includes(id))).toBe(false);
    });

    it('should return empty groups without devices', () => {
      const assigner = new RoleAssigner();

      expect(assigner.partition([], 50)).toEqual({ humans: [], zombies: [] });
    });
  });

  describe('requestSwap', () => {
    it('should move a human into the zombie group', () => {
      const assigner = new RoleAssigner();
      const state = makeState('active', ['d1', 'd2'], ['d3']);

      expect(assigner.requestSwap(state, 'd1', 'zombie')).toBe(true);
      expect([...state.humanGroup]).toEqual(['d2']);
      expect([...state.zombieGroup]).toEqual(['d3', 'd1']);
    });

    it('should allow emptying a group', () => {
      const assigner = new RoleAssigner();
      const state = makeState('active', ['d1'], ['d2']);

      expect(assigner.requestSwap(state, 'd1', 'zombie')).toBe(true);
      expect(state.humanGroup.size).toBe(0);
    });

    it('should ignore a label naming the current group', () => {
      const assigner = new RoleAssigner();
      const state = makeState('active', ['d1'], ['d2']);

      expect(assigner.requestSwap(state, 'd1', 'human')).toBe(false);
      expect([...state.humanGroup]).toEqual(['d1']);
    });

    it('should ignore labels other than the two groups', () => {
      const assigner = new RoleAssigner();
      const state = makeState('active', ['d1'], ['d2']);

      expect(assigner.requestSwap(state, 'd1', 'neutral')).toBe(false);
      expect(assigner.requestSwap(state, 'd1', 'ghost')).toBe(false);
    });

    it('should ignore a device in neither group', () => {
      const assigner = new RoleAssigner();
      const state = makeState('active', ['d1'], ['d2']);

      expect(assigner.requestSwap(state, 'd9', 'zombie')).toBe(false);
      expect(state.zombieGroup.has('d9')).toBe(false);
    });

    it('should ignore requests outside the active phase', () => {
      const assigner = new RoleAssigner();
      const state = makeState('prepare', ['d1'], ['d2']);

      expect(assigner.requestSwap(state, 'd1', 'zombie')).toBe(false);
    });
  });

  describe('reassign', () => {
    it('should move a device when the source group keeps a member', () => {
      const assigner = new RoleAssigner();
      const state = makeState('active', ['d1', 'd2'], ['d3']);

      expect(assigner.reassign(state, 'd2', 'zombie')).toBe(true);
      expect([...state.humanGroup]).toEqual(['d1']);
      expect([...state.zombieGroup]).toEqual(['d3', 'd2']);
    });

    it('should refuse to empty the source group', () => {
      const assigner = new RoleAssigner();
      const state = makeState('active', ['d1', 'd2'], ['d3']);

      expect(assigner.reassign(state, 'd3', 'human')).toBe(false);
      expect([...state.zombieGroup]).toEqual(['d3']);
    });

    it('should refuse outside the active phase', () => {
      const assigner = new RoleAssigner();
      const state = makeState('end', ['d1', 'd2'], ['d3']);

      expect(assigner.reassign(state, 'd1', 'zombie')).toBe(false);
    });
  });
});
