import { beforeEach, describe, expect, it } from 'vitest';
import { ClockEvictionPolicy } from '../../../src/eviction/policies/ClockEvictionPolicy';
import type { Frame } from '../../../src/Operation';
import { frame } from '../../utils/traces';

describe('ClockEvictionPolicy', () => {
  let policy: ClockEvictionPolicy;

  beforeEach(() => {
    policy = new ClockEvictionPolicy(3);
  });

  describe('findEvictee', () => {
    it('should evict the first unreferenced frame from the hand', () => {
      const frames = [frame(1, false), frame(2), frame(3)];

      expect(policy.findEvictee(frames)).toBe(0);
      expect(policy.getPointer()).toBe(1);
      expect(frames.map((f) => f.referenced)).toEqual([false, true, true]);
    });

    it('should give referenced frames a second chance', () => {
      const frames = [frame(1), frame(2, false), frame(3)];

      expect(policy.findEvictee(frames)).toBe(1);
      expect(policy.getPointer()).toBe(2);
      expect(frames.map((f) => f.referenced)).toEqual([false, false, true]);
    });

    it('should wrap around and evict the starting slot when every bit is set', () => {
      const frames = [frame(1), frame(2), frame(3)];

      expect(policy.findEvictee(frames)).toBe(0);
      expect(policy.getPointer()).toBe(1);
      expect(frames.map((f) => f.referenced)).toEqual([false, false, false]);
    });

    it('should continue from where the hand stopped', () => {
      const frames = [frame(1, false), frame(2, false), frame(3, false)];

      expect(policy.findEvictee(frames)).toBe(0);
      expect(policy.findEvictee(frames)).toBe(1);
      expect(policy.findEvictee(frames)).toBe(2);
      expect(policy.getPointer()).toBe(0);
      expect(policy.findEvictee(frames)).toBe(0);
    });

    it('should visit each slot at most twice in one call', () => {
      const visits = [0, 0, 0, 0];
      const frames: Frame[] = visits.map((_, slot) => {
        let referenced = true;
        return {
          pageId: slot,
          dirty: false,
          get referenced() {
            visits[slot]++;
            return referenced;
          },
          set referenced(value: boolean) {
            referenced = value;
          }
        };
      });

      const clock = new ClockEvictionPolicy(4);
      expect(clock.findEvictee(frames)).toBe(0);
      expect(visits).toEqual([2, 1, 1, 1]);
    });

    it('should ignore the dirty bit', () => {
      const frames = [frame(1, false, true), frame(2, false), frame(3, false)];
      expect(policy.findEvictee(frames)).toBe(0);
    });
  });

  describe('onOperation', () => {
    it('should set the referenced bit of the serviced frame', () => {
      const frames = [frame(1, false), frame(2, false), frame(3, false)];

      policy.onOperation(frames, 1);

      expect(frames.map((f) => f.referenced)).toEqual([false, true, false]);
    });

    it('should not move the hand', () => {
      const frames = [frame(1), frame(2), frame(3)];
      policy.onOperation(frames, 2);
      expect(policy.getPointer()).toBe(0);
    });
  });

  it('should report its name and kind', () => {
    expect(policy.getPolicyName()).toBe('Clock');
    expect(policy.kind).toBe('clock');
  });
});
