import { describe, expect, it } from 'vitest';
import {
  NotRecentlyUsedEvictionPolicy,
  nruClass
} from '../../../src/eviction/policies/NotRecentlyUsedEvictionPolicy';
import { frame } from '../../utils/traces';

describe('NotRecentlyUsedEvictionPolicy', () => {
  describe('nruClass', () => {
    it('should rank frames by referenced then dirty', () => {
      expect(nruClass(frame(1, false, false))).toBe(0);
      expect(nruClass(frame(1, false, true))).toBe(1);
      expect(nruClass(frame(1, true, false))).toBe(2);
      expect(nruClass(frame(1, true, true))).toBe(3);
    });
  });

  describe('findEvictee', () => {
    const policy = new NotRecentlyUsedEvictionPolicy(10);

    it('should pick the first unreferenced clean frame', () => {
      const frames = [frame(1, true, true), frame(2, false, true), frame(3, false, false), frame(4, false, false)];
      expect(policy.findEvictee(frames)).toBe(2);
    });

    it('should prefer unreferenced dirty over referenced clean', () => {
      expect(policy.findEvictee([frame(1, true, false), frame(2, false, true)])).toBe(1);
    });

    it('should prefer referenced clean over referenced dirty', () => {
      expect(policy.findEvictee([frame(1, true, true), frame(2, true, false)])).toBe(1);
    });

    it('should take the lowest slot when every frame is in the same class', () => {
      expect(policy.findEvictee([frame(1, true, true), frame(2, true, true), frame(3, true, true)])).toBe(0);
    });

    it('should not change any bits', () => {
      const frames = [frame(1, true, true), frame(2, false, false)];
      policy.findEvictee(frames);
      expect(frames).toEqual([frame(1, true, true), frame(2, false, false)]);
    });
  });

  describe('onOperation', () => {
    it('should set the referenced bit of the serviced frame', () => {
      const policy = new NotRecentlyUsedEvictionPolicy(10);
      const frames = [frame(1, false), frame(2, false)];

      policy.onOperation(frames, 1);

      expect(frames.map((f) => f.referenced)).toEqual([false, true]);
    });

    it('should clear every referenced bit once per refresh period, then mark the serviced frame', () => {
      const policy = new NotRecentlyUsedEvictionPolicy(3);
      const frames = [frame(1), frame(2), frame(3)];

      policy.onOperation(frames, 0);
      policy.onOperation(frames, 0);
      expect(frames.map((f) => f.referenced)).toEqual([true, true, true]);

      policy.onOperation(frames, 2);
      expect(frames.map((f) => f.referenced)).toEqual([false, false, true]);

      // counter restarted from zero
      policy.onOperation(frames, 1);
      policy.onOperation(frames, 1);
      expect(frames.map((f) => f.referenced)).toEqual([false, true, true]);
      policy.onOperation(frames, 0);
      expect(frames.map((f) => f.referenced)).toEqual([true, false, false]);
    });

    it('should clear on every access with a refresh period of one', () => {
      const policy = new NotRecentlyUsedEvictionPolicy(1);
      const frames = [frame(1), frame(2)];

      policy.onOperation(frames, 1);
      expect(frames.map((f) => f.referenced)).toEqual([false, true]);
      policy.onOperation(frames, 0);
      expect(frames.map((f) => f.referenced)).toEqual([true, false]);
    });

    it('should leave dirty bits alone', () => {
      const policy = new NotRecentlyUsedEvictionPolicy(1);
      const frames = [frame(1, true, true), frame(2)];
      policy.onOperation(frames, 1);
      expect(frames.map((f) => f.dirty)).toEqual([true, false]);
    });
  });

  it('should report its name and kind', () => {
    const policy = new NotRecentlyUsedEvictionPolicy(5);
    expect(policy.getPolicyName()).toBe('NRU');
    expect(policy.kind).toBe('nru');
  });
});
