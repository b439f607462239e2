import { describe, expect, it } from 'vitest';
import { createOptions, type SimulationOptions, validateOptions } from '../src/Options';
import { SimulationError } from '../src/errors';

describe('Options', () => {
  describe('createOptions', () => {
    it('should return a validated copy', () => {
      const input: SimulationOptions = { frameCount: 4, policy: { type: 'nru', refreshRate: 8 } };
      const options = createOptions(input);

      expect(options).toEqual(input);
      expect(options.policy).not.toBe(input.policy);
    });
  });

  describe('validateOptions', () => {
    it('should accept every policy with a positive frame count', () => {
      expect(() => validateOptions({ frameCount: 1, policy: { type: 'opt' } })).not.toThrow();
      expect(() => validateOptions({ frameCount: 64, policy: { type: 'clock' } })).not.toThrow();
      expect(() => validateOptions({ frameCount: 2, policy: { type: 'rand', seed: 9 } })).not.toThrow();
    });

    it('should reject a bad frame count', () => {
      expect(() => validateOptions({ frameCount: -1, policy: { type: 'opt' } }))
        .toThrow('frameCount must be a positive integer, got -1');
    });

    it('should reject NRU without a refresh period', () => {
      expect(() => validateOptions({ frameCount: 2, policy: { type: 'nru' } })).toThrow(SimulationError);
    });

    it('should reject unknown properties and suggest the right name', () => {
      const options = { frameCount: 2, policy: { type: 'opt' as const }, frames: 2 };

      expect(() => validateOptions(options)).toThrow(
        'Unknown configuration properties: frames. Valid properties are: frameCount, policy. ' +
        'Suggestion: did you mean "frames" -> "frameCount"?'
      );
    });

    it('should reject unknown properties without a known alternative', () => {
      const options = { frameCount: 2, policy: { type: 'opt' as const }, colour: 'blue' };

      expect(() => validateOptions(options)).toThrow(
        'Unknown configuration properties: colour. Valid properties are: frameCount, policy.'
      );
    });
  });
});
