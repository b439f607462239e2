import type { Frame } from '../Operation';
import type { EvictionPolicyKind } from './EvictionPolicyConfig';

/**
 * Abstract base class for page eviction policies.
 *
 * The page table owns the frames and lends them to the active policy for the
 * duration of each call. A policy may flip `referenced` bits but never changes
 * which page a frame holds.
 */
export abstract class EvictionPolicy {
  /** Discriminant of the closed set of policies, see `AnyEvictionPolicy` */
  abstract readonly kind: EvictionPolicyKind;

  /**
   * Pick the slot to reassign. Only called when every slot is occupied and the
   * accessed page is not resident.
   * @param frames - Resident frames, one per slot
   * @returns Index of the victim slot
   */
  abstract findEvictee(frames: Frame[]): number;

  /**
   * Record an access once it has resolved to a slot, whether it was a hit, a
   * cold fault or a fault with eviction.
   * @param frames - Resident frames, one per slot
   * @param frameIndex - Slot that serviced the access
   */
  abstract onOperation(frames: Frame[], frameIndex: number): void;

  /**
   * Display name used in reports
   */
  abstract getPolicyName(): string;
}
