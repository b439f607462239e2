import type { Frame } from '../../Operation';
import type { RandomSource } from '../../random';
import { EvictionPolicy } from '../EvictionPolicy';

/**
 * Random eviction policy
 * Evicts a uniformly chosen slot
 */
export class RandomEvictionPolicy extends EvictionPolicy {
  readonly kind = 'rand' as const;

  constructor(
    private readonly capacity: number,
    private readonly random: RandomSource
  ) {
    super();
  }

  findEvictee(_frames: Frame[]): number {
    return this.random.nextInt(this.capacity);
  }

  onOperation(_frames: Frame[], _frameIndex: number): void {
    // stateless
  }

  getPolicyName(): string {
    return 'Random';
  }
}
