/**
 * Random source port for the variance draw.
 * Lets tests pin the offset without patching Math.random or crypto.
 */
export interface RandomSource {
  /**
   * Integer drawn uniformly from [min, max], both ends included.
   */
  nextInt(min: number, max: number): number;
}

export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');
