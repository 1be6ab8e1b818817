import { Injectable } from '@nestjs/common';
import { randomInt } from 'crypto';
import type { RandomSource } from '../domain/random.port';

/**
 * Random source backed by the CSPRNG - uses crypto.randomInt.
 */
@Injectable()
export class CryptoRandomSource implements RandomSource {
  nextInt(min: number, max: number): number {
    // randomInt excludes its upper bound
    return randomInt(min, max + 1);
  }
}
