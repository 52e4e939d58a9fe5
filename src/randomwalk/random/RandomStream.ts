import { randomLcg, randomNormal } from 'd3-random';
import { InvalidParameterError } from '../models/errors';

const SEED_SPACE = 0x100000000;

/**
 * Seedable source of Normal and uniform variates.
 *
 * Every generator that needs randomness is handed one of these explicitly;
 * there is no process-wide stream. Two streams built from the same seed and
 * consumed by the same sequence of calls yield identical values.
 */
export class RandomStream {
  private readonly source: () => number;
  private readonly standardNormal: () => number;
  private drawCount = 0;

  private constructor(public readonly seed: number) {
    this.source = randomLcg(seed);
    this.standardNormal = randomNormal.source(this.source)(0, 1);
  }

  /**
   * Deterministic stream for the given seed, an integer in [0, 2^32).
   * Distinct seeds in that range give distinct streams.
   */
  static fromSeed(seed: number): RandomStream {
    if (!Number.isInteger(seed) || seed < 0 || seed >= SEED_SPACE) {
      throw new InvalidParameterError('seed', `seed must be an integer in [0, 2^32), got ${seed}`, {
        value: seed
      });
    }
    return new RandomStream(seed);
  }

  /**
   * Stream seeded from Math.random; the chosen seed is kept on `seed`
   */
  static unseeded(): RandomStream {
    return new RandomStream(Math.floor(Math.random() * SEED_SPACE));
  }

  /** Normal(0, sd) */
  normal(sd = 1): number {
    this.drawCount++;
    return sd * this.standardNormal();
  }

  /** Uniform [0, 1) */
  uniform(): number {
    return this.source();
  }

  /**
   * Independent child stream, seeded from this one
   */
  split(): RandomStream {
    return new RandomStream(Math.floor(this.source() * SEED_SPACE));
  }

  /**
   * Normal variates consumed so far
   */
  get draws(): number {
    return this.drawCount;
  }
}
