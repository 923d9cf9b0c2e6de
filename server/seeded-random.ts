/**
 * Injectable random sources.
 *
 * Bootstrap replicates never share a stream: each one gets a Mersenne Twister
 * seeded from (masterSeed, replicateIndex), so the draws a replicate sees do
 * not depend on which worker runs it or when.
 */

import { MersenneTwister19937, Random, type Engine } from "random-js";

export interface RandomSource {
  /** uniform draw in [0, 1) */
  next(): number;
}

class EngineRandomSource implements RandomSource {
  private readonly random: Random;

  constructor(engine: Engine) {
    this.random = new Random(engine);
  }

  next(): number {
    return this.random.real(0, 1, false);
  }
}

export function createRandomSource(seed?: number): RandomSource {
  const engine = seed === undefined
    ? MersenneTwister19937.autoSeed()
    : MersenneTwister19937.seed(seed);
  return new EngineRandomSource(engine);
}

export function createReplicateRandom(masterSeed: number, replicateIndex: number): RandomSource {
  return new EngineRandomSource(
    MersenneTwister19937.seedWithArray([masterSeed >>> 0, replicateIndex >>> 0])
  );
}

/** A fresh 32-bit master seed, reported back so a run can be repeated */
export function drawMasterSeed(): number {
  return MersenneTwister19937.autoSeed().next() >>> 0;
}
