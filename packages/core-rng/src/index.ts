import { createHmac, randomBytes } from "crypto";

export interface IRngService {
  /** Uniform in [0, 1). */
  nextFloat(): number;
}

export const RNG_SERVICE = Symbol("RNG_SERVICE");

const TWO_POW_48 = 2 ** 48;

/** 48 bits from the OS CSPRNG, scaled into [0, 1). */
export class CryptoRngService implements IRngService {
  nextFloat(): number {
    return randomBytes(6).readUIntBE(0, 6) / TWO_POW_48;
  }
}

/**
 * Deterministic stream: HMAC-SHA256 of the draw index under `seed`, first 52
 * bits of the digest scaled into [0, 1). Same seed, same rolls.
 */
export class SeededRngService implements IRngService {
  private index = 0;

  constructor(private readonly seed: string) {
    if (!seed) {
      throw new Error("SeededRngService needs a non-empty seed");
    }
  }

  nextFloat(): number {
    const digest = createHmac("sha256", this.seed).update(String(this.index)).digest("hex");
    this.index += 1;
    const slice = digest.slice(0, 13);
    return parseInt(slice, 16) / Math.pow(16, slice.length);
  }
}

/** Replays a fixed list of rolls, cycling when exhausted. For tests and simulations. */
export class SequenceRngService implements IRngService {
  private index = 0;

  constructor(private readonly rolls: number[]) {
    if (!rolls.length) {
      throw new Error("SequenceRngService needs at least one roll");
    }
    for (const roll of rolls) {
      if (!(roll >= 0 && roll < 1)) {
        throw new Error(`Roll ${roll} is outside [0, 1)`);
      }
    }
  }

  nextFloat(): number {
    const roll = this.rolls[this.index % this.rolls.length];
    this.index += 1;
    return roll;
  }
}
