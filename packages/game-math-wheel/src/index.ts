import type { PrizeStock } from "@spin-rewards/core-types";

export type DrawOutcome = { kind: "PRIZE"; prizeId: string } | { kind: "NO_WIN" };

export interface OddsTableIssue {
  prizeId?: string;
  message: string;
}

// Float sums like 0.1 + 0.2 overshoot by a few ulps.
const SUM_TOLERANCE = 1e-9;

/**
 * Weighted draw over a campaign's live prize table.
 *
 * [0, 1) is cut into contiguous segments, one per prize that still has stock,
 * in ascending prize-id order, each as wide as the prize's probability. What
 * is left after the last segment is the no-win segment, so the mass of an
 * exhausted prize falls to no-win rather than being spread over the others.
 */
export class OddsResolutionEngine {
  validateTable(prizes: Array<Pick<PrizeStock, "prizeId" | "probability">>): OddsTableIssue[] {
    const issues: OddsTableIssue[] = [];
    let total = 0;
    for (const prize of prizes) {
      if (!Number.isFinite(prize.probability) || prize.probability <= 0 || prize.probability > 1) {
        issues.push({ prizeId: prize.prizeId, message: `Probability must be in (0, 1], got ${prize.probability}` });
        continue;
      }
      total += prize.probability;
    }
    if (total > 1 + SUM_TOLERANCE) {
      issues.push({ message: `Probabilities sum to ${total}, above 1` });
    }
    return issues;
  }

  eligible(prizes: PrizeStock[]): PrizeStock[] {
    return prizes
      .filter((prize) => prize.remainingQuantity > 0)
      .sort((a, b) => (a.prizeId < b.prizeId ? -1 : a.prizeId > b.prizeId ? 1 : 0));
  }

  draw(prizes: PrizeStock[], roll: number): DrawOutcome {
    if (!(roll >= 0 && roll < 1)) {
      throw new RangeError(`Roll must be in [0, 1), got ${roll}`);
    }
    const issues = this.validateTable(prizes);
    if (issues.length) {
      throw new RangeError(`Invalid prize table: ${issues.map((issue) => issue.message).join("; ")}`);
    }

    let upper = 0;
    for (const prize of this.eligible(prizes)) {
      upper += prize.probability;
      if (roll < upper) {
        return { kind: "PRIZE", prizeId: prize.prizeId };
      }
    }
    return { kind: "NO_WIN" };
  }

  /** Probability of each outcome for the current stock. */
  distribution(prizes: PrizeStock[]): { prizes: Record<string, number>; noWin: number } {
    const result: Record<string, number> = {};
    let total = 0;
    for (const prize of this.eligible(prizes)) {
      result[prize.prizeId] = prize.probability;
      total += prize.probability;
    }
    return { prizes: result, noWin: Math.max(0, 1 - total) };
  }
}
