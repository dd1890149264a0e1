import type { PrizeStock } from "@spin-rewards/core-types";
import { OddsResolutionEngine } from "@spin-rewards/game-math-wheel";
import type { IRngService } from "@spin-rewards/core-rng";

export interface SimulationOptions {
  spins: number;
  prizes: PrizeStock[];
  /** When set, each win consumes one unit of stock as a live campaign would. */
  depleteStock: boolean;
}

export interface SimulationReport {
  spins: number;
  wins: Record<string, number>;
  noWins: number;
  winRate: number;
  frequencies: Record<string, number>;
  expected: Record<string, number>;
  expectedNoWin: number;
  remaining: Record<string, number>;
}

export function parseArgs(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      const key = arg.replace(/^--/, "");
      const value = args[i + 1];
      if (value && !value.startsWith("--")) {
        result[key] = value;
        i++;
      } else {
        result[key] = "true";
      }
    }
  }
  return result;
}

/** Parses `id:probability[:quantity]` entries separated by commas. */
export function parsePrizeTable(raw: string): PrizeStock[] {
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry) => {
      const [prizeId, probability, quantity] = entry.split(":");
      if (!prizeId || probability === undefined) {
        throw new Error(`Prize entry "${entry}" must look like id:probability[:quantity]`);
      }
      const total = quantity === undefined ? Number.MAX_SAFE_INTEGER : Number(quantity);
      if (!Number.isInteger(total) || total < 0) {
        throw new Error(`Prize ${prizeId} has an invalid quantity "${quantity}"`);
      }
      return { prizeId, probability: Number(probability), totalQuantity: total, remainingQuantity: total };
    });
}

export function simulateDraws(options: SimulationOptions, rng: IRngService): SimulationReport {
  const engine = new OddsResolutionEngine();
  const issues = engine.validateTable(options.prizes);
  if (issues.length) {
    throw new Error(issues.map((issue) => issue.message).join("; "));
  }
  if (!Number.isInteger(options.spins) || options.spins <= 0) {
    throw new Error(`Spin count must be a positive integer, got ${options.spins}`);
  }

  const stock = options.prizes.map((prize) => ({ ...prize }));
  const { prizes: expected, noWin: expectedNoWin } = engine.distribution(stock);
  const wins: Record<string, number> = Object.fromEntries(stock.map((prize) => [prize.prizeId, 0]));
  let noWins = 0;

  for (let i = 0; i < options.spins; i++) {
    const outcome = engine.draw(stock, rng.nextFloat());
    if (outcome.kind === "NO_WIN") {
      noWins += 1;
      continue;
    }
    wins[outcome.prizeId] += 1;
    if (options.depleteStock) {
      const prize = stock.find((entry) => entry.prizeId === outcome.prizeId);
      if (prize) prize.remainingQuantity -= 1;
    }
  }

  const frequencies = Object.fromEntries(Object.entries(wins).map(([prizeId, count]) => [prizeId, count / options.spins]));
  return {
    spins: options.spins,
    wins,
    noWins,
    winRate: (options.spins - noWins) / options.spins,
    frequencies,
    expected,
    expectedNoWin,
    remaining: Object.fromEntries(stock.map((prize) => [prize.prizeId, prize.remainingQuantity])),
  };
}
