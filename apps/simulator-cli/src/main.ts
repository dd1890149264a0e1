import { CryptoRngService, SeededRngService } from "@spin-rewards/core-rng";
import { parseArgs, parsePrizeTable, simulateDraws } from "./simulate";

const USAGE = "Example: npm run simulator -- --prizes coffee:0.3:100,muffin:0.2:20 --spins 10000 --deplete [--seed demo]";

function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.prizes) {
    console.error("Missing --prizes");
    console.error(USAGE);
    process.exit(1);
  }

  const report = simulateDraws(
    {
      spins: Number(args.spins ?? 10000),
      prizes: parsePrizeTable(args.prizes),
      depleteStock: args.deplete === "true",
    },
    args.seed ? new SeededRngService(args.seed) : new CryptoRngService(),
  );
  console.log(JSON.stringify(report, null, 2));
}

try {
  main();
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}
