/**
 * deep-research
 * Runs one research query end to end and prints the report
 *
 * Usage: npm start --workspace services/deep-research -- "<query>" [quick|medium|deep]
 */

import "dotenv/config";
import { getBaseConfig, isDeepResearchError, logger } from "@deepresearch/core";
import { createResearchSystem } from "./systems/research/system.js";
import type { ResearchDepth } from "./systems/research/types.js";

const DEPTHS: readonly ResearchDepth[] = ["quick", "medium", "deep"];

function parseDepth(value: string | undefined): ResearchDepth {
  const depth = DEPTHS.find((d) => d === value);
  return depth ?? "medium";
}

async function main() {
  const config = getBaseConfig();
  logger.setLevel(config.env.logLevel);

  const text = process.argv[2];
  if (!text) {
    console.error('Usage: deep-research "<query>" [quick|medium|deep]');
    process.exitCode = 1;
    return;
  }

  const system = createResearchSystem({ dataDir: config.env.dataDir });
  console.log("System Info:", system.getInfo());
  console.log();

  const result = await system.run({ text, depth: parseDepth(process.argv[3]) });

  console.log(result.markdown);
  if (result.reportPath) {
    console.log(`Report saved to ${result.reportPath}`);
  }
}

main().catch((error: unknown) => {
  if (isDeepResearchError(error)) {
    console.error(`${error.code}: ${error.message}`);
  } else {
    console.error("Research failed:", error);
  }
  process.exitCode = 1;
});
