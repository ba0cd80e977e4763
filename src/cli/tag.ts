import path from "node:path";
import { closePool } from "../db/client.js";
import { runTaggingPipeline } from "../pipeline/run.js";
import { booleanFlag, fractionFlag, optionalFlag, parseFlags, positiveIntFlag, requiredFlag } from "./args.js";

const EXIT_TARGET_MISSED = 2;
const EXIT_PIPELINE_ERROR = 1;

async function main(): Promise<boolean> {
  const flags = parseFlags(process.argv.slice(2));
  const inputPath = requiredFlag(flags, "input");
  const outputDir = optionalFlag(flags, "output-dir");

  const summary = await runTaggingPipeline({
    inputPath: path.resolve(process.cwd(), inputPath),
    outputDir: outputDir === undefined ? undefined : path.resolve(process.cwd(), outputDir),
    accuracyTarget: fractionFlag(flags, "target"),
    maxIterations: positiveIntFlag(flags, "max-iterations"),
    aiEnabled: booleanFlag(flags, "no-ai") ? false : undefined,
  });

  // eslint-disable-next-line no-console
  console.log(JSON.stringify(summary, null, 2));
  return summary.targetMet;
}

main()
  .then(async (targetMet) => {
    await closePool();
    if (!targetMet) {
      process.exitCode = EXIT_TARGET_MISSED;
    }
  })
  .catch(async (error: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Tagging run failed:", error);
    await closePool();
    process.exitCode = EXIT_PIPELINE_ERROR;
  });
