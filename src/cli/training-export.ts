import path from "node:path";
import { getConfig } from "../config.js";
import { closePool } from "../db/client.js";
import { openAuditStore } from "../db/open-audit-store.js";
import { selectTrainingExamples, writeTrainingExport } from "../pipeline/training-export.js";
import { fractionFlag, parseFlags, requiredFlag } from "./args.js";

async function main(): Promise<void> {
  const flags = parseFlags(process.argv.slice(2));
  const runId = requiredFlag(flags, "run");
  const outPath = path.resolve(process.cwd(), requiredFlag(flags, "out"));
  const minConfidence = fractionFlag(flags, "min-confidence") ?? 0;

  const store = openAuditStore(getConfig());
  try {
    const examples = selectTrainingExamples(await store.latestRecords(runId), minConfidence);
    await writeTrainingExport(outPath, examples);
    // eslint-disable-next-line no-console
    console.log(`Wrote ${examples.length} training example(s) to ${outPath}`);
  } finally {
    await store.close();
  }
}

main()
  .then(async () => {
    await closePool();
  })
  .catch(async (error: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Training export failed:", error);
    await closePool();
    process.exitCode = 1;
  });
