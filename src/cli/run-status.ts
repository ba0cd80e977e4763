import { getConfig } from "../config.js";
import { closePool } from "../db/client.js";
import { openAuditStore } from "../db/open-audit-store.js";
import { parseFlags, requiredFlag } from "./args.js";

function printJson(value: unknown): void {
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(value, null, 2));
}

async function main(): Promise<void> {
  const runId = requiredFlag(parseFlags(process.argv.slice(2)), "run");
  const store = openAuditStore(getConfig());

  try {
    const run = await store.getRun(runId);
    if (!run) {
      printJson({ found: false, runId });
      process.exitCode = 1;
      return;
    }

    const accuracy = await store.latestAccuracy(runId);
    const records = await store.latestRecords(runId);
    const modelUsage: Record<string, number> = {};
    for (const record of records) {
      modelUsage[record.modelUsed] = (modelUsage[record.modelUsed] ?? 0) + 1;
    }

    printJson({
      found: true,
      run,
      accuracy,
      latestPass: records.reduce((max, record) => Math.max(max, record.passNumber), 0),
      reviewCount: records.filter((record) => record.finalTags.length > 0 && record.needsManualReview).length,
      untaggedCount: records.filter((record) => record.finalTags.length === 0).length,
      modelUsage,
    });
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
    console.error("Run status failed:", error);
    await closePool();
    process.exitCode = 1;
  });
