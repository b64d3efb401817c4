#!/usr/bin/env node
import { buildConfig } from "./core/config";
import { FatalRunError } from "./core/errors";
import { HttpTransport } from "./core/transport";
import { createHttpClient, getErrorMessage } from "./core/utils";
import { runSnapshot } from "./pipeline";
import { CrawlConfig } from "./types";

async function main(): Promise<void> {
  let config: CrawlConfig;
  try {
    config = buildConfig();
  } catch (err: unknown) {
    console.error(`Error: ${getErrorMessage(err)}`);
    process.exitCode = 1;
    return;
  }

  console.log("Retail Category Snapshot v1.0\n");
  console.log(`   Seeds:  ${config.seedUrls.length}`);
  console.log(`   Output: ${config.outputDir}/\n`);

  const transport = new HttpTransport(createHttpClient(config.timeout, config.userAgent));

  try {
    const { report, images, sinks, summary } = await runSnapshot(config, { transport });

    const failedSinks = sinks.filter((s) => !s.ok);
    console.log(`\nDone in ${summary.elapsed_time}`);
    console.log(`   Products:   ${report.products.length}`);
    console.log(`   Duplicates: ${report.duplicates}`);
    console.log(`   Failures:   ${report.failures.length}`);
    console.log(`   Images:     ${images.saved.length} saved, ${images.failed.length} failed`);
    console.log(`   Output:     ${config.outputDir}/`);
    if (failedSinks.length > 0) {
      console.warn(`   Failed sinks: ${failedSinks.map((s) => s.name).join(", ")}`);
      process.exitCode = 1;
    }
  } catch (err: unknown) {
    if (err instanceof FatalRunError) {
      console.error(`\nError: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

main().catch((err: unknown) => {
  console.error("Snapshot failed:", err);
  process.exitCode = 1;
});
