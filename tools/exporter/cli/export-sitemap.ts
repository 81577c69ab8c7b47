#!/usr/bin/env node
import { resolveExportOptions } from "../pipeline/config.js";
import { ConfigError, RunFatalError } from "../pipeline/errors.js";
import { runExportPipeline } from "../pipeline/export-sitemap.js";
import { parseCliArgs, USAGE } from "./args.js";

async function main(): Promise<void> {
  const { help, ...raw } = parseCliArgs(process.argv.slice(2));
  if (help === true) {
    console.log(USAGE);
    return;
  }

  const options = resolveExportOptions(raw);
  const outcome = await runExportPipeline(options);
  const { total, succeeded, failed } = outcome.report.summary;
  console.log(`Export complete: ${succeeded}/${total} pages scraped, ${failed} skipped or failed.`);
  console.log(`Output folder: ${outcome.outputDir}`);
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(USAGE);
    for (const issue of error.issues) {
      console.error(`- ${issue}`);
    }
    process.exit(1);
  }
  if (error instanceof RunFatalError) {
    console.error(`Export failed: ${error.message}`);
    process.exit(1);
  }
  console.error("Export failed:", error);
  process.exit(1);
});
