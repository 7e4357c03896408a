#!/usr/bin/env node

import { createLogger } from "@listval/shared-utils";
import { MemoryListingRepo } from "../adapters/repo.memory";
import { ConsoleReportSink } from "../adapters/report.console";
import { FileReportSink } from "../adapters/report.file";
import { FileSource, sampleSource } from "../adapters/source.file";
import { loadConfig } from "../config/env";
import { runReportJob } from "../core/report-job";

async function main(): Promise<number> {
  const cfg = loadConfig();
  const logger = createLogger("VALUATION", cfg.logLevel);

  logger.info(`Starting in ${cfg.mode} mode, reading ${cfg.inputFile}`);

  const result = await runReportJob(
    {
      source: new FileSource(cfg.inputFile),
      fallback: cfg.sampleFallback ? sampleSource() : undefined,
      repo: new MemoryListingRepo(),
      console: new ConsoleReportSink(),
      output: new FileReportSink(cfg.outputFile),
      logger,
    },
    { targetCity: cfg.targetCity, currency: cfg.currency }
  );

  logger.debug("Report job finished", { outcome: result.outcome });
  return result.exitCode;
}

// Run if this file is executed directly
if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error("[VALUATION] Unhandled error:", error);
      process.exit(1);
    });
}
