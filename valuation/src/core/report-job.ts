import type { Logger } from "@listval/shared-utils";
import { type AnalyticsOptions, analyze } from "./analytics";
import type { LoadResult } from "./dto";
import { InputNotFoundError, InputReadError, OutputWriteError, describeError } from "./errors";
import { loadListings } from "./loader";
import type { ListingRepoPort, ReportSinkPort, SourcePort } from "./ports";
import { EMPTY_COLLECTION_MESSAGE, type RenderOptions, renderReport } from "./report";

export interface ReportJobDeps {
  source: SourcePort;
  fallback?: SourcePort; // used only when the source file is missing
  repo: ListingRepoPort;
  console: ReportSinkPort;
  output: ReportSinkPort;
  logger: Logger;
}

export type ReportJobOptions = AnalyticsOptions & RenderOptions;

export interface ReportJobResult {
  loads: LoadResult[];
  outcome: "empty" | "reported" | "write_failed";
  exitCode: 0 | 1;
}

async function loadPhase(deps: ReportJobDeps): Promise<LoadResult[]> {
  const { source, fallback, repo, logger } = deps;

  try {
    return [await loadListings(source, repo, logger)];
  } catch (error) {
    if (error instanceof InputNotFoundError) {
      logger.error(error.message);
      if (!fallback) {
        logger.error("Please ensure the file exists (INPUT_FILE) or set SAMPLE_FALLBACK=true.");
        return [];
      }
      logger.warn(`Falling back to sample data from ${fallback.name}`);
      return [await loadListings(fallback, repo, logger)];
    }
    if (error instanceof InputReadError) {
      logger.error(error.message, describeError(error.cause));
      return [];
    }
    throw error;
  }
}

/**
 * Load listings, compute the report and publish it to the console and the
 * report file. Only a failure to persist the report is fatal.
 */
export async function runReportJob(
  deps: ReportJobDeps,
  options: ReportJobOptions
): Promise<ReportJobResult> {
  const loads = await loadPhase(deps);
  const result = analyze(deps.repo.all(), options);

  if (result.kind === "empty") {
    await deps.console.write(EMPTY_COLLECTION_MESSAGE + "\n");
    return { loads, outcome: "empty", exitCode: 0 };
  }

  const report = renderReport(result.facts, options);
  await deps.console.write(report);

  try {
    await deps.output.write(report);
  } catch (error) {
    if (error instanceof OutputWriteError) {
      deps.logger.error(error.message, describeError(error.cause));
      return { loads, outcome: "write_failed", exitCode: 1 };
    }
    throw error;
  }

  deps.logger.info(`Results written to ${deps.output.target}`);
  return { loads, outcome: "reported", exitCode: 0 };
}
