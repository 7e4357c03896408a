import type { Logger } from "@listval/shared-utils";
import type { LoadResult } from "./dto";
import { MalformedRecordError, UnknownRecordTypeError } from "./errors";
import { isBlankLine, parseRecord } from "./normalize";
import type { ListingRepoPort, SourcePort } from "./ports";

/**
 * Read every record from the source into the repository. A bad line is
 * logged and skipped; it never aborts the batch. Errors raised by the
 * source itself propagate to the caller.
 */
export async function loadListings(
  source: SourcePort,
  repo: ListingRepoPort,
  logger: Logger
): Promise<LoadResult> {
  const startTime = Date.now();
  const lines = await source.readLines();

  let processed = 0;
  let added = 0;
  let duplicates = 0;
  let skipped = 0;
  let malformed = 0;

  lines.forEach((line, index) => {
    if (isBlankLine(line)) return;
    const lineNumber = index + 1;

    try {
      const listing = parseRecord(line, lineNumber);
      processed++;
      if (repo.add(listing)) {
        added++;
      } else {
        duplicates++;
        logger.debug(`Duplicate listing on line ${lineNumber} ignored`);
      }
    } catch (error) {
      if (error instanceof UnknownRecordTypeError) {
        skipped++;
        logger.warn(`Skipping line ${lineNumber}: ${error.message}`);
      } else if (error instanceof MalformedRecordError) {
        malformed++;
        logger.warn(`Skipping line ${lineNumber}: ${error.reason}`);
      } else {
        throw error;
      }
    }
  });

  const result: LoadResult = {
    source: source.name,
    processed,
    added,
    duplicates,
    skipped,
    malformed,
    durationMs: Date.now() - startTime,
  };

  logger.info(`Loaded ${repo.size()} properties from ${source.name}`, {
    added,
    duplicates,
    skipped,
    malformed,
  });

  return result;
}
