import { promises as fs } from "fs";
import * as path from "path";
import { InputNotFoundError, InputReadError } from "../core/errors";
import type { SourcePort } from "../core/ports";

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

export class FileSource implements SourcePort {
  readonly name: string;

  constructor(private filePath: string) {
    this.name = path.basename(filePath);
  }

  async readLines(): Promise<string[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        throw new InputNotFoundError(this.filePath, error);
      }
      throw new InputReadError(this.filePath, error);
    }

    return content.split(/\r?\n/);
  }
}

/**
 * Sample listings bundled with the service
 */
export function sampleSource(): FileSource {
  return new FileSource(path.join(__dirname, "../../fixtures/sample_listings.txt"));
}
