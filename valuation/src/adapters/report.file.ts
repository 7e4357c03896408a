import { promises as fs } from "fs";
import { OutputWriteError } from "../core/errors";
import type { ReportSinkPort } from "../core/ports";

export class FileReportSink implements ReportSinkPort {
  constructor(readonly target: string) {}

  async write(report: string): Promise<void> {
    try {
      await fs.writeFile(this.target, report, "utf-8");
    } catch (error) {
      throw new OutputWriteError(this.target, error);
    }
  }
}
