import type { ReportSinkPort } from "../core/ports";

export class ConsoleReportSink implements ReportSinkPort {
  readonly target = "stdout";

  constructor(private stream: NodeJS.WritableStream = process.stdout) {}

  async write(report: string): Promise<void> {
    this.stream.write(report);
  }
}
