import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import type { PhaseSummary } from "../domain/types.js";

/** Write-only sink the reporting layer renders from. */
export interface ProgressLedger {
  record(summary: PhaseSummary): Promise<void>;
}

export class JsonLinesLedger implements ProgressLedger {
  constructor(private readonly filePath: string) {}

  async record(summary: PhaseSummary): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `${JSON.stringify(summary)}\n`, "utf8");
  }
}
