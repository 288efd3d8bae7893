import dayjs from "dayjs";
import { v4 as uuid } from "uuid";
import type { PhaseSummary, StageName } from "../domain/types.js";

export type LogLevel = "info" | "warn" | "error";

export interface RunLogEntry {
  runId: string;
  stage: StageName;
  timestamp: string;
  level: LogLevel;
  message: string;
  subject?: string;
}

export type LogWriter = (entry: RunLogEntry) => void;

export const consoleWriter: LogWriter = (entry) => {
  const time = dayjs(entry.timestamp).format("HH:mm:ss");
  const subject = entry.subject ? ` ${entry.subject}:` : "";
  const line = `[${time}] [${entry.stage}]${subject} ${entry.message}`;
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export class RunLog {
  readonly runId = uuid();
  readonly startedAt = new Date().toISOString();
  readonly entries: RunLogEntry[] = [];

  constructor(
    readonly stage: StageName,
    private readonly writer: LogWriter = consoleWriter
  ) {}

  info(message: string, subject?: string): void {
    this.add("info", message, subject);
  }

  warn(message: string, subject?: string): void {
    this.add("warn", message, subject);
  }

  error(message: string, subject?: string): void {
    this.add("error", message, subject);
  }

  summarize(processed: number, counts: Record<string, number>, note?: string): PhaseSummary {
    const completedAt = new Date().toISOString();
    const elapsed = dayjs(completedAt).diff(dayjs(this.startedAt), "second", true);
    const breakdown = Object.entries(counts)
      .sort((a, b) => b[1] - a[1])
      .map(([status, count]) => `${status}:${count}`)
      .join("  ");
    this.info(`done in ${elapsed.toFixed(1)}s, ${processed} processed${breakdown ? `  ${breakdown}` : ""}`);

    return {
      runId: this.runId,
      stage: this.stage,
      startedAt: this.startedAt,
      completedAt,
      processed,
      counts,
      note
    };
  }

  private add(level: LogLevel, message: string, subject?: string): void {
    const entry: RunLogEntry = {
      runId: this.runId,
      stage: this.stage,
      timestamp: new Date().toISOString(),
      level,
      message,
      subject
    };
    this.entries.push(entry);
    this.writer(entry);
  }
}

export const silentWriter: LogWriter = () => undefined;

export function countBy<T>(items: T[], key: (item: T) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of items) {
    const value = key(item);
    counts[value] = (counts[value] ?? 0) + 1;
  }
  return counts;
}
