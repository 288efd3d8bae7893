import { isTerminalSite, resolveSiteStatus } from "../domain/status.js";
import type { PipelineStores } from "../domain/store.js";
import type { BrowserCheckEntry, DirectoryRecord, PhaseSummary } from "../domain/types.js";
import { RunLog } from "./run-log.js";

export interface DroppedEntry {
  entry: BrowserCheckEntry;
  reason: "record_removed" | "terminal" | "browser_checked";
}

export interface TriageResult {
  terminal: DirectoryRecord[];
  queue: BrowserCheckEntry[];
  added: BrowserCheckEntry[];
  dropped: DroppedEntry[];
}

function isAfterOrEqual(left: string | undefined, right: string | undefined): boolean {
  if (!left) return false;
  if (!right) return true;
  return Date.parse(left) >= Date.parse(right);
}

/** Why a record needs a browser look, or undefined when it does not. */
export function browserCheckReason(record: DirectoryRecord): string | undefined {
  const resolution = resolveSiteStatus(record.siteStatus);
  if (resolution.kind === "terminal") return undefined;
  if (isAfterOrEqual(record.browserCheckedAt, record.httpCheckedAt)) return undefined;

  if (resolution.kind === "needs_reprobe") return `status_${resolution.status}`;
  if (record.authType === "unknown") return "auth_unknown";
  if (record.captchaType === "unknown") return "captcha_unknown";
  return "confirm_active";
}

export function buildBrowserCheckQueue(
  records: DirectoryRecord[],
  previous: BrowserCheckEntry[],
  now: Date = new Date()
): TriageResult {
  const byName = new Map(records.map((record) => [record.name, record]));
  const queue: BrowserCheckEntry[] = [];
  const dropped: DroppedEntry[] = [];
  const queued = new Set<string>();

  for (const entry of previous) {
    const record = byName.get(entry.name);
    if (!record) {
      dropped.push({ entry, reason: "record_removed" });
    } else if (isTerminalSite(record)) {
      dropped.push({ entry, reason: "terminal" });
    } else if (isAfterOrEqual(record.browserCheckedAt, entry.queuedAt)) {
      dropped.push({ entry, reason: "browser_checked" });
    } else if (!queued.has(entry.name)) {
      queue.push(entry);
      queued.add(entry.name);
    }
  }

  const queuedAt = now.toISOString();
  const added: BrowserCheckEntry[] = [];
  for (const record of records) {
    if (queued.has(record.name)) continue;
    const reason = browserCheckReason(record);
    if (!reason) continue;
    const entry = { name: record.name, url: record.submissionUrl ?? record.url, reason, queuedAt };
    added.push(entry);
    queue.push(entry);
    queued.add(record.name);
  }

  return {
    terminal: records.filter(isTerminalSite),
    queue,
    added,
    dropped
  };
}

export async function runTriage(stores: PipelineStores, log: RunLog = new RunLog("triage")): Promise<PhaseSummary> {
  const records = await stores.directories.load();
  const previous = await stores.queue.load();
  const result = buildBrowserCheckQueue(records, previous);

  for (const { entry, reason } of result.dropped) {
    log.info(`dropped from browser-check queue: ${reason}`, entry.name);
  }
  await stores.queue.save(result.queue);

  return log.summarize(records.length, {
    terminal: result.terminal.length,
    queued: result.queue.length,
    added: result.added.length,
    dropped: result.dropped.length
  });
}
