import { describe, expect, it } from "vitest";
import type { BrowserCheckEntry } from "../server/domain/types.js";
import { RunLog, silentWriter } from "../server/services/run-log.js";
import { browserCheckReason, buildBrowserCheckQueue, runTriage } from "../server/services/triage.js";
import { directory, memoryStores } from "./helpers/fakes.js";

const httpChecked = "2024-03-01T10:00:00.000Z";

describe("browserCheckReason", () => {
  it("queues ambiguous and reprobe records that have not been browser-checked since their HTTP probe", () => {
    expect(browserCheckReason(directory({ name: "a", authType: "unknown", httpCheckedAt: httpChecked }))).toBe("auth_unknown");
    expect(browserCheckReason(directory({ name: "b", siteStatus: "cloudflare_blocked", httpCheckedAt: httpChecked }))).toBe(
      "status_cloudflare_blocked"
    );
    expect(browserCheckReason(directory({ name: "c", httpCheckedAt: httpChecked }))).toBe("confirm_active");
  });

  it("skips terminal and already verified records", () => {
    expect(browserCheckReason(directory({ name: "a", siteStatus: "domain_parked" }))).toBeUndefined();
    expect(
      browserCheckReason(directory({ name: "b", httpCheckedAt: httpChecked, browserCheckedAt: "2024-03-02T00:00:00.000Z" }))
    ).toBeUndefined();
    expect(
      browserCheckReason(directory({ name: "c", httpCheckedAt: httpChecked, browserCheckedAt: "2024-02-01T00:00:00.000Z" }))
    ).toBe("confirm_active");
  });
});

describe("buildBrowserCheckQueue", () => {
  const queuedAt = "2024-03-01T12:00:00.000Z";
  const previous: BrowserCheckEntry[] = [
    { name: "kept", url: "https://kept", reason: "auth_unknown", queuedAt },
    { name: "removed", url: "https://removed", reason: "auth_unknown", queuedAt },
    { name: "died", url: "https://died", reason: "status_timeout", queuedAt },
    { name: "checked", url: "https://checked", reason: "captcha_unknown", queuedAt }
  ];

  it("keeps surviving entries in order, drops the rest with a reason and appends new records", () => {
    const records = [
      directory({ name: "fresh", authType: "unknown", httpCheckedAt: httpChecked }),
      directory({ name: "checked", browserCheckedAt: "2024-03-01T13:00:00.000Z", httpCheckedAt: httpChecked }),
      directory({ name: "died", siteStatus: "domain_dead" }),
      directory({ name: "kept", authType: "unknown", httpCheckedAt: httpChecked })
    ];
    const result = buildBrowserCheckQueue(records, previous, new Date("2024-03-05T00:00:00.000Z"));

    expect(result.queue).toEqual([
      previous[0],
      { name: "fresh", url: "https://fresh", reason: "auth_unknown", queuedAt: "2024-03-05T00:00:00.000Z" }
    ]);
    expect(result.dropped.map(({ entry, reason }) => [entry.name, reason])).toEqual([
      ["removed", "record_removed"],
      ["died", "terminal"],
      ["checked", "browser_checked"]
    ]);
    expect(result.terminal.map((record) => record.name)).toEqual(["died"]);
  });

  it("is stable when nothing changed", () => {
    const records = [directory({ name: "kept", authType: "unknown", httpCheckedAt: httpChecked })];
    const first = buildBrowserCheckQueue(records, []);
    const second = buildBrowserCheckQueue(records, first.queue);
    expect(second.queue).toEqual(first.queue);
    expect(second.added).toEqual([]);
  });
});

describe("runTriage", () => {
  it("writes only the queue document", async () => {
    const { stores, documents } = memoryStores({
      directories: [directory({ name: "a.example", authType: "unknown", httpCheckedAt: httpChecked })]
    });
    const summary = await runTriage(stores, new RunLog("triage", silentWriter));
    expect(summary.counts).toEqual({ terminal: 0, queued: 1, added: 1, dropped: 0 });
    expect(documents.writes).toBe(1);
    expect([...documents.documents.keys()].sort()).toEqual(["browser_check_queue.json", "directories.json"]);
  });
});
