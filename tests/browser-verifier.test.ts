import { describe, expect, it } from "vitest";
import { runBrowserVerifier } from "../server/services/browser-verifier.js";
import { RunLog, silentWriter } from "../server/services/run-log.js";
import { directory, FakeSessionFactory, memoryStores } from "./helpers/fakes.js";

const pass = { navigationTimeoutMs: 1000, settleMs: 0, hardLimitMs: 500 };
const settings = { concurrency: 3, standard: pass, deep: pass, autosaveEvery: 50 };
const queuedAt = "2024-03-01T12:00:00.000Z";

function queueEntry(name: string) {
  return { name, url: `https://${name}`, reason: "auth_unknown", queuedAt };
}

describe("runBrowserVerifier", () => {
  it("resolves a rendered Google sign-in button to google_only", async () => {
    const { stores } = memoryStores({
      directories: [directory({ name: "launch.example", siteStatus: "active", authType: "unknown", captchaType: "unknown" })],
      queue: [queueEntry("launch.example")]
    });
    const sessions = new FakeSessionFactory({
      "https://launch.example": {
        html: "<html><head><title>Launch</title></head><body><button>Sign in with Google</button></body></html>"
      }
    });

    const summary = await runBrowserVerifier(stores, { settings, sessions, log: new RunLog("verify", silentWriter) });

    const [record] = await stores.directories.load();
    expect(record.authType).toBe("google_only");
    expect(record.captchaType).toBe("none");
    expect(record.authProviders).toEqual(["google"]);
    expect(record.browserCheckedAt).toBeDefined();
    expect(record.deepCheckedAt).toBeUndefined();
    expect(summary.counts).toEqual({ active: 1 });
    expect(sessions.active).toBe(0);
  });

  it("skips terminal records and keeps going past failures", async () => {
    const { stores } = memoryStores({
      directories: [
        directory({ name: "gone.example", siteStatus: "not_found" }),
        directory({ name: "broken.example", authType: "unknown" }),
        directory({ name: "slow.example", authType: "unknown" }),
        directory({ name: "fine.example", authType: "unknown" })
      ],
      queue: ["gone.example", "broken.example", "slow.example", "fine.example"].map(queueEntry)
    });
    const sessions = new FakeSessionFactory({
      "https://broken.example": { html: "", openError: new Error("net::ERR_CONNECTION_RESET") },
      "https://slow.example": { html: "<html></html>", delayMs: 5000 },
      "https://fine.example": { html: '<html><body><form><input type="text" name="name"></form></body></html>' }
    });

    const summary = await runBrowserVerifier(stores, { settings, sessions, log: new RunLog("verify", silentWriter) });

    const records = await stores.directories.load();
    expect(records.map((record) => [record.name, record.siteStatus, record.statusReason])).toEqual([
      ["gone.example", "not_found", undefined],
      ["broken.example", "error", "net::ERR_CONNECTION_RESET"],
      ["slow.example", "timeout", "browser_hard_timeout"],
      ["fine.example", "active", "browser_rendered"]
    ]);
    expect(records[0].browserCheckedAt).toBeUndefined();
    expect(records[3].authType).toBe("none");
    expect(summary.processed).toBe(3);
  });

  it("inspects the DOM on the recheck-unknown pass", async () => {
    const { stores } = memoryStores({
      directories: [
        directory({ name: "deep.example", authType: "unknown", captchaType: "unknown" }),
        directory({ name: "known.example", authType: "none", captchaType: "none" })
      ]
    });
    const sessions = new FakeSessionFactory({
      "https://deep.example": {
        html: "<html><body><div id=root></div></body></html>",
        dom: { inputCount: 2, formCount: 1, passwordInputs: 1, oauthButtons: ["Continue with GitHub"], signupButtons: ["Sign up"] }
      }
    });

    const summary = await runBrowserVerifier(stores, {
      settings,
      sessions,
      recheckUnknown: true,
      log: new RunLog("verify", silentWriter)
    });

    const [deep, known] = await stores.directories.load();
    expect(deep.authType).toBe("email_password");
    expect(deep.authProviders).toEqual(["github", "email_password"]);
    expect(deep.requiresLogin).toBe(true);
    expect(deep.submissionHints).toEqual(["Sign up"]);
    expect(deep.signals).toEqual(["dom:inputs=2", "dom:forms=1"]);
    expect(deep.deepCheckedAt).toBeDefined();
    expect(known.browserCheckedAt).toBeUndefined();
    expect(summary.note).toBe("recheck-unknown pass");
    expect(sessions.sessionsOpened).toBe(1);
  });
});
