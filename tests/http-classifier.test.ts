import { describe, expect, it } from "vitest";
import { probeDirectory, runClassifier, type FetchLike } from "../server/services/http-classifier.js";
import { silentWriter, RunLog } from "../server/services/run-log.js";
import { runTriage } from "../server/services/triage.js";
import { directory, memoryStores } from "./helpers/fakes.js";

const probeOptions = { timeoutMs: 200, userAgent: "test-agent", maxHtmlChars: 100_000 };

function html(body: string, init: { status?: number; headers?: Record<string, string> } = {}): Response {
  return new Response(body, {
    status: init.status ?? 200,
    headers: { "content-type": "text/html; charset=utf-8", ...init.headers }
  });
}

function dnsFailure(host: string): Error {
  const cause = Object.assign(new Error(`getaddrinfo ENOTFOUND ${host}`), { code: "ENOTFOUND" });
  return new TypeError("fetch failed", { cause });
}

function routes(table: Record<string, () => Response | Error>): FetchLike {
  return async (url) => {
    const handler = table[url];
    if (!handler) throw new Error(`unexpected fetch ${url}`);
    const result = handler();
    if (result instanceof Error) throw result;
    return result;
  };
}

describe("probeDirectory", () => {
  it("rejects malformed URLs without fetching", async () => {
    const fetchImpl = routes({});
    await expect(probeDirectory("ftp://files.example", { ...probeOptions, fetchImpl })).resolves.toEqual({
      siteStatus: "invalid_url",
      statusReason: "malformed_url"
    });
    await expect(probeDirectory("https://bad**.example", { ...probeOptions, fetchImpl })).resolves.toMatchObject({
      siteStatus: "invalid_url"
    });
  });

  it("recognises facebook groups", async () => {
    const observation = await probeDirectory("https://www.facebook.com/groups/makers", { ...probeOptions, fetchImpl: routes({}) });
    expect(observation).toMatchObject({ siteStatus: "facebook_group", authType: "facebook", captchaType: "none" });
  });

  it("maps DNS failures to domain_dead", async () => {
    const fetchImpl = routes({ "https://dead.example": () => dnsFailure("dead.example") });
    await expect(probeDirectory("https://dead.example", { ...probeOptions, fetchImpl })).resolves.toEqual({
      siteStatus: "domain_dead",
      statusReason: "dns_failure"
    });
  });

  it("maps status codes and challenge signatures", async () => {
    const fetchImpl = routes({
      "https://gone.example": () => html("<h1>Gone</h1>", { status: 410 }),
      "https://cf.example": () => html("<html></html>", { status: 503, headers: { server: "cloudflare" } }),
      "https://broken.example": () => html("<html>oops</html>", { status: 500 }),
      "https://api.example": () => new Response("{}", { headers: { "content-type": "application/json" } })
    });
    await expect(probeDirectory("https://gone.example", { ...probeOptions, fetchImpl })).resolves.toEqual({
      siteStatus: "not_found",
      statusReason: "http_410"
    });
    await expect(probeDirectory("https://cf.example", { ...probeOptions, fetchImpl })).resolves.toEqual({
      siteStatus: "cloudflare_blocked",
      statusReason: "http_503_cloudflare",
      captchaType: "cloudflare_challenge"
    });
    await expect(probeDirectory("https://broken.example", { ...probeOptions, fetchImpl })).resolves.toEqual({
      siteStatus: "error",
      statusReason: "http_500"
    });
    await expect(probeDirectory("https://api.example", { ...probeOptions, fetchImpl })).resolves.toEqual({
      siteStatus: "error",
      statusReason: "non_html"
    });
  });

  it("classifies a live page with its signals", async () => {
    const fetchImpl = routes({
      "https://live.example": () =>
        html('<html><title>Submit your tool</title><body><form><input type="url" name="site"></form><p>Free submission</p></body></html>')
    });
    await expect(probeDirectory("https://live.example", { ...probeOptions, fetchImpl })).resolves.toEqual({
      siteStatus: "active",
      statusReason: "http_200",
      authType: "none",
      captchaType: "none",
      pricingType: "free",
      requiresLogin: false,
      authProviders: [],
      signals: ["pricing:free"]
    });
  });

  it("times out on a hanging server", async () => {
    const fetchImpl: FetchLike = (_url, init) =>
      new Promise((_, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new DOMException("aborted", "AbortError")));
      });
    const started = Date.now();
    await expect(probeDirectory("https://slow.example", { ...probeOptions, timeoutMs: 50, fetchImpl })).resolves.toEqual({
      siteStatus: "timeout",
      statusReason: "timeout"
    });
    expect(Date.now() - started).toBeLessThan(1000);
  });
});

describe("runClassifier", () => {
  const settings = { concurrency: 4, timeoutMs: 200, maxHtmlChars: 100_000, autosaveEvery: 1 };

  it("marks a dead domain and leaves it out of the browser-check queue", async () => {
    const { stores } = memoryStores({
      directories: [
        directory({ name: "dead.example", url: "https://dead.example", siteStatus: "unknown", authType: "unknown", captchaType: "unknown" }),
        directory({ name: "old.example", url: "https://old.example", siteStatus: "not_found" })
      ]
    });
    const fetchImpl = routes({ "https://dead.example": () => dnsFailure("dead.example") });

    const summary = await runClassifier(stores, {
      settings,
      userAgent: "test-agent",
      fetchImpl,
      log: new RunLog("classify", silentWriter)
    });

    expect(summary.counts).toEqual({ domain_dead: 1 });
    expect(summary.note).toBe("1 terminal records skipped");
    const [dead, old] = await stores.directories.load();
    expect(dead.siteStatus).toBe("domain_dead");
    expect(dead.httpCheckedAt).toBeDefined();
    expect(old.httpCheckedAt).toBeUndefined();

    await runTriage(stores, new RunLog("triage", silentWriter));
    await expect(stores.queue.load()).resolves.toEqual([]);
  });

  it("classifies the submission page when the record names one", async () => {
    const { stores } = memoryStores({
      directories: [
        directory({
          name: "hub.example",
          url: "https://hub.example",
          submissionUrl: "https://hub.example/submit",
          authType: "unknown",
          captchaType: "unknown"
        })
      ]
    });
    const fetchImpl = routes({
      "https://hub.example/submit": () =>
        html('<html><body><form></form><div class="g-recaptcha"></div><button>Sign in with Google</button></body></html>')
    });

    await runClassifier(stores, { settings, userAgent: "test-agent", fetchImpl, log: new RunLog("classify", silentWriter) });

    const [record] = await stores.directories.load();
    expect(record.captchaType).toBe("recaptcha");
    expect(record.authType).toBe("google_only");
  });

  it("re-probes terminal records only when asked", async () => {
    const { stores } = memoryStores({
      directories: [directory({ name: "back.example", url: "https://back.example", siteStatus: "domain_dead" })]
    });
    const fetchImpl = routes({ "https://back.example": () => html("<html><body><form></form></body></html>") });

    await runClassifier(stores, { settings, userAgent: "test-agent", fetchImpl, reprobeTerminal: true, log: new RunLog("classify", silentWriter) });
    const [record] = await stores.directories.load();
    expect(record.siteStatus).toBe("active");
  });
});
