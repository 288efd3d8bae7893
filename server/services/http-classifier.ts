import type { PipelineConfig } from "../config.js";
import { applyObservation, isTerminalSite, type SiteObservation } from "../domain/status.js";
import type { PipelineStores } from "../domain/store.js";
import type { PhaseSummary } from "../domain/types.js";
import { analyzePage } from "./page-signals.js";
import { countBy, RunLog } from "./run-log.js";
import { runPool } from "./worker-pool.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ProbeOptions {
  timeoutMs: number;
  userAgent: string;
  maxHtmlChars: number;
  fetchImpl?: FetchLike;
  signal?: AbortSignal;
}

const deadHostCodes = new Set(["ENOTFOUND", "EAI_AGAIN", "ECONNREFUSED", "EHOSTUNREACH", "ENETUNREACH"]);
const challengeStatuses = new Set([403, 429, 503]);

export function checkUrlShape(url: string): SiteObservation | undefined {
  const invalid: SiteObservation = { siteStatus: "invalid_url", statusReason: "malformed_url" };
  if (!/^https?:\/\//i.test(url) || /\s/.test(url) || url.includes("**") || /["']/.test(url)) {
    return invalid;
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return invalid;
  }

  const host = parsed.hostname.toLowerCase();
  if ((host === "facebook.com" || host.endsWith(".facebook.com")) && parsed.pathname.startsWith("/groups/")) {
    return {
      siteStatus: "facebook_group",
      statusReason: "facebook_group",
      authType: "facebook",
      captchaType: "none",
      requiresLogin: true
    };
  }
  return undefined;
}

function networkErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current instanceof Error; depth += 1) {
    if ("code" in current && typeof current.code === "string") return current.code;
    current = current.cause;
  }
  return undefined;
}

function classifyFailure(error: unknown, timedOut: boolean): SiteObservation {
  if (timedOut) return { siteStatus: "timeout", statusReason: "timeout" };
  const code = networkErrorCode(error);
  if (code && deadHostCodes.has(code)) {
    return { siteStatus: "domain_dead", statusReason: code === "ENOTFOUND" || code === "EAI_AGAIN" ? "dns_failure" : "connection_refused" };
  }
  return { siteStatus: "error", statusReason: code ? `network_${code.toLowerCase()}` : "network_error" };
}

async function readHtml(response: Response, maxHtmlChars: number): Promise<string> {
  const html = await response.text();
  return html.slice(0, maxHtmlChars);
}

function classifyResponse(response: Response, html: string | undefined): SiteObservation {
  const status = response.status;
  if (response.headers.get("cf-mitigated")?.toLowerCase() === "challenge") {
    return { siteStatus: "cloudflare_blocked", statusReason: "bot_challenge", captchaType: "cloudflare_challenge" };
  }
  if (status === 404 || status === 410) {
    return { siteStatus: "not_found", statusReason: `http_${status}` };
  }

  const server = response.headers.get("server")?.toLowerCase() ?? "";
  if (challengeStatuses.has(status) && server.includes("cloudflare")) {
    return { siteStatus: "cloudflare_blocked", statusReason: `http_${status}_cloudflare`, captchaType: "cloudflare_challenge" };
  }

  if (html === undefined) {
    return status >= 400
      ? { siteStatus: "error", statusReason: `http_${status}` }
      : { siteStatus: "error", statusReason: "non_html" };
  }

  const analysis = analyzePage(html);
  if (analysis.verdict === "cloudflare_blocked") {
    return { siteStatus: "cloudflare_blocked", statusReason: "bot_challenge", captchaType: "cloudflare_challenge" };
  }
  if (status >= 400) {
    return { siteStatus: "error", statusReason: `http_${status}` };
  }
  if (analysis.verdict === "domain_parked") {
    return { siteStatus: "domain_parked", statusReason: "parked_page" };
  }
  if (analysis.verdict === "not_found") {
    return { siteStatus: "not_found", statusReason: "soft_404" };
  }

  return {
    siteStatus: "active",
    statusReason: `http_${status}`,
    authType: analysis.auth.authType,
    captchaType: analysis.captchaType,
    pricingType: analysis.pricingType,
    requiresLogin: analysis.auth.requiresLogin,
    authProviders: analysis.auth.providers,
    signals: analysis.signals
  };
}

/** One bounded HTTP probe. Never throws: every outcome is a site observation. */
export async function probeDirectory(url: string, options: ProbeOptions): Promise<SiteObservation> {
  const shape = checkUrlShape(url.trim());
  if (shape) return shape;

  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const forwardAbort = () => controller.abort();
  options.signal?.addEventListener("abort", forwardAbort, { once: true });

  try {
    const response = await fetchImpl(url.trim(), {
      signal: controller.signal,
      redirect: "follow",
      headers: {
        "user-agent": options.userAgent,
        accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8"
      }
    });
    const contentType = response.headers.get("content-type")?.toLowerCase() ?? "";
    const html = !contentType || contentType.includes("html") ? await readHtml(response, options.maxHtmlChars) : undefined;
    return classifyResponse(response, html);
  } catch (error) {
    return classifyFailure(error, timedOut || controller.signal.aborted);
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener("abort", forwardAbort);
  }
}

export interface ClassifyRunOptions {
  settings: PipelineConfig["classifier"];
  userAgent: string;
  reprobeTerminal?: boolean;
  fetchImpl?: FetchLike;
  log?: RunLog;
}

export async function runClassifier(stores: PipelineStores, options: ClassifyRunOptions): Promise<PhaseSummary> {
  const log = options.log ?? new RunLog("classify");
  const records = await stores.directories.load();
  const positions = records
    .map((record, position) => ({ record, position }))
    .filter(({ record }) => options.reprobeTerminal || !isTerminalSite(record))
    .map(({ position }) => position);
  const skipped = records.length - positions.length;
  log.info(`probing ${positions.length} directories (${skipped} terminal skipped)`);

  const { settings } = options;
  let completed = 0;

  await runPool<number, SiteObservation>(
    positions,
    {
      concurrency: settings.concurrency,
      // backstop above the probe's own abort timer
      timeoutMs: settings.timeoutMs + 5000,
      onTimeout: () => ({ siteStatus: "timeout", statusReason: "hard_timeout" }),
      onError: (_, error) => classifyFailure(error, false),
      onSettled: async (observation, position) => {
        const record = records[position];
        records[position] = {
          ...applyObservation(record, observation, { explicitReprobe: options.reprobeTerminal }),
          httpCheckedAt: new Date().toISOString()
        };
        if (observation.siteStatus === "error" || observation.siteStatus === "timeout") {
          log.warn(`${observation.siteStatus} (${observation.statusReason ?? "no reason"})`, record.name);
        }

        completed += 1;
        if (completed % settings.autosaveEvery === 0) {
          await stores.directories.save(records);
        }
      }
    },
    (position, context) =>
      probeDirectory(records[position].submissionUrl ?? records[position].url, {
        timeoutMs: settings.timeoutMs,
        userAgent: options.userAgent,
        maxHtmlChars: settings.maxHtmlChars,
        fetchImpl: options.fetchImpl,
        signal: context.signal
      })
  );

  await stores.directories.save(records);
  const counts = countBy(
    positions.map((position) => records[position]),
    (record) => record.siteStatus
  );
  return log.summarize(positions.length, counts, skipped ? `${skipped} terminal records skipped` : undefined);
}
