import type { BrowserPassSettings, PipelineConfig } from "../config.js";
import { errorMessage } from "../domain/errors.js";
import { applyObservation, isTerminalSite, type SiteObservation } from "../domain/status.js";
import type { PipelineStores } from "../domain/store.js";
import { indexBy } from "../domain/store.js";
import type { DirectoryRecord, PhaseSummary } from "../domain/types.js";
import { withSession, type PageSession, type SessionFactory } from "./browser.js";
import { analyzePage, authTypeFromProviders } from "./page-signals.js";
import { countBy, RunLog } from "./run-log.js";
import { runPool } from "./worker-pool.js";

const buttonProviders = ["google", "github", "twitter", "facebook", "apple", "linkedin"];

function mergeDomProviders(providers: string[], oauthButtons: string[], passwordInputs: number): string[] {
  const merged = new Set(providers);
  for (const text of oauthButtons) {
    const lower = text.toLowerCase();
    const provider = buttonProviders.find((name) => lower.includes(name));
    if (provider) merged.add(provider);
    else if (/\bx\b/.test(lower)) merged.add("twitter");
  }
  if (passwordInputs > 0) merged.add("email_password");
  return [...merged];
}

export async function verifyDirectory(
  session: PageSession,
  url: string,
  pass: BrowserPassSettings,
  deep: boolean
): Promise<SiteObservation> {
  const opened = await session.open(url, pass);
  if (opened.status === 404 || opened.status === 410) {
    return { siteStatus: "not_found", statusReason: `browser_http_${opened.status}` };
  }

  const snapshot = await session.snapshot();
  const analysis = analyzePage(snapshot.html, snapshot.title);
  if (analysis.verdict === "cloudflare_blocked") {
    return { siteStatus: "cloudflare_blocked", statusReason: "browser_bot_challenge", captchaType: "cloudflare_challenge" };
  }
  if (analysis.verdict === "domain_parked") return { siteStatus: "domain_parked", statusReason: "parked_page" };
  if (analysis.verdict === "not_found") return { siteStatus: "not_found", statusReason: "soft_404" };

  const observation: SiteObservation = {
    siteStatus: "active",
    statusReason: "browser_rendered",
    authType: analysis.auth.authType,
    captchaType: analysis.captchaType,
    pricingType: analysis.pricingType,
    requiresLogin: analysis.auth.requiresLogin,
    authProviders: analysis.auth.providers,
    signals: analysis.signals
  };
  if (!deep) return observation;

  const dom = await session.inspectDom();
  const providers = mergeDomProviders(analysis.auth.providers, dom.oauthButtons, dom.passwordInputs);
  return {
    ...observation,
    statusReason: "browser_deep_inspected",
    authType: authTypeFromProviders(providers, dom.inputCount > 0 || dom.formCount > 0),
    authProviders: providers,
    requiresLogin: analysis.auth.requiresLogin || providers.length > 0 || dom.signupButtons.length > 0,
    signals: [...analysis.signals, `dom:inputs=${dom.inputCount}`, `dom:forms=${dom.formCount}`],
    submissionHints: dom.signupButtons.length > 0 ? dom.signupButtons.slice(0, 5) : undefined
  };
}

function failureObservation(error: unknown): SiteObservation {
  if (error instanceof Error && error.name === "TimeoutError") {
    return { siteStatus: "timeout", statusReason: "navigation_timeout" };
  }
  return { siteStatus: "error", statusReason: errorMessage(error, "browser_error").slice(0, 200) };
}

interface VerificationTask {
  position: number;
  url: string;
}

export interface VerifyRunOptions {
  settings: PipelineConfig["verifier"];
  sessions: SessionFactory;
  recheckUnknown?: boolean;
  log?: RunLog;
}

function selectDeepTargets(records: DirectoryRecord[]): VerificationTask[] {
  return records
    .map((record, position) => ({ record, position }))
    .filter(({ record }) => record.siteStatus === "active" && (record.authType === "unknown" || record.captchaType === "unknown"))
    .map(({ record, position }) => ({ position, url: record.submissionUrl ?? record.url }));
}

export async function runBrowserVerifier(stores: PipelineStores, options: VerifyRunOptions): Promise<PhaseSummary> {
  const log = options.log ?? new RunLog("verify");
  const deep = options.recheckUnknown === true;
  const pass = deep ? options.settings.deep : options.settings.standard;
  const records = await stores.directories.load();

  let tasks: VerificationTask[];
  if (deep) {
    tasks = selectDeepTargets(records);
  } else {
    const positions = indexBy(records, (record) => record.name);
    tasks = [];
    for (const entry of await stores.queue.load()) {
      const position = positions.get(entry.name);
      if (position === undefined) {
        log.warn("queued directory no longer in the catalog", entry.name);
      } else if (isTerminalSite(records[position])) {
        log.info(`skipped, terminal status ${records[position].siteStatus}`, entry.name);
      } else {
        tasks.push({ position, url: entry.url });
      }
    }
  }
  log.info(`${deep ? "deep" : "standard"} pass over ${tasks.length} directories`);

  let completed = 0;
  await runPool<VerificationTask, SiteObservation>(
    tasks,
    {
      concurrency: options.settings.concurrency,
      timeoutMs: pass.hardLimitMs,
      onTimeout: () => ({ siteStatus: "timeout", statusReason: "browser_hard_timeout" }),
      onError: (_, error) => failureObservation(error),
      onSettled: async (observation, task) => {
        const record = records[task.position];
        const checkedAt = new Date().toISOString();
        records[task.position] = {
          ...applyObservation(record, observation),
          browserCheckedAt: checkedAt,
          deepCheckedAt: deep ? checkedAt : record.deepCheckedAt
        };
        if (observation.siteStatus !== "active") {
          log.info(`${observation.siteStatus} (${observation.statusReason ?? "no reason"})`, record.name);
        }

        completed += 1;
        if (completed % options.settings.autosaveEvery === 0) {
          await stores.directories.save(records);
        }
      }
    },
    (task, context) => withSession(options.sessions, context.signal, (session) => verifyDirectory(session, task.url, pass, deep))
  );

  await stores.directories.save(records);
  const counts = countBy(
    tasks.map((task) => records[task.position]),
    (record) => record.siteStatus
  );
  return log.summarize(tasks.length, counts, deep ? "recheck-unknown pass" : undefined);
}
