#!/usr/bin/env node
import path from "node:path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { z } from "zod";
import { loadConfig, type PipelineConfig } from "./config.js";
import { ConfigurationError, isStageAbort } from "./domain/errors.js";
import { createDocumentStore, createPipelineStores, type PipelineStores } from "./domain/store.js";
import { SUBMISSION_STATUSES, type PhaseSummary, type StageName } from "./domain/types.js";
import { PlaywrightSessionFactory, type SessionFactory } from "./services/browser.js";
import { runBrowserVerifier } from "./services/browser-verifier.js";
import { resolveSlotValues } from "./services/field-matcher.js";
import { runFormDiscoverer } from "./services/form-discoverer.js";
import { runClassifier } from "./services/http-classifier.js";
import { runPlanBuilder } from "./services/plan-builder.js";
import { loadCopyVariants, loadProfile } from "./services/profile.js";
import { JsonLinesLedger } from "./services/progress-ledger.js";
import { formatReport, loadReport } from "./services/report.js";
import { RunLog } from "./services/run-log.js";
import { runSubmissionEngine } from "./services/submission-engine.js";
import { runTriage } from "./services/triage.js";

interface StageContext {
  config: PipelineConfig;
  stores: PipelineStores;
  log: RunLog;
}

async function runStage(stage: StageName, work: (context: StageContext) => Promise<PhaseSummary>): Promise<void> {
  const config = loadConfig();
  const documents = createDocumentStore(config);
  const log = new RunLog(stage);
  try {
    const summary = await work({ config, stores: createPipelineStores(documents), log });
    await new JsonLinesLedger(path.join(config.dataDir, "progress.jsonl")).record(summary);
  } catch (error) {
    if (!isStageAbort(error)) throw error;
    log.error(`aborted: ${error.message}`);
    process.exitCode = 1;
  } finally {
    await documents.close?.();
  }
}

async function withBrowser<R>(
  config: PipelineConfig,
  blockHeavyResources: boolean,
  work: (sessions: SessionFactory) => Promise<R>
): Promise<R> {
  const sessions = await PlaywrightSessionFactory.launch({ userAgent: config.userAgent, blockHeavyResources });
  try {
    return await work(sessions);
  } finally {
    await sessions.close();
  }
}

const retrySchema = z.array(z.enum(SUBMISSION_STATUSES).exclude(["submitted"])).default([]);

function parseRetry(raw: unknown) {
  const parsed = retrySchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`--retry takes submission statuses other than submitted: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName("dirsubmit")
    .command(
      "classify",
      "Probe every directory over HTTP and classify it",
      (y) => y.option("reprobe-terminal", { type: "boolean", default: false, describe: "also re-probe terminal records" }),
      (argv) =>
        runStage("classify", ({ config, stores, log }) =>
          runClassifier(stores, {
            settings: config.classifier,
            userAgent: config.userAgent,
            reprobeTerminal: argv["reprobe-terminal"],
            log
          })
        )
    )
    .command(
      "triage",
      "Rebuild the browser-check queue",
      (y) => y,
      () => runStage("triage", ({ stores, log }) => runTriage(stores, log))
    )
    .command(
      "verify",
      "Verify queued directories in a headless browser",
      (y) => y.option("recheck-unknown", { type: "boolean", default: false, describe: "deep pass over records still unresolved" }),
      (argv) =>
        runStage("verify", ({ config, stores, log }) =>
          withBrowser(config, true, (sessions) =>
            runBrowserVerifier(stores, { settings: config.verifier, sessions, recheckUnknown: argv["recheck-unknown"], log })
          )
        )
    )
    .command(
      "plan",
      "Add a pending submission target for every live directory",
      (y) => y.option("category", { type: "string", describe: "only directories listing this category" }),
      (argv) =>
        runStage("plan", async ({ config, stores, log }) => {
          const profile = await loadProfile(config.dataDir);
          return runPlanBuilder(stores, profile, { category: argv.category }, log);
        })
    )
    .command(
      "discover",
      "Find the submission form on each planned directory",
      (y) => y.option("rediscover", { type: "boolean", default: false, describe: "rerun on every target not yet submitted" }),
      (argv) =>
        runStage("discover", async ({ config, stores, log }) => {
          const profile = await loadProfile(config.dataDir);
          return withBrowser(config, true, (sessions) =>
            runFormDiscoverer(stores, {
              settings: config.discovery,
              sessions,
              values: resolveSlotValues(profile),
              match: { threshold: config.submission.matchThreshold, categories: profile.product.categories },
              rediscover: argv.rediscover,
              log
            })
          );
        })
    )
    .command(
      "submit",
      "Fill and submit discovered forms",
      (y) =>
        y
          .option("allow-login", { type: "boolean", default: false })
          .option("include-paid", { type: "boolean", default: false })
          .option("paid-manual-review", { type: "boolean", default: false, describe: "defer paid directories instead of skipping them" })
          .option("skip-discovery", { type: "boolean", default: false, describe: "also attempt pending targets" })
          .option("retry", { type: "string", array: true, describe: "statuses to attempt again" })
          .option("dry-run", { type: "boolean", default: false, describe: "fill without clicking, persist nothing" }),
      (argv) =>
        runStage("submit", async ({ config, stores, log }) => {
          const retry = parseRetry(argv.retry);
          const profile = await loadProfile(config.dataDir);
          const copies = await loadCopyVariants(config.dataDir);
          return withBrowser(config, false, (sessions) =>
            runSubmissionEngine(stores, {
              settings: config.submission,
              sessions,
              profile,
              copies,
              evidenceDir: config.evidenceDir,
              allowLogin: argv["allow-login"],
              includePaid: argv["include-paid"],
              paidManualReview: argv["paid-manual-review"],
              skipDiscovery: argv["skip-discovery"],
              retry,
              dryRun: argv["dry-run"],
              log
            })
          );
        })
    )
    .command(
      "report",
      "Print counts by status and the manual-assist queue size",
      (y) => y.option("json", { type: "boolean", default: false }),
      async (argv) => {
        const config = loadConfig();
        const documents = createDocumentStore(config);
        try {
          const report = await loadReport(createPipelineStores(documents));
          console.log(argv.json ? JSON.stringify(report, null, 2) : formatReport(report).join("\n"));
        } finally {
          await documents.close?.();
        }
      }
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
