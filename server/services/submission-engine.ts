import path from "node:path";
import type { PipelineConfig } from "../config.js";
import { errorMessage, throwIfAborted } from "../domain/errors.js";
import { canTransition, requiresLogin } from "../domain/status.js";
import type { PipelineStores } from "../domain/store.js";
import type {
  CaptchaType,
  CopyVariant,
  DirectoryRecord,
  FieldDescriptor,
  PhaseSummary,
  ProductProfile,
  SubmissionStatus,
  SubmissionTarget
} from "../domain/types.js";
import { withSession, type FieldFill, type PageSession, type SessionFactory } from "./browser.js";
import { fieldLabel, matchField, matchFields, resolveSlotValues, type FillPlan, type MatchOptions, type SlotValues } from "./field-matcher.js";
import { discoverForm } from "./form-discoverer.js";
import { stripHtml } from "./page-signals.js";
import { countBy, RunLog } from "./run-log.js";
import { runPool, Semaphore } from "./worker-pool.js";

const confirmationPhrases = ["thank", "received", "success", "submitted", "under review", "pending approval"];

/** What a same-session discovery found on a target that reached the engine without fields. */
export interface InlineDiscovery {
  discoveredFields: FieldDescriptor[];
  formPath?: string;
  pageCaptcha?: CaptchaType;
}

export interface AttemptOutcome {
  status: SubmissionStatus;
  statusReason: string;
  filledFields?: string[];
  unmatchedRequired?: string[];
  evidencePath?: string;
  finalUrl?: string;
  discovery?: InlineDiscovery;
}

export interface GateOptions {
  allowLogin?: boolean;
  includePaid?: boolean;
  paidManualReview?: boolean;
}

/** Directory captcha when it is known, otherwise what discovery saw on the form page. */
export function effectiveCaptcha(record: DirectoryRecord | undefined, target: SubmissionTarget): CaptchaType {
  if (record && record.captchaType !== "unknown" && record.captchaType !== "none") return record.captchaType;
  return target.pageCaptcha ?? record?.captchaType ?? "unknown";
}

export function applyGates(
  target: SubmissionTarget,
  record: DirectoryRecord | undefined,
  options: GateOptions
): AttemptOutcome | undefined {
  if (record?.pricingType === "paid" && !options.includePaid) {
    return options.paidManualReview
      ? { status: "deferred", statusReason: "paid_manual_review" }
      : { status: "skipped_paid", statusReason: "paid_listing" };
  }
  if (record && requiresLogin(record) && !options.allowLogin) {
    return { status: "skipped_login_required", statusReason: `login_required:${record.authType}` };
  }
  const captcha = effectiveCaptcha(record, target);
  if (captcha !== "none" && captcha !== "unknown") {
    return { status: "captcha", statusReason: `captcha:${captcha}` };
  }
  return undefined;
}

export function assignCopy(copies: CopyVariant[], queuePosition: number): { copy: CopyVariant; copyIndex: number } {
  const copyIndex = queuePosition % copies.length;
  return { copy: copies[copyIndex], copyIndex };
}

export interface SubmitRunOptions extends GateOptions {
  settings: PipelineConfig["submission"];
  sessions: SessionFactory;
  profile: ProductProfile;
  copies: CopyVariant[];
  evidenceDir: string;
  skipDiscovery?: boolean;
  retry?: SubmissionStatus[];
  dryRun?: boolean;
  ceiling?: Semaphore;
  log?: RunLog;
}

let sharedCeiling: Semaphore | undefined;

/** The one semaphore every submission in this process goes through. */
export function submissionCeiling(settings: PipelineConfig["submission"]): Semaphore {
  sharedCeiling ??= new Semaphore(settings.ceiling, settings.minStartIntervalMs);
  return sharedCeiling;
}

export function selectSubmissionQueue(plan: SubmissionTarget[], options: Pick<SubmitRunOptions, "skipDiscovery" | "retry">): number[] {
  const retry = new Set(options.retry ?? []);
  return plan
    .map((target, position) => ({ target, position }))
    .filter(
      ({ target }) =>
        target.status !== "submitted" &&
        (target.status === "discovered" || (options.skipDiscovery === true && target.status === "pending") || retry.has(target.status))
    )
    .map(({ position }) => position);
}

/** `<run>/<directory>-pre-submit.png`, both segments reduced to filename-safe characters. */
export function preSubmitEvidencePath(runId: string, directoryName: string): string {
  const safe = (value: string) => value.replace(/[^a-zA-Z0-9_-]/g, "_");
  return `${safe(runId)}/${safe(directoryName.toLowerCase())}-pre-submit.png`;
}

function hasConfirmation(before: string, after: string): boolean {
  return confirmationPhrases.some((phrase) => after.includes(phrase) && !before.includes(phrase));
}

interface AttemptContext {
  target: SubmissionTarget;
  /** Absent when the target has no fields yet and the form is discovered on the open page. */
  fillPlan?: FillPlan;
  matchOptions: MatchOptions;
  values: SlotValues;
  settings: PipelineConfig["submission"];
  evidenceDir: string;
  runId: string;
  dryRun: boolean;
  signal: AbortSignal;
  log: RunLog;
  onFillStarted: () => void;
}

function toFills(plan: FillPlan): FieldFill[] {
  return plan.matches.map((match) => ({
    locator: match.field.locator,
    fieldName: fieldLabel(match.field),
    value: match.value,
    kind: match.kind,
    required: match.field.required
  }));
}

async function attemptSubmission(session: PageSession, context: AttemptContext): Promise<AttemptOutcome> {
  const { settings, signal } = context;
  let { target, fillPlan } = context;
  let discovery: InlineDiscovery | undefined;
  let openedUrl: string;

  if (fillPlan) {
    openedUrl = (await session.open(target.finalUrl ?? target.submissionUrl, settings)).finalUrl;
  } else {
    const isMatchable = (field: FieldDescriptor) => "slot" in matchField(field, context.values, context.matchOptions);
    const found = await discoverForm(session, target.submissionUrl, settings, isMatchable);
    discovery = { discoveredFields: found.fields, formPath: found.formPath, pageCaptcha: found.pageCaptcha };
    openedUrl = found.finalUrl ?? target.submissionUrl;
    if (found.status !== "discovered") {
      return { status: found.status, statusReason: found.statusReason, discovery, finalUrl: found.finalUrl };
    }
    if (found.pageCaptcha && found.pageCaptcha !== "none" && found.pageCaptcha !== "unknown") {
      return { status: "captcha", statusReason: `captcha:${found.pageCaptcha}`, discovery, finalUrl: openedUrl };
    }
    target = { ...target, ...discovery };
    fillPlan = matchFields(found.fields, context.values, context.matchOptions);
    const structural = planOutcome(fillPlan);
    if (structural) return { ...structural, discovery, finalUrl: openedUrl };
  }

  const before = stripHtml((await session.snapshot()).html.toLowerCase());
  const fills = toFills(fillPlan);

  throwIfAborted(signal);
  context.onFillStarted();
  const report = await session.fill(fills);
  const failures = report.failed.map((failure) => `${failure.fieldName}: ${failure.error}`);
  if (report.filled.length === 0) {
    return { status: "error", statusReason: `fill_failed: ${failures.join("; ").slice(0, 180)}`, discovery, finalUrl: openedUrl };
  }
  for (const failure of failures) {
    context.log.warn(`field not filled: ${failure}`, target.directoryName);
  }

  const required = new Set(fills.filter((fill) => fill.required).map((fill) => fill.fieldName));
  const requiredFailed = report.failed.filter((failure) => required.has(failure.fieldName)).map((failure) => failure.fieldName);
  if (requiredFailed.length > 0) {
    return {
      status: "deferred",
      statusReason: `fill_failed_required:${requiredFailed.join(",")}`,
      filledFields: report.filled,
      discovery,
      finalUrl: openedUrl
    };
  }

  let evidencePath: string | undefined;
  const relativePath = preSubmitEvidencePath(context.runId, target.directoryName);
  try {
    await session.screenshot(path.join(context.evidenceDir, relativePath));
    evidencePath = relativePath;
  } catch (error) {
    context.log.warn(`pre-submit screenshot failed: ${errorMessage(error)}`, target.directoryName);
  }

  const filled = { filledFields: report.filled, evidencePath, discovery, finalUrl: openedUrl };
  if (context.dryRun) {
    return { status: target.status, statusReason: "dry_run", ...filled };
  }
  if (!settings.submitEnabled) {
    return { status: "deferred", statusReason: "submit_disabled", ...filled };
  }

  throwIfAborted(signal);
  const clicked = await session.submit(target.formPath);
  if (!clicked) {
    return { status: "deferred", statusReason: "no_submit_button", ...filled };
  }
  await session.settle(settings.confirmationWaitMs);

  const after = await session.snapshot();
  if (hasConfirmation(before, stripHtml(after.html.toLowerCase()))) {
    return { status: "submitted", statusReason: "confirmation_text", ...filled, finalUrl: after.url };
  }
  if (after.url !== openedUrl && /thank|success|confirm/i.test(after.url)) {
    return { status: "submitted", statusReason: "confirmation_redirect", ...filled, finalUrl: after.url };
  }
  return { status: "deferred", statusReason: "no_confirmation", ...filled, finalUrl: after.url };
}

function planOutcome(plan: FillPlan): AttemptOutcome | undefined {
  if (plan.unmatchedRequired.length > 0) {
    const names = plan.unmatchedRequired.map(fieldLabel);
    return { status: "no_fields_matched", statusReason: `unmatched_required:${names.join(",")}`, unmatchedRequired: names };
  }
  if (plan.matches.length === 0) {
    return { status: "no_fields_matched", statusReason: "no_matches", unmatchedRequired: [] };
  }
  return undefined;
}

export async function runSubmissionEngine(stores: PipelineStores, options: SubmitRunOptions): Promise<PhaseSummary> {
  const log = options.log ?? new RunLog("submit");
  const { settings } = options;
  const dryRun = options.dryRun === true;
  const explicitRerun = (options.retry ?? []).length > 0;
  const ceiling = options.ceiling ?? submissionCeiling(settings);

  const records = await stores.directories.load();
  const directories = new Map(records.map((record) => [record.name, record]));
  const plan = await stores.plan.load();
  const queue = selectSubmissionQueue(plan, options);
  const copies = queue.map((_, k) => assignCopy(options.copies, k));
  log.info(`${queue.length} targets queued${dryRun ? " (dry run)" : ""}`);

  const fillStarted = new Set<number>();
  const inFlight = new Set<string>();

  const { results } = await runPool<number, AttemptOutcome>(
    queue,
    {
      concurrency: settings.concurrency,
      timeoutMs: settings.hardLimitMs,
      onTimeout: (_, k) =>
        fillStarted.has(k)
          ? { status: "submit_timeout", statusReason: "hard_timeout_after_fill" }
          : { status: "timeout", statusReason: "hard_timeout" },
      onError: (_, error, k) => {
        if (error instanceof Error && error.name === "TimeoutError") {
          return fillStarted.has(k)
            ? { status: "submit_timeout", statusReason: "navigation_timeout_after_fill" }
            : { status: "timeout", statusReason: "navigation_timeout" };
        }
        return { status: "error", statusReason: errorMessage(error, "submission_error").slice(0, 200) };
      },
      onSettled: async (outcome, position, k) => {
        const target = plan[position];
        inFlight.delete(target.directoryName);
        log.info(`${outcome.status} (${outcome.statusReason})`, target.directoryName);
        if (dryRun || !canTransition(target.status, outcome.status, { explicitRerun })) return;

        const attemptedAt = new Date().toISOString();
        plan[position] = {
          ...target,
          ...copies[k],
          status: outcome.status,
          statusReason: outcome.statusReason,
          attemptedAt,
          submittedAt: outcome.status === "submitted" ? attemptedAt : target.submittedAt,
          filledFields: outcome.filledFields ?? target.filledFields,
          unmatchedRequired: outcome.unmatchedRequired ?? target.unmatchedRequired,
          evidencePath: outcome.evidencePath ?? target.evidencePath,
          finalUrl: outcome.finalUrl ?? target.finalUrl,
          ...(outcome.discovery ? { ...outcome.discovery, discoveredAt: attemptedAt } : {})
        };
        await stores.plan.save(plan);
      }
    },
    async (position, context) => {
      const target = plan[position];
      const gated = applyGates(target, directories.get(target.directoryName), options);
      if (gated) return gated;

      const values = resolveSlotValues(options.profile, copies[context.index].copy);
      const matchOptions = { threshold: settings.matchThreshold, categories: options.profile.product.categories };
      let fillPlan: FillPlan | undefined;
      if (target.discoveredFields.length > 0) {
        fillPlan = matchFields(target.discoveredFields, values, matchOptions);
        const structural = planOutcome(fillPlan);
        if (structural) return structural;
      }

      if (inFlight.has(target.directoryName)) {
        return { status: target.status, statusReason: "attempt_already_in_flight" };
      }
      inFlight.add(target.directoryName);

      return ceiling.use(
        () =>
          withSession(options.sessions, context.signal, (session) =>
            attemptSubmission(session, {
              target,
              fillPlan,
              matchOptions,
              values,
              settings,
              evidenceDir: options.evidenceDir,
              runId: log.runId,
              dryRun,
              signal: context.signal,
              log,
              onFillStarted: () => fillStarted.add(context.index)
            })
          ),
        context.signal
      );
    }
  );

  return log.summarize(
    queue.length,
    countBy(results, (outcome) => outcome.status),
    dryRun ? "dry run, nothing persisted" : undefined
  );
}
