import type { PipelineConfig } from "../config.js";
import { errorMessage } from "../domain/errors.js";
import { canTransition } from "../domain/status.js";
import type { PipelineStores } from "../domain/store.js";
import type { CaptchaType, FieldDescriptor, PhaseSummary, SubmissionStatus, SubmissionTarget } from "../domain/types.js";
import { withSession, type ExtractedForm, type NavigationSettings, type PageSession, type SessionFactory } from "./browser.js";
import { matchField, type MatchOptions, type SlotValues } from "./field-matcher.js";
import { detectCaptcha, hasLoginRequiredText, stripHtml } from "./page-signals.js";
import { countBy, RunLog } from "./run-log.js";
import { runPool } from "./worker-pool.js";

export interface DiscoveryOutcome {
  status: SubmissionStatus;
  statusReason: string;
  fields: FieldDescriptor[];
  formPath?: string;
  pageCaptcha?: CaptchaType;
  finalUrl?: string;
}

export function isLoginForm(form: ExtractedForm): boolean {
  return form.hasPassword && form.fields.length <= 3;
}

/**
 * The form with the most matchable fields wins; ties go to the larger form, then the earlier one.
 */
export function choosePrincipalForm(
  forms: ExtractedForm[],
  isMatchable: (field: FieldDescriptor) => boolean
): ExtractedForm | undefined {
  let best: { form: ExtractedForm; matchable: number } | undefined;
  for (const form of forms) {
    const matchable = form.fields.filter(isMatchable).length;
    if (
      !best ||
      matchable > best.matchable ||
      (matchable === best.matchable && form.fields.length > best.form.fields.length)
    ) {
      best = { form, matchable };
    }
  }
  return best?.form;
}

export async function discoverForm(
  session: PageSession,
  url: string,
  navigation: NavigationSettings,
  isMatchable: (field: FieldDescriptor) => boolean
): Promise<DiscoveryOutcome> {
  const opened = await session.open(url, navigation);
  if (opened.status === 404 || opened.status === 410) {
    return { status: "no_form_found", statusReason: `http_${opened.status}`, fields: [], finalUrl: opened.finalUrl };
  }

  const snapshot = await session.snapshot();
  const lowerHtml = snapshot.html.toLowerCase();
  const pageCaptcha = detectCaptcha(lowerHtml);
  const forms = await session.extractForms();
  const candidates = forms.filter((form) => !isLoginForm(form));

  if (candidates.length === 0) {
    if (forms.length > 0 || hasLoginRequiredText(stripHtml(lowerHtml))) {
      return { status: "skipped_login_required", statusReason: "login_wall", fields: [], pageCaptcha, finalUrl: opened.finalUrl };
    }
    return { status: "no_form_found", statusReason: "no_fields", fields: [], pageCaptcha, finalUrl: opened.finalUrl };
  }

  const principal = choosePrincipalForm(candidates, isMatchable) ?? candidates[0];
  return {
    status: "discovered",
    statusReason: `${principal.fields.length} fields in ${principal.formless ? "formless group" : `form ${principal.index + 1} of ${forms.length}`}`,
    fields: principal.fields,
    formPath: principal.formPath,
    pageCaptcha,
    finalUrl: opened.finalUrl
  };
}

function failureOutcome(error: unknown): DiscoveryOutcome {
  if (error instanceof Error && error.name === "TimeoutError") {
    return { status: "timeout", statusReason: "navigation_timeout", fields: [] };
  }
  return { status: "error", statusReason: errorMessage(error, "discovery_error").slice(0, 200), fields: [] };
}

export interface DiscoverRunOptions {
  settings: PipelineConfig["discovery"];
  sessions: SessionFactory;
  values: SlotValues;
  match: MatchOptions;
  rediscover?: boolean;
  log?: RunLog;
}

export function selectDiscoveryTargets(plan: SubmissionTarget[], rediscover: boolean): number[] {
  return plan
    .map((target, position) => ({ target, position }))
    .filter(({ target }) => (rediscover ? target.status !== "submitted" : target.status === "pending"))
    .map(({ position }) => position);
}

export function applyDiscovery(target: SubmissionTarget, outcome: DiscoveryOutcome, rediscover: boolean): SubmissionTarget {
  if (!canTransition(target.status, outcome.status, { explicitRerun: rediscover })) return target;
  return {
    ...target,
    status: outcome.status,
    statusReason: outcome.statusReason,
    discoveredFields: outcome.fields,
    formPath: outcome.formPath,
    pageCaptcha: outcome.pageCaptcha ?? target.pageCaptcha,
    finalUrl: outcome.finalUrl ?? target.finalUrl,
    discoveredAt: new Date().toISOString()
  };
}

export async function runFormDiscoverer(stores: PipelineStores, options: DiscoverRunOptions): Promise<PhaseSummary> {
  const log = options.log ?? new RunLog("discover");
  const rediscover = options.rediscover === true;
  const plan = await stores.plan.load();
  const positions = selectDiscoveryTargets(plan, rediscover);
  log.info(`discovering forms on ${positions.length} targets`);

  const isMatchable = (field: FieldDescriptor) => "slot" in matchField(field, options.values, options.match);
  const { settings } = options;

  await runPool<number, DiscoveryOutcome>(
    positions,
    {
      concurrency: settings.concurrency,
      timeoutMs: settings.hardLimitMs,
      onTimeout: () => ({ status: "timeout", statusReason: "discovery_hard_timeout", fields: [] }),
      onError: (_, error) => failureOutcome(error),
      onSettled: async (outcome, position) => {
        const target = plan[position];
        plan[position] = applyDiscovery(target, outcome, rediscover);
        if (outcome.status !== "discovered") {
          log.info(`${outcome.status} (${outcome.statusReason})`, target.directoryName);
        }
        await stores.plan.save(plan);
      }
    },
    (position, context) =>
      withSession(options.sessions, context.signal, (session) =>
        discoverForm(session, plan[position].submissionUrl, settings, isMatchable)
      )
  );

  const counts = countBy(
    positions.map((position) => plan[position]),
    (target) => target.status
  );
  return log.summarize(positions.length, counts);
}
