import type { PipelineStores } from "../domain/store.js";
import type { DirectoryRecord, PhaseSummary, ProductProfile, SubmissionTarget } from "../domain/types.js";
import { credentialsFromProfile } from "./profile.js";
import { RunLog } from "./run-log.js";

export interface PlanOptions {
  category?: string;
}

function matchesCategory(record: DirectoryRecord, category: string | undefined): boolean {
  if (!category) return true;
  const wanted = category.trim().toLowerCase();
  return record.categories.some((value) => value.toLowerCase() === wanted);
}

/** Appends a pending target for every live directory the plan does not hold yet. */
export function extendPlan(
  records: DirectoryRecord[],
  plan: SubmissionTarget[],
  profile: ProductProfile,
  options: PlanOptions = {}
): { plan: SubmissionTarget[]; added: SubmissionTarget[] } {
  const planned = new Set(plan.map((target) => target.directoryName));
  const credentials = credentialsFromProfile(profile);
  const added: SubmissionTarget[] = records
    .filter((record) => record.siteStatus === "active" && !planned.has(record.name) && matchesCategory(record, options.category))
    .map((record): SubmissionTarget => ({
      directoryName: record.name,
      submissionUrl: record.submissionUrl ?? record.url,
      status: "pending",
      discoveredFields: [],
      credentials: { ...credentials }
    }));
  return { plan: [...plan, ...added], added };
}

export async function runPlanBuilder(
  stores: PipelineStores,
  profile: ProductProfile,
  options: PlanOptions = {},
  log: RunLog = new RunLog("plan")
): Promise<PhaseSummary> {
  const records = await stores.directories.load();
  const existing = await stores.plan.load();
  const { plan, added } = extendPlan(records, existing, profile, options);
  if (added.length > 0) {
    await stores.plan.save(plan);
  }
  return log.summarize(added.length, { added: added.length, total: plan.length }, options.category ? `category ${options.category}` : undefined);
}
