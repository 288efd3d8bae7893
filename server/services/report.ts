import { MANUAL_ASSIST_STATUSES } from "../domain/status.js";
import type { PipelineStores } from "../domain/store.js";
import type { DirectoryRecord, SubmissionStatus, SubmissionTarget } from "../domain/types.js";
import { countBy } from "./run-log.js";

export interface ManualAssistItem {
  directoryName: string;
  submissionUrl: string;
  status: SubmissionStatus;
  statusReason?: string;
  authType?: DirectoryRecord["authType"];
  captchaType?: DirectoryRecord["captchaType"];
  copyIndex?: number;
}

export interface StatusReport {
  generatedAt: string;
  directories: {
    total: number;
    bySiteStatus: Record<string, number>;
    byAuthType: Record<string, number>;
    byCaptchaType: Record<string, number>;
    byPricingType: Record<string, number>;
  };
  plan: {
    total: number;
    byStatus: Record<string, number>;
  };
  manualQueueSize: number;
}

export function manualAssistQueue(plan: SubmissionTarget[], records: DirectoryRecord[]): ManualAssistItem[] {
  const directories = new Map(records.map((record) => [record.name, record]));
  return plan
    .filter((target) => MANUAL_ASSIST_STATUSES.includes(target.status))
    .map((target) => {
      const record = directories.get(target.directoryName);
      return {
        directoryName: target.directoryName,
        submissionUrl: target.finalUrl ?? target.submissionUrl,
        status: target.status,
        statusReason: target.statusReason,
        authType: record?.authType,
        captchaType: record?.captchaType,
        copyIndex: target.copyIndex
      };
    });
}

export function buildReport(records: DirectoryRecord[], plan: SubmissionTarget[], now: Date = new Date()): StatusReport {
  return {
    generatedAt: now.toISOString(),
    directories: {
      total: records.length,
      bySiteStatus: countBy(records, (record) => record.siteStatus),
      byAuthType: countBy(records, (record) => record.authType),
      byCaptchaType: countBy(records, (record) => record.captchaType),
      byPricingType: countBy(records, (record) => record.pricingType)
    },
    plan: {
      total: plan.length,
      byStatus: countBy(plan, (target) => target.status)
    },
    manualQueueSize: manualAssistQueue(plan, records).length
  };
}

export async function loadReport(stores: PipelineStores): Promise<StatusReport> {
  const [records, plan] = await Promise.all([stores.directories.load(), stores.plan.load()]);
  return buildReport(records, plan);
}

export function formatReport(report: StatusReport): string[] {
  const section = (title: string, counts: Record<string, number>) => {
    const rows = Object.entries(counts)
      .sort((a, b) => b[1] - a[1])
      .map(([key, count]) => `  ${key.padEnd(24)} ${count}`);
    return [title, ...rows];
  };
  return [
    `directories: ${report.directories.total}`,
    ...section("site status", report.directories.bySiteStatus),
    ...section("auth", report.directories.byAuthType),
    ...section("captcha", report.directories.byCaptchaType),
    ...section("pricing", report.directories.byPricingType),
    `submission targets: ${report.plan.total}`,
    ...section("submission status", report.plan.byStatus),
    `manual-assist queue: ${report.manualQueueSize}`
  ];
}
