import type {
  AuthType,
  CaptchaType,
  DirectoryRecord,
  PricingType,
  SiteStatus,
  SubmissionStatus
} from "./types.js";

export const TERMINAL_SITE_STATUSES = [
  "not_found",
  "domain_dead",
  "invalid_url",
  "facebook_group",
  "domain_parked"
] as const;

export const REPROBE_SITE_STATUSES = ["unknown", "timeout", "error", "cloudflare_blocked"] as const;

export type TerminalSiteStatus = (typeof TERMINAL_SITE_STATUSES)[number];
export type ReprobeSiteStatus = (typeof REPROBE_SITE_STATUSES)[number];

export type SiteResolution =
  | { kind: "terminal"; status: TerminalSiteStatus }
  | { kind: "needs_reprobe"; status: ReprobeSiteStatus }
  | { kind: "resolved"; status: "active" };

const terminalStatuses: ReadonlySet<SiteStatus> = new Set(TERMINAL_SITE_STATUSES);
const reprobeStatuses: ReadonlySet<SiteStatus> = new Set(REPROBE_SITE_STATUSES);

function isTerminalStatus(status: SiteStatus): status is TerminalSiteStatus {
  return terminalStatuses.has(status);
}

function isReprobeStatus(status: SiteStatus): status is ReprobeSiteStatus {
  return reprobeStatuses.has(status);
}

export function resolveSiteStatus(status: SiteStatus): SiteResolution {
  if (isTerminalStatus(status)) return { kind: "terminal", status };
  if (isReprobeStatus(status)) return { kind: "needs_reprobe", status };
  return { kind: "resolved", status: "active" };
}

export function isTerminalSite(record: Pick<DirectoryRecord, "siteStatus">): boolean {
  return resolveSiteStatus(record.siteStatus).kind === "terminal";
}

export interface RefinementOptions {
  explicitReprobe?: boolean;
}

/**
 * Terminal failures stick until an operator asks for a re-probe; everything else takes the newer value.
 */
export function refineSiteStatus(current: SiteStatus, next: SiteStatus, options: RefinementOptions = {}): SiteStatus {
  if (isTerminalStatus(current) && !isTerminalStatus(next) && !options.explicitReprobe) {
    return current;
  }
  return next;
}

export function refineAttribute<T extends AuthType | CaptchaType | PricingType>(current: T, next: T): T {
  return next === "unknown" ? current : next;
}

export interface SiteObservation {
  siteStatus: SiteStatus;
  statusReason?: string;
  authType?: AuthType;
  captchaType?: CaptchaType;
  pricingType?: PricingType;
  requiresLogin?: boolean;
  authProviders?: string[];
  signals?: string[];
  submissionHints?: string[];
}

export function applyObservation(
  record: DirectoryRecord,
  observation: SiteObservation,
  options: RefinementOptions = {}
): DirectoryRecord {
  const siteStatus = refineSiteStatus(record.siteStatus, observation.siteStatus, options);
  if (siteStatus !== observation.siteStatus) {
    // terminal status held; the observation is not applied
    return record;
  }

  return {
    ...record,
    siteStatus,
    statusReason: observation.statusReason,
    authType: observation.authType ? refineAttribute(record.authType, observation.authType) : record.authType,
    captchaType: observation.captchaType
      ? refineAttribute(record.captchaType, observation.captchaType)
      : record.captchaType,
    pricingType: observation.pricingType
      ? refineAttribute(record.pricingType, observation.pricingType)
      : record.pricingType,
    requiresLogin: observation.requiresLogin ?? record.requiresLogin,
    authProviders: observation.authProviders ?? record.authProviders,
    signals: observation.signals ?? record.signals,
    submissionHints: observation.submissionHints ?? record.submissionHints
  };
}

export const LOGIN_AUTH_TYPES: readonly AuthType[] = [
  "email_password",
  "google_only",
  "google_and_email",
  "facebook",
  "oauth_other"
];

export function requiresLogin(record: Pick<DirectoryRecord, "authType" | "requiresLogin">): boolean {
  return LOGIN_AUTH_TYPES.includes(record.authType) || record.requiresLogin === true;
}

/** Statuses the manual-submission assistant works from. */
export const MANUAL_ASSIST_STATUSES: readonly SubmissionStatus[] = ["captcha", "skipped_login_required", "deferred"];

const phaseRank: Record<SubmissionStatus, number> = {
  pending: 0,
  discovered: 1,
  no_form_found: 2,
  submitted: 2,
  no_fields_matched: 2,
  captcha: 2,
  skipped_login_required: 2,
  skipped_paid: 2,
  timeout: 2,
  submit_timeout: 2,
  deferred: 2,
  error: 2
};

export interface TransitionOptions {
  explicitRerun?: boolean;
}

export function canTransition(from: SubmissionStatus, to: SubmissionStatus, options: TransitionOptions = {}): boolean {
  if (from === "submitted") return false;
  if (phaseRank[to] > phaseRank[from]) return true;
  return options.explicitRerun === true;
}
