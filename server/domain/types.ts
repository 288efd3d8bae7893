export const SITE_STATUSES = [
  "active",
  "not_found",
  "domain_dead",
  "timeout",
  "cloudflare_blocked",
  "error",
  "invalid_url",
  "facebook_group",
  "domain_parked",
  "unknown"
] as const;

export type SiteStatus = (typeof SITE_STATUSES)[number];

export const AUTH_TYPES = [
  "none",
  "email_password",
  "google_only",
  "google_and_email",
  "facebook",
  "oauth_other",
  "unknown"
] as const;

export type AuthType = (typeof AUTH_TYPES)[number];

export const CAPTCHA_TYPES = [
  "none",
  "recaptcha",
  "recaptcha_v3",
  "hcaptcha",
  "turnstile",
  "cloudflare_challenge",
  "generic",
  "unknown"
] as const;

export type CaptchaType = (typeof CAPTCHA_TYPES)[number];

export const PRICING_TYPES = ["free", "freemium", "paid", "unknown"] as const;

export type PricingType = (typeof PRICING_TYPES)[number];

export const SUBMISSION_STATUSES = [
  "pending",
  "discovered",
  "no_form_found",
  "submitted",
  "no_fields_matched",
  "captcha",
  "skipped_login_required",
  "skipped_paid",
  "timeout",
  "submit_timeout",
  "deferred",
  "error"
] as const;

export type SubmissionStatus = (typeof SUBMISSION_STATUSES)[number];

export interface DirectoryRecord {
  name: string;
  url: string;
  submissionUrl?: string;
  siteStatus: SiteStatus;
  authType: AuthType;
  captchaType: CaptchaType;
  pricingType: PricingType;
  categories: string[];
  requiresLogin?: boolean;
  authProviders?: string[];
  signals?: string[];
  statusReason?: string;
  httpCheckedAt?: string;
  browserCheckedAt?: string;
  deepCheckedAt?: string;
  submissionHints?: string[];
}

export interface FieldDescriptor {
  name: string;
  type: string;
  tag: string;
  label: string;
  placeholder: string;
  id: string;
  required: boolean;
  locator: string;
  options?: string[];
}

export interface CopyVariant {
  title: string;
  description: string;
}

export interface TargetCredentials {
  email: string;
  name: string;
  username: string;
}

export interface SubmissionTarget {
  directoryName: string;
  submissionUrl: string;
  status: SubmissionStatus;
  statusReason?: string;
  copy?: CopyVariant;
  copyIndex?: number;
  discoveredFields: FieldDescriptor[];
  formPath?: string;
  credentials: TargetCredentials;
  pageCaptcha?: CaptchaType;
  finalUrl?: string;
  discoveredAt?: string;
  attemptedAt?: string;
  submittedAt?: string;
  filledFields?: string[];
  unmatchedRequired?: string[];
  evidencePath?: string;
}

export interface BrowserCheckEntry {
  name: string;
  url: string;
  reason: string;
  queuedAt: string;
}

export interface ProductProfile {
  product: {
    name: string;
    url: string;
    tagline: string;
    description?: string;
    github?: string;
    twitter?: string;
    launchDate?: string;
    categories: string[];
  };
  contact: {
    name: string;
    firstName?: string;
    lastName?: string;
    email: string;
    username?: string;
    password?: string;
    jobTitle?: string;
  };
  assets?: {
    logoPath?: string;
    screenshotPath?: string;
  };
}

export type StageName = "classify" | "triage" | "verify" | "plan" | "discover" | "submit";

export interface PhaseSummary {
  runId: string;
  stage: StageName;
  startedAt: string;
  completedAt: string;
  processed: number;
  counts: Record<string, number>;
  note?: string;
}
