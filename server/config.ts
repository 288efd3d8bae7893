import path from "node:path";

export function envFlag(name: string, fallback = false): boolean {
  const raw = process.env[name];
  if (!raw) return fallback;
  const trimmed = raw.trim();
  if (!trimmed) return fallback;
  const unquoted =
    (trimmed.startsWith("\"") && trimmed.endsWith("\"")) || (trimmed.startsWith("'") && trimmed.endsWith("'"))
      ? trimmed.slice(1, -1).trim()
      : trimmed;
  const normalized = unquoted.toLowerCase();
  return normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on";
}

function envNumber(name: string, fallback: number, min: number): number {
  const parsed = Number(process.env[name] ?? fallback);
  return Number.isFinite(parsed) ? Math.max(min, parsed) : fallback;
}

/** Pool sizes, ceilings and counts take whole numbers only. */
function envInteger(name: string, fallback: number, min: number): number {
  return Math.max(min, Math.floor(envNumber(name, fallback, min)));
}

export interface BrowserPassSettings {
  navigationTimeoutMs: number;
  settleMs: number;
  hardLimitMs: number;
}

export interface PipelineConfig {
  dataDir: string;
  databaseUrl?: string;
  userAgent: string;
  classifier: {
    concurrency: number;
    timeoutMs: number;
    maxHtmlChars: number;
    autosaveEvery: number;
  };
  verifier: {
    concurrency: number;
    standard: BrowserPassSettings;
    deep: BrowserPassSettings;
    autosaveEvery: number;
  };
  discovery: BrowserPassSettings & { concurrency: number };
  submission: BrowserPassSettings & {
    concurrency: number;
    ceiling: number;
    minStartIntervalMs: number;
    confirmationWaitMs: number;
    matchThreshold: number;
    submitEnabled: boolean;
  };
  evidenceDir: string;
  apiPort: number;
}

export function loadConfig(): PipelineConfig {
  const dataDir = path.resolve(process.cwd(), process.env.DATA_DIR?.trim() || "server/data");

  return {
    dataDir,
    databaseUrl: process.env.DATABASE_URL?.trim() || undefined,
    userAgent:
      process.env.CRAWLER_USER_AGENT?.trim() ||
      "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
    classifier: {
      concurrency: envInteger("CLASSIFIER_CONCURRENCY", 20, 1),
      timeoutMs: envNumber("CLASSIFIER_TIMEOUT_MS", 15_000, 1000),
      maxHtmlChars: envNumber("CLASSIFIER_MAX_HTML_CHARS", 400_000, 20_000),
      autosaveEvery: envInteger("CLASSIFIER_AUTOSAVE_EVERY", 50, 1)
    },
    verifier: {
      concurrency: envInteger("VERIFIER_CONCURRENCY", 10, 1),
      standard: {
        navigationTimeoutMs: envNumber("VERIFIER_NAV_TIMEOUT_MS", 10_000, 1000),
        settleMs: envNumber("VERIFIER_SETTLE_MS", 800, 0),
        hardLimitMs: envNumber("VERIFIER_HARD_LIMIT_MS", 15_000, 2000)
      },
      deep: {
        navigationTimeoutMs: envNumber("VERIFIER_DEEP_NAV_TIMEOUT_MS", 20_000, 1000),
        settleMs: envNumber("VERIFIER_DEEP_SETTLE_MS", 2500, 0),
        hardLimitMs: envNumber("VERIFIER_DEEP_HARD_LIMIT_MS", 30_000, 2000)
      },
      autosaveEvery: envInteger("VERIFIER_AUTOSAVE_EVERY", 50, 1)
    },
    discovery: {
      concurrency: envInteger("DISCOVERY_CONCURRENCY", 10, 1),
      navigationTimeoutMs: envNumber("DISCOVERY_NAV_TIMEOUT_MS", 12_000, 1000),
      settleMs: envNumber("DISCOVERY_SETTLE_MS", 2000, 0),
      hardLimitMs: envNumber("DISCOVERY_HARD_LIMIT_MS", 20_000, 2000)
    },
    submission: {
      concurrency: envInteger("SUBMISSION_CONCURRENCY", 5, 1),
      ceiling: envInteger("SUBMISSION_CEILING", 5, 1),
      minStartIntervalMs: envNumber("SUBMISSION_MIN_START_INTERVAL_MS", 250, 0),
      navigationTimeoutMs: envNumber("SUBMISSION_NAV_TIMEOUT_MS", 15_000, 1000),
      settleMs: envNumber("SUBMISSION_SETTLE_MS", 3000, 0),
      hardLimitMs: envNumber("SUBMISSION_HARD_LIMIT_MS", 30_000, 2000),
      confirmationWaitMs: envNumber("SUBMISSION_CONFIRMATION_WAIT_MS", 2000, 0),
      matchThreshold: Math.min(1, envNumber("MATCH_CONFIDENCE_THRESHOLD", 0.6, 0.05)),
      submitEnabled: envFlag("PLAYWRIGHT_SUBMIT_ENABLED", true)
    },
    evidenceDir: path.resolve(process.cwd(), process.env.EXECUTION_EVIDENCE_DIR?.trim() || "server/data/evidence"),
    apiPort: envInteger("PORT", 8787, 1)
  };
}
