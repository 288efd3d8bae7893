import type { AuthType, CaptchaType, PricingType } from "../domain/types.js";

type ProviderName = "google" | "github" | "twitter" | "facebook" | "apple" | "linkedin";

const providerPatterns: Array<{ provider: ProviderName; terms: string[] }> = [
  {
    provider: "google",
    terms: [
      "accounts.google.com",
      "googleapis.com/auth",
      "google-signin",
      "gsi/client",
      "sign in with google",
      "login with google",
      "continue with google",
      "google.com/o/oauth",
      "google-login",
      "auth/google",
      "oauth/google",
      "btn-google",
      "btn_google",
      "social-google"
    ]
  },
  {
    provider: "github",
    terms: ["github.com/login/oauth", "sign in with github", "login with github", "continue with github", "auth/github", "oauth/github"]
  },
  {
    provider: "twitter",
    terms: ["api.twitter.com/oauth", "sign in with twitter", "login with twitter", "continue with twitter", "auth/twitter", "sign in with x", "continue with x"]
  },
  {
    provider: "facebook",
    terms: [
      "facebook.com/dialog/oauth",
      "connect.facebook.net",
      "sign in with facebook",
      "login with facebook",
      "continue with facebook",
      "auth/facebook",
      "oauth/facebook",
      "fb-login"
    ]
  },
  {
    provider: "apple",
    terms: ["appleid.apple.com/auth", "sign in with apple", "continue with apple", "auth/apple", "apple-sign-in"]
  },
  {
    provider: "linkedin",
    terms: ["linkedin.com/oauth", "sign in with linkedin", "login with linkedin", "continue with linkedin", "auth/linkedin"]
  }
];

const loginRequiredPhrases = [
  "sign in to continue",
  "log in to continue",
  "login to continue",
  "login to submit",
  "log in to submit",
  "sign in to submit",
  "sign up to submit",
  "sign up to continue",
  "you must log in",
  "please sign in",
  "please log in",
  "login required"
];

const parkedPhrases = [
  "domain is for sale",
  "buy this domain",
  "domain may be for sale",
  "parked domain",
  "this domain is parked",
  "parked free, courtesy of"
];

const notFoundPhrases = ["page not found", "404 error", "this page doesn't exist", "this page does not exist", "page doesn&#39;t exist"];

const challengeTitles = ["just a moment", "attention required", "checking your browser"];
const challengeMarkers = ["checking your browser before accessing", "cf-browser-verification", "cf_chl_opt", "challenge-form"];

const passwordInputPattern = /<input[^>]*type=["']password["']/;
const formPattern = /<form[\s>]/;
const textInputPattern = /<input[^>]*type=["'](?:text|email|url|tel)["']|<textarea[\s>]/;
const jsFormPattern = /role=["']form["']|data-form|react-hook-form|formik/;

export function stripHtml(html: string): string {
  return html
    .replace(/<script[\s\S]*?<\/script>/gi, " ")
    .replace(/<style[\s\S]*?<\/style>/gi, " ")
    .replace(/<noscript[\s\S]*?<\/noscript>/gi, " ")
    .replace(/<svg[\s\S]*?<\/svg>/gi, " ")
    .replace(/<[^>]+>/g, " ")
    .replace(/&nbsp;/gi, " ")
    .replace(/&amp;/gi, "&")
    .replace(/&#39;/gi, "'")
    .replace(/\s+/g, " ")
    .trim();
}

export function extractTitle(html: string): string {
  const match = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html);
  return match?.[1]?.replace(/\s+/g, " ").trim() ?? "";
}

export interface AuthSignal {
  authType: AuthType;
  providers: string[];
  requiresLogin: boolean;
}

export function authTypeFromProviders(providers: string[], hasInteractiveInputs: boolean): AuthType {
  if (providers.length === 0) return hasInteractiveInputs ? "none" : "unknown";
  const hasPassword = providers.includes("email_password");
  if (providers.includes("google")) return hasPassword ? "google_and_email" : "google_only";
  if (hasPassword) return "email_password";
  if (providers.includes("facebook")) return "facebook";
  return "oauth_other";
}

export function detectProviders(lowerHtml: string): string[] {
  const providers: string[] = providerPatterns
    .filter((entry) => entry.terms.some((term) => lowerHtml.includes(term)))
    .map((entry) => entry.provider);
  if (passwordInputPattern.test(lowerHtml)) providers.push("email_password");
  return providers;
}

export function hasLoginRequiredText(lowerText: string): boolean {
  return loginRequiredPhrases.some((phrase) => lowerText.includes(phrase));
}

export function detectAuth(lowerHtml: string, lowerText: string): AuthSignal {
  const providers = detectProviders(lowerHtml);
  const hasInputs = formPattern.test(lowerHtml) || textInputPattern.test(lowerHtml) || jsFormPattern.test(lowerHtml);
  const loginText = hasLoginRequiredText(lowerText);
  return {
    authType: authTypeFromProviders(providers, hasInputs),
    providers,
    requiresLogin: loginText || providers.length > 0
  };
}

export function detectCaptcha(lowerHtml: string): CaptchaType {
  if (/challenges\.cloudflare\.com\/turnstile|cf-turnstile/.test(lowerHtml)) return "turnstile";
  if (/hcaptcha\.com|h-captcha/.test(lowerHtml)) return "hcaptcha";
  if (/g-recaptcha|recaptcha\/api\.js|grecaptcha/.test(lowerHtml)) {
    return /recaptcha\/api\.js\?[^"']*render=|grecaptcha\.execute/.test(lowerHtml) ? "recaptcha_v3" : "recaptcha";
  }
  if (lowerHtml.includes("captcha")) return "generic";
  return "none";
}

export function detectPricing(lowerText: string): PricingType {
  const paid =
    /\$\s?\d+/.test(lowerText) ||
    /\/\s?(month|mo)\b/.test(lowerText) ||
    /paid[^.]{0,40}(submission|listing)/.test(lowerText) ||
    /(premium|featured)[^.]{0,30}(submission|listing)/.test(lowerText) ||
    /(upgrade|pay)[^.]{0,20}to[^.]{0,20}(submit|list)/.test(lowerText);
  const free =
    /free[^.]{0,30}(submission|listing)/.test(lowerText) ||
    /submit[^.]{0,20}for free/.test(lowerText) ||
    /no[^.]{0,10}cost/.test(lowerText);
  const freemium = /freemium|free[^.]{0,20}(plan|tier)/.test(lowerText);

  if (freemium || (paid && free)) return "freemium";
  if (paid) return "paid";
  if (free) return "free";
  return "unknown";
}

export function isCloudflareChallenge(lowerHtml: string, lowerTitle: string): boolean {
  return challengeTitles.some((title) => lowerTitle.includes(title)) || challengeMarkers.some((marker) => lowerHtml.includes(marker));
}

export function isParked(lowerText: string): boolean {
  return parkedPhrases.some((phrase) => lowerText.includes(phrase));
}

export function isSoftNotFound(lowerText: string, lowerTitle: string): boolean {
  if (/\b404\b|not found/.test(lowerTitle)) return true;
  return notFoundPhrases.some((phrase) => lowerText.includes(phrase));
}

export interface PageAnalysis {
  verdict: "active" | "not_found" | "domain_parked" | "cloudflare_blocked";
  auth: AuthSignal;
  captchaType: CaptchaType;
  pricingType: PricingType;
  signals: string[];
}

/** Classifies one rendered or fetched HTML document. */
export function analyzePage(html: string, title = extractTitle(html)): PageAnalysis {
  const lowerHtml = html.toLowerCase();
  const lowerTitle = title.toLowerCase();
  const lowerText = stripHtml(lowerHtml);
  const auth = detectAuth(lowerHtml, lowerText);
  const captchaType = detectCaptcha(lowerHtml);
  const pricingType = detectPricing(lowerText);

  const signals: string[] = auth.providers.map((provider) => `auth:${provider}`);
  if (auth.requiresLogin) signals.push("login_required");
  if (captchaType !== "none") signals.push(`captcha:${captchaType}`);
  if (pricingType !== "unknown") signals.push(`pricing:${pricingType}`);

  let verdict: PageAnalysis["verdict"] = "active";
  if (isCloudflareChallenge(lowerHtml, lowerTitle)) {
    verdict = "cloudflare_blocked";
  } else if (isParked(lowerText)) {
    verdict = "domain_parked";
  } else if (isSoftNotFound(lowerText, lowerTitle)) {
    verdict = "not_found";
  }
  if (verdict !== "active") signals.push(`page:${verdict}`);

  return {
    verdict,
    auth,
    captchaType: verdict === "cloudflare_blocked" ? "cloudflare_challenge" : captchaType,
    pricingType,
    signals
  };
}
