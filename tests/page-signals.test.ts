import { describe, expect, it } from "vitest";
import { analyzePage, authTypeFromProviders, detectCaptcha, detectPricing, stripHtml } from "../server/services/page-signals.js";

describe("analyzePage", () => {
  it("reads google and password sign-in from the same page", () => {
    const html =
      '<html><title>Submit</title><body><a class="btn-google" href="/auth/google">Continue with Google</a>' +
      '<form><input type="email" name="email"><input type="password" name="pw"></form></body></html>';
    const analysis = analyzePage(html);
    expect(analysis.verdict).toBe("active");
    expect(analysis.auth).toEqual({ authType: "google_and_email", providers: ["google", "email_password"], requiresLogin: true });
    expect(analysis.captchaType).toBe("none");
    expect(analysis.signals).toEqual(["auth:google", "auth:email_password", "login_required"]);
  });

  it("distinguishes an open form from a page with no signal", () => {
    expect(analyzePage("<html><body><p>Hello</p></body></html>").auth.authType).toBe("unknown");
    expect(analyzePage('<html><body><form><input type="url" name="site"></form></body></html>').auth.authType).toBe("none");
  });

  it("flags challenge, parked and soft-404 pages", () => {
    const challenge = analyzePage("<html><head><title>Just a moment...</title></head><body></body></html>");
    expect(challenge.verdict).toBe("cloudflare_blocked");
    expect(challenge.captchaType).toBe("cloudflare_challenge");

    expect(analyzePage("<title>tools.example</title><body>This domain is for sale!</body>").verdict).toBe("domain_parked");
    expect(analyzePage("<title>Page Not Found</title><body>Sorry</body>").verdict).toBe("not_found");
  });
});

describe("detectors", () => {
  it("maps provider sets onto auth types", () => {
    expect(authTypeFromProviders(["google"], true)).toBe("google_only");
    expect(authTypeFromProviders(["facebook"], true)).toBe("facebook");
    expect(authTypeFromProviders(["github", "apple"], false)).toBe("oauth_other");
    expect(authTypeFromProviders(["twitter", "email_password"], true)).toBe("email_password");
  });

  it("names the captcha vendor", () => {
    expect(detectCaptcha('<div class="g-recaptcha" data-sitekey="k"></div>')).toBe("recaptcha");
    expect(detectCaptcha('<script src="https://www.google.com/recaptcha/api.js?render=k"></script>')).toBe("recaptcha_v3");
    expect(detectCaptcha('<div class="h-captcha"></div>')).toBe("hcaptcha");
    expect(detectCaptcha('<div class="cf-turnstile"></div>')).toBe("turnstile");
    expect(detectCaptcha('<img alt="captcha">')).toBe("generic");
    expect(detectCaptcha("<form></form>")).toBe("none");
  });

  it("reads pricing from visible text", () => {
    expect(detectPricing("featured listing for $49")).toBe("paid");
    expect(detectPricing("free submission. featured listing $29")).toBe("freemium");
    expect(detectPricing("submit your tool for free")).toBe("free");
    expect(detectPricing("nothing about money here")).toBe("unknown");
  });

  it("strips scripts and tags before reading text", () => {
    expect(stripHtml("<p>Price <script>var x = '$99';</script><b>free</b>&nbsp;listing</p>")).toBe("Price free listing");
  });
});
