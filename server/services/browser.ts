import { mkdir } from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import type { Browser, BrowserContext, Page } from "playwright";
import { ConfigurationError, errorMessage, TaskAbortedError } from "../domain/errors.js";
import type { FieldDescriptor } from "../domain/types.js";

export interface NavigationSettings {
  navigationTimeoutMs: number;
  settleMs: number;
}

export interface OpenResult {
  finalUrl: string;
  status?: number;
}

export interface PageSnapshot {
  html: string;
  title: string;
  url: string;
}

export interface DomInspection {
  inputCount: number;
  formCount: number;
  passwordInputs: number;
  oauthButtons: string[];
  signupButtons: string[];
}

export interface ExtractedForm {
  index: number;
  /** CSS path of the form element, or "body" for inputs that sit outside any form. */
  formPath: string;
  formless: boolean;
  hasPassword: boolean;
  fields: FieldDescriptor[];
}

export type FillKind = "text" | "select" | "check" | "file";

export interface FieldFill {
  locator: string;
  fieldName: string;
  value: string;
  kind: FillKind;
  required: boolean;
}

export interface FillFailure {
  fieldName: string;
  error: string;
}

export interface FillReport {
  filled: string[];
  failed: FillFailure[];
}

/** One isolated page. Every worker owns its own session and closes it when done. */
export interface PageSession {
  open(url: string, settings: NavigationSettings): Promise<OpenResult>;
  snapshot(): Promise<PageSnapshot>;
  inspectDom(): Promise<DomInspection>;
  extractForms(): Promise<ExtractedForm[]>;
  fill(fills: FieldFill[]): Promise<FillReport>;
  screenshot(filePath: string): Promise<void>;
  /** Clicks the submit control of the form. Resolves false when there is none. */
  submit(formPath: string | undefined): Promise<boolean>;
  settle(ms: number): Promise<void>;
  close(): Promise<void>;
}

export interface SessionFactory {
  newSession(): Promise<PageSession>;
  close(): Promise<void>;
}

type PlaywrightModule = typeof import("playwright");

const require = createRequire(import.meta.url);
const fallbackPlaywrightPath = process.env.PLAYWRIGHT_GLOBAL_MODULE_PATH?.trim() || "/usr/local/lib/node_modules/playwright";

function isPlaywrightModule(value: unknown): value is PlaywrightModule {
  return (
    typeof value === "object" &&
    value !== null &&
    "chromium" in value &&
    typeof value.chromium === "object" &&
    value.chromium !== null &&
    "launch" in value.chromium
  );
}

export async function loadPlaywright(): Promise<PlaywrightModule | undefined> {
  try {
    return await import("playwright");
  } catch {
    try {
      const global: unknown = require(fallbackPlaywrightPath);
      return isPlaywrightModule(global) ? global : undefined;
    } catch {
      return undefined;
    }
  }
}

const heavyResourceTypes = new Set(["image", "media", "font"]);

export class PlaywrightPageSession implements PageSession {
  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page
  ) {}

  async open(url: string, settings: NavigationSettings): Promise<OpenResult> {
    const response = await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: settings.navigationTimeoutMs });
    await this.settle(settings.settleMs);
    return { finalUrl: this.page.url(), status: response?.status() };
  }

  async snapshot(): Promise<PageSnapshot> {
    return { html: await this.page.content(), title: await this.page.title(), url: this.page.url() };
  }

  inspectDom(): Promise<DomInspection> {
    return this.page.evaluate(() => {
      const buttonTexts = Array.from(document.querySelectorAll("button, a, [role=button]"))
        .map((element) => (element.textContent ?? "").replace(/\s+/g, " ").trim())
        .filter((text) => text.length > 0 && text.length < 80);
      return {
        inputCount: document.querySelectorAll("input:not([type=hidden]), textarea, select").length,
        formCount: document.querySelectorAll("form").length,
        passwordInputs: document.querySelectorAll("input[type=password]").length,
        oauthButtons: buttonTexts.filter((text) =>
          /(sign|log)\s?in with|continue with/i.test(text) && /google|github|twitter|facebook|apple|linkedin|\bx\b/i.test(text)
        ),
        signupButtons: buttonTexts.filter((text) => /sign\s?up|register|create (an )?account/i.test(text))
      };
    });
  }

  extractForms(): Promise<ExtractedForm[]> {
    return this.page.evaluate(() => {
      const fillable =
        "input:not([type=hidden]):not([type=submit]):not([type=button]):not([type=reset]):not([type=image]), textarea, select";

      const cssPath = (element: Element): string => {
        const parts: string[] = [];
        let node: Element | null = element;
        while (node && parts.length < 10) {
          if (node.id) {
            parts.unshift(`#${CSS.escape(node.id)}`);
            break;
          }
          const tag = node.tagName.toLowerCase();
          const parent: Element | null = node.parentElement;
          if (!parent) {
            parts.unshift(tag);
            break;
          }
          const sameTag = Array.from(parent.children).filter((sibling) => sibling.tagName === node?.tagName);
          parts.unshift(sameTag.length > 1 ? `${tag}:nth-of-type(${sameTag.indexOf(node) + 1})` : tag);
          node = parent;
        }
        return parts.join(" > ");
      };

      const labelOf = (element: HTMLInputElement | HTMLTextAreaElement | HTMLSelectElement): string => {
        const fromLabels = Array.from(element.labels ?? [])
          .map((label) => label.textContent ?? "")
          .join(" ");
        const labelledBy = element.getAttribute("aria-labelledby");
        const fromLabelledBy = labelledBy ? document.getElementById(labelledBy)?.textContent ?? "" : "";
        const text = [fromLabels, element.getAttribute("aria-label") ?? "", fromLabelledBy].join(" ");
        return text.replace(/\s+/g, " ").trim();
      };

      const describe = (element: Element): FieldDescriptor | undefined => {
        if (
          !(element instanceof HTMLInputElement) &&
          !(element instanceof HTMLTextAreaElement) &&
          !(element instanceof HTMLSelectElement)
        ) {
          return undefined;
        }
        const type = element instanceof HTMLInputElement ? element.type || "text" : element.tagName.toLowerCase();
        const visible = element.getClientRects().length > 0 || type === "file" || type === "checkbox";
        if (!visible || element.disabled) return undefined;
        return {
          name: element.name,
          type,
          tag: element.tagName.toLowerCase(),
          label: labelOf(element),
          placeholder: element.getAttribute("placeholder") ?? "",
          id: element.id,
          required: element.required || element.getAttribute("aria-required") === "true",
          locator: cssPath(element),
          options:
            element instanceof HTMLSelectElement
              ? Array.from(element.options).map((option) => option.text.trim())
              : undefined
        };
      };

      const collect = (elements: Element[]): FieldDescriptor[] =>
        elements.map(describe).filter((field): field is FieldDescriptor => field !== undefined);

      const forms = Array.from(document.querySelectorAll("form")).map((form, index) => {
        const fields = collect(Array.from(form.querySelectorAll(fillable)));
        return {
          index,
          formPath: cssPath(form),
          formless: false,
          hasPassword: fields.some((field) => field.type === "password"),
          fields
        };
      });

      const loose = collect(Array.from(document.querySelectorAll(fillable)).filter((element) => !element.closest("form")));
      if (loose.length > 0) {
        forms.push({
          index: forms.length,
          formPath: "body",
          formless: true,
          hasPassword: loose.some((field) => field.type === "password"),
          fields: loose
        });
      }
      return forms.filter((form) => form.fields.length > 0);
    });
  }

  async fill(fills: FieldFill[]): Promise<FillReport> {
    const report: FillReport = { filled: [], failed: [] };
    for (const fill of fills) {
      const field = this.page.locator(fill.locator).first();
      try {
        if (fill.kind === "select") {
          await field.selectOption({ label: fill.value }).catch(() => field.selectOption(fill.value));
        } else if (fill.kind === "check") {
          await field.check();
        } else if (fill.kind === "file") {
          await field.setInputFiles(fill.value);
        } else {
          await field.fill(fill.value);
        }
        report.filled.push(fill.fieldName);
      } catch (error) {
        report.failed.push({ fieldName: fill.fieldName, error: errorMessage(error) });
      }
    }
    return report;
  }

  async screenshot(filePath: string): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    await this.page.screenshot({ path: filePath, fullPage: true });
  }

  async submit(formPath: string | undefined): Promise<boolean> {
    const scope = formPath && formPath !== "body" ? this.page.locator(formPath).first() : this.page.locator("body");
    const typed = scope.locator('button[type="submit"], input[type="submit"]');
    if ((await typed.count()) > 0) {
      await typed.first().click();
      return true;
    }

    const labelled = scope.locator("button, [role=button]").filter({ hasText: /submit|send|add|list|post|launch|publish/i });
    if ((await labelled.count()) > 0) {
      await labelled.first().click();
      return true;
    }
    return false;
  }

  async settle(ms: number): Promise<void> {
    if (ms > 0) await this.page.waitForTimeout(ms);
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

export interface PlaywrightFactoryOptions {
  userAgent: string;
  blockHeavyResources?: boolean;
}

export class PlaywrightSessionFactory implements SessionFactory {
  private constructor(
    private readonly browser: Browser,
    private readonly options: PlaywrightFactoryOptions
  ) {}

  static async launch(options: PlaywrightFactoryOptions): Promise<PlaywrightSessionFactory> {
    const playwright = await loadPlaywright();
    if (!playwright) {
      throw new ConfigurationError(
        "Playwright runtime not found. Install playwright or set PLAYWRIGHT_GLOBAL_MODULE_PATH."
      );
    }
    try {
      const browser = await playwright.chromium.launch({
        headless: true,
        args: ["--no-sandbox", "--disable-dev-shm-usage"]
      });
      return new PlaywrightSessionFactory(browser, options);
    } catch (error) {
      throw new ConfigurationError(`Could not launch chromium: ${errorMessage(error)}`);
    }
  }

  async newSession(): Promise<PageSession> {
    const context = await this.browser.newContext({
      userAgent: this.options.userAgent,
      viewport: { width: 1366, height: 900 }
    });
    if (this.options.blockHeavyResources ?? true) {
      await context.route("**/*", (route) =>
        heavyResourceTypes.has(route.request().resourceType()) ? route.abort() : route.continue()
      );
    }
    const page = await context.newPage();
    return new PlaywrightPageSession(context, page);
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

/** Opens a session, runs the work and always closes the session, also when the pool has aborted the task. */
export async function withSession<R>(factory: SessionFactory, signal: AbortSignal, work: (session: PageSession) => Promise<R>): Promise<R> {
  const session = await factory.newSession();
  if (signal.aborted) {
    await session.close();
    throw new TaskAbortedError();
  }
  const closeOnAbort = () => {
    session.close().catch(() => undefined);
  };
  signal.addEventListener("abort", closeOnAbort, { once: true });
  try {
    return await work(session);
  } finally {
    signal.removeEventListener("abort", closeOnAbort);
    if (!signal.aborted) await session.close();
  }
}
