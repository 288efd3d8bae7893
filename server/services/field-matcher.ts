import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";
import { describeZodError } from "../domain/schemas.js";
import type { CopyVariant, FieldDescriptor, ProductProfile } from "../domain/types.js";
import type { FillKind } from "./browser.js";
import synonymTable from "./field-synonyms.json" with { type: "json" };

export const SLOTS = [
  "email",
  "url",
  "name",
  "first_name",
  "last_name",
  "username",
  "password",
  "product_name",
  "title",
  "description",
  "subject",
  "github",
  "twitter",
  "company",
  "job_title",
  "launch_date",
  "category",
  "consent",
  "logo",
  "screenshot"
] as const;

export type Slot = (typeof SLOTS)[number];

export type SlotValues = Partial<Record<Slot, string>>;

interface SlotRule {
  phrases: string[];
  types: Record<string, number>;
  veto: string[];
}

const slotRuleSchema = z.object({
  phrases: z.array(z.string()).min(1),
  types: z.record(z.number()).default({}),
  veto: z.array(z.string()).default([])
});

const synonymTableSchema = z.object({
  slots: z.record(slotRuleSchema),
  unfillable: z.record(slotRuleSchema)
});

function loadRules(): { slots: Array<[Slot, SlotRule]>; unfillable: Array<[string, SlotRule]> } {
  const parsed = synonymTableSchema.safeParse(synonymTable);
  if (!parsed.success) {
    throw new ConfigurationError(`field-synonyms.json is invalid: ${describeZodError(parsed.error)}`);
  }
  const slots = SLOTS.map((slot): [Slot, SlotRule] => {
    const rule = parsed.data.slots[slot];
    if (!rule) throw new ConfigurationError(`field-synonyms.json has no entry for slot "${slot}"`);
    return [slot, rule];
  });
  return { slots, unfillable: Object.entries(parsed.data.unfillable) };
}

const rules = loadRules();

export function normalizeText(value: string): string {
  return value
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
}

interface FieldText {
  sources: string[];
  text: string;
  compact: string;
}

function fieldText(field: FieldDescriptor): FieldText {
  const sources = [field.name, field.id, field.label, field.placeholder].map(normalizeText).filter(Boolean);
  const text = sources.join(" ");
  return { sources, text, compact: text.replace(/ /g, "") };
}

function phraseScore(phrase: string, field: FieldText): number {
  const normalized = normalizeText(phrase);
  if (!normalized) return 0;
  if (field.sources.includes(normalized)) return 1;
  if (` ${field.text} `.includes(` ${normalized} `)) return 0.85;
  const compact = normalized.replace(/ /g, "");
  if (compact.length >= 3 && field.compact.includes(compact)) return 0.6;
  return 0;
}

export function scoreRule(rule: SlotRule, field: FieldDescriptor, text: FieldText = fieldText(field)): number {
  if (rule.veto.some((term) => ` ${text.text} `.includes(` ${normalizeText(term)} `))) return 0;
  const byPhrase = Math.max(0, ...rule.phrases.map((phrase) => phraseScore(phrase, text)));
  const byType = rule.types[field.type.toLowerCase()] ?? 0;
  const bonus = byPhrase > 0 && byType > 0 ? 0.1 : 0;
  return Math.min(1, Math.max(byPhrase, byType) + bonus);
}

function fillKindFor(slot: Slot, field: FieldDescriptor): FillKind | undefined {
  const type = field.type.toLowerCase();
  if (slot === "logo" || slot === "screenshot") return type === "file" ? "file" : undefined;
  if (type === "file") return undefined;
  if (slot === "consent") return type === "checkbox" ? "check" : undefined;
  if (type === "checkbox" || type === "radio") return undefined;
  if (field.tag === "select" || type === "select") return slot === "category" ? "select" : undefined;
  return "text";
}

function pickOption(options: string[] | undefined, wanted: string[]): string | undefined {
  if (!options) return undefined;
  const lowered = wanted.map((value) => value.toLowerCase());
  return options.find((option) => {
    const candidate = option.toLowerCase();
    return lowered.some((value) => candidate === value || candidate.includes(value) || value.includes(candidate));
  });
}

export function resolveSlotValues(profile: ProductProfile, copy?: CopyVariant): SlotValues {
  const { product, contact, assets } = profile;
  const [firstWord, ...rest] = contact.name.trim().split(/\s+/);
  return {
    email: contact.email,
    url: product.url,
    name: contact.name,
    first_name: contact.firstName ?? firstWord,
    last_name: contact.lastName ?? (rest.length > 0 ? rest.join(" ") : undefined),
    username: contact.username ?? contact.email.split("@")[0],
    password: contact.password,
    product_name: product.name,
    title: copy?.title ?? product.tagline,
    description: copy?.description ?? product.description,
    subject: copy?.title ?? product.name,
    github: product.github,
    twitter: product.twitter,
    company: product.name,
    job_title: contact.jobTitle,
    launch_date: product.launchDate,
    category: product.categories.length > 0 ? product.categories.join(", ") : undefined,
    consent: "true",
    logo: assets?.logoPath,
    screenshot: assets?.screenshotPath
  };
}

export interface FieldMatch {
  field: FieldDescriptor;
  slot: Slot;
  score: number;
  value: string;
  kind: FillKind;
}

export interface SkippedField {
  field: FieldDescriptor;
  reason: string;
}

export interface FillPlan {
  matches: FieldMatch[];
  unmatchedRequired: FieldDescriptor[];
  skipped: SkippedField[];
}

export interface MatchOptions {
  threshold: number;
  categories?: string[];
}

/** Best slot for one field, or the reason it stays empty. */
export function matchField(field: FieldDescriptor, values: SlotValues, options: MatchOptions): FieldMatch | SkippedField {
  const text = fieldText(field);
  let best: { slot: Slot; score: number; kind: FillKind; value: string } | undefined;
  let bestWithoutValue: { slot: Slot; score: number } | undefined;

  for (const [slot, rule] of rules.slots) {
    const kind = fillKindFor(slot, field);
    if (!kind) continue;
    const score = scoreRule(rule, field, text);
    if (score <= 0) continue;

    let value = values[slot];
    if (value !== undefined && kind === "select") {
      value = pickOption(field.options, options.categories ?? value.split(/,\s*/));
    }
    if (value === undefined || value === "") {
      if (!bestWithoutValue || score > bestWithoutValue.score) bestWithoutValue = { slot, score };
      continue;
    }
    if (!best || score > best.score) best = { slot, score, kind, value };
  }

  const unfillable = rules.unfillable
    .map(([label, rule]) => ({ label, score: scoreRule(rule, field, text) }))
    .reduce<{ label: string; score: number } | undefined>((top, entry) => (entry.score > (top?.score ?? 0) ? entry : top), undefined);

  if (unfillable && unfillable.score > (best?.score ?? 0)) {
    return { field, reason: `unfillable:${unfillable.label}` };
  }
  if (best && best.score >= options.threshold) {
    return { field, slot: best.slot, score: best.score, value: best.value, kind: best.kind };
  }
  if (bestWithoutValue && bestWithoutValue.score >= options.threshold && bestWithoutValue.score > (best?.score ?? 0)) {
    return { field, reason: `no_value:${bestWithoutValue.slot}` };
  }
  return { field, reason: "below_threshold" };
}

function isMatch(result: FieldMatch | SkippedField): result is FieldMatch {
  return "slot" in result;
}

export function matchFields(fields: FieldDescriptor[], values: SlotValues, options: MatchOptions): FillPlan {
  const plan: FillPlan = { matches: [], unmatchedRequired: [], skipped: [] };
  for (const field of fields) {
    const result = matchField(field, values, options);
    if (isMatch(result)) {
      plan.matches.push(result);
    } else {
      plan.skipped.push(result);
      if (field.required) plan.unmatchedRequired.push(field);
    }
  }
  return plan;
}

export function fieldLabel(field: FieldDescriptor): string {
  return field.name || field.id || field.label || field.placeholder || field.locator;
}
