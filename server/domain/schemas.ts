import { z } from "zod";
import {
  AUTH_TYPES,
  CAPTCHA_TYPES,
  PRICING_TYPES,
  SITE_STATUSES,
  SUBMISSION_STATUSES
} from "./types.js";

export const directoryRecordSchema = z.object({
  name: z.string().min(1),
  url: z.string(),
  submissionUrl: z.string().optional(),
  siteStatus: z.enum(SITE_STATUSES).default("unknown"),
  authType: z.enum(AUTH_TYPES).default("unknown"),
  captchaType: z.enum(CAPTCHA_TYPES).default("unknown"),
  pricingType: z.enum(PRICING_TYPES).default("unknown"),
  categories: z.array(z.string()).default([]),
  requiresLogin: z.boolean().optional(),
  authProviders: z.array(z.string()).optional(),
  signals: z.array(z.string()).optional(),
  statusReason: z.string().optional(),
  httpCheckedAt: z.string().optional(),
  browserCheckedAt: z.string().optional(),
  deepCheckedAt: z.string().optional(),
  submissionHints: z.array(z.string()).optional()
});

export const directoryCatalogSchema = z.array(directoryRecordSchema).superRefine((records, ctx) => {
  const seen = new Set<string>();
  records.forEach((record, index) => {
    if (seen.has(record.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "name"],
        message: `Duplicate directory name "${record.name}"`
      });
    }
    seen.add(record.name);
  });
});

export const fieldDescriptorSchema = z.object({
  name: z.string(),
  type: z.string(),
  tag: z.string(),
  label: z.string(),
  placeholder: z.string().default(""),
  id: z.string().default(""),
  required: z.boolean().default(false),
  locator: z.string(),
  options: z.array(z.string()).optional()
});

export const copyVariantSchema = z.object({
  title: z.string(),
  description: z.string()
});

export const submissionTargetSchema = z.object({
  directoryName: z.string().min(1),
  submissionUrl: z.string(),
  status: z.enum(SUBMISSION_STATUSES).default("pending"),
  statusReason: z.string().optional(),
  copy: copyVariantSchema.optional(),
  copyIndex: z.number().int().nonnegative().optional(),
  discoveredFields: z.array(fieldDescriptorSchema).default([]),
  formPath: z.string().optional(),
  credentials: z.object({
    email: z.string(),
    name: z.string(),
    username: z.string()
  }),
  pageCaptcha: z.enum(CAPTCHA_TYPES).optional(),
  finalUrl: z.string().optional(),
  discoveredAt: z.string().optional(),
  attemptedAt: z.string().optional(),
  submittedAt: z.string().optional(),
  filledFields: z.array(z.string()).optional(),
  unmatchedRequired: z.array(z.string()).optional(),
  evidencePath: z.string().optional()
});

export const submissionPlanSchema = z.array(submissionTargetSchema);

export const browserCheckEntrySchema = z.object({
  name: z.string().min(1),
  url: z.string(),
  reason: z.string().default("unspecified"),
  queuedAt: z.string()
});

export const browserCheckQueueSchema = z.array(browserCheckEntrySchema);

export const productProfileSchema = z.object({
  product: z.object({
    name: z.string().min(1),
    url: z.string().url(),
    tagline: z.string().default(""),
    description: z.string().optional(),
    github: z.string().optional(),
    twitter: z.string().optional(),
    launchDate: z.string().optional(),
    categories: z.array(z.string()).default([])
  }),
  contact: z.object({
    name: z.string().min(1),
    firstName: z.string().optional(),
    lastName: z.string().optional(),
    email: z.string().email(),
    username: z.string().optional(),
    password: z.string().optional(),
    jobTitle: z.string().optional()
  }),
  assets: z
    .object({
      logoPath: z.string().optional(),
      screenshotPath: z.string().optional()
    })
    .optional()
});

export const copyVariantPoolSchema = z.array(copyVariantSchema);

export function describeZodError(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
