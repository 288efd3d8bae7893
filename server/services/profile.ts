import { readFile } from "node:fs/promises";
import path from "node:path";
import type { z } from "zod";
import { ConfigurationError, errorMessage } from "../domain/errors.js";
import { copyVariantPoolSchema, describeZodError, productProfileSchema } from "../domain/schemas.js";
import type { CopyVariant, ProductProfile, TargetCredentials } from "../domain/types.js";

export const PROFILE_FILE = "profile.json";
export const COPY_VARIANTS_FILE = "copy_variants.json";

async function readInput<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${filePath}: ${errorMessage(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`${filePath} is invalid: ${describeZodError(parsed.error)}`);
  }
  return parsed.data;
}

export function loadProfile(dataDir: string): Promise<ProductProfile> {
  return readInput<ProductProfile>(path.join(dataDir, PROFILE_FILE), productProfileSchema);
}

export async function loadCopyVariants(dataDir: string): Promise<CopyVariant[]> {
  const variants = await readInput<CopyVariant[]>(path.join(dataDir, COPY_VARIANTS_FILE), copyVariantPoolSchema);
  if (variants.length === 0) {
    throw new ConfigurationError(`${COPY_VARIANTS_FILE} holds no copy variants`);
  }
  return variants;
}

/** Identity stored on each target. The password stays in the profile. */
export function credentialsFromProfile(profile: ProductProfile): TargetCredentials {
  const email = profile.contact.email;
  return {
    email,
    name: profile.contact.name,
    username: profile.contact.username ?? email.split("@")[0]
  };
}
