import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import logger from './logger.js';

const namedItem = z.object({
  name: z.string(),
  description: z.string().optional().default(''),
}).passthrough();

/**
 * Fact sheet about the selling organization. Only ever used to ground
 * reasoning prompts; deterministic scoring never reads it.
 */
export const OrganizationProfileSchema = z.object({
  name: z.string(),
  legal_name: z.string().optional().default(''),
  tagline: z.string().optional().default(''),
  founded: z.union([z.string(), z.number()]).transform(String).optional().default(''),
  headquarters: z.string().optional().default(''),
  employee_count: z.number().int().nonnegative().optional(),
  methodology: z.string().optional().default(''),
  certifications: z.array(z.string()).optional().default([]),
  services: z.array(namedItem).optional().default([]),
  delivery_models: z.array(namedItem).optional().default([]),
  technologies: z.array(z.string()).optional().default([]),
  industries: z.array(z.string()).optional().default([]),
  past_engagements: z.array(z.object({
    client: z.string(),
    summary: z.string().optional().default(''),
  }).passthrough()).optional().default([]),
  awards: z.array(z.string()).optional().default([]),
  client_regions: z.array(z.string()).optional().default([]),
}).passthrough();

export type OrganizationProfile = z.infer<typeof OrganizationProfileSchema>;

/**
 * Load the profile JSON from disk. A missing or malformed file is not fatal:
 * flows fall back to roster facts only.
 */
export async function loadOrganizationProfile(path: string | undefined): Promise<OrganizationProfile | null> {
  if (!path) return null;

  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    logger.warn({ err, path }, 'Organization profile not found, prompts will use roster facts only');
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    logger.warn({ err, path }, 'Organization profile is not valid JSON');
    return null;
  }

  const parsed = OrganizationProfileSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn({ path, issues: parsed.error.issues }, 'Organization profile failed validation');
    return null;
  }
  return parsed.data;
}
