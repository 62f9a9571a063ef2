/**
 * Group Override File Schema
 *
 * Additional vaccine group overrides can be supplied as JSON:
 *
 * ```json
 * { "overrides": [{ "prefix": "DTaP-IPV", "label": "DTaP" }] }
 * ```
 *
 * Each entry maps any derived group label starting with `prefix` to `label`
 * (or to the prefix itself when no label is given).
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';

/**
 * A single prefix override entry.
 */
export const PrefixOverrideSchema = z.object({
  /** Prefix the derived group label must start with */
  prefix: z.string().min(1, 'Override prefix must not be empty'),

  /** Label forced for matching categories (defaults to the prefix) */
  label: z.string().min(1).optional(),
});

export type PrefixOverride = z.infer<typeof PrefixOverrideSchema>;

/**
 * Override file.
 */
export const GroupOverrideFileSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.overrides),
  overrides: z.array(PrefixOverrideSchema),
});

export type GroupOverrideFile = z.infer<typeof GroupOverrideFileSchema>;
