/**
 * Group Override Loading
 *
 * Reads a JSON override file and turns it into ordered group rules,
 * appended after the built-in rules.
 *
 * @module config/overrides
 */

import * as fs from 'node:fs/promises';
import { ConfigurationError, errorMessage } from '../errors/index.js';
import { GroupOverrideFileSchema } from '../schemas/overrides.js';
import {
  buildGroupOverrides,
  type GroupOverrideRule,
} from '../stages/category-normalizer.js';

/**
 * Parse override file contents.
 *
 * @throws {ConfigurationError} If the JSON is invalid, fails validation,
 *   or defines conflicting prefixes
 */
export function parseGroupOverrides(text: string, source = 'overrides'): GroupOverrideRule[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${source}`, [errorMessage(error)]);
  }

  const result = GroupOverrideFileSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid group overrides in ${source}`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  return buildGroupOverrides(result.data.overrides);
}

/**
 * Load group overrides from a JSON file.
 *
 * @example
 * ```typescript
 * const rules = await loadGroupOverrides('./overrides.json');
 * runNormalization(dataset, { groupOverrides: rules });
 * ```
 */
export async function loadGroupOverrides(filePath: string): Promise<GroupOverrideRule[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read overrides file ${filePath}`, [errorMessage(error)]);
  }
  return parseGroupOverrides(text, filePath);
}
