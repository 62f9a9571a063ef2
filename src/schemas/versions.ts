/**
 * Schema Version Registry
 *
 * All persisted files include a schemaVersion field.
 * Each schema type has an independent version number (simple integers).
 */

/**
 * Current schema versions for all persisted data types.
 * Increment when making breaking changes to a schema.
 */
export const SCHEMA_VERSIONS = {
  /** Pipeline stage checkpoints */
  stage: 1,
  /** Run manifest */
  manifest: 1,
  /** Persisted tables */
  table: 1,
  /** Group override files */
  overrides: 1,
} as const;

/**
 * All schema types that support versioning
 */
export type SchemaType = keyof typeof SCHEMA_VERSIONS;

/**
 * Check if a schema version is current
 */
export function isCurrentVersion(schemaType: SchemaType, version: number): boolean {
  return version === SCHEMA_VERSIONS[schemaType];
}
