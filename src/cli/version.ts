/**
 * Version reported by `--version`. Bump together with package.json.
 *
 * @module cli/version
 */

export const VERSION = '1.0.0';

export const PROGRAM_NAME = 'immunization-etl';

/** `immunization-etl v1.0.0` */
export function getVersionInfo(): string {
  return `${PROGRAM_NAME} v${VERSION}`;
}
