/**
 * immunization-etl
 *
 * Library entry: dataset types and loaders, the five normalization stages,
 * the pipeline executor and table storage.
 *
 * @example
 * ```typescript
 * import { readCsvDataset, runNormalization, saveTable } from 'immunization-etl';
 *
 * const raw = await readCsvDataset('immunization.csv');
 * const { dataset } = runNormalization(raw);
 * await saveTable('ns_school_immunization', dataset);
 * ```
 *
 * @module immunization-etl
 */

export * from './dataset/index.js';
export * from './errors/index.js';
export * from './casts/numeric.js';
export * from './stages/index.js';
export * from './pipeline/index.js';
export * from './storage/index.js';
export * from './schemas/index.js';
export { loadGroupOverrides, parseGroupOverrides } from './config/overrides.js';
