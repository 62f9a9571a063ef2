/**
 * Dataset Module
 *
 * In-memory tabular datasets, the CSV source and read-only inspections.
 *
 * @module dataset
 */

export * from './types.js';
export { typeCell, parseCsvDataset, readCsvDataset, type CsvParseOptions } from './csv.js';
export * from './inspect.js';
