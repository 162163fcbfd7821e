/**
 * intervalkit - BED and GFF3 genomic interval files for TypeScript
 *
 * Parses both formats into typed records, reports every bad line instead
 * of giving up on the file, merges overlapping regions and converts
 * between the zero-based half-open and one-based closed coordinate
 * systems.
 *
 * @example
 * ```typescript
 * import { load, merge, save } from "intervalkit";
 *
 * const dataset = await load({ path: "peaks.bed" });
 * await save(merge(dataset), "peaks.merged.bed");
 * ```
 */

// Host API
export {
  convert,
  detect,
  formatDataset,
  load,
  loadString,
  merge,
  save,
  type DetectionResult,
  type LoadOptions,
  type LoadSource,
} from './api';
// Configuration
export { DEFAULT_CONFIG, resolveConfig, type IntervalConfig } from './config';
// Datasets
export { statusOf, type BedDataset, type Dataset, type GffDataset } from './dataset';
// Diagnostics
export {
  DiagnosticLog,
  formatDiagnostic,
  MAX_CONTENT_LENGTH,
  truncateContent,
  type DefectKind,
  type Diagnostic,
  type FieldDefect,
  type Severity,
} from './diagnostics';
// Error types
export {
  BedError,
  ConversionError,
  FileError,
  FormatDetectionError,
  GffError,
  IntervalKitError,
  ParseError,
  StreamError,
  ValidationError,
} from './errors';
// Formats: parsers, writers, attributes, headers, detection
export * from './formats';
// File I/O infrastructure
export { createStream, exists, getSize, readToString, type FileReaderOptions } from './io/file-reader';
export { deleteFile, writeString, type WriteOptions } from './io/file-writer';
export { processBuffer, readLines, textToStream } from './io/stream-utils';
// Interval operations
export * from './operations';
// Record container
export { RecordStream } from './record-stream';
// Core types
export {
  BED_STRANDS,
  GFF_STRANDS,
  isUnrecognized,
  type FormatTag,
  type GffStrand,
  type ParserOptions,
  type Phase,
  type Rgb,
  type Strand,
  type UnrecognizedValue,
} from './types';
