/**
 * Host-facing entry points
 *
 * A host (viewer, CLI, pipeline) detects, loads, saves, merges and converts
 * whole datasets through these functions and never touches parsers
 * directly. Per-line problems come back as diagnostics; only unreadable
 * sources, unwritable destinations, undetectable input, bad configuration
 * and cancellation throw.
 *
 * @module api
 */

import { type } from "arktype";
import { resolveConfig, type IntervalConfig } from "./config";
import { statusOf, type BedDataset, type Dataset, type GffDataset } from "./dataset";
import { ConversionError, FormatDetectionError } from "./errors";
import { BedParser } from "./formats/bed/parser";
import { BedWriter } from "./formats/bed/writer";
import { detect, DETECTION_SAMPLE_SIZE, type DetectionResult } from "./formats/detection";
import { GffParser } from "./formats/gff/parser";
import { GffWriter } from "./formats/gff/writer";
import { HeaderMetadata } from "./formats/headers";
import { splitLines } from "./formats/lines";
import { readToString } from "./io/file-reader";
import { writeString } from "./io/file-writer";
import { readLines } from "./io/stream-utils";
import { convertDataset } from "./operations/convert";
import { mergeIntervals } from "./operations/merge";
import { RecordStream } from "./record-stream";
import type { FormatTag, ParserOptions } from "./types";

export { detect, type DetectionResult };

export interface LoadOptions extends ParserOptions {
  /** Skip detection and parse as this format */
  format?: FormatTag;
  config?: Partial<IntervalConfig>;
  /** Largest file `load({ path })` will read, in bytes */
  maxFileSize?: number;
}

export type LoadSource = { readonly path: string } | ReadableStream<Uint8Array>;

const FormatTagSchema = type('"bed" | "gff"');

function detectFormat(lines: readonly string[]): FormatTag {
  const result = detect(lines);
  if (result.format === "unknown") {
    throw new FormatDetectionError("Input does not look like BED or GFF3", result.confidence);
  }
  return result.format;
}

function createParser(format: "bed", options: LoadOptions, config: IntervalConfig): BedParser;
function createParser(format: "gff", options: LoadOptions, config: IntervalConfig): GffParser;
function createParser(format: FormatTag, options: LoadOptions, config: IntervalConfig): BedParser | GffParser;
function createParser(format: FormatTag, options: LoadOptions, config: IntervalConfig): BedParser | GffParser {
  const parserOptions: ParserOptions = {
    skipValidation: options.skipValidation ?? config.skipValidation,
    maxLineLength: options.maxLineLength,
    trackLineNumbers: options.trackLineNumbers,
    signal: options.signal,
    onError: options.onError,
    onWarning: options.onWarning,
  };
  return format === "bed"
    ? new BedParser({ ...parserOptions, defaultStrand: config.defaultStrand })
    : new GffParser(parserOptions);
}

/**
 * Load a document held in memory
 *
 * @throws {FormatDetectionError} When no format is given and none is detected
 *
 * @example
 * ```typescript
 * const dataset = loadString("chr1\t0\t100\tpeak\n");
 * dataset.format; // "bed"
 * ```
 */
export function loadString(text: string, options: LoadOptions = {}): Dataset {
  const config = resolveConfig(options.config);
  const format = options.format ?? detectFormat(splitLines(text).slice(0, DETECTION_SAMPLE_SIZE));

  if (format === "bed") {
    return { format, ...createParser(format, options, config).parseString(text) };
  }
  return { format, ...createParser(format, options, config).parseString(text) };
}

/**
 * Load from a file path or a byte stream
 *
 * With an explicit format the source is parsed line by line; otherwise it
 * is buffered so its first lines can be sampled for detection.
 *
 * @throws {FileError} When the file cannot be read
 * @throws {FormatDetectionError} When no format is given and none is detected
 */
export async function load(source: LoadSource, options: LoadOptions = {}): Promise<Dataset> {
  const config = resolveConfig(options.config);
  const { format } = options;

  if (!("path" in source)) {
    if (format === undefined) {
      const lines: string[] = [];
      for await (const line of readLines(source)) {
        lines.push(line);
      }
      return loadString(lines.join("\n"), options);
    }
    return format === "bed"
      ? { format, ...(await createParser(format, options, config).parse(source)) }
      : { format, ...(await createParser(format, options, config).parse(source)) };
  }

  const fileOptions = options.maxFileSize !== undefined ? { maxFileSize: options.maxFileSize } : {};
  if (format === undefined) {
    return loadString(await readToString(source.path, fileOptions), options);
  }
  return format === "bed"
    ? { format, ...(await createParser(format, options, config).parseFile(source.path, {}, fileOptions)) }
    : { format, ...(await createParser(format, options, config).parseFile(source.path, {}, fileOptions)) };
}

/**
 * Serialise a dataset in its own format
 */
export function formatDataset(dataset: Dataset, config: Partial<IntervalConfig> = {}): string {
  if (dataset.format === "gff") {
    return new GffWriter().formatDocument(dataset.records, dataset.headers);
  }
  const resolved = resolveConfig(config);
  return new BedWriter({
    defaultName: resolved.defaultName,
    defaultScore: resolved.defaultScore,
    defaultStrand: resolved.defaultStrand,
  }).formatDocument(dataset.records, dataset.headers);
}

/**
 * Write a dataset to a file in its own format
 *
 * @throws {FileError} When the destination cannot be written
 */
export async function save(
  dataset: Dataset,
  path: string,
  config: Partial<IntervalConfig> = {}
): Promise<void> {
  await writeString(path, formatDataset(dataset, config));
}

/**
 * Merge overlapping and book-ended intervals. GFF3 datasets are converted
 * to BED first. The source dataset is not modified.
 */
export function merge(dataset: Dataset, config: Partial<IntervalConfig> = {}): BedDataset {
  const resolved = resolveConfig(config);
  const bed = dataset.format === "bed" ? dataset : convertDataset(dataset, "bed", resolved);
  const records = new RecordStream(
    mergeIntervals(bed.records, { chromosomeOrder: resolved.chromosomeOrder })
  ).seal();

  return {
    format: "bed",
    records,
    headers: HeaderMetadata.from(bed.headers),
    diagnostics: dataset.format === "bed" ? [] : bed.diagnostics,
    status: statusOf(records),
  };
}

/**
 * Convert a dataset to the target format
 *
 * The target is checked at run time for hosts that pass it through from
 * user input.
 *
 * @throws {ConversionError} When the target is not a supported format
 * @example
 * ```typescript
 * const gff = convert(loadString(bedText), "gff", { gffFeatureType: "exon" });
 * ```
 */
export function convert(dataset: Dataset, target: "bed", config?: Partial<IntervalConfig>): BedDataset;
export function convert(dataset: Dataset, target: "gff", config?: Partial<IntervalConfig>): GffDataset;
export function convert(dataset: Dataset, target: string, config?: Partial<IntervalConfig>): Dataset;
export function convert(
  dataset: Dataset,
  target: string,
  config: Partial<IntervalConfig> = {}
): Dataset {
  const checked = FormatTagSchema(target);
  if (checked instanceof type.errors) {
    throw new ConversionError(
      `Cannot convert to '${target}': ${checked.summary}`,
      dataset.format,
      target
    );
  }
  return convertDataset(dataset, checked, resolveConfig(config));
}
