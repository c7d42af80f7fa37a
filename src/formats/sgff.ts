/**
 * SnapGene file parser and writer
 *
 * SnapGene files are a 19-byte header followed by TLV blocks. Blocks that
 * have a codec are decoded into typed values; anything else is kept as raw
 * bytes so the writer can reproduce it. Writing an untouched parse result
 * gives back the original bytes, including LZMA-wrapped containers and
 * zlib-framed trace chunks.
 *
 * @example Parse, inspect and write back
 * ```typescript
 * const file = parseSnapGene(bytes);
 * const sequence = getSequence(file);
 * console.log(sequence?.bases.length, sequence?.topology);
 *
 * for (const feature of getFeatures(file)) {
 *   console.log(`${feature.name}: ${feature.start}..${feature.end} (${feature.strand})`);
 * }
 *
 * const output = serializeSnapGene(file);
 * ```
 *
 * @example Effect composition with a custom compression layer
 * ```typescript
 * const program = parseSnapGeneEffect(bytes).pipe(Effect.map(getHistoryTree));
 * const tree = await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 */

import { Effect } from "effect";
import { compressorFromService, CompressionService, defaultCompressor } from "../compression";
import type { SnapGeneError } from "../errors";
import { toSnapGeneError } from "../errors";
import type {
  ParseResult,
  SnapGeneParserOptions,
  SnapGeneWriterOptions,
  TraceCompression,
  WarningHandler,
} from "../types";
import { validateParserOptions, validateWriterOptions } from "../types";
import {
  parseAlignableSequences,
  parseFeatures,
  parseNotes,
  parsePrimers,
  parseProperties,
} from "./sgff/annotations";
import { ByteWriter } from "./sgff/binary-serializer";
import { CODECS } from "./sgff/codecs";
import {
  BLOCK_NAMES,
  BlockType,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_HISTORY_DEPTH,
  DEFAULT_MAX_MARKUP_DEPTH,
  HEADER_SIZE,
  HISTORY_MARKUP_MARGIN,
  SEQUENCE_BLOCK_TYPES,
} from "./sgff/constants";
import { BlockContainer } from "./sgff/container";
import type { DecodeContext, EncodeContext } from "./sgff/dispatcher";
import { decodeBlocks, encodeBlocks, readHeader, rootContext, writeHeader } from "./sgff/dispatcher";
import { buildHistoryTree } from "./sgff/history-tree";
import { parseMarkup } from "./sgff/markup";
import type {
  AlignableSequence,
  BlockSummary,
  Feature,
  HistoryEntry,
  HistoryTree,
  Primer,
  Sequence,
  SequenceKind,
  SnapGeneFile,
  Trace,
  TraceContainer,
  TraceSummary,
} from "./sgff/types";

// =============================================================================
// OPTIONS
// =============================================================================

const warnToConsole: WarningHandler = (warning) => {
  console.warn(`SnapGene Warning: ${warning}`);
};

export const DEFAULT_PARSER_OPTIONS: Required<SnapGeneParserOptions> = {
  maxDepth: DEFAULT_MAX_DEPTH,
  maxHistoryDepth: DEFAULT_MAX_HISTORY_DEPTH,
  onWarning: warnToConsole,
  compressor: defaultCompressor,
};

export const DEFAULT_WRITER_OPTIONS: Required<SnapGeneWriterOptions> = {
  traceCompression: "preserve",
  maxDepth: DEFAULT_MAX_DEPTH,
  onWarning: warnToConsole,
  compressor: defaultCompressor,
};

// =============================================================================
// PARSER
// =============================================================================

/**
 * Decodes SnapGene bytes into a `SnapGeneFile`
 *
 * Options are validated once at construction; the parser keeps no state
 * between calls and can be reused.
 */
export class SnapGeneParser {
  private readonly options: Required<SnapGeneParserOptions>;

  /**
   * @throws {ValidationError} If a depth limit is not a positive integer
   */
  constructor(options: SnapGeneParserOptions = {}) {
    const provided = definedOnly(options);
    validateParserOptions(provided);
    this.options = { ...DEFAULT_PARSER_OPTIONS, ...provided };
  }

  /**
   * Decode a complete file held in memory
   *
   * @throws {InvalidHeaderError} If the 19-byte header is wrong
   * @throws {TruncatedBlockError} If a block runs past the end of its stream
   * @throws {SnapGeneError} Any codec failure, annotated with block path and offset
   */
  parse(bytes: Uint8Array): SnapGeneFile {
    const header = readHeader(bytes);
    const ctx: DecodeContext = rootContext({
      maxDepth: this.options.maxDepth,
      compressor: this.options.compressor,
      codecs: CODECS,
      onWarning: this.options.onWarning,
    });
    return { header, blocks: decodeBlocks(bytes, ctx, HEADER_SIZE) };
  }

  /**
   * Decode without throwing; failures come back as `{ success: false }`
   */
  safeParse(bytes: Uint8Array): ParseResult<SnapGeneFile> {
    try {
      return { success: true, value: this.parse(bytes) };
    } catch (error) {
      return { success: false, error: toSnapGeneError(error) };
    }
  }

  /**
   * Build the history tree of a parsed file using this parser's limits
   */
  historyTree(file: SnapGeneFile): HistoryTree | undefined {
    const value = file.blocks.get(BlockType.HISTORY_TREE);
    if (value === undefined || value.kind !== "compressed-markup") {
      return undefined;
    }
    // Lower history limits are enforced by the tree builder with its own error
    const markup = parseMarkup(value.text, {
      maxNesting: Math.max(DEFAULT_MAX_MARKUP_DEPTH, this.options.maxHistoryDepth + HISTORY_MARKUP_MARGIN),
    });
    return buildHistoryTree(markup, {
      maxHistoryDepth: this.options.maxHistoryDepth,
      onWarning: this.options.onWarning,
    });
  }
}

// =============================================================================
// WRITER
// =============================================================================

/**
 * Encodes a `SnapGeneFile` back into bytes
 *
 * Serialisation is all-or-nothing: any failure throws before output is
 * returned.
 */
export class SnapGeneWriter {
  private readonly options: Required<SnapGeneWriterOptions>;

  /**
   * @throws {ValidationError} If the trace framing or depth limit is invalid
   */
  constructor(options: SnapGeneWriterOptions = {}) {
    const provided = definedOnly(options);
    validateWriterOptions(provided);
    this.options = { ...DEFAULT_WRITER_OPTIONS, ...provided };
  }

  get traceCompression(): TraceCompression {
    return this.options.traceCompression;
  }

  /**
   * @throws {SerializeError} If a value no longer encodes consistently
   */
  serialize(file: SnapGeneFile): Uint8Array {
    const writer = new ByteWriter();
    writeHeader(writer, file.header);
    const ctx: EncodeContext = rootContext({
      maxDepth: this.options.maxDepth,
      compressor: this.options.compressor,
      codecs: CODECS,
      traceCompression: this.options.traceCompression,
      onWarning: this.options.onWarning,
    });
    encodeBlocks(file.blocks, ctx, writer);
    return writer.toUint8Array();
  }
}

function definedOnly<T extends object>(options: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(options)) {
    if (isKeyOf(options, key) && options[key] !== undefined) {
      result[key] = options[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}

// =============================================================================
// FUNCTIONAL API
// =============================================================================

export function parseSnapGene(bytes: Uint8Array, options?: SnapGeneParserOptions): SnapGeneFile {
  return new SnapGeneParser(options).parse(bytes);
}

export function safeParseSnapGene(
  bytes: Uint8Array,
  options?: SnapGeneParserOptions
): ParseResult<SnapGeneFile> {
  try {
    return new SnapGeneParser(options).safeParse(bytes);
  } catch (error) {
    return { success: false, error: toSnapGeneError(error) };
  }
}

export function serializeSnapGene(file: SnapGeneFile, options?: SnapGeneWriterOptions): Uint8Array {
  return new SnapGeneWriter(options).serialize(file);
}

/**
 * Start an empty file of the given kind
 */
export function createSnapGeneFile(
  kind: SequenceKind,
  versions: { exportVersion?: number; importVersion?: number } = {}
): SnapGeneFile {
  return {
    header: {
      kind,
      exportVersion: versions.exportVersion ?? 15,
      importVersion: versions.importVersion ?? 19,
    },
    blocks: new BlockContainer(),
  };
}

// =============================================================================
// EFFECT API
// =============================================================================

/**
 * Parse with xz/zlib provided by the `CompressionService` in scope
 */
export function parseSnapGeneEffect(
  bytes: Uint8Array,
  options: Omit<SnapGeneParserOptions, "compressor"> = {}
): Effect.Effect<SnapGeneFile, SnapGeneError, CompressionService> {
  return Effect.gen(function* () {
    const service = yield* CompressionService;
    return yield* Effect.try({
      try: () => parseSnapGene(bytes, { ...options, compressor: compressorFromService(service) }),
      catch: toSnapGeneError,
    });
  });
}

/**
 * Serialise with xz/zlib provided by the `CompressionService` in scope
 */
export function serializeSnapGeneEffect(
  file: SnapGeneFile,
  options: Omit<SnapGeneWriterOptions, "compressor"> = {}
): Effect.Effect<Uint8Array, SnapGeneError, CompressionService> {
  return Effect.gen(function* () {
    const service = yield* CompressionService;
    return yield* Effect.try({
      try: () => serializeSnapGene(file, { ...options, compressor: compressorFromService(service) }),
      catch: toSnapGeneError,
    });
  });
}

// =============================================================================
// ACCESSORS
// =============================================================================

function markupText(source: SnapGeneFile | TraceContainer, type: number): string | undefined {
  const value = source.blocks.get(type);
  return value?.kind === "markup" ? value.text : undefined;
}

/**
 * The file's primary sequence: the first plain block matching the header
 * kind, any other plain block, or the unpacked compressed DNA block
 */
export function getSequence(file: SnapGeneFile): Sequence | undefined {
  const preferred = SEQUENCE_BLOCK_TYPES[file.header.kind];
  for (const type of [preferred, BlockType.DNA, BlockType.RNA, BlockType.PROTEIN]) {
    const value = file.blocks.get(type);
    if (value?.kind === "sequence") {
      return value.sequence;
    }
  }

  const compressed = file.blocks.get(BlockType.COMPRESSED_DNA);
  if (compressed?.kind === "compressed-sequence") {
    return {
      kind: "DNA",
      bases: compressed.sequence.bases,
      topology: "linear",
      strandedness: "double",
      methylation: { dam: false, dcm: false, ecoKI: false },
      extraFlags: 0,
    };
  }
  return undefined;
}

export function getFeatures(file: SnapGeneFile): Feature[] {
  const text = markupText(file, BlockType.FEATURES);
  return text === undefined ? [] : parseFeatures(text);
}

export function getNotes(file: SnapGeneFile): Record<string, string> {
  const text = markupText(file, BlockType.NOTES);
  return text === undefined ? {} : parseNotes(text);
}

export function getPrimers(file: SnapGeneFile): Primer[] {
  const text = markupText(file, BlockType.PRIMERS);
  return text === undefined ? [] : parsePrimers(text);
}

/**
 * Sequence properties (block 8) of a file, or of a trace container, which
 * carries its own
 */
export function getProperties(source: SnapGeneFile | TraceContainer): Record<string, string> {
  const text = markupText(source, BlockType.PROPERTIES);
  return text === undefined ? {} : parseProperties(text);
}

export function getAlignableSequences(file: SnapGeneFile): AlignableSequence[] {
  const text = markupText(file, BlockType.ALIGNABLE_SEQUENCES);
  return text === undefined ? [] : parseAlignableSequences(text);
}

/**
 * Decode the history markup (block 7) into an arena tree
 */
export function getHistoryTree(
  file: SnapGeneFile,
  options: Pick<SnapGeneParserOptions, "maxHistoryDepth" | "onWarning"> = {}
): HistoryTree | undefined {
  return new SnapGeneParser(options).historyTree(file);
}

export function getHistoryEntries(file: SnapGeneFile): HistoryEntry[] {
  const entries: HistoryEntry[] = [];
  for (const value of file.blocks.getAll(BlockType.HISTORY_NODE)) {
    if (value.kind === "history-entry") {
      entries.push(value.entry);
    }
  }
  return entries;
}

/**
 * Traces from every trace container, in block order
 */
export function getTraces(file: SnapGeneFile): Trace[] {
  const traces: Trace[] = [];
  for (const value of file.blocks.getAll(BlockType.TRACE_CONTAINER)) {
    if (value.kind !== "trace-container") continue;
    const trace = value.container.blocks.get(BlockType.TRACE);
    if (trace?.kind === "trace") {
      traces.push(trace.trace);
    }
  }
  return traces;
}

/**
 * Collapse a trace's chunks into one record. Repeated chunks of the same
 * kind append (comments, text) or overwrite (everything else).
 */
export function summarizeTrace(trace: Trace): TraceSummary {
  const summary: TraceSummary = {
    version: trace.version,
    bases: "",
    positions: [],
    confidence: [],
    samples: { A: [], C: [], G: [], T: [] },
    text: {},
    comments: [],
  };

  for (const { payload } of trace.chunks) {
    switch (payload.kind) {
      case "bases":
        summary.bases = payload.calls;
        break;
      case "positions":
        summary.positions = payload.positions;
        break;
      case "confidence":
        summary.confidence = payload.values;
        break;
      case "samples4":
        summary.samples = { A: payload.a, C: payload.c, G: payload.g, T: payload.t };
        break;
      case "samples":
        if (isChannel(payload.channel)) {
          summary.samples[payload.channel] = payload.samples;
        }
        break;
      case "clip":
        summary.clip = { left: payload.left, right: payload.right };
        break;
      case "text":
        for (const { key, value } of payload.entries) {
          summary.text[key] = value;
        }
        break;
      case "comment":
        summary.comments.push(payload.text);
        break;
      case "raw":
        break;
    }
  }
  return summary;
}

function isChannel(channel: string): channel is "A" | "C" | "G" | "T" {
  return channel === "A" || channel === "C" || channel === "G" || channel === "T";
}

/**
 * Per-type block inventory in order of first appearance
 */
export function describeBlocks(file: SnapGeneFile): BlockSummary[] {
  return file.blocks.types().map((type) => ({
    type,
    name: BLOCK_NAMES.get(type) ?? "Unknown",
    count: file.blocks.count(type),
    decoded: file.blocks.isDecoded(type),
  }));
}

