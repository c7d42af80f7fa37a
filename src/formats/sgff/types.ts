/**
 * Data model for decoded SnapGene containers
 */

import type { BlockContainer } from "./container";

export type SequenceKind = "DNA" | "RNA" | "Protein";
export type Topology = "linear" | "circular";
export type Strandedness = "single" | "double";

/**
 * Fixed 19-byte file prefix
 */
export interface Header {
  readonly kind: SequenceKind;
  readonly exportVersion: number;
  readonly importVersion: number;
}

export interface Methylation {
  dam: boolean;
  dcm: boolean;
  ecoKI: boolean;
}

/**
 * Plain sequence from block 0 (DNA), 32 (RNA) or 21 (protein)
 */
export interface Sequence {
  kind: SequenceKind;
  bases: string;
  topology: Topology;
  strandedness: Strandedness;
  methylation: Methylation;
  /** Flag bits 5-7, carried through unchanged */
  extraFlags: number;
}

/**
 * 2-bit packed DNA (block 1 and compressed history snapshots)
 *
 * The compressed-length field is not stored; it is recomputed on encode from
 * the packed size and the trailing bytes.
 */
export interface CompressedSequence {
  /** Base count */
  length: number;
  /** 14 opaque bytes between the base count and the packed data */
  reserved: Uint8Array;
  bases: string;
  /** Bytes inside the compressed length that follow the packed data */
  trailing: Uint8Array;
  /**
   * Packed bytes as read, kept only when the final byte has non-zero pad
   * bits; re-emitted while `bases` still equals the bases they decoded to
   */
  packing?: PackedOrigin;
}

export interface PackedOrigin {
  readonly bases: string;
  readonly packed: Uint8Array;
}

/**
 * Original bytes of an LZMA-wrapped block, re-emitted on write when the
 * re-serialised content is byte-identical to `uncompressed`
 */
export interface CompressedOrigin {
  readonly compressed: Uint8Array;
  readonly uncompressed: Uint8Array;
}

// =============================================================================
// HISTORY
// =============================================================================

export type HistorySequence =
  | { kind: "plain"; sequenceKind: SequenceKind; bases: string }
  | { kind: "compressed"; sequence: CompressedSequence }
  | { kind: "modifier" };

/**
 * Block 11: sequence snapshot for one history node
 */
export interface HistoryEntry {
  /** Refers to `HistoryNode.id` */
  nodeIndex: number;
  sequence: HistorySequence;
  nodeInfo?: BlockContainer;
}

/**
 * Generic element tree produced by the markup adapter
 */
export interface MarkupElement {
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly MarkupElement[];
  /** Concatenated direct text content */
  readonly text: string;
}

export type HistoryOperation =
  | { readonly kind: "known"; readonly name: string }
  | { readonly kind: "other"; readonly name: string };

export interface HistoryNode {
  /** Position in the arena (pre-order) */
  readonly index: number;
  readonly id: number;
  readonly name: string;
  readonly type: string;
  readonly seqLen: number;
  readonly topology: Topology;
  readonly strandedness: Strandedness;
  readonly operation: HistoryOperation;
  readonly upstreamModification?: string;
  readonly downstreamModification?: string;
  readonly resurrectable: boolean;
  /** Arena indices, document order */
  readonly children: number[];
  readonly inputSummaries: readonly MarkupElement[];
  readonly oligos: readonly MarkupElement[];
  readonly parameters: readonly MarkupElement[];
  readonly attributes: Readonly<Record<string, string>>;
}

export interface HistoryTree {
  readonly nodes: readonly HistoryNode[];
  readonly root: number;
  /** Node id to arena index; the first occurrence wins */
  readonly byId: ReadonlyMap<number, number>;
}

// =============================================================================
// TRACES
// =============================================================================

export interface TextEntry {
  key: string;
  value: string;
}

export type TraceChunkPayload =
  | { kind: "bases"; calls: string }
  | { kind: "positions"; positions: number[] }
  | { kind: "confidence"; values: number[] }
  | { kind: "samples4"; a: number[]; c: number[]; g: number[]; t: number[] }
  | { kind: "samples"; channel: string; samples: number[] }
  | { kind: "text"; entries: TextEntry[] }
  | { kind: "clip"; left: number; right: number }
  | { kind: "comment"; text: string }
  | { kind: "raw"; body: Uint8Array };

/**
 * Data bytes exactly as read, with the canonical raw encoding of the payload
 * they decoded to. The writer reuses `data` while the payload still encodes
 * to `canonical`.
 */
export interface ChunkFraming {
  readonly data: Uint8Array;
  readonly canonical: Uint8Array;
}

export interface TraceChunk {
  /** Four ASCII characters, e.g. "BASE" */
  type: string;
  metadata: Uint8Array;
  payload: TraceChunkPayload;
  framing?: ChunkFraming;
}

export interface Trace {
  version: number;
  chunks: TraceChunk[];
}

export type TraceDirection = "forward" | "reverse";

/**
 * Block 16: one chromatogram plus optional properties
 */
export interface TraceContainer {
  /** Raw direction word; zero means forward */
  flags: number;
  direction: TraceDirection;
  blocks: BlockContainer;
}

// =============================================================================
// BLOCK VALUES
// =============================================================================

export type BlockValue =
  | { kind: "sequence"; sequence: Sequence }
  | { kind: "compressed-sequence"; sequence: CompressedSequence }
  | { kind: "markup"; text: string }
  | { kind: "compressed-markup"; text: string; origin?: CompressedOrigin }
  | { kind: "container"; blocks: BlockContainer; origin?: CompressedOrigin }
  | { kind: "history-entry"; entry: HistoryEntry }
  | { kind: "trace-container"; container: TraceContainer }
  | { kind: "trace"; trace: Trace }
  | { kind: "raw"; bytes: Uint8Array };

export type BlockValueKind = BlockValue["kind"];

/**
 * A whole parsed file
 */
export interface SnapGeneFile {
  header: Header;
  blocks: BlockContainer;
}

// =============================================================================
// ANNOTATIONS
// =============================================================================

export type FeatureStrand = "none" | "forward" | "reverse" | "both";

export interface FeatureSegment {
  /** 0-based inclusive */
  start: number;
  /** 1-based inclusive (exclusive when read as 0-based) */
  end: number;
  color?: string;
  type?: string;
}

export interface Feature {
  name: string;
  type: string;
  strand: FeatureStrand;
  start: number;
  end: number;
  color?: string;
  segments: FeatureSegment[];
  qualifiers: Record<string, string>;
}

export interface PrimerBindingSite {
  start: number;
  end: number;
  strand: "forward" | "reverse";
}

export interface Primer {
  name: string;
  sequence: string;
  description?: string;
  bindingSites: PrimerBindingSite[];
  attributes: Record<string, string>;
}

export interface AlignableSequence {
  name: string;
  sequence: string;
  attributes: Record<string, string>;
}

/**
 * Per-type inventory for inspection tooling
 */
export interface BlockSummary {
  type: number;
  name: string;
  count: number;
  decoded: boolean;
}

/**
 * Flattened view of one chromatogram
 */
export interface TraceSummary {
  version: number;
  bases: string;
  positions: number[];
  confidence: number[];
  samples: Record<"A" | "C" | "G" | "T", number[]>;
  clip?: { left: number; right: number };
  text: Record<string, string>;
  comments: string[];
}
