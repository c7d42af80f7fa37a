/**
 * Block type identifiers and fixed layout constants
 */

import type { SequenceKind } from "./types";

export const BlockType = {
  DNA: 0,
  COMPRESSED_DNA: 1,
  PRIMERS: 5,
  NOTES: 6,
  HISTORY_TREE: 7,
  PROPERTIES: 8,
  FEATURES: 10,
  HISTORY_NODE: 11,
  CUSTOM_ENZYMES: 14,
  TRACE_CONTAINER: 16,
  ALIGNABLE_SEQUENCES: 17,
  TRACE: 18,
  PROTEIN: 21,
  ENZYME_VISUALIZATION: 28,
  HISTORY_MODIFIERS: 29,
  NESTED_CONTAINER: 30,
  RNA: 32,
} as const;

export const HEADER_MAGIC = 0x09;
export const HEADER_LENGTH_FIELD = 14;
export const HEADER_TITLE = "SnapGene";
export const HEADER_SIZE = 19;

/** Type byte plus big-endian u32 length */
export const BLOCK_HEADER_SIZE = 5;

export const DEFAULT_MAX_DEPTH = 8;
export const DEFAULT_MAX_HISTORY_DEPTH = 4096;

/** Element levels history markup may add around and below its `<Node>` chain */
export const HISTORY_MARKUP_MARGIN = 16;
export const DEFAULT_MAX_MARKUP_DEPTH = DEFAULT_MAX_HISTORY_DEPTH + HISTORY_MARKUP_MARGIN;

export const SEQUENCE_KIND_CODES: ReadonlyMap<number, SequenceKind> = new Map([
  [1, "DNA"],
  [2, "RNA"],
  [3, "Protein"],
]);

export const SEQUENCE_KIND_TO_CODE: Readonly<Record<SequenceKind, number>> = {
  DNA: 1,
  RNA: 2,
  Protein: 3,
};

/** Plain sequence block type for each kind */
export const SEQUENCE_BLOCK_TYPES: Readonly<Record<SequenceKind, number>> = {
  DNA: BlockType.DNA,
  RNA: BlockType.RNA,
  Protein: BlockType.PROTEIN,
};

/** Human-readable names used by describeBlocks */
export const BLOCK_NAMES: ReadonlyMap<number, string> = new Map([
  [BlockType.DNA, "DNA sequence"],
  [BlockType.COMPRESSED_DNA, "Compressed DNA"],
  [BlockType.PRIMERS, "Primers"],
  [BlockType.NOTES, "Notes"],
  [BlockType.HISTORY_TREE, "History tree"],
  [BlockType.PROPERTIES, "Sequence properties"],
  [BlockType.FEATURES, "Features"],
  [BlockType.HISTORY_NODE, "History node"],
  [BlockType.CUSTOM_ENZYMES, "Custom enzymes"],
  [BlockType.TRACE_CONTAINER, "Trace container"],
  [BlockType.ALIGNABLE_SEQUENCES, "Alignable sequences"],
  [BlockType.TRACE, "Sequence trace"],
  [BlockType.PROTEIN, "Protein sequence"],
  [BlockType.ENZYME_VISUALIZATION, "Enzyme visualization"],
  [BlockType.HISTORY_MODIFIERS, "History modifiers"],
  [BlockType.NESTED_CONTAINER, "Nested container"],
  [BlockType.RNA, "RNA sequence"],
]);
