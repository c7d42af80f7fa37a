/**
 * SnapGene container internals: block model, dispatcher and codecs
 */

export { BlockContainer, type BlockEntry } from "./container";
export { CODECS, isRegisteredType } from "./codecs";
export {
  BLOCK_NAMES,
  BlockType,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_HISTORY_DEPTH,
  DEFAULT_MAX_MARKUP_DEPTH,
  HEADER_SIZE,
  HISTORY_MARKUP_MARGIN,
} from "./constants";
export {
  type BlockCodec,
  type CodecTable,
  type DecodeContext,
  type EncodeContext,
  decodeBlocks,
  descend,
  encodeBlocks,
  readHeader,
  serializeBlocks,
  writeHeader,
} from "./dispatcher";
export {
  decodeCompressedSequence,
  decodePlainSequence,
  decodeSequenceFlags,
  encodeCompressedSequence,
  encodePlainSequence,
  encodeSequenceFlags,
  hasPadBits,
  packBases,
  packedLength,
  unpackBases,
} from "./sequence";
export { decodeHistoryEntry, encodeHistoryEntry, HistorySequenceTag } from "./history-entry";
export {
  buildHistoryTree,
  type HistoryTreeOptions,
  KNOWN_OPERATIONS,
  parseOperation,
  walkHistory,
} from "./history-tree";
export { childrenNamed, findElement, firstChild, type MarkupOptions, parseMarkup } from "./markup";
export {
  decodeChunkPayload,
  decodeTrace,
  encodeChunkPayload,
  encodeTrace,
  normalizeChunkData,
  sampleChannelMetadata,
  type TraceEncodeOptions,
  ZTR_MAGIC,
  zlibFrame,
} from "./ztr";
export {
  parseAlignableSequences,
  parseFeatures,
  parseNotes,
  parsePrimers,
  parseProperties,
  parseRange,
} from "./annotations";
export type * from "./types";
