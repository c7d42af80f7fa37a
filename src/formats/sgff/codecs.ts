/**
 * Block type to codec table
 *
 * Built once. Types missing from the table are kept as raw bytes by the
 * dispatcher.
 */

import { BlockType } from "./constants";
import type { BlockCodec, CodecTable } from "./dispatcher";
import { historyEntryCodec } from "./history-entry";
import { markupCodec } from "./markup";
import { compressedMarkupCodec, nestedContainerCodec } from "./nested";
import { compressedSequenceCodec, plainSequenceCodec } from "./sequence";
import { traceContainerCodec } from "./trace-container";
import { traceCodec } from "./ztr";

export const CODECS: CodecTable = new Map<number, BlockCodec>([
  [BlockType.DNA, plainSequenceCodec],
  [BlockType.COMPRESSED_DNA, compressedSequenceCodec],
  [BlockType.PRIMERS, markupCodec],
  [BlockType.NOTES, markupCodec],
  [BlockType.HISTORY_TREE, compressedMarkupCodec],
  [BlockType.PROPERTIES, markupCodec],
  [BlockType.FEATURES, markupCodec],
  [BlockType.HISTORY_NODE, historyEntryCodec],
  [BlockType.CUSTOM_ENZYMES, markupCodec],
  [BlockType.TRACE_CONTAINER, traceContainerCodec],
  [BlockType.ALIGNABLE_SEQUENCES, markupCodec],
  [BlockType.TRACE, traceCodec],
  [BlockType.PROTEIN, plainSequenceCodec],
  [BlockType.ENZYME_VISUALIZATION, markupCodec],
  [BlockType.HISTORY_MODIFIERS, compressedMarkupCodec],
  [BlockType.NESTED_CONTAINER, nestedContainerCodec],
  [BlockType.RNA, plainSequenceCodec],
]);

export function isRegisteredType(type: number): boolean {
  return CODECS.has(type);
}
