/**
 * Trace container codec (block 16)
 *
 * A u32 direction word followed by a TLV stream holding exactly one trace
 * (block 18) and optionally a properties block (block 8).
 */

import { MalformedBlockError, MissingTraceError, TruncatedBlockError } from "../../errors";
import { readUInt32BE } from "./binary";
import { ByteWriter } from "./binary-serializer";
import { BlockType } from "./constants";
import type { BlockContainer } from "./container";
import type { BlockCodec } from "./dispatcher";
import { decodeBlocks, descend, serializeBlocks, valueMismatch } from "./dispatcher";
import type { TraceContainer } from "./types";

function checkTraceCount(blocks: BlockContainer): void {
  const count = blocks.count(BlockType.TRACE);
  if (count === 0) {
    throw new MissingTraceError();
  }
  if (count > 1) {
    throw new MalformedBlockError(`Trace container holds ${count} traces, expected one`);
  }
}

function flagsFor(container: TraceContainer): number {
  if (container.direction === "forward") {
    return 0;
  }
  return container.flags === 0 ? 1 : container.flags;
}

export const traceContainerCodec: BlockCodec = {
  name: "trace-container",
  decode: (payload, ctx) => {
    if (payload.length < 4) {
      throw new TruncatedBlockError(
        `Trace container needs a 4-byte direction word, got ${payload.length} bytes`,
        4,
        payload.length
      );
    }
    const flags = readUInt32BE(payload, 0);
    const blocks = decodeBlocks(payload, descend(ctx), 4);
    checkTraceCount(blocks);
    return {
      kind: "trace-container",
      container: { flags, direction: flags === 0 ? "forward" : "reverse", blocks },
    };
  },
  encode: (value, ctx, type) => {
    if (value.kind !== "trace-container") {
      throw valueMismatch(type, "trace-container", value);
    }
    const { container } = value;
    checkTraceCount(container.blocks);
    return new ByteWriter()
      .uint32(flagsFor(container))
      .bytes(serializeBlocks(container.blocks, descend(ctx)))
      .toUint8Array();
  },
};
