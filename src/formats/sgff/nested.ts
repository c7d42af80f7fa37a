/**
 * LZMA-wrapped blocks
 *
 * Block 30 is a complete TLV stream compressed as one XZ stream; blocks 7
 * and 29 are XZ-compressed markup. Decoding keeps the compressed payload
 * next to the bytes it expanded to, so an unchanged value is written back
 * with its original compression rather than whatever the local encoder
 * produces.
 */

import type { Compressor } from "../../types";
import { bytesEqual, decodeUtf8 } from "./binary";
import { encodeUtf8 } from "./binary-serializer";
import type { BlockCodec } from "./dispatcher";
import { decodeBlocks, descend, serializeBlocks, valueMismatch } from "./dispatcher";
import type { CompressedOrigin } from "./types";

function recompress(
  uncompressed: Uint8Array,
  origin: CompressedOrigin | undefined,
  compressor: Compressor
): Uint8Array {
  if (origin !== undefined && bytesEqual(uncompressed, origin.uncompressed)) {
    return origin.compressed;
  }
  return compressor.compress(uncompressed, "xz");
}

export const nestedContainerCodec: BlockCodec = {
  name: "container",
  decode: (payload, ctx) => {
    const inner = descend(ctx);
    const uncompressed = ctx.compressor.decompress(payload, "xz");
    return {
      kind: "container",
      blocks: decodeBlocks(uncompressed, inner),
      origin: { compressed: payload.slice(), uncompressed },
    };
  },
  encode: (value, ctx, type) => {
    if (value.kind !== "container") {
      throw valueMismatch(type, "container", value);
    }
    const serialized = serializeBlocks(value.blocks, descend(ctx));
    return recompress(serialized, value.origin, ctx.compressor);
  },
};

export const compressedMarkupCodec: BlockCodec = {
  name: "compressed-markup",
  decode: (payload, ctx) => {
    const uncompressed = ctx.compressor.decompress(payload, "xz");
    return {
      kind: "compressed-markup",
      text: decodeUtf8(uncompressed),
      origin: { compressed: payload.slice(), uncompressed },
    };
  },
  encode: (value, ctx, type) => {
    if (value.kind !== "compressed-markup") {
      throw valueMismatch(type, "compressed-markup", value);
    }
    return recompress(encodeUtf8(value.text), value.origin, ctx.compressor);
  },
};
