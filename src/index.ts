/**
 * snapgene-tlv - read and write SnapGene .dna containers
 *
 * Decodes the TLV block stream into typed values (sequences, annotations,
 * cloning history, chromatogram traces) and writes it back byte for byte.
 */

// Compression infrastructure
export {
  CompressionService,
  type CompressionServiceShape,
  compressorFromService,
  defaultCompressor,
  isXz,
  XzCodec,
  ZlibCodec,
} from "./compression";
// Error types
export {
  CompressionError,
  CyclicHistoryError,
  InvalidHeaderError,
  InvalidMagicError,
  MalformedBlockError,
  MissingTraceError,
  NestingTooDeepError,
  SerializeError,
  SnapGeneError,
  toSnapGeneError,
  TruncatedBlockError,
  TruncatedSequenceError,
  UnknownSequenceTypeError,
  UnsupportedTraceCompressionError,
  ValidationError,
} from "./errors";
// SnapGene format
export * from "./formats";
// Options and shared types
export {
  type CompressionFormat,
  type Compressor,
  ParserOptionsSchema,
  type ParseResult,
  type SnapGeneParserOptions,
  type SnapGeneWriterOptions,
  type TraceCompression,
  type WarningHandler,
  WriterOptionsSchema,
} from "./types";
