/**
 * Error handling for SnapGene container parsing and writing
 *
 * Every failure carries the block it happened in: the dispatcher records the
 * chain of block types from the outermost stream to the innermost one, plus
 * the byte offset of the failing block inside its own stream.
 */

/**
 * Base error class for all SnapGene codec errors
 */
export class SnapGeneError extends Error {
  /** Block types from the outermost stream to the block that failed */
  readonly blockPath: number[] = [];
  /** Offset of the failing block header within its (possibly nested) stream */
  offset?: number;

  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "SnapGeneError";
  }

  /**
   * Record the block this error escaped from. The innermost dispatcher sets
   * the offset; every enclosing dispatcher prepends its block type.
   */
  withBlockContext(blockType: number, offset: number): this {
    this.blockPath.unshift(blockType);
    if (this.offset === undefined) {
      this.offset = offset;
    }
    return this;
  }

  /** Innermost block type, if the error was raised inside a block */
  get blockType(): number | undefined {
    return this.blockPath[this.blockPath.length - 1];
  }

  /**
   * Create a user-friendly error message with block context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.blockPath.length > 0) {
      msg += ` (block ${this.blockPath.join(" > ")}`;
      msg += this.offset !== undefined ? ` at offset ${this.offset})` : ")";
    } else if (this.offset !== undefined) {
      msg += ` (offset ${this.offset})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or caller-supplied values
 */
export class ValidationError extends SnapGeneError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * The 19-byte file header does not match the fixed layout
 */
export class InvalidHeaderError extends SnapGeneError {
  constructor(
    message: string,
    public readonly field: "magic" | "length" | "title" | "sequence-kind" | "size",
    context?: string
  ) {
    super(message, "INVALID_HEADER", context);
    this.name = "InvalidHeaderError";
    this.offset = 0;
  }
}

/**
 * A block declares more bytes than remain in its stream
 */
export class TruncatedBlockError extends SnapGeneError {
  constructor(
    message: string,
    public readonly declaredLength: number,
    public readonly availableLength: number,
    context?: string
  ) {
    super(message, "TRUNCATED_BLOCK", context);
    this.name = "TruncatedBlockError";
  }

  /**
   * Create error for a payload that runs past the end of its stream
   */
  static forPayload(
    blockType: number,
    offset: number,
    declaredLength: number,
    availableLength: number
  ): TruncatedBlockError {
    const error = new TruncatedBlockError(
      `Block type ${blockType} declares ${declaredLength} bytes but only ${availableLength} remain`,
      declaredLength,
      availableLength,
      `Declared: ${declaredLength} bytes, Available: ${availableLength} bytes`
    );
    error.offset = offset;
    return error;
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nDeclared length: ${this.declaredLength}`;
    msg += `\nAvailable: ${this.availableLength}`;
    return msg;
  }
}

/**
 * Sequence body shorter than its declared lengths require
 */
export class TruncatedSequenceError extends SnapGeneError {
  constructor(
    message: string,
    public readonly requiredBytes: number,
    public readonly availableBytes: number
  ) {
    super(message, "TRUNCATED_SEQUENCE", `Required: ${requiredBytes} bytes, Available: ${availableBytes} bytes`);
    this.name = "TruncatedSequenceError";
  }
}

/**
 * A recognised block whose body does not follow the expected layout
 */
export class MalformedBlockError extends SnapGeneError {
  constructor(message: string, context?: string) {
    super(message, "MALFORMED_BLOCK", context);
    this.name = "MalformedBlockError";
  }
}

/**
 * History entry with a sequence-type tag outside the known set
 */
export class UnknownSequenceTypeError extends SnapGeneError {
  constructor(public readonly tag: number) {
    super(`Unknown history sequence type tag: ${tag}`, "UNKNOWN_SEQUENCE_TYPE");
    this.name = "UnknownSequenceTypeError";
  }
}

/**
 * Nested containers or history markup deeper than the configured bound
 */
export class NestingTooDeepError extends SnapGeneError {
  constructor(
    public readonly limit: number,
    public readonly structure: "container" | "history"
  ) {
    super(
      `${structure === "container" ? "Nested container" : "History tree"} depth exceeds limit of ${limit}`,
      "NESTING_TOO_DEEP"
    );
    this.name = "NestingTooDeepError";
  }
}

/**
 * History markup declares a node as its own descendant
 */
export class CyclicHistoryError extends SnapGeneError {
  constructor(
    public readonly nodeId: number,
    public readonly ancestry: readonly number[]
  ) {
    super(
      `History node ${nodeId} appears among its own ancestors`,
      "CYCLIC_HISTORY",
      `Ancestry: ${[...ancestry, nodeId].join(" > ")}`
    );
    this.name = "CyclicHistoryError";
  }
}

/**
 * Trace sub-format magic mismatch
 */
export class InvalidMagicError extends SnapGeneError {
  constructor(public readonly found: Uint8Array) {
    super(
      `Invalid trace magic bytes: ${Array.from(found, (b) => b.toString(16).padStart(2, "0")).join(" ")}`,
      "INVALID_MAGIC"
    );
    this.name = "InvalidMagicError";
  }
}

/**
 * Trace chunk framed with a compression selector other than raw or zlib
 */
export class UnsupportedTraceCompressionError extends SnapGeneError {
  constructor(
    public readonly chunkType: string,
    public readonly selector: number
  ) {
    super(
      `Trace chunk ${chunkType} uses unsupported compression selector 0x${selector.toString(16).padStart(2, "0")}`,
      "UNSUPPORTED_TRACE_COMPRESSION"
    );
    this.name = "UnsupportedTraceCompressionError";
  }
}

/**
 * Trace container without its type-18 trace block
 */
export class MissingTraceError extends SnapGeneError {
  constructor() {
    super("Trace container holds no type-18 trace block", "MISSING_TRACE");
    this.name = "MissingTraceError";
  }
}

/**
 * A decoded value can no longer be encoded consistently
 */
export class SerializeError extends SnapGeneError {
  constructor(message: string, context?: string) {
    super(message, "SERIALIZE_ERROR", context);
    this.name = "SerializeError";
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends SnapGeneError {
  constructor(
    message: string,
    public readonly format: "xz" | "zlib" | "none",
    public readonly operation: "decompress" | "compress" | "validate",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from a library error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    if (systemError instanceof CompressionError) {
      return systemError;
    }
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(format, errorMessage);

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `Library error: ${errorMessage}`
    );
  }

  /**
   * Get helpful suggestion based on compression error
   */
  private static getSuggestionForCompressionError(
    format: CompressionError["format"],
    errorMessage: string
  ): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("magic") || msg.includes("header") || msg.includes("format")) {
      return `Payload may be corrupted or not actually ${format} compressed`;
    }
    if (msg.includes("truncated") || msg.includes("unexpected end")) {
      return "Payload appears to be truncated";
    }
    if (msg.includes("crc") || msg.includes("checksum") || msg.includes("adler")) {
      return "Data integrity check failed - payload may be corrupted";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }

    return msg;
  }
}

/**
 * Wrap anything thrown inside a block codec so the caller always receives a
 * SnapGeneError carrying the block location.
 */
export function toSnapGeneError(error: unknown): SnapGeneError {
  if (error instanceof SnapGeneError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new MalformedBlockError(message, "Unexpected failure while decoding block");
}
