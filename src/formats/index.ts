/**
 * Central format module exports
 */

export {
  createSnapGeneFile,
  DEFAULT_PARSER_OPTIONS,
  DEFAULT_WRITER_OPTIONS,
  describeBlocks,
  getAlignableSequences,
  getFeatures,
  getHistoryEntries,
  getHistoryTree,
  getNotes,
  getPrimers,
  getProperties,
  getSequence,
  getTraces,
  parseSnapGene,
  parseSnapGeneEffect,
  safeParseSnapGene,
  serializeSnapGene,
  serializeSnapGeneEffect,
  SnapGeneParser,
  SnapGeneWriter,
  summarizeTrace,
} from "./sgff";
export * from "./sgff/index";
