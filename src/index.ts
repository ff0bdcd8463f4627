export {PathRepairEngine, PathRepairOptions, entryPath, isValidEntryName} from './path-repair';
export type {
  PathEntry,
  RepairRecord,
  RepairStrategy,
  RejectReason,
  RenameOutcome,
  NameStrategy
} from './path-repair';
export {ContentRepairEngine, ContentRepairOptions} from './content-repair';
export type {ContentRecord} from './content-repair';
export {TreeScanner} from './scanner';
export type {ScanOptions, ScanSummary, TreeScannerOptions} from './scanner';
export {FileComparator} from './file-comparison';
export type {TextComparison, SizeComparison} from './file-comparison';
export {formatScanReport} from './report';

export {CharsetProber, normalizeEncodingLabel} from './encoding-prober';
export type {EncodingProber, EncodingGuess} from './encoding-prober';
export {isClean} from './name-validator';
export {decodeEscapeSequences, hasEscapeSequence} from './escape-sequence';
export {applyMojibakeTable, DEFAULT_MOJIBAKE_TABLE} from './mojibake-table';
export type {MojibakeRule} from './mojibake-table';

export {createRepairConfig, DEFAULT_REPAIR_CONFIG} from './config';
export type {RepairConfig, RepairConfigOverrides} from './config';
export {RepairError, REPAIR_ERROR_CODES} from './errors';
export type {RepairErrorCode} from './errors';
export {logger, createChildLogger} from './logger';

// Encoding utilities
export {
  decodeBytes,
  encodeText,
  reinterpretName,
  isValidUtf8,
  countReplacementChars
} from './decoder';
