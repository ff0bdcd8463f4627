import {existsSync, renameSync} from 'fs';
import {join, sep} from 'path';
import {DEFAULT_REPAIR_CONFIG, RepairConfig} from './config';
import {reinterpretName} from './decoder';
import {errorMessage} from './errors';
import {decodeEscapeSequences, hasEscapeSequence} from './escape-sequence';
import {createChildLogger, Logger} from './logger';
import {applyMojibakeTable} from './mojibake-table';
import {isClean} from './name-validator';

export interface PathEntry {
  readonly parentDirectory: string;
  readonly name: string;
}

export interface RepairRecord {
  readonly originalPath: string;
  readonly newPath: string;
}

export type RepairStrategy = 'escape-sequence' | 'mojibake-table' | 'recode';

export type RejectReason = 'invalid-name' | 'collision' | 'io-error';

export type RenameOutcome =
  | {status: 'unchanged'}
  | {
      status: 'renamed';
      strategy: RepairStrategy;
      entry: PathEntry;
      record: RepairRecord;
    }
  | {
      status: 'rejected';
      strategy: RepairStrategy;
      candidate: string;
      reason: RejectReason;
    };

/**
 * Proposes replacement names for a garbled name, best first. An empty list
 * means the strategy does not apply.
 */
export type NameStrategy = (name: string) => string[];

export interface PathRepairOptions {
  config?: RepairConfig;
  logger?: Logger;
}

// A high surrogate not followed by a low one, or a low one not preceded by a high one.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function entryPath(entry: PathEntry): string {
  return join(entry.parentDirectory, entry.name);
}

/**
 * True when `name` can be used as a single path segment: no separator, no
 * NUL, not `.` or `..`, and no unpaired surrogate (which the filesystem
 * would store as U+FFFD).
 */
export function isValidEntryName(name: string): boolean {
  return (
    name.length > 0 &&
    name !== '.' &&
    name !== '..' &&
    !name.includes('/') &&
    !name.includes(sep) &&
    !name.includes('\0') &&
    !LONE_SURROGATE.test(name)
  );
}

export class PathRepairEngine {
  private readonly config: RepairConfig;
  private readonly log: Logger;
  private readonly history: RepairRecord[] = [];
  private readonly strategies: ReadonlyArray<[RepairStrategy, NameStrategy]>;

  constructor(options: PathRepairOptions = {}) {
    this.config = options.config ?? DEFAULT_REPAIR_CONFIG;
    this.log = options.logger ?? createChildLogger({module: 'path-repair'});
    this.strategies = [
      ['escape-sequence', name => this.decodeEscapes(name)],
      ['mojibake-table', name => this.applyTable(name)],
      ['recode', name => this.recode(name)]
    ];
  }

  /** Renames performed so far, oldest first. */
  public get records(): readonly RepairRecord[] {
    return this.history;
  }

  /**
   * Try each strategy in order and rename the entry with the first candidate
   * that can be applied. The parent directory is never touched.
   *
   * `#UXXXX` placeholders are plain ASCII, so a clean name still goes through
   * escape decoding when it carries one.
   */
  public repair(entry: PathEntry): RenameOutcome {
    if (isClean(entry.name) && !hasEscapeSequence(entry.name)) {
      return {status: 'unchanged'};
    }

    this.log.debug({path: entryPath(entry)}, 'Attempting to fix name');

    for (const [strategy, propose] of this.strategies) {
      for (const candidate of propose(entry.name)) {
        const outcome = this.tryRename(entry, candidate, strategy);
        if (outcome.status === 'renamed') {
          return outcome;
        }
      }
    }

    this.log.info({path: entryPath(entry)}, 'Could not fix name');
    return {status: 'unchanged'};
  }

  private decodeEscapes(name: string): string[] {
    if (!hasEscapeSequence(name)) return [];
    const decoded = decodeEscapeSequences(name);
    return decoded !== name ? [decoded] : [];
  }

  private applyTable(name: string): string[] {
    const fixed = applyMojibakeTable(name, this.config.mojibakeTable);
    return fixed !== name ? [fixed] : [];
  }

  private recode(name: string): string[] {
    const candidates: string[] = [];
    for (const encoding of this.config.candidateEncodings) {
      const recovered = reinterpretName(name, encoding);
      if (
        recovered &&
        recovered !== name &&
        !candidates.includes(recovered)
      ) {
        candidates.push(recovered);
      }
    }
    return candidates;
  }

  private tryRename(
    entry: PathEntry,
    candidate: string,
    strategy: RepairStrategy
  ): RenameOutcome {
    const from = entryPath(entry);

    if (!isValidEntryName(candidate)) {
      this.log.warn({from, candidate, strategy}, 'Candidate is not a valid name');
      return {status: 'rejected', strategy, candidate, reason: 'invalid-name'};
    }

    const renamed: PathEntry = {
      parentDirectory: entry.parentDirectory,
      name: candidate
    };
    const to = entryPath(renamed);

    if (existsSync(to)) {
      this.log.warn({from, to, strategy}, 'Target name already exists');
      return {status: 'rejected', strategy, candidate, reason: 'collision'};
    }

    try {
      renameSync(from, to);
    } catch (err) {
      this.log.warn(
        {from, to, strategy, error: errorMessage(err)},
        'Error renaming entry'
      );
      return {status: 'rejected', strategy, candidate, reason: 'io-error'};
    }

    const record: RepairRecord = Object.freeze({originalPath: from, newPath: to});
    this.history.push(record);
    this.log.info({from, to, strategy}, 'Fixed name');

    return {status: 'renamed', strategy, entry: renamed, record};
  }
}
