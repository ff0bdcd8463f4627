import {Dirent, readdirSync} from 'fs';
import {extname, join} from 'path';
import {DEFAULT_REPAIR_CONFIG, RepairConfig} from './config';
import {ContentRecord, ContentRepairEngine} from './content-repair';
import {EncodingProber} from './encoding-prober';
import {errorMessage} from './errors';
import {createChildLogger, Logger} from './logger';
import {PathEntry, PathRepairEngine, RepairRecord} from './path-repair';

export interface ScanOptions {
  /** Repair file names (and folder names, see fixFolders). Default true. */
  fixNames?: boolean;
  /** Include directory names in name repair. Default true. */
  fixFolders?: boolean;
  /** Rewrite legacy-encoded text files. Default true. */
  fixContent?: boolean;
}

export interface ScanSummary {
  root: string;
  itemsProcessed: number;
  namesFixed: readonly RepairRecord[];
  contentsFixed: readonly ContentRecord[];
  /** Directories that could not be listed. */
  skippedDirectories: readonly string[];
}

export interface TreeScannerOptions {
  config?: RepairConfig;
  prober?: EncodingProber;
  logger?: Logger;
}

// State of one scan() call.
interface ScanRun {
  settings: Required<ScanOptions>;
  paths: PathRepairEngine;
  contents: ContentRepairEngine;
  skipped: string[];
  itemsProcessed: number;
}

/**
 * Walks a directory tree top-down in the order the filesystem lists it,
 * renaming garbled names and re-encoding text files along the way.
 *
 * Every scan() starts with fresh engines, so a summary only covers its own
 * run.
 */
export class TreeScanner {
  private readonly config: RepairConfig;
  private readonly prober?: EncodingProber;
  private readonly log: Logger;

  constructor(options: TreeScannerOptions = {}) {
    this.config = options.config ?? DEFAULT_REPAIR_CONFIG;
    this.prober = options.prober;
    this.log = options.logger ?? createChildLogger({module: 'scanner'});
  }

  public scan(root: string, options: ScanOptions = {}): ScanSummary {
    const run: ScanRun = {
      settings: {
        fixNames: options.fixNames ?? true,
        fixFolders: options.fixFolders ?? true,
        fixContent: options.fixContent ?? true
      },
      paths: new PathRepairEngine({config: this.config, logger: this.log}),
      contents: new ContentRepairEngine({
        config: this.config,
        prober: this.prober,
        logger: this.log
      }),
      skipped: [],
      itemsProcessed: 0
    };

    this.log.info({root, ...run.settings}, 'Scanning directory');
    this.walk(root, run);

    return {
      root,
      itemsProcessed: run.itemsProcessed,
      namesFixed: run.paths.records,
      contentsFixed: run.contents.records,
      skippedDirectories: run.skipped
    };
  }

  public isTextFile(name: string): boolean {
    return this.config.textExtensions.includes(extname(name).toLowerCase());
  }

  private walk(directory: string, run: ScanRun): void {
    const {settings} = run;
    let entries: Dirent[];
    try {
      entries = readdirSync(directory, {withFileTypes: true});
    } catch (err) {
      this.log.warn(
        {path: directory, error: errorMessage(err)},
        'Cannot read directory'
      );
      run.skipped.push(directory);
      return;
    }

    const subdirectories: string[] = [];

    for (const dirent of entries.filter(entry => entry.isDirectory())) {
      let name = dirent.name;
      if (settings.fixNames && settings.fixFolders) {
        run.itemsProcessed++;
        name = repairName(run.paths, {parentDirectory: directory, name});
      }
      subdirectories.push(name);
    }

    for (const dirent of entries.filter(entry => !entry.isDirectory())) {
      run.itemsProcessed++;
      let name = dirent.name;
      if (settings.fixNames) {
        name = repairName(run.paths, {parentDirectory: directory, name});
      }
      if (settings.fixContent && dirent.isFile() && this.isTextFile(name)) {
        run.contents.repair(join(directory, name));
      }
    }

    for (const name of subdirectories) {
      this.walk(join(directory, name), run);
    }
  }
}

/** Returns the entry's name after repair. */
function repairName(engine: PathRepairEngine, entry: PathEntry): string {
  const outcome = engine.repair(entry);
  return outcome.status === 'renamed' ? outcome.entry.name : entry.name;
}
