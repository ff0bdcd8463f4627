#!/usr/bin/env node
import {Command} from 'commander';
import {existsSync, statSync} from 'fs';
import {resolve} from 'path';
import {createRepairConfig, RepairConfig} from './config';
import {errorMessage, isRepairError, REPAIR_ERROR_CODES, RepairError} from './errors';
import {FileComparator} from './file-comparison';
import {logger, setLogLevel} from './logger';
import {formatScanReport} from './report';
import {ScanOptions, ScanSummary, TreeScanner} from './scanner';

interface FixCommandOptions {
  folders: boolean;
  content: boolean;
  ext?: string;
}

interface CompareCommandOptions {
  sizePattern?: string;
}

/**
 * Resolve a CLI path argument to an absolute directory path.
 *
 * @throws RepairError (PATH_NOT_FOUND, NOT_A_DIRECTORY)
 */
export function resolveDirectory(path: string): string {
  const target = resolve(path);

  if (!existsSync(target)) {
    throw new RepairError(
      REPAIR_ERROR_CODES.PATH_NOT_FOUND,
      `Path '${target}' does not exist!`,
      target
    );
  }

  if (!statSync(target).isDirectory()) {
    throw new RepairError(
      REPAIR_ERROR_CODES.NOT_A_DIRECTORY,
      `'${target}' is not a directory!`,
      target
    );
  }

  return target;
}

export function parseExtensions(list: string): string[] {
  return list
    .split(',')
    .map(ext => ext.trim().toLowerCase())
    .filter(ext => ext.length > 0)
    .map(ext => (ext.startsWith('.') ? ext : `.${ext}`));
}

export function runScan(
  path: string,
  scanOptions: ScanOptions,
  config?: RepairConfig
): ScanSummary {
  const root = resolveDirectory(path);
  return new TreeScanner({config}).scan(root, scanOptions);
}

export function runComparison(
  oldDir: string,
  newDir: string,
  sizePattern?: RegExp
): string {
  const comparator = new FileComparator(
    resolveDirectory(oldDir),
    resolveDirectory(newDir)
  );
  comparator.compareTextFiles();
  if (sizePattern) {
    comparator.compareBySize(sizePattern);
  }
  return comparator.generateSummaryReport();
}

function fail(error: unknown): void {
  if (isRepairError(error)) {
    console.error(`Error: ${error.message}`);
  } else {
    logger.error({err: error}, 'Unexpected failure');
    console.error(`Error: ${errorMessage(error)}`);
  }
  process.exitCode = 1;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('encoding-repair')
    .description(
      'Repair mojibake names, #U escape placeholders and legacy text encodings'
    )
    .version('1.0.0')
    .option('-v, --verbose', 'log every step to stderr')
    .hook('preAction', command => {
      if (command.opts<{verbose?: boolean}>().verbose) {
        setLogLevel('debug');
      }
    });

  program
    .command('fix')
    .description('Fix file and folder names and convert text files to UTF-8')
    .argument('[path]', 'directory to scan', '.')
    .option('--no-folders', 'leave folder names untouched')
    .option('--no-content', 'leave file contents untouched')
    .option('--ext <list>', 'comma-separated text extensions', '.txt')
    .action((path: string, options: FixCommandOptions) => {
      try {
        const config = options.ext
          ? createRepairConfig({textExtensions: parseExtensions(options.ext)})
          : undefined;
        console.log(`Starting scan in: ${resolve(path)}`);
        const summary = runScan(
          path,
          {fixFolders: options.folders, fixContent: options.content},
          config
        );
        console.log(formatScanReport(summary));
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('fix-names')
    .description('Fix file and folder names only (e.g. #U51b2#U950b#U7ebf.txt -> 冲锋线.txt)')
    .argument('[path]', 'directory to scan', '.')
    .option('--no-folders', 'only fix file names, skip folder names')
    .action((path: string, options: Pick<FixCommandOptions, 'folders'>) => {
      try {
        const summary = runScan(path, {
          fixFolders: options.folders,
          fixContent: false
        });
        console.log(formatScanReport(summary));
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('compare')
    .description('Compare text files (size and MD5) between two directories')
    .argument('<oldDir>', 'reference directory')
    .argument('<newDir>', 'directory to check')
    .option('--size-pattern <regex>', 'also compare, by size, the first file matching this pattern')
    .action((oldDir: string, newDir: string, options: CompareCommandOptions) => {
      try {
        const pattern = options.sizePattern
          ? new RegExp(options.sizePattern)
          : undefined;
        console.log(runComparison(oldDir, newDir, pattern));
      } catch (error) {
        fail(error);
      }
    });

  return program;
}

if (require.main === module) {
  createProgram().parse(process.argv);
}
