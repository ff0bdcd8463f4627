/**
 * Audits two directory trees against each other: text files by size and MD5,
 * plus one size-only comparison of files matching a name pattern (useful for
 * binaries such as PDFs that should have survived a repair untouched).
 */

import {createHash} from 'crypto';
import {existsSync, readdirSync, readFileSync, statSync} from 'fs';
import {basename, extname, join} from 'path';
import {DEFAULT_REPAIR_CONFIG, RepairConfig} from './config';
import {errorMessage} from './errors';
import {createChildLogger, Logger} from './logger';

export interface TextComparison {
  fileName: string;
  oldFilePath: string;
  newFilePath?: string;
  existsInNew: boolean;
  identical: boolean;
  sizeMatch: boolean;
  hashMatch: boolean;
  oldSize: number;
  newSize: number;
  oldHash: string;
  newHash: string;
}

export interface SizeComparison {
  label: string;
  oldFile: string;
  newFile: string;
  oldSize: number;
  newSize: number;
  sizeMatch: boolean;
  sizeDifference: number;
}

export interface FileComparatorOptions {
  config?: RepairConfig;
  logger?: Logger;
}

export class FileComparator {
  public readonly textResults = new Map<string, TextComparison>();
  public readonly sizeResults = new Map<string, SizeComparison>();
  private readonly config: RepairConfig;
  private readonly log: Logger;

  constructor(
    private readonly oldDir: string,
    private readonly newDir: string,
    options: FileComparatorOptions = {}
  ) {
    this.config = options.config ?? DEFAULT_REPAIR_CONFIG;
    this.log = options.logger ?? createChildLogger({module: 'file-comparison'});
  }

  /** MD5 hex digest, or '' when the file cannot be read. */
  public getFileHash(path: string): string {
    try {
      return createHash('md5').update(readFileSync(path)).digest('hex');
    } catch (err) {
      this.log.warn({path, error: errorMessage(err)}, 'Error calculating hash');
      return '';
    }
  }

  /** Size in bytes, or 0 when the file cannot be read. */
  public getFileSize(path: string): number {
    try {
      return statSync(path).size;
    } catch (err) {
      this.log.warn({path, error: errorMessage(err)}, 'Error getting size');
      return 0;
    }
  }

  /**
   * Compare every text file directly under the old root with the file of the
   * same name under the new root.
   */
  public compareTextFiles(): Map<string, TextComparison> {
    const textFiles = this.listFiles(this.oldDir).filter(name =>
      this.config.textExtensions.includes(extname(name).toLowerCase())
    );

    for (const fileName of textFiles) {
      const oldFilePath = join(this.oldDir, fileName);
      const candidate = join(this.newDir, fileName);
      const existsInNew = existsSync(candidate);

      const result: TextComparison = {
        fileName,
        oldFilePath,
        newFilePath: existsInNew ? candidate : undefined,
        existsInNew,
        identical: false,
        sizeMatch: false,
        hashMatch: false,
        oldSize: this.getFileSize(oldFilePath),
        newSize: 0,
        oldHash: '',
        newHash: ''
      };

      if (existsInNew) {
        result.newSize = this.getFileSize(candidate);
        result.oldHash = this.getFileHash(oldFilePath);
        result.newHash = this.getFileHash(candidate);
        result.sizeMatch = result.oldSize === result.newSize;
        result.hashMatch = result.oldHash === result.newHash;
        result.identical = result.sizeMatch && result.hashMatch;
      }

      this.textResults.set(fileName, result);
    }

    return this.textResults;
  }

  /**
   * Compare, by size only, the first file in each root whose name matches.
   * Returns undefined when either side has no match.
   */
  public compareBySize(pattern: RegExp): SizeComparison | undefined {
    const oldMatch = this.listFiles(this.oldDir).find(name => pattern.test(name));
    const newMatch = this.listFiles(this.newDir).find(name => pattern.test(name));

    if (!oldMatch || !newMatch) {
      this.log.warn(
        {pattern: pattern.source, oldMatch, newMatch},
        'No matching file to compare by size'
      );
      return undefined;
    }

    const oldFile = join(this.oldDir, oldMatch);
    const newFile = join(this.newDir, newMatch);
    const oldSize = this.getFileSize(oldFile);
    const newSize = this.getFileSize(newFile);

    const result: SizeComparison = {
      label: basename(oldMatch),
      oldFile,
      newFile,
      oldSize,
      newSize,
      sizeMatch: oldSize === newSize,
      sizeDifference: Math.abs(oldSize - newSize)
    };
    this.sizeResults.set(result.label, result);
    return result;
  }

  public generateSummaryReport(): string {
    const results = [...this.textResults.values()];
    const identical = results.filter(r => r.identical);
    const missing = results.filter(r => !r.existsInNew);
    const different = results.filter(r => r.existsInNew && !r.identical);

    const report: string[] = [
      'File comparison report',
      '='.repeat(60),
      '',
      'Text files:',
      `Text files in ${this.oldDir}: ${results.length}`,
      `Identical: ${identical.length}`,
      `Missing in ${this.newDir}: ${missing.length}`,
      `Different: ${different.length}`
    ];

    if (missing.length > 0) {
      report.push('', 'Missing files:');
      missing.forEach(r => report.push(`  - ${r.fileName}`));
    }

    if (different.length > 0) {
      report.push('', 'Different files:');
      different.forEach(r => report.push(`  - ${r.fileName}`));
    }

    if (this.sizeResults.size > 0) {
      report.push('', 'Size comparison:');
      for (const r of this.sizeResults.values()) {
        report.push(
          r.sizeMatch
            ? `  ${r.label}: same size (${r.oldSize} bytes)`
            : `  ${r.label}: size differs by ${r.sizeDifference} bytes (${r.oldSize} vs ${r.newSize})`
        );
      }
    }

    return report.join('\n');
  }

  private listFiles(directory: string): string[] {
    try {
      return readdirSync(directory, {withFileTypes: true})
        .filter(entry => entry.isFile())
        .map(entry => entry.name);
    } catch (err) {
      this.log.warn(
        {path: directory, error: errorMessage(err)},
        'Cannot read directory'
      );
      return [];
    }
  }
}
