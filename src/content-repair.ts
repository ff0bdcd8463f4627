import {closeSync, openSync, readFileSync, readSync, writeFileSync} from 'fs';
import {DEFAULT_REPAIR_CONFIG, RepairConfig} from './config';
import {countReplacementChars, decodeBytes, encodeText} from './decoder';
import {CharsetProber, EncodingProber} from './encoding-prober';
import {errorMessage} from './errors';
import {createChildLogger, Logger} from './logger';

export interface ContentRecord {
  readonly path: string;
  readonly fromEncoding: string;
  readonly toEncoding: string;
}

export interface ContentRepairOptions {
  config?: RepairConfig;
  prober?: EncodingProber;
  logger?: Logger;
}

function sameEncoding(a: string, b: string): boolean {
  const normalize = (name: string) => name.toLowerCase().replace(/[-_]/g, '');
  return normalize(a) === normalize(b);
}

export class ContentRepairEngine {
  private readonly config: RepairConfig;
  private readonly prober: EncodingProber;
  private readonly log: Logger;
  private readonly history: ContentRecord[] = [];

  constructor(options: ContentRepairOptions = {}) {
    this.config = options.config ?? DEFAULT_REPAIR_CONFIG;
    this.log = options.logger ?? createChildLogger({module: 'content-repair'});
    this.prober =
      options.prober ??
      new CharsetProber({
        minimumConfidence: this.config.detectionThreshold,
        logger: this.log
      });
  }

  /** Files rewritten so far, oldest first. */
  public get records(): readonly ContentRecord[] {
    return this.history;
  }

  /**
   * Rewrite a text file in the target encoding when it is stored in another
   * one. The original bytes are not kept.
   *
   * @returns true when the file was rewritten
   */
  public repair(path: string): boolean {
    try {
      if (this.looksBinary(path)) {
        this.log.debug({path}, 'Skipping binary file');
        return false;
      }

      const bytes = readFileSync(path);
      const detected = this.prober.detect(bytes);
      if (!detected || sameEncoding(detected, this.config.targetEncoding)) {
        return false;
      }

      const text = decodeBytes(bytes, detected);
      const unmapped = countReplacementChars(text);
      writeFileSync(path, encodeText(text, this.config.targetEncoding));

      const record: ContentRecord = Object.freeze({
        path,
        fromEncoding: detected,
        toEncoding: this.config.targetEncoding
      });
      this.history.push(record);
      this.log.info(
        {path, from: detected, to: this.config.targetEncoding, unmapped},
        'Fixed content encoding'
      );
      return true;
    } catch (err) {
      this.log.warn(
        {path, error: errorMessage(err)},
        'Error fixing content encoding'
      );
      return false;
    }
  }

  private looksBinary(path: string): boolean {
    const sample = Buffer.alloc(this.config.binarySniffBytes);
    const fd = openSync(path, 'r');
    try {
      const bytesRead = readSync(fd, sample, 0, sample.length, 0);
      return sample.subarray(0, bytesRead).includes(0);
    } finally {
      closeSync(fd);
    }
  }
}
