/**
 * Encoding detection
 *
 * Buffers that are already valid UTF-8 (plain ASCII included) are reported as
 * "utf-8" without consulting the statistical detector. Anything else goes to
 * jschardet, whose label is normalized to a name iconv-lite understands.
 * Guesses are best effort: callers must not rely on them being right.
 */

import * as jschardet from 'jschardet';
import {isSupportedEncoding, isValidUtf8} from './decoder';
import {createChildLogger, Logger} from './logger';

export type EncodingGuess = string | undefined;

export interface EncodingProber {
  detect(bytes: Uint8Array): EncodingGuess;
}

const LABEL_ALIASES: Record<string, string> = {
  'ascii': 'utf-8',
  'utf-8': 'utf-8',
  'iso-8859-1': 'latin1',
  'windows-1252': 'windows-1252',
  'windows-1251': 'windows-1251',
  'gb2312': 'gb2312',
  'gb18030': 'gb18030',
  'gbk': 'gbk',
  'big5': 'big5',
  'euc-tw': 'big5',
  'shift_jis': 'shift_jis',
  'euc-jp': 'euc-jp',
  'euc-kr': 'euc-kr',
  'koi8-r': 'koi8-r',
  'utf-16le': 'utf-16le',
  'utf-16be': 'utf-16be'
};

/**
 * Map a detector label to an iconv-lite encoding name.
 */
export function normalizeEncodingLabel(label: string): EncodingGuess {
  const lower = label.trim().toLowerCase();
  if (!lower) return undefined;

  const name = LABEL_ALIASES[lower] ?? lower;
  return isSupportedEncoding(name) ? name : undefined;
}

export interface CharsetProberOptions {
  /** Minimum jschardet confidence (0-1) for a guess to be returned. */
  minimumConfidence?: number;
  logger?: Logger;
}

export class CharsetProber implements EncodingProber {
  private readonly minimumConfidence: number;
  private readonly log: Logger;

  constructor(options: CharsetProberOptions = {}) {
    this.minimumConfidence = options.minimumConfidence ?? 0.2;
    this.log = options.logger ?? createChildLogger({module: 'encoding-prober'});
  }

  public detect(bytes: Uint8Array): EncodingGuess {
    if (bytes.length === 0) return undefined;

    if (isValidUtf8(bytes)) return 'utf-8';

    try {
      const result = jschardet.detect(Buffer.from(bytes), {
        minimumThreshold: this.minimumConfidence
      });

      if (!result || !result.encoding) {
        this.log.debug({size: bytes.length}, 'No encoding detected');
        return undefined;
      }

      const guess = normalizeEncodingLabel(result.encoding);
      this.log.debug(
        {label: result.encoding, confidence: result.confidence, guess},
        'Encoding detected'
      );
      return guess;
    } catch (err) {
      this.log.debug({err}, 'Encoding detection failed');
      return undefined;
    }
  }
}
