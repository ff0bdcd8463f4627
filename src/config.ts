import {z} from 'zod';
import {isSupportedEncoding} from './decoder';
import {REPAIR_ERROR_CODES, RepairError} from './errors';
import {DEFAULT_MOJIBAKE_TABLE, MojibakeRule} from './mojibake-table';

export interface RepairConfig {
  /** Encoding every repaired text file is rewritten in. */
  readonly targetEncoding: string;
  /** Encodings tried, in order, when brute-forcing a garbled name. */
  readonly candidateEncodings: readonly string[];
  readonly mojibakeTable: readonly MojibakeRule[];
  /** Leading bytes inspected for a NUL before a file is treated as binary. */
  readonly binarySniffBytes: number;
  /** Lower-case extensions, with dot, whose contents are repaired. */
  readonly textExtensions: readonly string[];
  /** Minimum detector confidence for a legacy encoding guess. */
  readonly detectionThreshold: number;
}

export const DEFAULT_REPAIR_CONFIG: RepairConfig = Object.freeze({
  targetEncoding: 'utf-8',
  candidateEncodings: Object.freeze([
    'latin1',
    'windows-1252',
    'gbk',
    'gb2312',
    'big5'
  ]),
  mojibakeTable: DEFAULT_MOJIBAKE_TABLE,
  binarySniffBytes: 1024,
  textExtensions: Object.freeze(['.txt']),
  detectionThreshold: 0.2
});

const encodingName = z
  .string()
  .min(1)
  .refine(isSupportedEncoding, value => ({
    message: `Unsupported encoding "${value}"`
  }));

const configSchema = z.object({
  targetEncoding: encodingName,
  candidateEncodings: z.array(encodingName),
  mojibakeTable: z.array(z.tuple([z.string().min(1), z.string()])),
  binarySniffBytes: z.number().int().positive(),
  textExtensions: z
    .array(z.string().regex(/^\.[^.]+$/, 'Extension must start with a dot'))
    .transform(extensions => extensions.map(ext => ext.toLowerCase())),
  detectionThreshold: z.number().min(0).max(1)
});

export type RepairConfigOverrides = Partial<RepairConfig>;

/**
 * Build an immutable config from the defaults and the given overrides.
 *
 * @throws RepairError (INVALID_CONFIG) when an override does not validate
 */
export function createRepairConfig(
  overrides: RepairConfigOverrides = {}
): RepairConfig {
  const merged = {...DEFAULT_REPAIR_CONFIG, ...overrides};
  const parsed = configSchema.safeParse({
    ...merged,
    candidateEncodings: [...merged.candidateEncodings],
    mojibakeTable: merged.mojibakeTable.map(([from, to]) => [from, to]),
    textExtensions: [...merged.textExtensions]
  });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new RepairError(
      REPAIR_ERROR_CODES.INVALID_CONFIG,
      `Invalid repair config: ${issues}`
    );
  }

  const config = parsed.data;
  return Object.freeze({
    targetEncoding: config.targetEncoding,
    candidateEncodings: Object.freeze(config.candidateEncodings),
    mojibakeTable: Object.freeze(
      config.mojibakeTable.map(
        ([from, to]): MojibakeRule => Object.freeze([from, to] as const)
      )
    ),
    binarySniffBytes: config.binarySniffBytes,
    textExtensions: Object.freeze(config.textExtensions),
    detectionThreshold: config.detectionThreshold
  });
}
