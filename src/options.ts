import { DEFAULT_MAX_USER_DATA_DEPTH } from './record/PayloadFlattener';

export type MalformedRecordPolicy = 'skip' | 'emit';

/**
 * `cache` keeps every flattened row in memory between the discovery and emit passes;
 * `reparse` keeps nothing and reads the source a second time.
 */
export type ConversionStrategy = 'cache' | 'reparse';

export interface ConvertProgress {
  phase: 'discover' | 'emit';
  /** Records handled so far in this phase */
  current: number;
  /** Known once discovery has finished */
  total?: number;
}

export interface ConvertOptions {
  maxUserDataDepth?: number; // default 32
  malformedRecords?: MalformedRecordPolicy; // default 'skip'
  newColumnWarningThreshold?: number; // default 64
  strategy?: ConversionStrategy; // default 'cache'
  signal?: AbortSignal;
  onProgress?: (p: ConvertProgress) => void;
  progressInterval?: number; // default 500
}

export interface FileConvertOptions extends ConvertOptions {
  /** Prefix the CSV with a UTF-8 byte order mark; default true */
  bom?: boolean;
}

export interface ResolvedConvertOptions {
  maxUserDataDepth: number;
  malformedRecords: MalformedRecordPolicy;
  newColumnWarningThreshold: number;
  strategy: ConversionStrategy;
  signal?: AbortSignal;
  onProgress?: (p: ConvertProgress) => void;
  progressInterval: number;
}

export const DEFAULT_OPTIONS = {
  maxUserDataDepth: DEFAULT_MAX_USER_DATA_DEPTH,
  malformedRecords: 'skip',
  newColumnWarningThreshold: 64,
  strategy: 'cache',
  progressInterval: 500,
} as const satisfies Omit<ResolvedConvertOptions, 'signal' | 'onProgress'>;

function positiveInteger(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

export function resolveOptions(options: ConvertOptions = {}): ResolvedConvertOptions {
  return {
    maxUserDataDepth: positiveInteger('maxUserDataDepth', options.maxUserDataDepth, DEFAULT_OPTIONS.maxUserDataDepth),
    malformedRecords: options.malformedRecords ?? DEFAULT_OPTIONS.malformedRecords,
    newColumnWarningThreshold: positiveInteger(
      'newColumnWarningThreshold',
      options.newColumnWarningThreshold,
      DEFAULT_OPTIONS.newColumnWarningThreshold,
    ),
    strategy: options.strategy ?? DEFAULT_OPTIONS.strategy,
    signal: options.signal,
    onProgress: options.onProgress,
    progressInterval: positiveInteger('progressInterval', options.progressInterval, DEFAULT_OPTIONS.progressInterval),
  };
}
