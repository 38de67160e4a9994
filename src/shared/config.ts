import { parseLogFormat, parseLogLevel } from './logger';
import type { LogFormat, LogLevel } from './logger';

export const DEFAULT_INVOICE_MARKERS: readonly string[] = [
  'Faktura',
  'Invoice',
  'Faktura br.',
  'Invoice No.',
  'Račun',
  'Bill'
];

/** Markers only count when they first occur within this many characters of the page text. */
export const MARKER_WINDOW_CHARS = 500;

export const REPLACEMENT_FONT_RATIO = 0.8;

export const DEFAULT_OUTPUT_DIRECTORY = 'output';

export const MARKER_LIST_SEPARATOR = '|';

export interface ToolConfig {
  logLevel: LogLevel;
  logFormat: LogFormat;
  outputDirectory: string;
  invoiceMarkers: string[] | null;
  invoicePattern: string | null;
}

export function parseMarkerList(value: string | undefined): string[] | null {
  if (value === undefined || value.trim() === '') {
    return null;
  }

  return value
    .split(MARKER_LIST_SEPARATOR)
    .map((marker) => marker.trim())
    .filter((marker) => marker.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ToolConfig {
  const pattern = env.INVOICE_PATTERN?.trim();

  return {
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logFormat: parseLogFormat(env.LOG_FORMAT),
    outputDirectory: env.SPLIT_OUTPUT_DIR?.trim() || DEFAULT_OUTPUT_DIRECTORY,
    invoiceMarkers: parseMarkerList(env.INVOICE_MARKERS),
    invoicePattern: pattern ? pattern : null
  };
}
