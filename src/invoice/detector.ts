import { DEFAULT_INVOICE_MARKERS, MARKER_WINDOW_CHARS } from '../shared/config';
import { PdfToolError, describeError } from '../shared/errors';
import type { PagedTextSource } from '../shared/file/decoders/pdf';
import type { Logger } from '../shared/logger';

export type BoundaryRule =
  | { kind: 'markers'; markers: readonly string[] }
  | { kind: 'pattern'; pattern: RegExp };

export interface BoundaryRuleInput {
  markers?: readonly string[] | null;
  pattern?: string | null;
}

export interface BoundaryDetection {
  /** Strictly increasing page indices; always starts with 0. */
  boundaries: number[];
  /** Pages after the first that matched the rule, with what matched. */
  matchedPages: Array<{ pageIndex: number; match: string }>;
  hasAdditionalBoundaries: boolean;
}

/** A non-empty pattern always wins over markers and is compiled as given. */
export function createBoundaryRule(input: BoundaryRuleInput = {}): BoundaryRule {
  const source = input.pattern;
  if (source !== undefined && source !== null && source.length > 0) {
    try {
      return { kind: 'pattern', pattern: new RegExp(source, 'i') };
    } catch (error) {
      throw new PdfToolError('InvalidBoundaryRule', `Invalid invoice pattern: ${describeError(error)}`, {
        cause: error,
        context: { pattern: source }
      });
    }
  }

  if (input.markers === undefined || input.markers === null) {
    return { kind: 'markers', markers: [...DEFAULT_INVOICE_MARKERS] };
  }

  const markers = input.markers.map((marker) => marker.trim()).filter((marker) => marker.length > 0);
  if (markers.length === 0) {
    throw new PdfToolError('InvalidBoundaryRule', 'At least one non-blank invoice marker is required.');
  }
  return { kind: 'markers', markers };
}

/**
 * Returns what made `text` start an invoice, or null. Markers must occur in
 * the first MARKER_WINDOW_CHARS characters, and that must be their first
 * occurrence on the page.
 */
export function matchBoundary(text: string, rule: BoundaryRule): string | null {
  if (text.length === 0) {
    return null;
  }

  if (rule.kind === 'pattern') {
    return rule.pattern.exec(text)?.[0] ?? null;
  }

  const lowered = text.toLowerCase();
  const window = lowered.slice(0, MARKER_WINDOW_CHARS);
  for (const marker of rule.markers) {
    const needle = marker.toLowerCase();
    if (window.includes(needle) && lowered.indexOf(needle) < MARKER_WINDOW_CHARS) {
      return marker;
    }
  }
  return null;
}

export function pageStartsInvoice(text: string, rule: BoundaryRule): boolean {
  return matchBoundary(text, rule) !== null;
}

export async function detectInvoiceStarts(
  document: PagedTextSource,
  rule: BoundaryRule,
  logger?: Logger
): Promise<BoundaryDetection> {
  const boundaries = [0];
  const matchedPages: BoundaryDetection['matchedPages'] = [];

  for (let pageIndex = 1; pageIndex < document.pageCount; pageIndex += 1) {
    const text = await document.getPageText(pageIndex);
    if (text.length === 0) {
      logger?.debug('Skipping page without text', { pageIndex });
      continue;
    }

    const match = matchBoundary(text, rule);
    if (match !== null) {
      boundaries.push(pageIndex);
      matchedPages.push({ pageIndex, match });
      logger?.debug('Invoice boundary', { pageIndex, match });
    }
  }

  return {
    boundaries,
    matchedPages,
    hasAdditionalBoundaries: boundaries.length > 1
  };
}
