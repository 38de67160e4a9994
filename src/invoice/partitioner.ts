import { PDFDocument } from 'pdf-lib';
import { PdfToolError } from '../shared/errors';
import { loadPdfDocument } from '../shared/file/decoders/document';
import { padSequence } from '../shared/file/utils';
import type { Logger } from '../shared/logger';

export interface PageRange {
  /** 1-based position among the outputs. */
  sequence: number;
  startPage: number;
  /** Exclusive. */
  endPage: number;
}

export interface OutputDocument extends PageRange {
  pageCount: number;
  bytes: Uint8Array;
}

export type OutputKind = 'invoice' | 'part';

export function outputFileName(baseName: string, sequence: number, kind: OutputKind = 'invoice'): string {
  return `${baseName}_${kind}_${padSequence(sequence)}.pdf`;
}

export function invoiceFileName(baseName: string, sequence: number): string {
  return outputFileName(baseName, sequence, 'invoice');
}

/**
 * Turns a boundary list into contiguous page ranges that cover
 * `[0, pageCount)` exactly once.
 */
export function planPartition(pageCount: number, boundaries: readonly number[]): PageRange[] {
  if (pageCount === 0) {
    throw new PdfToolError('EmptyDocument', 'PDF has no pages.');
  }
  if (!Number.isInteger(pageCount) || pageCount < 0) {
    throw new RangeError(`Invalid page count: ${pageCount}`);
  }
  if (boundaries.length === 0) {
    throw new RangeError('Boundary list must not be empty.');
  }
  if (boundaries[0] !== 0) {
    throw new RangeError(`First boundary must be 0, got ${boundaries[0]}.`);
  }

  boundaries.forEach((boundary, index) => {
    if (!Number.isInteger(boundary) || boundary < 0 || boundary >= pageCount) {
      throw new RangeError(`Boundary ${boundary} is outside 0..${pageCount - 1}.`);
    }
    const previous = boundaries[index - 1];
    if (previous !== undefined && boundary <= previous) {
      throw new RangeError(`Boundaries must be strictly increasing: ${previous} then ${boundary}.`);
    }
  });

  const edges = [...boundaries, pageCount];
  return boundaries.map((startPage, index) => ({
    sequence: index + 1,
    startPage,
    endPage: edges[index + 1] ?? pageCount
  }));
}

export function fixedSizeBoundaries(pageCount: number, pagesPerFile: number): number[] {
  if (!Number.isInteger(pagesPerFile) || pagesPerFile < 1) {
    throw new RangeError(`Pages per file must be a positive integer, got ${pagesPerFile}.`);
  }

  const boundaries: number[] = [];
  for (let page = 0; page < pageCount; page += pagesPerFile) {
    boundaries.push(page);
  }
  return boundaries;
}

export async function partitionDocument(
  source: Uint8Array | PDFDocument,
  boundaries: readonly number[],
  logger?: Logger
): Promise<OutputDocument[]> {
  const document = source instanceof PDFDocument ? source : await loadPdfDocument(source);
  const ranges = planPartition(document.getPageCount(), boundaries);
  const outputs: OutputDocument[] = [];

  for (const range of ranges) {
    const output = await PDFDocument.create();
    const indices = Array.from({ length: range.endPage - range.startPage }, (_, offset) => range.startPage + offset);
    const pages = await output.copyPages(document, indices);
    for (const page of pages) {
      output.addPage(page);
    }

    const bytes = await output.save();
    outputs.push({ ...range, pageCount: indices.length, bytes });
    logger?.debug('Output document built', { sequence: range.sequence, startPage: range.startPage, endPage: range.endPage });
  }

  return outputs;
}
