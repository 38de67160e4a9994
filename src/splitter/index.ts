import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { PDFDocument } from 'pdf-lib';
import { createBoundaryRule, detectInvoiceStarts } from '../invoice/detector';
import type { BoundaryDetection } from '../invoice/detector';
import { fixedSizeBoundaries, outputFileName, partitionDocument } from '../invoice/partitioner';
import type { OutputDocument, OutputKind } from '../invoice/partitioner';
import { PdfToolError } from '../shared/errors';
import { loadPdfDocument } from '../shared/file/decoders/document';
import { withPdfText } from '../shared/file/decoders/pdf';
import { resolveSource } from '../shared/file/registry';
import type { ResolvedSource, SourceInput } from '../shared/file/types';
import { getLogger } from '../shared/logger';
import type { Logger } from '../shared/logger';

export interface SplitOptions {
  markers?: readonly string[] | null;
  /** Case-insensitive regular expression; takes precedence over markers. */
  pattern?: string | null;
  /** Fail with NoInvoicesDetected when no page after the first starts an invoice. */
  requireMultipleInvoices?: boolean;
  logger?: Logger;
}

export interface SplitOutput extends OutputDocument {
  fileName: string;
}

export interface InvoiceSplit {
  source: ResolvedSource;
  detection: BoundaryDetection;
  outputs: SplitOutput[];
}

async function loadNonEmpty(source: ResolvedSource): Promise<PDFDocument> {
  const document = await loadPdfDocument(source.bytes);
  if (document.getPageCount() === 0) {
    throw new PdfToolError('EmptyDocument', `PDF has no pages: ${source.fileName}`, {
      context: { fileName: source.fileName }
    });
  }
  return document;
}

function nameOutputs(outputs: OutputDocument[], baseName: string, kind: OutputKind): SplitOutput[] {
  return outputs.map((output) => ({ ...output, fileName: outputFileName(baseName, output.sequence, kind) }));
}

async function writeOutputs(outputs: readonly SplitOutput[], outputDirectory: string): Promise<string[]> {
  const directory = path.resolve(outputDirectory);
  await mkdir(directory, { recursive: true });

  const written: string[] = [];
  for (const output of outputs) {
    const filePath = path.join(directory, output.fileName);
    await writeFile(filePath, output.bytes);
    written.push(filePath);
  }
  return written;
}

/** Splits in memory; nothing is written. */
export async function splitInvoicesDetailed(input: SourceInput, options: SplitOptions = {}): Promise<InvoiceSplit> {
  const logger = options.logger ?? getLogger('splitter');
  // Rule errors surface before any PDF work.
  const rule = createBoundaryRule({ markers: options.markers, pattern: options.pattern });
  const source = await resolveSource(input);
  const document = await loadNonEmpty(source);

  logger.info('Detecting invoice boundaries', {
    fileName: source.fileName,
    pageCount: document.getPageCount(),
    rule: rule.kind
  });
  const detection = await withPdfText(source.bytes, (text) => detectInvoiceStarts(text, rule, logger));

  if (!detection.hasAdditionalBoundaries) {
    if (options.requireMultipleInvoices) {
      throw new PdfToolError('NoInvoicesDetected', `No invoice boundaries found after the first page of ${source.fileName}.`, {
        context: { fileName: source.fileName, rule: rule.kind }
      });
    }
    logger.info('Single invoice detected', { fileName: source.fileName });
  }

  const outputs = nameOutputs(await partitionDocument(document, detection.boundaries, logger), source.baseName, 'invoice');
  logger.info('Invoices split', { fileName: source.fileName, invoices: outputs.length });
  return { source, detection, outputs };
}

export async function splitInvoices(input: SourceInput, options: SplitOptions = {}): Promise<SplitOutput[]> {
  const { outputs } = await splitInvoicesDetailed(input, options);
  return outputs;
}

/** Writes one `{base}_invoice_{seq}.pdf` per detected invoice and returns their paths in order. */
export async function splitDocument(input: SourceInput, outputDirectory: string, options: SplitOptions = {}): Promise<string[]> {
  const outputs = await splitInvoices(input, options);
  return writeOutputs(outputs, outputDirectory);
}

export async function splitByPageCount(
  input: SourceInput,
  outputDirectory: string,
  pagesPerFile: number,
  options: Pick<SplitOptions, 'logger'> = {}
): Promise<string[]> {
  const logger = options.logger ?? getLogger('splitter');
  const source = await resolveSource(input);
  const document = await loadNonEmpty(source);
  const boundaries = fixedSizeBoundaries(document.getPageCount(), pagesPerFile);

  logger.info('Splitting by page count', { fileName: source.fileName, pagesPerFile, parts: boundaries.length });
  const outputs = nameOutputs(await partitionDocument(document, boundaries, logger), source.baseName, 'part');
  return writeOutputs(outputs, outputDirectory);
}
