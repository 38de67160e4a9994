export { splitByPageCount, splitDocument, splitInvoices, splitInvoicesDetailed } from './splitter';
export type { InvoiceSplit, SplitOptions, SplitOutput } from './splitter';
export { countOccurrences, editDocument, editPdfBytes, editedFileName, normalizeReplacements } from './editor';
export type { EditDocumentOptions, EditOptions, EditResult, ReplacementSet } from './editor';
export { createBoundaryRule, detectInvoiceStarts, matchBoundary, pageStartsInvoice } from './invoice/detector';
export type { BoundaryDetection, BoundaryRule, BoundaryRuleInput } from './invoice/detector';
export { fixedSizeBoundaries, invoiceFileName, outputFileName, partitionDocument, planPartition } from './invoice/partitioner';
export type { OutputDocument, OutputKind, PageRange } from './invoice/partitioner';
export { archiveFileName, createInvoiceArchive } from './invoice/archive';
export { createPdfEditingEngine, computeInsertion } from './shared/file/redaction/pdf/engine';
export { loadPdfEditingEngine, requireReadyEngine } from './shared/file/redaction/pdf/capability';
export type { MupdfImporter } from './shared/file/redaction/pdf/capability';
export type { MupdfModule } from './shared/file/redaction/pdf/engine';
export type {
  PageEditReport,
  PdfEditingEngine,
  PdfEditingSession,
  PdfEditingSupport,
  Rect,
  RegionReplacement,
  TextInsertion,
  TextRegion
} from './shared/file/redaction/pdf/types';
export { resolveSource } from './shared/file/registry';
export type { NamedBytes, ResolvedSource, SourceInput } from './shared/file/types';
export { PdfToolError, isPdfToolError } from './shared/errors';
export type { PdfToolErrorCode } from './shared/errors';
export { DEFAULT_INVOICE_MARKERS, loadConfig } from './shared/config';
export type { ToolConfig } from './shared/config';
export { getLogger } from './shared/logger';
export type { LogFormat, LogLevel, Logger } from './shared/logger';
