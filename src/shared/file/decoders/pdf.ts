import { createRequire } from 'node:module';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import * as pdfjs from 'pdfjs-dist/legacy/build/pdf.mjs';
import { PdfToolError, describeError } from '../../errors';
import { getLogger } from '../../logger';
import { DECODE_TIMEOUT_MS, MAX_PDF_EXTRACTED_CHARS, MAX_PDF_PAGES, withTimeout } from '../security';

/** Read-only view of a paginated document's plain text, one entry per page. */
export interface PagedTextSource {
  readonly pageCount: number;
  getPageText(pageIndex: number): Promise<string>;
}

const logger = getLogger('pdf-text');

let runtimeBootstrapPromise: Promise<void> | null = null;
let standardFontDataUrl: string | undefined;

function resolvePdfjsFile(relativePath: string): string {
  const require = createRequire(import.meta.url);
  const packageJson = require.resolve('pdfjs-dist/package.json');
  return path.join(path.dirname(packageJson), relativePath);
}

// Standard-14 fonts are not embedded; PDF.js reads their metrics from the package's font data.
async function ensurePdfRuntimeConfigured(): Promise<void> {
  if (runtimeBootstrapPromise) {
    return runtimeBootstrapPromise;
  }

  runtimeBootstrapPromise = (async () => {
    try {
      if (!pdfjs.GlobalWorkerOptions.workerSrc) {
        pdfjs.GlobalWorkerOptions.workerSrc = pathToFileURL(resolvePdfjsFile('legacy/build/pdf.worker.mjs')).href;
      }
      standardFontDataUrl = `${resolvePdfjsFile('standard_fonts')}${path.sep}`;
    } catch (error) {
      logger.warn('PDF.js runtime bootstrap failed. Falling back to default worker resolution.', {
        reason: describeError(error)
      });
    }
  })();

  return runtimeBootstrapPromise;
}

function normalizeTokenText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export class PdfTextDocument implements PagedTextSource {
  private readonly pageTexts = new Map<number, string>();
  private extractedChars = 0;

  constructor(private readonly doc: pdfjs.PDFDocumentProxy) {}

  get pageCount(): number {
    return this.doc.numPages;
  }

  async getPageText(pageIndex: number): Promise<string> {
    const cached = this.pageTexts.get(pageIndex);
    if (cached !== undefined) {
      return cached;
    }

    if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= this.pageCount) {
      throw new RangeError(`Page index ${pageIndex} is outside 0..${this.pageCount - 1}.`);
    }

    const page = await this.doc.getPage(pageIndex + 1);
    const textContent = await page.getTextContent();
    const pageTokens: string[] = [];

    for (const item of textContent.items) {
      if (!('str' in item)) {
        continue;
      }
      const tokenText = normalizeTokenText(item.str);
      if (tokenText) {
        pageTokens.push(tokenText);
      }
    }

    const pageText = pageTokens.join(' ');
    this.extractedChars += pageText.length;
    if (this.extractedChars > MAX_PDF_EXTRACTED_CHARS) {
      throw new PdfToolError(
        'UnsupportedFormat',
        `PDF text exceeds maximum supported extraction size (${MAX_PDF_EXTRACTED_CHARS} chars).`
      );
    }

    page.cleanup();
    this.pageTexts.set(pageIndex, pageText);
    return pageText;
  }
}

/**
 * Opens `bytes` with PDF.js, hands the text view to `use`, and destroys the
 * loading task on every exit path.
 */
export async function withPdfText<T>(bytes: Uint8Array, use: (document: PdfTextDocument) => Promise<T>): Promise<T> {
  await ensurePdfRuntimeConfigured();
  // PDF.js may transfer the buffer it is given, so it gets its own copy.
  const loadingTask = pdfjs.getDocument({
    data: bytes.slice(),
    isEvalSupported: false,
    disableFontFace: true,
    useSystemFonts: false,
    standardFontDataUrl,
    verbosity: pdfjs.VerbosityLevel.ERRORS
  });

  try {
    let doc: pdfjs.PDFDocumentProxy;
    try {
      doc = await withTimeout(loadingTask.promise, DECODE_TIMEOUT_MS, 'PDF decode');
    } catch (error) {
      const code = error instanceof Error && error.name === 'PasswordException' ? 'UnsupportedFormat' : 'InvalidFormat';
      throw new PdfToolError(code, `PDF could not be read: ${describeError(error)}`, { cause: error });
    }

    if (doc.numPages > MAX_PDF_PAGES) {
      throw new PdfToolError('UnsupportedFormat', `PDF has ${doc.numPages} pages. Maximum supported is ${MAX_PDF_PAGES}.`);
    }

    return await use(new PdfTextDocument(doc));
  } finally {
    try {
      await loadingTask.destroy();
    } catch (error) {
      logger.debug('PDF.js loading task teardown failed', { reason: describeError(error) });
    }
  }
}
