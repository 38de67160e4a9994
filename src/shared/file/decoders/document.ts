import { EncryptedPDFError, PDFDocument } from 'pdf-lib';
import { PdfToolError, describeError } from '../../errors';
import { DECODE_TIMEOUT_MS, MAX_PDF_PAGES, withTimeout } from '../security';

/** Loads `bytes` with pdf-lib for page copying or content editing. */
export async function loadPdfDocument(bytes: Uint8Array): Promise<PDFDocument> {
	let document: PDFDocument;
	let pageCount: number;
	try {
		document = await withTimeout(PDFDocument.load(bytes, { updateMetadata: false }), DECODE_TIMEOUT_MS, 'PDF load');
		// A document without a usable catalog only fails once its pages are read.
		pageCount = document.getPageCount();
	} catch (error) {
		if (error instanceof EncryptedPDFError) {
			throw new PdfToolError('UnsupportedFormat', 'Encrypted PDFs are not supported.', { cause: error });
		}
		throw new PdfToolError('InvalidFormat', `PDF could not be loaded: ${describeError(error)}`, { cause: error });
	}

	if (pageCount > MAX_PDF_PAGES) {
		throw new PdfToolError('UnsupportedFormat', `PDF has ${pageCount} pages. Maximum supported is ${MAX_PDF_PAGES}.`);
	}
	return document;
}
