import { PDFDocument, StandardFonts, rgb } from 'pdf-lib';
import type { PDFFont } from 'pdf-lib';
import type * as mupdf from 'mupdf';
import { REPLACEMENT_FONT_RATIO } from '../../../config';
import { PdfToolError, describeError } from '../../../errors';
import { getLogger } from '../../../logger';
import { loadPdfDocument } from '../../decoders/document';
import type {
	PageEditReport,
	PdfEditingEngine,
	PdfEditingSession,
	PdfEditingSupport,
	Rect,
	RegionReplacement,
	TextInsertion,
	TextRegion
} from './types';

export type MupdfModule = typeof mupdf;

const PDF_EDITING_MESSAGE =
	'PDF text replacement is ready. Matched text is redacted with MuPDF before new text is drawn.';

// PDFPage.applyRedactions arguments: blank overlapping image pixels, drop line art
// the region fully covers, remove text.
const REDACT_IMAGE_PIXELS = 2;
const REDACT_LINE_ART_REMOVE_IF_COVERED = 1;
const REDACT_TEXT_REMOVE = 0;

const SAVE_OPTIONS = 'garbage,compress';

// Keeps glyphs that only touch a region's edge out of the redaction.
const REDACTION_INSET = 0.25;
const SAME_LINE_TOLERANCE = 1;

const logger = getLogger('pdf-redaction');

interface PageChar {
	c: string;
	x: number;
	y: number;
}

export function computeInsertion(region: TextRegion, text: string): TextInsertion {
	const height = region.bottom - region.top;
	const fontSize = height * REPLACEMENT_FONT_RATIO;

	return {
		pageIndex: region.pageIndex,
		x: region.left,
		y: region.bottom - (height - fontSize) / 2,
		fontSize,
		text
	};
}

function quadBounds(quad: mupdf.Quad): Rect {
	const xs = [quad[0], quad[2], quad[4], quad[6]];
	const ys = [quad[1], quad[3], quad[5], quad[7]];
	return {
		left: Math.min(...xs),
		top: Math.min(...ys),
		right: Math.max(...xs),
		bottom: Math.max(...ys)
	};
}

function unionRegion(boxes: readonly Rect[], pageIndex: number, text: string): TextRegion {
	return {
		pageIndex,
		text,
		left: Math.min(...boxes.map((box) => box.left)),
		top: Math.min(...boxes.map((box) => box.top)),
		right: Math.max(...boxes.map((box) => box.right)),
		bottom: Math.max(...boxes.map((box) => box.bottom))
	};
}

function contains(box: Rect, char: PageChar): boolean {
	return char.x >= box.left && char.x <= box.right && char.y >= box.top && char.y <= box.bottom;
}

function intersects(a: Rect, b: Rect): boolean {
	return a.left < b.right && b.left < a.right && a.top < b.bottom && b.top < a.bottom;
}

function compact(text: string): string {
	return text.replace(/\s+/g, '');
}

function readingOrder(a: TextRegion, b: TextRegion): number {
	if (Math.abs(a.top - b.top) > SAME_LINE_TOLERANCE) {
		return a.top - b.top;
	}
	return a.left - b.left;
}

function redactionRect(region: Rect): mupdf.Rect {
	const inset = Math.min(REDACTION_INSET, (region.right - region.left) / 4);
	return [region.left + inset, region.top, region.right - inset, region.bottom];
}

function assertEncodable(font: PDFFont, text: string): void {
	try {
		font.encodeText(text);
	} catch (error) {
		throw new PdfToolError('InvalidReplacement', `Replacement text cannot be drawn with ${font.name}: ${describeError(error)}`, {
			cause: error,
			context: { text }
		});
	}
}

class MupdfEditingSession implements PdfEditingSession {
	private readonly pages = new Map<number, mupdf.PDFPage>();
	private readonly chars = new Map<number, PageChar[]>();
	private readonly editedPages = new Set<number>();
	private readonly insertions: TextInsertion[] = [];
	private closed = false;

	constructor(
		private readonly document: mupdf.PDFDocument,
		private readonly measureFont: PDFFont
	) {}

	get pageCount(): number {
		return this.document.countPages();
	}

	locate(pageIndex: number, text: string): TextRegion[] {
		if (this.editedPages.has(pageIndex)) {
			throw new Error(`Page ${pageIndex + 1} was already edited in this session.`);
		}
		return this.search(pageIndex, text);
	}

	async applyReplacements(pageIndex: number, replacements: readonly RegionReplacement[]): Promise<PageEditReport> {
		if (this.editedPages.has(pageIndex)) {
			throw new Error(`Page ${pageIndex + 1} was already edited in this session.`);
		}

		// Insertion geometry comes from the regions as located, before any removal.
		const insertions = replacements.map(({ region, text }) => computeInsertion(region, text));
		for (const insertion of insertions) {
			assertEncodable(this.measureFont, insertion.text);
		}

		const regions = replacements.map(({ region }) => region);
		const removedGlyphs = this.pageChars(pageIndex)
			.filter((char) => regions.some((region) => contains(region, char)))
			.length;

		const page = this.page(pageIndex);
		for (const region of regions) {
			page.createAnnotation('Redact').setRect(redactionRect(region));
		}
		page.applyRedactions(false, REDACT_IMAGE_PIXELS, REDACT_LINE_ART_REMOVE_IF_COVERED, REDACT_TEXT_REMOVE);
		this.chars.delete(pageIndex);
		this.editedPages.add(pageIndex);

		this.assertRemoved(pageIndex, regions);
		this.insertions.push(...insertions);

		logger.debug('Page edited', { pageIndex, regions: replacements.length, removedGlyphs });
		return { pageIndex, regionCount: replacements.length, removedGlyphs, insertions };
	}

	async save(): Promise<Uint8Array> {
		const buffer = this.document.saveToBuffer(SAVE_OPTIONS);
		let redacted: Uint8Array;
		try {
			redacted = buffer.asUint8Array().slice();
		} finally {
			buffer.destroy();
		}

		const output = await loadPdfDocument(redacted);
		const font = await output.embedFont(StandardFonts.Helvetica);
		for (const insertion of this.insertions) {
			if (insertion.text.length === 0) {
				continue;
			}
			const page = output.getPage(insertion.pageIndex);
			const box = page.getCropBox();
			page.drawText(insertion.text, {
				x: box.x + insertion.x,
				y: box.y + box.height - insertion.y,
				size: insertion.fontSize,
				font,
				color: rgb(0, 0, 0)
			});
		}
		return output.save();
	}

	close(): void {
		if (this.closed) {
			return;
		}
		this.closed = true;
		for (const page of this.pages.values()) {
			page.destroy();
		}
		this.pages.clear();
		this.document.destroy();
	}

	private page(pageIndex: number): mupdf.PDFPage {
		if (this.closed) {
			throw new Error('PDF editing session is closed.');
		}
		if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= this.pageCount) {
			throw new RangeError(`Page index ${pageIndex} is outside 0..${this.pageCount - 1}.`);
		}

		const cached = this.pages.get(pageIndex);
		if (cached) {
			return cached;
		}
		const page = this.document.loadPage(pageIndex);
		this.pages.set(pageIndex, page);
		return page;
	}

	private pageChars(pageIndex: number): PageChar[] {
		const cached = this.chars.get(pageIndex);
		if (cached) {
			return cached;
		}

		const chars: PageChar[] = [];
		const text = this.page(pageIndex).toStructuredText('preserve-whitespace');
		try {
			text.walk({
				onChar(c, _origin, _font, _size, quad) {
					const box = quadBounds(quad);
					chars.push({ c, x: (box.left + box.right) / 2, y: (box.top + box.bottom) / 2 });
				}
			});
		} finally {
			text.destroy();
		}

		this.chars.set(pageIndex, chars);
		return chars;
	}

	// Page search ignores case, so each hit is checked against the characters it covers.
	private search(pageIndex: number, text: string): TextRegion[] {
		const wanted = compact(text);
		if (wanted.length === 0) {
			return [];
		}

		const chars = this.pageChars(pageIndex);
		const regions: TextRegion[] = [];
		for (const hit of this.page(pageIndex).search(text)) {
			const boxes = hit.map(quadBounds);
			if (boxes.length === 0) {
				continue;
			}
			const covered = chars
				.filter((char) => boxes.some((box) => contains(box, char)))
				.map((char) => char.c)
				.join('');
			if (compact(covered) === wanted) {
				regions.push(unionRegion(boxes, pageIndex, text));
			}
		}
		return regions.sort(readingOrder);
	}

	private assertRemoved(pageIndex: number, regions: readonly TextRegion[]): void {
		for (const text of new Set(regions.map((region) => region.text))) {
			const remaining = this.search(pageIndex, text).filter((hit) => regions.some((region) => intersects(region, hit)));
			if (remaining.length > 0) {
				throw new PdfToolError('UnsupportedFormat', `Page ${pageIndex + 1} still shows "${text}" after redaction.`, {
					context: { pageIndex, text, remaining: remaining.length }
				});
			}
		}
	}
}

/** Validates `bytes`, then opens them with MuPDF for search and redaction. */
export async function openEditablePdf(lib: MupdfModule, bytes: Uint8Array): Promise<PdfEditingSession> {
	await loadPdfDocument(bytes);

	let opened: mupdf.Document;
	try {
		opened = lib.Document.openDocument(bytes, 'application/pdf');
	} catch (error) {
		throw new PdfToolError('InvalidFormat', `PDF could not be opened for editing: ${describeError(error)}`, { cause: error });
	}

	const document = opened.asPDF();
	if (!document) {
		opened.destroy();
		throw new PdfToolError('UnsupportedFormat', 'Document is not an editable PDF.');
	}

	// Only used to reject replacement text the drawing font cannot encode.
	const scratch = await PDFDocument.create();
	const measureFont = await scratch.embedFont(StandardFonts.Helvetica);
	return new MupdfEditingSession(document, measureFont);
}

class MupdfEditingEngine implements PdfEditingEngine {
	constructor(private readonly lib: MupdfModule) {}

	getSupport(): PdfEditingSupport {
		return {
			status: 'ready',
			objectLevelRemoval: true,
			message: PDF_EDITING_MESSAGE
		};
	}

	open(bytes: Uint8Array): Promise<PdfEditingSession> {
		return openEditablePdf(this.lib, bytes);
	}
}

export function createPdfEditingEngine(lib: MupdfModule): PdfEditingEngine {
	return new MupdfEditingEngine(lib);
}

export function getPdfEditingSupportMessage(): string {
	return PDF_EDITING_MESSAGE;
}
