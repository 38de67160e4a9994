/** Axis-aligned box in top-left page space, in points. */
export interface Rect {
	left: number;
	top: number;
	right: number;
	bottom: number;
}

/** One located occurrence of `text` on a page. */
export interface TextRegion extends Rect {
	pageIndex: number;
	text: string;
}

export type PdfEditingSupportStatus = 'ready' | 'unavailable';

export interface PdfEditingSupport {
	status: PdfEditingSupportStatus;
	objectLevelRemoval: boolean;
	message: string;
}

export interface RegionReplacement {
	region: TextRegion;
	text: string;
}

/** Where replacement text is drawn: baseline origin in top-left page space. */
export interface TextInsertion {
	pageIndex: number;
	x: number;
	y: number;
	fontSize: number;
	text: string;
}

export interface PageEditReport {
	pageIndex: number;
	regionCount: number;
	removedGlyphs: number;
	insertions: TextInsertion[];
}

/**
 * One open document. Each page may be edited at most once per session.
 * `close` releases the document and must be called on every exit path.
 */
export interface PdfEditingSession {
	readonly pageCount: number;
	locate(pageIndex: number, text: string): TextRegion[];
	applyReplacements(pageIndex: number, replacements: readonly RegionReplacement[]): Promise<PageEditReport>;
	save(): Promise<Uint8Array>;
	close(): void;
}

export interface PdfEditingEngine {
	getSupport(): PdfEditingSupport;
	open(bytes: Uint8Array): Promise<PdfEditingSession>;
}
