import { PdfToolError, describeError } from '../../../errors';
import { createPdfEditingEngine } from './engine';
import type { MupdfModule } from './engine';
import type { PdfEditingEngine } from './types';

export type MupdfImporter = () => Promise<MupdfModule>;

// MuPDF ships as ESM with a WASM payload, so it is only loaded when editing starts.
const importMupdf: MupdfImporter = () => import('mupdf');

let enginePromise: Promise<PdfEditingEngine> | null = null;

async function importEngine(importLibrary: MupdfImporter): Promise<PdfEditingEngine> {
	try {
		return createPdfEditingEngine(await importLibrary());
	} catch (error) {
		throw new PdfToolError('MissingCapability', `PDF layout engine could not be loaded: ${describeError(error)}`, {
			cause: error
		});
	}
}

/** Loads the MuPDF-backed editing engine once per process. */
export async function loadPdfEditingEngine(importLibrary: MupdfImporter = importMupdf): Promise<PdfEditingEngine> {
	if (importLibrary !== importMupdf) {
		return importEngine(importLibrary);
	}

	if (!enginePromise) {
		enginePromise = importEngine(importMupdf);
	}

	try {
		return await enginePromise;
	} catch (error) {
		enginePromise = null;
		throw error;
	}
}

export function requireReadyEngine(engine: PdfEditingEngine | null): PdfEditingEngine {
	if (!engine) {
		throw new PdfToolError('MissingCapability', 'No PDF layout engine is available for text replacement.');
	}

	const support = engine.getSupport();
	if (support.status !== 'ready') {
		throw new PdfToolError('MissingCapability', support.message, { context: { status: support.status } });
	}

	return engine;
}
