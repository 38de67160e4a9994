export const DECODE_TIMEOUT_MS = 30_000;
export const MAX_SOURCE_SIZE_BYTES = 200 * 1024 * 1024;
export const MAX_PDF_PAGES = 5_000;
export const MAX_PDF_EXTRACTED_CHARS = 20_000_000;
/** The %PDF- signature may be preceded by junk bytes; readers accept it within the first kilobyte. */
export const PDF_HEADER_SEARCH_BYTES = 1024;

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
	let timer: ReturnType<typeof setTimeout> | null = null;

	const timeoutPromise = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			reject(new Error(`${label} timed out after ${timeoutMs}ms.`));
		}, timeoutMs);
	});

	try {
		return await Promise.race([promise, timeoutPromise]);
	} finally {
		if (timer) {
			clearTimeout(timer);
		}
	}
}
