import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

let jsZipPromise: Promise<{ default: typeof import('jszip') }> | null = null;

async function loadJsZip(): Promise<{ default: typeof import('jszip') }> {
  if (!jsZipPromise) {
    jsZipPromise = import('jszip');
  }

  return jsZipPromise;
}

export function archiveFileName(baseName: string): string {
  return `${baseName}_invoices.zip`;
}

/** Packs the given files, flat, into one ZIP and returns its absolute path. */
export async function createInvoiceArchive(files: readonly string[], archivePath: string): Promise<string> {
  const JSZipModule = await loadJsZip();
  const zip = new JSZipModule.default();
  for (const filePath of files) {
    zip.file(path.basename(filePath), await readFile(filePath));
  }

  const content = await zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
  const resolved = path.resolve(archivePath);
  await writeFile(resolved, content);
  return resolved;
}
