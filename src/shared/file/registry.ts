import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { PdfToolError } from '../errors';
import { MAX_SOURCE_SIZE_BYTES, PDF_HEADER_SEARCH_BYTES } from './security';
import type { NamedBytes, ResolvedSource, SourceInput } from './types';
import { getBaseName, getExtension, startsWithPdfHeader } from './utils';

const pdfExtensions = new Set(['.pdf']);

const DEFAULT_BYTES_FILE_NAME = 'document.pdf';

function isNamedBytes(input: SourceInput): input is NamedBytes {
  return typeof input === 'object' && !(input instanceof Uint8Array);
}

export function validateSourcePreflight(fileName: string, size: number): void {
  const extension = getExtension(fileName);
  if (!pdfExtensions.has(extension)) {
    throw new PdfToolError('InvalidFormat', `File must be a PDF: ${fileName}`, {
      context: { fileName, extension }
    });
  }

  if (size > MAX_SOURCE_SIZE_BYTES) {
    throw new PdfToolError('InvalidFormat', `File too large. Maximum size is ${MAX_SOURCE_SIZE_BYTES} bytes.`, {
      context: { fileName, size }
    });
  }
}

function assertPdfContent(bytes: Uint8Array, fileName: string): void {
  if (!startsWithPdfHeader(bytes, PDF_HEADER_SEARCH_BYTES)) {
    throw new PdfToolError('InvalidFormat', `File content is not a PDF document: ${fileName}`, {
      context: { fileName }
    });
  }
}

async function readSourceFile(filePath: string): Promise<Uint8Array> {
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new PdfToolError('NotFound', `PDF file not found: ${filePath}`, { context: { filePath } });
    }
    validateSourcePreflight(filePath, info.size);
    return new Uint8Array(await readFile(filePath));
  } catch (error) {
    if (error instanceof PdfToolError) {
      throw error;
    }
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new PdfToolError('NotFound', `PDF file not found: ${filePath}`, { cause: error, context: { filePath } });
    }
    throw error;
  }
}

export async function resolveSource(input: SourceInput): Promise<ResolvedSource> {
  if (typeof input === 'string') {
    const absolutePath = path.resolve(input);
    const bytes = await readSourceFile(absolutePath);
    const fileName = path.basename(absolutePath);
    assertPdfContent(bytes, fileName);

    return {
      format: 'pdf',
      bytes,
      fileName,
      baseName: getBaseName(fileName),
      extension: getExtension(fileName),
      directory: path.dirname(absolutePath)
    };
  }

  const { bytes, fileName } = isNamedBytes(input)
    ? input
    : { bytes: input, fileName: DEFAULT_BYTES_FILE_NAME };
  validateSourcePreflight(fileName, bytes.byteLength);
  assertPdfContent(bytes, fileName);

  return {
    format: 'pdf',
    bytes,
    fileName,
    baseName: getBaseName(fileName),
    extension: getExtension(fileName)
  };
}
