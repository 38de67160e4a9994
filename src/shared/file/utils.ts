import path from 'node:path';

export function getExtension(fileName: string): string {
  const lowered = fileName.toLowerCase();
  const index = lowered.lastIndexOf('.');
  if (index < 0 || index < lowered.lastIndexOf('/')) {
    return '';
  }
  return lowered.slice(index);
}

export function getBaseName(fileName: string): string {
  return path.basename(fileName, path.extname(fileName));
}

export function padSequence(sequence: number, width = 3): string {
  return String(sequence).padStart(width, '0');
}

export function startsWithPdfHeader(bytes: Uint8Array, searchLimit: number): boolean {
  const limit = Math.min(bytes.length - 5, searchLimit);
  for (let offset = 0; offset <= limit; offset += 1) {
    if (
      bytes[offset] === 0x25
      && bytes[offset + 1] === 0x50
      && bytes[offset + 2] === 0x44
      && bytes[offset + 3] === 0x46
      && bytes[offset + 4] === 0x2d
    ) {
      return true;
    }
  }
  return false;
}
