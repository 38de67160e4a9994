import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { PDFDocument, PDFName, StandardFonts } from 'pdf-lib';

export const PAGE_WIDTH = 400;
export const PAGE_HEIGHT = 800;
export const TEXT_X = 50;
export const TEXT_Y = 700;
export const TEXT_SIZE = 12;

/** One page per entry; each line is drawn 20pt below the previous one. */
export async function createTextPdf(pages: ReadonlyArray<string | readonly string[]>): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  const font = await pdf.embedFont(StandardFonts.Helvetica);

  for (const content of pages) {
    const page = pdf.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    const lines = typeof content === 'string' ? [content] : content;
    lines.forEach((line, index) => {
      if (line.length > 0) {
        page.drawText(line, { x: TEXT_X, y: TEXT_Y - index * 20, size: TEXT_SIZE, font });
      }
    });
  }

  return pdf.save();
}

/** One page whose only text sits inside a form XObject. */
export async function createFormXObjectPdf(text: string): Promise<Uint8Array> {
  const inner = await PDFDocument.create();
  const font = await inner.embedFont(StandardFonts.Helvetica);
  inner.addPage([PAGE_WIDTH, PAGE_HEIGHT]).drawText(text, { x: TEXT_X, y: TEXT_Y, size: TEXT_SIZE, font });

  const pdf = await PDFDocument.create();
  const [form] = await pdf.embedPdf(inner);
  pdf.addPage([PAGE_WIDTH, PAGE_HEIGHT]).drawPage(form);
  return pdf.save();
}

/** One line, "Račun 42", shown through a simple font whose Differences map code 129 to /ccaron. */
export async function createDifferencesPdf(): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  const page = pdf.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
  const { context } = pdf;

  const font = context.register(context.obj({
    Type: 'Font',
    Subtype: 'Type1',
    BaseFont: 'Helvetica',
    Encoding: { Type: 'Encoding', BaseEncoding: 'WinAnsiEncoding', Differences: [129, 'ccaron'] }
  }));
  page.node.setFontDictionary(PDFName.of('F1'), font);
  const content = `BT /F1 ${TEXT_SIZE} Tf ${TEXT_X} ${TEXT_Y} Td (Ra\\201un 42) Tj ET`;
  page.node.addContentStream(context.register(context.stream(content)));
  return pdf.save();
}

export async function createEmptyPdf(): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  return pdf.save({ addDefaultPage: false });
}

export async function withTempDir<T>(use: (directory: string) => Promise<T>): Promise<T> {
  const directory = await mkdtemp(path.join(os.tmpdir(), 'pdf-invoice-toolkit-'));
  try {
    return await use(directory);
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
}

export function assertClose(actual: number, expected: number, label: string, tolerance = 0.01): void {
  if (Math.abs(actual - expected) > tolerance) {
    throw new Error(`${label}: expected ${expected} ± ${tolerance}, got ${actual}`);
  }
}
