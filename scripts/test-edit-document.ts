import assert from 'node:assert/strict';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { PDFDocument } from 'pdf-lib';
import { countOccurrences, editDocument, editPdfBytes, editedFileName, normalizeReplacements } from '../src/editor';
import { withPdfText } from '../src/shared/file/decoders/pdf';
import { loadPdfEditingEngine } from '../src/shared/file/redaction/pdf/capability';
import type { PdfEditingEngine, PdfEditingSession, TextRegion } from '../src/shared/file/redaction/pdf/types';
import { isPdfToolError } from '../src/shared/errors';
import { getLogger } from '../src/shared/logger';
import { TEXT_X, assertClose, createFormXObjectPdf, createTextPdf, withTempDir } from './pdf-fixtures';

const quietLogger = getLogger('test', { level: 'silent' });

interface FakeCalls {
  saved: number;
  closed: number;
}

function fakeEngine(
  calls: FakeCalls,
  locate: (pageIndex: number, text: string) => TextRegion[],
  failOnPage?: number
): PdfEditingEngine {
  return {
    getSupport: () => ({ status: 'ready', objectLevelRemoval: true, message: 'test engine' }),
    open: async (): Promise<PdfEditingSession> => ({
      pageCount: 3,
      locate,
      applyReplacements: async (pageIndex, replacements) => {
        if (pageIndex === failOnPage) {
          throw new Error(`page ${pageIndex + 1} is broken`);
        }
        return { pageIndex, regionCount: replacements.length, removedGlyphs: 0, insertions: [] };
      },
      save: async () => {
        calls.saved += 1;
        return new Uint8Array();
      },
      close: () => {
        calls.closed += 1;
      }
    })
  };
}

async function main(): Promise<void> {
  assert.deepEqual(normalizeReplacements({ Acme: 'Globex', '': 'ignored' }), [['Acme', 'Globex']]);
  assert.deepEqual(normalizeReplacements(new Map([['A', 'B']])), [['A', 'B']]);
  assert.throws(() => normalizeReplacements({ '': 'x' }), (error: unknown) => isPdfToolError(error, 'InvalidReplacement'));
  assert.throws(() => normalizeReplacements({}), (error: unknown) => isPdfToolError(error, 'InvalidReplacement'));
  assert.equal(editedFileName('contract'), 'contract_edited.pdf');

  assert.equal(countOccurrences('Acme Ltd Bill to Acme', 'Acme'), 2);
  assert.equal(countOccurrences('aaaa', 'aa'), 2);
  assert.equal(countOccurrences('Order 17', 'Order  17'), 1);
  assert.equal(countOccurrences('acme', 'Acme'), 0);
  assert.equal(countOccurrences('Acme', ' '), 0);

  const engine = await loadPdfEditingEngine();

  // Page 1 has no Acme, page 2 has it twice, page 3 once.
  const threePages = await createTextPdf([
    ['Order 17', 'Terms and conditions'],
    ['Acme Ltd', 'Bill to Acme'],
    ['Signed for Acme']
  ]);

  const original = await engine.open(threePages);
  const originalAcme = original.locate(1, 'Acme');
  original.close();
  assert.equal(originalAcme.length, 2);

  const result = await editPdfBytes(threePages, { Acme: 'Globex' }, { logger: quietLogger });
  assert.equal(result.replacementCount, 3);
  assert.deepEqual(result.pages.map((page) => [page.pageIndex, page.regionCount]), [[1, 2], [2, 1]]);

  const edited = await engine.open(result.bytes);
  assert.equal(edited.pageCount, 3);
  for (let pageIndex = 0; pageIndex < 3; pageIndex += 1) {
    assert.deepEqual(edited.locate(pageIndex, 'Acme'), [], `Acme left on page ${pageIndex + 1}`);
  }
  assert.equal(edited.locate(0, 'Globex').length, 0);
  assert.equal(edited.locate(2, 'Globex').length, 1);

  const globex = edited.locate(1, 'Globex');
  assert.equal(globex.length, 2);
  originalAcme.forEach((region, index) => {
    assertClose(globex[index]?.left ?? 0, region.left, `Globex ${index + 1} left`, 0.5);
    assert(Math.abs((globex[index]?.top ?? 0) - region.top) < 3, `Globex ${index + 1} stays on its line`);
  });
  assertClose(edited.locate(0, 'Terms')[0]?.left ?? 0, TEXT_X, 'untouched page text', 0.5);
  assert.equal(edited.locate(1, 'Ltd').length, 1);
  edited.close();

  const remaining = await withPdfText(result.bytes, async (text) => {
    const counts: number[] = [];
    for (let pageIndex = 0; pageIndex < text.pageCount; pageIndex += 1) {
      counts.push(countOccurrences(await text.getPageText(pageIndex), 'Acme'));
    }
    return counts;
  });
  assert.deepEqual(remaining, [0, 0, 0]);

  const before = await PDFDocument.load(threePages);
  const after = await PDFDocument.load(result.bytes);
  assert.equal(after.getPageCount(), 3);
  assert.deepEqual(
    after.getPages().map((page) => page.getSize()),
    before.getPages().map((page) => page.getSize())
  );

  const noMatch = await editPdfBytes(threePages, { Initech: 'Globex' }, { logger: quietLogger });
  assert.equal(noMatch.replacementCount, 0);
  assert.deepEqual(noMatch.pages, []);

  const formResult = await editPdfBytes(await createFormXObjectPdf('Acme Beta'), { Acme: 'Globex' }, { logger: quietLogger });
  assert.equal(formResult.replacementCount, 1);

  await assert.rejects(
    editPdfBytes(threePages, { Acme: 'Globex' }, { capability: null, logger: quietLogger }),
    (error: unknown) => isPdfToolError(error, 'MissingCapability')
  );

  // A failure on a later page aborts before anything is saved.
  const failing: FakeCalls = { saved: 0, closed: 0 };
  const everywhere = (pageIndex: number, text: string): TextRegion[] => [
    { pageIndex, text, left: 0, top: 0, right: 10, bottom: 10 }
  ];
  await assert.rejects(
    editPdfBytes(threePages, { Acme: 'Globex' }, { capability: fakeEngine(failing, everywhere, 2), logger: quietLogger }),
    /page 3 is broken/
  );
  assert.deepEqual(failing, { saved: 0, closed: 1 });

  // Text the page shows but the engine cannot find is an error, not a silent no-op.
  const blind: FakeCalls = { saved: 0, closed: 0 };
  await assert.rejects(
    editPdfBytes(threePages, { Acme: 'Globex' }, { capability: fakeEngine(blind, () => []), logger: quietLogger }),
    (error: unknown) =>
      isPdfToolError(error, 'UnsupportedFormat')
      && error.context?.pageIndex === 1
      && error.context.expected === 2
      && error.context.located === 0
  );
  assert.deepEqual(blind, { saved: 0, closed: 1 });

  await withTempDir(async (directory) => {
    const sourcePath = path.join(directory, 'letter.pdf');
    await writeFile(sourcePath, threePages);

    const defaultOutput = await editDocument(sourcePath, { Acme: 'Globex' }, { logger: quietLogger });
    assert.equal(defaultOutput, path.join(directory, 'letter_edited.pdf'));
    const written = await engine.open(new Uint8Array(await readFile(defaultOutput)));
    assert.equal(written.locate(2, 'Globex').length, 1);
    written.close();

    const explicitOutput = path.join(directory, 'out', 'renamed.pdf');
    assert.equal(
      await editDocument(sourcePath, new Map([['Order 17', 'Order 18']]), { outputPath: explicitOutput, logger: quietLogger }),
      explicitOutput
    );

    await assert.rejects(
      editDocument(path.join(directory, 'missing.pdf'), { Acme: 'Globex' }, { logger: quietLogger }),
      (error: unknown) => isPdfToolError(error, 'NotFound')
    );
  });

  console.log('✅ Edit document tests passed (37 checks).');
}

void main();
