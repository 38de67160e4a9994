import assert from 'node:assert/strict';
import { PDFDocument } from 'pdf-lib';
import { loadPdfEditingEngine, requireReadyEngine } from '../src/shared/file/redaction/pdf/capability';
import { computeInsertion, getPdfEditingSupportMessage } from '../src/shared/file/redaction/pdf/engine';
import type { PdfEditingEngine } from '../src/shared/file/redaction/pdf/types';
import { isPdfToolError } from '../src/shared/errors';
import {
  PAGE_HEIGHT,
  TEXT_X,
  TEXT_Y,
  assertClose,
  createDifferencesPdf,
  createFormXObjectPdf,
  createTextPdf
} from './pdf-fixtures';

// Text drawn at TEXT_Y from the bottom has its baseline here in top-left page space.
const BASELINE = PAGE_HEIGHT - TEXT_Y;

async function main(): Promise<void> {
  const engine = await loadPdfEditingEngine();
  const support = engine.getSupport();
  assert.equal(support.status, 'ready');
  assert.equal(support.objectLevelRemoval, true);
  assert.equal(support.message, getPdfEditingSupportMessage());
  assert.equal(await loadPdfEditingEngine(), engine);

  await assert.rejects(
    loadPdfEditingEngine(() => Promise.reject(new Error('mupdf is not installed'))),
    (error: unknown) => isPdfToolError(error, 'MissingCapability') && /mupdf is not installed/.test(error.message)
  );

  assert.throws(() => requireReadyEngine(null), (error: unknown) => isPdfToolError(error, 'MissingCapability'));
  const unavailable: PdfEditingEngine = {
    getSupport: () => ({ status: 'unavailable', objectLevelRemoval: false, message: 'Layout engine disabled.' }),
    open: () => Promise.reject(new Error('not reachable'))
  };
  assert.throws(() => requireReadyEngine(unavailable), (error: unknown) => isPdfToolError(error, 'MissingCapability'));

  const insertion = computeInsertion({ pageIndex: 2, text: 'Acme', left: 10, top: 20, right: 60, bottom: 30 }, 'Globex');
  assert.equal(insertion.pageIndex, 2);
  assert.equal(insertion.x, 10);
  assertClose(insertion.fontSize, 8, 'insertion font size', 1e-9);
  assertClose(insertion.y, 29, 'insertion baseline', 1e-9);

  const session = await engine.open(await createTextPdf(['Acme Beta']));
  assert.equal(session.pageCount, 1);

  const [acme] = session.locate(0, 'Acme');
  assert(acme, 'Expected Acme to be located');
  assert.equal(acme.text, 'Acme');
  assertClose(acme.left, TEXT_X, 'Acme left', 0.5);
  assert(acme.top < BASELINE && acme.bottom > BASELINE, 'Acme box spans its baseline');
  assert.deepEqual(session.locate(0, 'acme'), []);
  assert.deepEqual(session.locate(0, 'ACME BETA'), []);

  const [beta] = session.locate(0, 'Beta');
  assert(beta, 'Expected Beta to be located');
  assert(beta.left > acme.right, 'Beta follows Acme');

  // Both keys are located before anything is removed, so the inserted "Beta" is not replaced again.
  const report = await session.applyReplacements(0, [
    { region: acme, text: 'Beta' },
    { region: beta, text: 'Gamma' }
  ]);
  assert.equal(report.regionCount, 2);
  assert.equal(report.removedGlyphs, 8);
  assert.deepEqual(report.insertions[0], computeInsertion(acme, 'Beta'));
  assert.throws(() => session.locate(0, 'Beta'), /already edited/);

  const edited = await session.save();
  session.close();
  const reopened = await engine.open(edited);
  assert.deepEqual(reopened.locate(0, 'Acme'), []);

  const insertedBeta = reopened.locate(0, 'Beta');
  assert.equal(insertedBeta.length, 1);
  assertClose(insertedBeta[0]?.left ?? 0, TEXT_X, 'inserted Beta left', 0.5);

  const [gamma] = reopened.locate(0, 'Gamma');
  assert(gamma, 'Expected Gamma to be drawn');
  assertClose(gamma.left, beta.left, 'Gamma left', 0.5);
  reopened.close();

  const partial = await engine.open(await createTextPdf(['Acme Beta']));
  const [partialAcme] = partial.locate(0, 'Acme');
  assert(partialAcme);
  await partial.applyReplacements(0, [{ region: partialAcme, text: '' }]);
  const afterPartial = await engine.open(await partial.save());
  partial.close();
  assert.deepEqual(afterPartial.locate(0, 'Acme'), []);
  const [keptBeta] = afterPartial.locate(0, 'Beta');
  assert(keptBeta, 'Expected untouched glyphs to survive');
  assertClose(keptBeta.left, beta.left, 'Beta keeps its position', 0.5);
  assertClose(keptBeta.top, beta.top, 'Beta keeps its line', 0.5);
  afterPartial.close();

  // Text inside a form XObject is found and removed like page content.
  const form = await engine.open(await createFormXObjectPdf('Acme Beta'));
  const [formAcme] = form.locate(0, 'Acme');
  assert(formAcme, 'Expected Acme inside the form XObject to be located');
  assertClose(formAcme.left, TEXT_X, 'form XObject Acme left', 0.5);
  await form.applyReplacements(0, [{ region: formAcme, text: 'Globex' }]);
  const formEdited = await engine.open(await form.save());
  form.close();
  assert.deepEqual(formEdited.locate(0, 'Acme'), []);
  assert.equal(formEdited.locate(0, 'Globex').length, 1);
  assert.equal(formEdited.locate(0, 'Beta').length, 1);
  formEdited.close();

  // Glyph names from an encoding's Differences array resolve to their characters.
  const differences = await engine.open(await createDifferencesPdf());
  const [racun] = differences.locate(0, 'Račun');
  assert(racun, 'Expected Račun to be located');
  assertClose(racun.left, TEXT_X, 'Račun left', 0.5);
  await differences.applyReplacements(0, [{ region: racun, text: 'Invoice' }]);
  const differencesEdited = await engine.open(await differences.save());
  differences.close();
  assert.deepEqual(differencesEdited.locate(0, 'Račun'), []);
  assert.equal(differencesEdited.locate(0, 'Invoice').length, 1);
  assert.equal(differencesEdited.locate(0, '42').length, 1);
  differencesEdited.close();

  const unencodable = await engine.open(await createTextPdf(['Acme']));
  const [target] = unencodable.locate(0, 'Acme');
  assert(target);
  await assert.rejects(
    unencodable.applyReplacements(0, [{ region: target, text: '漢字' }]),
    (error: unknown) => isPdfToolError(error, 'InvalidReplacement')
  );
  assert.equal(unencodable.locate(0, 'Acme').length, 1);
  unencodable.close();

  const corrupt = new TextEncoder().encode('%PDF-1.7\nnot really a pdf');
  await assert.rejects(engine.open(corrupt), (error: unknown) => isPdfToolError(error, 'InvalidFormat'));

  const blank = await PDFDocument.create();
  blank.addPage([200, 200]);
  const blankSession = await engine.open(await blank.save());
  assert.deepEqual(blankSession.locate(0, 'Acme'), []);
  assert.throws(() => blankSession.locate(3, 'Acme'), RangeError);
  blankSession.close();
  assert.throws(() => blankSession.locate(0, 'Acme'), /closed/);

  console.log('✅ PDF redaction engine tests passed (45 checks).');
}

void main();
