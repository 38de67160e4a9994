import assert from 'node:assert/strict';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import JSZip from 'jszip';
import { PDFDocument } from 'pdf-lib';
import { archiveFileName, createInvoiceArchive } from '../src/invoice/archive';
import { withPdfText } from '../src/shared/file/decoders/pdf';
import { isPdfToolError } from '../src/shared/errors';
import { getLogger } from '../src/shared/logger';
import { splitByPageCount, splitDocument, splitInvoices, splitInvoicesDetailed } from '../src/splitter';
import { createEmptyPdf, createTextPdf, withTempDir } from './pdf-fixtures';

const logger = getLogger('test', { level: 'silent' });

async function pageCountOf(filePath: string): Promise<number> {
  const document = await PDFDocument.load(await readFile(filePath));
  return document.getPageCount();
}

async function main(): Promise<void> {
  const twoInvoices = await createTextPdf([
    ['Invoice No. 1001', 'Customer: Northwind'],
    'Line items continued',
    'Totals',
    ['Invoice No. 1002', 'Customer: Contoso'],
    'Line items continued',
    'Totals'
  ]);

  const pageTexts = await withPdfText(twoInvoices, async (document) => {
    const texts: string[] = [];
    for (let index = 0; index < document.pageCount; index += 1) {
      texts.push(await document.getPageText(index));
    }
    return texts;
  });
  assert.equal(pageTexts.length, 6);
  assert.match(pageTexts[3] ?? '', /Invoice No\. 1002/);

  await withTempDir(async (directory) => {
    const sourcePath = path.join(directory, 'batch.pdf');
    await writeFile(sourcePath, twoInvoices);
    const outputDirectory = path.join(directory, 'out');

    const files = await splitDocument(sourcePath, outputDirectory, { logger });
    assert.deepEqual(files, [
      path.join(outputDirectory, 'batch_invoice_001.pdf'),
      path.join(outputDirectory, 'batch_invoice_002.pdf')
    ]);
    assert.deepEqual(await Promise.all(files.map(pageCountOf)), [3, 3]);

    const archivePath = await createInvoiceArchive(files, path.join(directory, archiveFileName('batch')));
    assert.equal(archivePath, path.join(directory, 'batch_invoices.zip'));
    const zip = await JSZip.loadAsync(await readFile(archivePath));
    assert.deepEqual(Object.keys(zip.files).sort(), ['batch_invoice_001.pdf', 'batch_invoice_002.pdf']);

    const parts = await splitByPageCount(sourcePath, path.join(directory, 'parts'), 4, { logger });
    assert.deepEqual(parts.map((part) => path.basename(part)), ['batch_part_001.pdf', 'batch_part_002.pdf']);
    assert.deepEqual(await Promise.all(parts.map(pageCountOf)), [4, 2]);

    await assert.rejects(
      splitByPageCount(sourcePath, path.join(directory, 'parts'), 0, { logger }),
      RangeError
    );
    await assert.rejects(
      splitDocument(path.join(directory, 'missing.pdf'), outputDirectory, { logger }),
      (error: unknown) => isPdfToolError(error, 'NotFound')
    );
  });

  const detailed = await splitInvoicesDetailed({ bytes: twoInvoices, fileName: 'march.pdf' }, { logger });
  assert.deepEqual(detailed.detection.boundaries, [0, 3]);
  assert.deepEqual(detailed.outputs.map((output) => output.fileName), ['march_invoice_001.pdf', 'march_invoice_002.pdf']);
  assert.deepEqual(detailed.outputs.map((output) => [output.startPage, output.endPage]), [[0, 3], [3, 6]]);

  const singleInvoice = await createTextPdf(['Invoice No. 7', 'Page two', 'Page three']);
  const single = await splitInvoices(singleInvoice, { logger });
  assert.equal(single.length, 1);
  assert.equal(single[0]?.pageCount, 3);
  assert.equal(single[0]?.fileName, 'document_invoice_001.pdf');

  await assert.rejects(
    splitInvoices(singleInvoice, { requireMultipleInvoices: true, logger }),
    (error: unknown) => isPdfToolError(error, 'NoInvoicesDetected')
  );

  const patterned = await createTextPdf(['Statement INV-0001', 'Statement inv-0002', 'Notes', 'Statement INV-0003 Invoice']);
  const byPattern = await splitInvoices(patterned, { pattern: 'INV-\\d{4}', markers: ['Notes'], logger });
  assert.deepEqual(byPattern.map((output) => output.startPage), [0, 1, 3]);

  const byMarker = await splitInvoices(patterned, { markers: ['Notes'], logger });
  assert.deepEqual(byMarker.map((output) => [output.startPage, output.endPage]), [[0, 2], [2, 4]]);

  await assert.rejects(
    splitInvoices(await createEmptyPdf(), { logger }),
    (error: unknown) => isPdfToolError(error, 'EmptyDocument')
  );
  await assert.rejects(
    splitInvoices(twoInvoices, { pattern: '[unclosed', logger }),
    (error: unknown) => isPdfToolError(error, 'InvalidBoundaryRule')
  );

  console.log('✅ Split document tests passed (21 checks).');
}

void main();
