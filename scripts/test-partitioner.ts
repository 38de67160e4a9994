import assert from 'node:assert/strict';
import { PDFDocument } from 'pdf-lib';
import {
  fixedSizeBoundaries,
  invoiceFileName,
  outputFileName,
  partitionDocument,
  planPartition
} from '../src/invoice/partitioner';
import { isPdfToolError } from '../src/shared/errors';

async function createSizedPdf(pageCount: number): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  for (let index = 0; index < pageCount; index += 1) {
    // Widths identify pages after copying.
    pdf.addPage([300 + index, 500]);
  }
  return pdf.save();
}

async function main(): Promise<void> {
  assert.deepEqual(planPartition(6, [0, 3]), [
    { sequence: 1, startPage: 0, endPage: 3 },
    { sequence: 2, startPage: 3, endPage: 6 }
  ]);
  assert.deepEqual(planPartition(4, [0]), [{ sequence: 1, startPage: 0, endPage: 4 }]);
  assert.deepEqual(
    planPartition(5, [0, 1, 2, 3, 4]).map((range) => range.endPage - range.startPage),
    [1, 1, 1, 1, 1]
  );

  assert.throws(() => planPartition(0, [0]), (error: unknown) => isPdfToolError(error, 'EmptyDocument'));
  assert.throws(() => planPartition(5, []), RangeError);
  assert.throws(() => planPartition(5, [1, 3]), RangeError);
  assert.throws(() => planPartition(5, [0, 2, 2]), RangeError);
  assert.throws(() => planPartition(5, [0, 3, 2]), RangeError);
  assert.throws(() => planPartition(5, [0, 5]), RangeError);

  assert.deepEqual(fixedSizeBoundaries(7, 3), [0, 3, 6]);
  assert.deepEqual(fixedSizeBoundaries(2, 5), [0]);
  assert.throws(() => fixedSizeBoundaries(7, 0), RangeError);
  assert.throws(() => fixedSizeBoundaries(7, 1.5), RangeError);

  assert.equal(invoiceFileName('batch', 1), 'batch_invoice_001.pdf');
  assert.equal(invoiceFileName('batch', 1234), 'batch_invoice_1234.pdf');
  assert.equal(outputFileName('batch', 12, 'part'), 'batch_part_012.pdf');

  const outputs = await partitionDocument(await createSizedPdf(6), [0, 2, 5]);
  assert.deepEqual(outputs.map((output) => output.pageCount), [2, 3, 1]);
  assert.deepEqual(outputs.map((output) => output.sequence), [1, 2, 3]);

  const widths: number[] = [];
  for (const output of outputs) {
    const copy = await PDFDocument.load(output.bytes);
    widths.push(...copy.getPages().map((page) => page.getWidth()));
  }
  assert.deepEqual(widths, [300, 301, 302, 303, 304, 305]);

  await assert.rejects(
    partitionDocument(new Uint8Array([1, 2, 3]), [0]),
    (error: unknown) => isPdfToolError(error, 'InvalidFormat')
  );

  console.log('✅ Partitioner tests passed (21 checks).');
}

void main();
