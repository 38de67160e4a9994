import assert from 'node:assert/strict';
import {
  createBoundaryRule,
  detectInvoiceStarts,
  matchBoundary,
  pageStartsInvoice
} from '../src/invoice/detector';
import type { PagedTextSource } from '../src/shared/file/decoders/pdf';
import { DEFAULT_INVOICE_MARKERS } from '../src/shared/config';
import { isPdfToolError } from '../src/shared/errors';

function textSource(pages: readonly string[]): PagedTextSource & { reads: number[] } {
  const reads: number[] = [];
  return {
    reads,
    pageCount: pages.length,
    async getPageText(pageIndex) {
      reads.push(pageIndex);
      return pages[pageIndex] ?? '';
    }
  };
}

async function main(): Promise<void> {
  const defaults = createBoundaryRule();
  assert.deepEqual(defaults, { kind: 'markers', markers: [...DEFAULT_INVOICE_MARKERS] });
  assert.deepEqual(createBoundaryRule({ markers: ['  Rechnung ', ' '] }), { kind: 'markers', markers: ['Rechnung'] });

  const patternRule = createBoundaryRule({ markers: ['Rechnung'], pattern: 'INV-\\d{4}' });
  assert.equal(patternRule.kind, 'pattern');
  assert.equal(pageStartsInvoice('Reference inv-2024 attached', patternRule), true);
  assert.equal(pageStartsInvoice('Rechnung 5', patternRule), false);

  // Patterns are compiled as given; only an empty one falls back to markers.
  const spacedRule = createBoundaryRule({ pattern: ' INV ' });
  assert(spacedRule.kind === 'pattern');
  assert.equal(spacedRule.pattern.source, ' INV ');
  assert.equal(pageStartsInvoice('Ref INV 7', spacedRule), true);
  assert.equal(pageStartsInvoice('INVOICE', spacedRule), false);
  assert.deepEqual(createBoundaryRule({ markers: ['Rechnung'], pattern: '' }), { kind: 'markers', markers: ['Rechnung'] });

  assert.throws(() => createBoundaryRule({ pattern: '(' }), (error: unknown) => isPdfToolError(error, 'InvalidBoundaryRule'));
  assert.throws(() => createBoundaryRule({ markers: [] }), (error: unknown) => isPdfToolError(error, 'InvalidBoundaryRule'));
  assert.throws(() => createBoundaryRule({ markers: ['', '   '] }), (error: unknown) => isPdfToolError(error, 'InvalidBoundaryRule'));

  assert.equal(matchBoundary('INVOICE No. 7', defaults), 'Invoice');
  assert.equal(matchBoundary('Faktura br. 12', defaults), 'Faktura');
  assert.equal(matchBoundary('Račun 3', defaults), 'Račun');
  assert.equal(matchBoundary('', defaults), null);
  assert.equal(matchBoundary('Delivery note', defaults), null);

  // The marker has to sit entirely inside the first 500 characters.
  assert.equal(matchBoundary(`${'x'.repeat(480)} Invoice`, defaults), 'Invoice');
  assert.equal(matchBoundary(`${'x'.repeat(495)}Invoice`, defaults), null);
  assert.equal(matchBoundary(`${'x'.repeat(600)} Invoice`, defaults), null);
  assert.equal(matchBoundary(`${'x'.repeat(600)} invoice`, createBoundaryRule({ pattern: 'invoice' })), 'invoice');

  const source = textSource(['Invoice 1', 'Line items', '', 'Invoice 2', 'Faktura 3', 'Totals']);
  const detection = await detectInvoiceStarts(source, defaults);
  assert.deepEqual(detection.boundaries, [0, 3, 4]);
  assert.deepEqual(detection.matchedPages, [
    { pageIndex: 3, match: 'Invoice' },
    { pageIndex: 4, match: 'Faktura' }
  ]);
  assert.equal(detection.hasAdditionalBoundaries, true);
  assert.deepEqual(source.reads, [1, 2, 3, 4, 5]);

  const again = await detectInvoiceStarts(textSource(['Invoice 1', 'Line items', '', 'Invoice 2', 'Faktura 3', 'Totals']), defaults);
  assert.deepEqual(again, detection);

  const single = await detectInvoiceStarts(textSource(['Invoice 1', 'page two', 'page three']), defaults);
  assert.deepEqual(single.boundaries, [0]);
  assert.equal(single.hasAdditionalBoundaries, false);

  const onePage = await detectInvoiceStarts(textSource(['Invoice 1']), defaults);
  assert.deepEqual(onePage.boundaries, [0]);

  console.log('✅ Boundary detector tests passed (30 checks).');
}

void main();
