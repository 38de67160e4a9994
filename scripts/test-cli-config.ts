import assert from 'node:assert/strict';
import { readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { CliUsageError, USAGE, parseCliArguments, runCli } from '../src/cli/run';
import { DEFAULT_OUTPUT_DIRECTORY, loadConfig, parseMarkerList } from '../src/shared/config';
import { PdfToolError } from '../src/shared/errors';
import { formatLogLine, getLogger, parseLogFormat, parseLogLevel } from '../src/shared/logger';
import { createTextPdf, withTempDir } from './pdf-fixtures';

async function main(): Promise<void> {
  assert.deepEqual(parseMarkerList(' Invoice | Bill ||'), ['Invoice', 'Bill']);
  assert.equal(parseMarkerList('  '), null);
  assert.equal(parseMarkerList(undefined), null);

  assert.deepEqual(loadConfig({}), {
    logLevel: 'info',
    logFormat: 'pretty',
    outputDirectory: DEFAULT_OUTPUT_DIRECTORY,
    invoiceMarkers: null,
    invoicePattern: null
  });
  assert.deepEqual(
    loadConfig({
      LOG_LEVEL: 'DEBUG',
      LOG_FORMAT: 'json',
      SPLIT_OUTPUT_DIR: 'invoices',
      INVOICE_MARKERS: 'Rechnung|Factura',
      INVOICE_PATTERN: ' INV-\\d+ '
    }),
    {
      logLevel: 'debug',
      logFormat: 'json',
      outputDirectory: 'invoices',
      invoiceMarkers: ['Rechnung', 'Factura'],
      invoicePattern: 'INV-\\d+'
    }
  );

  assert.equal(parseLogLevel('verbose'), 'info');
  assert.equal(parseLogFormat('xml', 'json'), 'json');
  assert.equal(
    formatLogLine('pretty', 'info', 'Done', { service: 'cli', files: 2 }, '2024-01-01T00:00:00.000Z'),
    '[2024-01-01T00:00:00.000Z] INFO cli - Done {"files":2}'
  );
  assert.equal(
    formatLogLine('json', 'warn', 'Slow page', { pageIndex: 3 }, '2024-01-01T00:00:00.000Z'),
    '{"ts":"2024-01-01T00:00:00.000Z","level":"warn","msg":"Slow page","pageIndex":3}'
  );

  const lines: string[] = [];
  const logger = getLogger('splitter', { level: 'warn', format: 'json', sink: (line) => lines.push(line) });
  logger.info('hidden');
  logger.child({ fileName: 'a.pdf' }).warn('shown');
  assert.equal(lines.length, 1);
  const [entry] = lines;
  assert.match(entry ?? '', /"service":"splitter","fileName":"a.pdf"/);

  const error = new PdfToolError('NotFound', 'PDF file not found: x.pdf', { context: { filePath: 'x.pdf' } });
  assert.deepEqual(error.toJSON(), {
    name: 'PdfToolError',
    code: 'NotFound',
    message: 'PDF file not found: x.pdf',
    context: { filePath: 'x.pdf' }
  });

  assert.deepEqual(parseCliArguments([]), { command: 'help' });
  assert.deepEqual(parseCliArguments(['split', 'batch.pdf', '--out=invoices', '--markers', 'A|B', '--zip']), {
    command: 'split',
    input: 'batch.pdf',
    outputDirectory: 'invoices',
    markers: ['A', 'B'],
    pattern: null,
    requireMultipleInvoices: false,
    pagesPerFile: null,
    zip: true
  });
  const blankMarkers = parseCliArguments(['split', 'batch.pdf', '--markers', '']);
  assert.deepEqual(blankMarkers.command === 'split' ? blankMarkers.markers : null, []);

  const edit = parseCliArguments(['edit', 'letter.pdf', '--replace', 'Acme=Globex', '--replace=a=b=c']);
  assert.equal(edit.command, 'edit');
  if (edit.command === 'edit') {
    assert.deepEqual([...edit.replacements.entries()], [['Acme', 'Globex'], ['a', 'b=c']]);
    assert.equal(edit.outputPath, null);
  }

  assert.throws(() => parseCliArguments(['split']), CliUsageError);
  assert.throws(() => parseCliArguments(['split', 'a.pdf', '--pages', 'two']), CliUsageError);
  assert.throws(() => parseCliArguments(['edit', 'a.pdf']), CliUsageError);
  assert.throws(() => parseCliArguments(['edit', 'a.pdf', '--replace', '=x']), CliUsageError);
  assert.throws(() => parseCliArguments(['merge', 'a.pdf']), CliUsageError);
  assert.throws(() => parseCliArguments(['split', 'a.pdf', '--colour']), CliUsageError);

  const silent = getLogger('cli', { level: 'silent' });
  const stdout: string[] = [];
  const io = { stdout: (line: string) => stdout.push(line), logger: silent };

  assert.equal(await runCli(['help'], {}, io), 0);
  assert.deepEqual(stdout, [USAGE]);
  assert.equal(await runCli(['merge'], {}, io), 2);

  await withTempDir(async (directory) => {
    const sourcePath = path.join(directory, 'batch.pdf');
    await writeFile(sourcePath, await createTextPdf(['Rechnung 1', 'Details', 'Rechnung 2']));
    const outputDirectory = path.join(directory, 'invoices');

    stdout.length = 0;
    const exitCode = await runCli(['split', sourcePath, '--zip'], { SPLIT_OUTPUT_DIR: outputDirectory, INVOICE_MARKERS: 'Rechnung' }, io);
    assert.equal(exitCode, 0);
    assert.deepEqual(stdout, [
      path.join(outputDirectory, 'batch_invoice_001.pdf'),
      path.join(outputDirectory, 'batch_invoice_002.pdf'),
      path.join(outputDirectory, 'batch_invoices.zip')
    ]);
    assert.deepEqual((await readdir(outputDirectory)).sort(), [
      'batch_invoice_001.pdf',
      'batch_invoice_002.pdf',
      'batch_invoices.zip'
    ]);

    assert.equal(await runCli(['split', path.join(directory, 'missing.pdf')], {}, io), 1);
  });

  console.log('✅ CLI and configuration tests passed (29 checks).');
}

void main();
