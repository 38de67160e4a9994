import assert from 'node:assert/strict';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { resolveSource, validateSourcePreflight } from '../src/shared/file/registry';
import { getBaseName, getExtension, padSequence, startsWithPdfHeader } from '../src/shared/file/utils';
import { isPdfToolError } from '../src/shared/errors';
import { createTextPdf, withTempDir } from './pdf-fixtures';

async function main(): Promise<void> {
  assert.equal(getExtension('Report.PDF'), '.pdf');
  assert.equal(getExtension('archive'), '');
  assert.equal(getBaseName('/tmp/batch.march.pdf'), 'batch.march');
  assert.equal(padSequence(7), '007');
  assert.equal(startsWithPdfHeader(new TextEncoder().encode('junk%PDF-1.7'), 1024), true);
  assert.equal(startsWithPdfHeader(new TextEncoder().encode('%PDF'), 1024), false);

  assert.throws(() => validateSourcePreflight('notes.txt', 10), (error: unknown) => isPdfToolError(error, 'InvalidFormat'));

  const bytes = await createTextPdf(['Invoice 1']);
  const fromBytes = await resolveSource(bytes);
  assert.equal(fromBytes.fileName, 'document.pdf');
  assert.equal(fromBytes.baseName, 'document');
  assert.equal(fromBytes.directory, undefined);

  const named = await resolveSource({ bytes, fileName: 'march.pdf' });
  assert.equal(named.baseName, 'march');

  await assert.rejects(
    resolveSource({ bytes: new TextEncoder().encode('plain text'), fileName: 'fake.pdf' }),
    (error: unknown) => isPdfToolError(error, 'InvalidFormat')
  );

  await withTempDir(async (directory) => {
    const filePath = path.join(directory, 'batch.pdf');
    await writeFile(filePath, bytes);

    const fromPath = await resolveSource(filePath);
    assert.equal(fromPath.fileName, 'batch.pdf');
    assert.equal(fromPath.baseName, 'batch');
    assert.equal(fromPath.directory, directory);
    assert.deepEqual(fromPath.bytes, bytes);

    await assert.rejects(
      resolveSource(path.join(directory, 'missing.pdf')),
      (error: unknown) => isPdfToolError(error, 'NotFound')
    );

    const folder = path.join(directory, 'folder.pdf');
    await mkdir(folder);
    await assert.rejects(resolveSource(folder), (error: unknown) => isPdfToolError(error, 'NotFound'));

    const textPath = path.join(directory, 'notes.txt');
    await writeFile(textPath, 'hello');
    await assert.rejects(resolveSource(textPath), (error: unknown) => isPdfToolError(error, 'InvalidFormat'));
  });

  console.log('✅ Source registry tests passed (19 checks).');
}

void main();
