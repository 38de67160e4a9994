import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { PdfToolError } from '../shared/errors';
import { withPdfText } from '../shared/file/decoders/pdf';
import { loadPdfEditingEngine, requireReadyEngine } from '../shared/file/redaction/pdf/capability';
import type {
  PageEditReport,
  PdfEditingEngine,
  RegionReplacement
} from '../shared/file/redaction/pdf/types';
import { resolveSource } from '../shared/file/registry';
import type { SourceInput } from '../shared/file/types';
import { getLogger } from '../shared/logger';
import type { Logger } from '../shared/logger';

/** Old literal to new literal. */
export type ReplacementSet = Readonly<Record<string, string>> | ReadonlyMap<string, string>;

export interface EditOptions {
  /**
   * Engine used for locating and redacting text. Omitted: the built-in engine
   * is loaded. `null`: no engine is available.
   */
  capability?: PdfEditingEngine | null;
  logger?: Logger;
}

export interface EditDocumentOptions extends EditOptions {
  outputPath?: string;
}

export interface EditResult {
  bytes: Uint8Array;
  /** Regions replaced across all pages. */
  replacementCount: number;
  pages: PageEditReport[];
}

function isReplacementMap(replacements: ReplacementSet): replacements is ReadonlyMap<string, string> {
  return replacements instanceof Map;
}

export function normalizeReplacements(replacements: ReplacementSet): Array<[string, string]> {
  const entries = isReplacementMap(replacements)
    ? [...replacements.entries()]
    : Object.entries(replacements);
  const usable = entries.filter(([oldText]) => oldText.length > 0);

  if (usable.length === 0) {
    throw new PdfToolError('InvalidReplacement', 'At least one non-empty text to replace is required.');
  }
  return usable;
}

async function resolveEngine(capability: PdfEditingEngine | null | undefined): Promise<PdfEditingEngine> {
  return requireReadyEngine(capability === undefined ? await loadPdfEditingEngine() : capability);
}

/** Non-overlapping occurrences of `needle` in text extracted with PDF.js. */
export function countOccurrences(text: string, needle: string): number {
  const wanted = needle.replace(/\s+/g, ' ').trim();
  if (wanted.length === 0) {
    return 0;
  }

  let count = 0;
  for (let index = text.indexOf(wanted); index !== -1; index = text.indexOf(wanted, index + wanted.length)) {
    count += 1;
  }
  return count;
}

/**
 * Replaces every occurrence of each key on every page. All regions of a page
 * are located before the page is changed; the document is saved once. Text
 * the page shows but the engine cannot locate aborts the edit.
 */
export async function editPdfBytes(bytes: Uint8Array, replacements: ReplacementSet, options: EditOptions = {}): Promise<EditResult> {
  const logger = options.logger ?? getLogger('editor');
  const pairs = normalizeReplacements(replacements);
  const engine = await resolveEngine(options.capability);
  const session = await engine.open(bytes);

  try {
    return await withPdfText(bytes, async (pageTexts) => {
      const pages: PageEditReport[] = [];
      let replacementCount = 0;

      for (let pageIndex = 0; pageIndex < session.pageCount; pageIndex += 1) {
        const pageText = await pageTexts.getPageText(pageIndex);
        const located: RegionReplacement[] = [];

        for (const [oldText, newText] of pairs) {
          const regions = session.locate(pageIndex, oldText);
          const expected = countOccurrences(pageText, oldText);
          if (regions.length < expected) {
            throw new PdfToolError(
              'UnsupportedFormat',
              `Page ${pageIndex + 1} shows "${oldText}" ${expected} time(s) but only ${regions.length} could be located.`,
              { context: { pageIndex, text: oldText, expected, located: regions.length } }
            );
          }
          for (const region of regions) {
            located.push({ region, text: newText });
          }
        }

        if (located.length === 0) {
          continue;
        }

        const report = await session.applyReplacements(pageIndex, located);
        pages.push(report);
        replacementCount += report.regionCount;
        logger.debug('Replaced text on page', { pageIndex, regions: report.regionCount });
      }

      const output = await session.save();
      logger.info('Text replacement finished', { pageCount: session.pageCount, replacementCount });
      return { bytes: output, replacementCount, pages };
    });
  } finally {
    session.close();
  }
}

export function editedFileName(baseName: string): string {
  return `${baseName}_edited.pdf`;
}

/** Writes the edited copy and returns its absolute path. */
export async function editDocument(input: SourceInput, replacements: ReplacementSet, options: EditDocumentOptions = {}): Promise<string> {
  const logger = options.logger ?? getLogger('editor');
  const source = await resolveSource(input);
  const outputPath = path.resolve(
    options.outputPath ?? path.join(source.directory ?? process.cwd(), editedFileName(source.baseName))
  );

  logger.info('Editing document', { fileName: source.fileName, keys: normalizeReplacements(replacements).length });
  const result = await editPdfBytes(source.bytes, replacements, { ...options, logger });

  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, result.bytes);
  logger.info('Edited document written', { outputPath, replacementCount: result.replacementCount });
  return outputPath;
}
