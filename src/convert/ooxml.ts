import path from 'path';
import JSZip from 'jszip';
import { load, CheerioAPI } from 'cheerio';
import { CorruptDocumentError, ErrorContext } from '../errors';
import { createLogger, errorMessage } from '../utils/logger';
import {
  CellValue,
  SheetCell,
  SheetRow,
  SlideFrames,
  buildOdfPackage,
  presentationContent,
  spreadsheetContent,
  textContent,
} from './odf';

const logger = createLogger('convert:ooxml');

/**
 * In-process OOXML converters
 *
 * OOXML documents are ZIP archives of XML parts:
 * - Spreadsheets: xl/workbook.xml lists sheets, cells live in xl/worksheets/*.xml,
 *   strings in xl/sharedStrings.xml
 * - Word: paragraphs in word/document.xml
 * - Presentations: ppt/presentation.xml orders slides, shapes in ppt/slides/*.xml
 *
 * Parts are located through the _rels/*.rels relationship files.
 */

/** Name of the single table written to converted spreadsheets */
export const SPREADSHEET_TABLE_NAME = 'Sheet1';

async function openPackage(input: Buffer, context: ErrorContext): Promise<JSZip> {
  try {
    return await JSZip.loadAsync(input);
  } catch (error) {
    throw new CorruptDocumentError(`not an OOXML package (${errorMessage(error)})`, context);
  }
}

async function readPart(zip: JSZip, partName: string, context: ErrorContext): Promise<CheerioAPI> {
  const xml = await readOptionalPart(zip, partName);
  if (!xml) {
    throw new CorruptDocumentError(`missing part ${partName}`, context);
  }
  return xml;
}

async function readOptionalPart(zip: JSZip, partName: string): Promise<CheerioAPI | null> {
  const file = zip.file(partName);
  if (!file) {
    return null;
  }
  return load(await file.async('string'), { xml: true });
}

/**
 * Resolve relationship IDs of `partName` to part names inside the package
 */
async function readRelationships(zip: JSZip, partName: string): Promise<Map<string, string>> {
  const dir = path.posix.dirname(partName);
  const relsName = path.posix.join(dir, '_rels', `${path.posix.basename(partName)}.rels`);
  const $ = await readOptionalPart(zip, relsName);
  const targets = new Map<string, string>();
  if (!$) {
    return targets;
  }

  $('Relationship').each((_, el) => {
    const id = $(el).attr('Id');
    const target = $(el).attr('Target');
    if (!id || !target) {
      return;
    }
    const resolved = target.startsWith('/')
      ? target.slice(1)
      : path.posix.normalize(path.posix.join(dir, target));
    targets.set(id, resolved);
  });

  return targets;
}

// =============================================================================
// Spreadsheets
// =============================================================================

/**
 * Zero-based column index of a cell reference such as "AB12"
 */
export function columnIndex(reference: string): number | null {
  const letters = /^([A-Z]+)\d*$/i.exec(reference)?.[1];
  if (!letters) {
    return null;
  }
  let index = 0;
  for (const letter of letters.toUpperCase()) {
    index = index * 26 + (letter.charCodeAt(0) - 64);
  }
  return index - 1;
}

async function readSharedStrings(zip: JSZip): Promise<string[]> {
  const $ = await readOptionalPart(zip, 'xl/sharedStrings.xml');
  if (!$) {
    return [];
  }
  return $('si')
    .toArray()
    .map((si) =>
      $(si)
        .find('t')
        .filter((_, t) => $(t).closest('rPh').length === 0)
        .toArray()
        .map((t) => $(t).text())
        .join('')
    );
}

/**
 * Rows of cell values from the workbook's active sheet
 *
 * Only rows and cells present in the sheet are returned, sorted by
 * position; a later duplicate reference replaces an earlier one.
 */
export async function readActiveSheet(input: Buffer, context: ErrorContext = {}): Promise<SheetRow[]> {
  const zip = await openPackage(input, context);
  const workbookPart = 'xl/workbook.xml';
  const $workbook = await readPart(zip, workbookPart, context);

  const sheets = $workbook('sheets > sheet').toArray();
  if (sheets.length === 0) {
    throw new CorruptDocumentError('workbook has no sheets', context);
  }

  const activeTab = parseInt($workbook('bookViews > workbookView').first().attr('activeTab') ?? '0', 10);
  const sheet = sheets[Number.isInteger(activeTab) && activeTab < sheets.length ? activeTab : 0];
  const relationshipId = $workbook(sheet).attr('r:id');
  const relationships = await readRelationships(zip, workbookPart);
  const sheetPart = relationshipId ? relationships.get(relationshipId) : undefined;
  if (!sheetPart) {
    throw new CorruptDocumentError('active sheet has no worksheet part', context);
  }

  const sharedStrings = await readSharedStrings(zip);
  const $ = await readPart(zip, sheetPart, context);
  const rows = new Map<number, Map<number, CellValue>>();
  let nextRow = 0;

  $('sheetData > row').each((_, rowEl) => {
    const rowNumber = parseInt($(rowEl).attr('r') ?? '', 10);
    const rowIndex = Number.isInteger(rowNumber) && rowNumber > 0 ? rowNumber - 1 : nextRow;
    const cells = rows.get(rowIndex) ?? new Map<number, CellValue>();
    let nextColumn = 0;

    $(rowEl)
      .children('c')
      .each((__, cellEl) => {
        const $cell = $(cellEl);
        const col = columnIndex($cell.attr('r') ?? '') ?? nextColumn;
        const value = cellValue($cell.attr('t'), $cell.children('v').text(), $cell.find('is t').text(), sharedStrings);
        if (value === null) {
          cells.delete(col);
        } else {
          cells.set(col, value);
        }
        nextColumn = col + 1;
      });

    rows.set(rowIndex, cells);
    nextRow = rowIndex + 1;
  });

  return [...rows.entries()]
    .sort(([a], [b]) => a - b)
    .map(([index, cells]): SheetRow => ({
      index,
      cells: [...cells.entries()]
        .sort(([a], [b]) => a - b)
        .map(([column, value]): SheetCell => ({ column, value })),
    }));
}

function cellValue(
  type: string | undefined,
  raw: string,
  inline: string,
  sharedStrings: string[]
): CellValue {
  switch (type) {
    case 's':
      return sharedStrings[parseInt(raw, 10)] ?? null;
    case 'inlineStr':
      return inline;
    case 'b':
      return raw === '1';
    case 'str':
    case 'e':
    case 'd':
      return raw;
    default: {
      if (raw === '') {
        return null;
      }
      const numeric = Number(raw);
      return Number.isFinite(numeric) ? numeric : raw;
    }
  }
}

/**
 * XLSX/XLSM → ODS: the active sheet's values as a single table
 */
export async function convertSpreadsheet(input: Buffer, context: ErrorContext = {}): Promise<Buffer> {
  const rows = await readActiveSheet(input, context);
  logger.debug({ correlationId: context.correlationId, rowCount: rows.length }, 'Read active sheet');
  return buildOdfPackage('ods', spreadsheetContent(SPREADSHEET_TABLE_NAME, rows));
}

/** mc:Fallback repeats its mc:Choice sibling for older readers */
const FALLBACK = 'mc\\:Fallback';

// =============================================================================
// Word documents
// =============================================================================

/**
 * Text of each paragraph of the document body, tables and text boxes included
 */
export async function readParagraphs(input: Buffer, context: ErrorContext = {}): Promise<string[]> {
  const zip = await openPackage(input, context);
  const $ = await readPart(zip, 'word/document.xml', context);

  return $('w\\:body')
    .find('w\\:p')
    .filter((_, p) => $(p).closest(FALLBACK).length === 0)
    .toArray()
    .map((p) =>
      $(p)
        .find('w\\:t, w\\:tab, w\\:br, w\\:cr')
        .filter((_, el) => $(el).closest('w\\:p')[0] === p && $(el).closest('w\\:pPr').length === 0)
        .toArray()
        .map((el) => {
          switch (el.tagName) {
            case 'w:tab':
              return '\t';
            case 'w:br':
            case 'w:cr':
              return '\n';
            default:
              return $(el).text();
          }
        })
        .join('')
    );
}

/**
 * DOCX → ODT: paragraph text only
 */
export async function convertWordDocument(input: Buffer, context: ErrorContext = {}): Promise<Buffer> {
  const paragraphs = await readParagraphs(input, context);
  logger.debug({ correlationId: context.correlationId, paragraphCount: paragraphs.length }, 'Read paragraphs');
  return buildOdfPackage('odt', textContent(paragraphs));
}

// =============================================================================
// Presentations
// =============================================================================

/**
 * Text frames of every slide, in presentation order
 *
 * A slide whose part is missing becomes an empty slide; shapes without
 * text are skipped.
 */
export async function readSlides(input: Buffer, context: ErrorContext = {}): Promise<SlideFrames[]> {
  const zip = await openPackage(input, context);
  const presentationPart = 'ppt/presentation.xml';
  const $presentation = await readPart(zip, presentationPart, context);
  const relationships = await readRelationships(zip, presentationPart);

  const slideIds = $presentation('p\\:sldIdLst > p\\:sldId').toArray();
  logger.info({ correlationId: context.correlationId, slideCount: slideIds.length }, 'Processing presentation');

  const slides: SlideFrames[] = [];
  for (const [slideIndex, slideId] of slideIds.entries()) {
    const relationshipId = $presentation(slideId).attr('r:id');
    const slidePart = relationshipId ? relationships.get(relationshipId) : undefined;
    const $ = slidePart ? await readOptionalPart(zip, slidePart) : null;

    if (!$) {
      logger.warn({ correlationId: context.correlationId, slideIndex, slidePart }, 'Slide part missing, writing empty page');
      slides.push([]);
      continue;
    }

    const frames: SlideFrames = [];
    $('p\\:sp')
      .filter((_, shape) => $(shape).closest(FALLBACK).length === 0)
      .each((shapeIndex, shape) => {
        try {
          const text = $(shape)
            .children('p\\:txBody')
            .first()
            .find('a\\:p')
            .toArray()
            .map((p) =>
              $(p)
                .find('a\\:t, a\\:br')
                .toArray()
                .map((el) => (el.tagName === 'a:br' ? '\n' : $(el).text()))
                .join('')
            )
            .join('\n')
            .trim();
          if (text) {
            frames.push(text.split('\n'));
          }
        } catch (error) {
          logger.warn(
            { correlationId: context.correlationId, slideIndex, shapeIndex, error: errorMessage(error) },
            'Skipping shape'
          );
        }
      });

    logger.debug({ correlationId: context.correlationId, slideIndex, textShapes: frames.length }, 'Processed slide');
    slides.push(frames);
  }

  return slides;
}

/**
 * PPTX/PPSX → ODP: the text of each shape, one page per slide
 */
export async function convertPresentation(input: Buffer, context: ErrorContext = {}): Promise<Buffer> {
  const slides = await readSlides(input, context);
  return buildOdfPackage('odp', presentationContent(slides));
}
