import JSZip from 'jszip';
import { encode } from 'html-entities';
import type { TargetFormat } from '../types';

/**
 * Minimal OpenDocument package writer.
 *
 * Produces mimetype (first, stored), META-INF/manifest.xml, content.xml,
 * styles.xml and meta.xml. Content is plain: cell values, paragraphs, and
 * text frames; no formatting is carried over.
 */

export type CellValue = string | number | boolean | null;

/** A cell at a zero-based column */
export interface SheetCell {
  column: number;
  value: CellValue;
}

/** A non-empty row at a zero-based index; cells ascend by column */
export interface SheetRow {
  index: number;
  cells: SheetCell[];
}

export const ODF_MIME_TYPES: Readonly<Record<TargetFormat, string>> = {
  ods: 'application/vnd.oasis.opendocument.spreadsheet',
  odt: 'application/vnd.oasis.opendocument.text',
  odp: 'application/vnd.oasis.opendocument.presentation',
};

const ODF_VERSION = '1.2';

const NAMESPACES = [
  'xmlns:office="urn:oasis:names:tc:opendocument:xmlns:office:1.0"',
  'xmlns:style="urn:oasis:names:tc:opendocument:xmlns:style:1.0"',
  'xmlns:text="urn:oasis:names:tc:opendocument:xmlns:text:1.0"',
  'xmlns:table="urn:oasis:names:tc:opendocument:xmlns:table:1.0"',
  'xmlns:draw="urn:oasis:names:tc:opendocument:xmlns:drawing:1.0"',
  'xmlns:fo="urn:oasis:names:tc:opendocument:xmlns:xsl-fo-compatible:1.0"',
  'xmlns:svg="urn:oasis:names:tc:opendocument:xmlns:svg-compatible:1.0"',
  'xmlns:presentation="urn:oasis:names:tc:opendocument:xmlns:presentation:1.0"',
  'xmlns:meta="urn:oasis:names:tc:opendocument:xmlns:meta:1.0"',
  'xmlns:dc="http://purl.org/dc/elements/1.1/"',
].join(' ');

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/**
 * Escape text for element content and attribute values
 */
export function escapeXml(value: string): string {
  return encode(value, { mode: 'specialChars', level: 'xml' });
}

/**
 * Render text as the inside of a text:p, keeping tabs and line breaks
 */
export function paragraphContent(text: string): string {
  return text
    .split('\n')
    .map((line) => line.split('\t').map(escapeXml).join('<text:tab/>'))
    .join('<text:line-break/>');
}

function paragraph(text: string): string {
  return `<text:p>${paragraphContent(text)}</text:p>`;
}

function cell(value: CellValue): string {
  if (value === null) {
    return '<table:table-cell/>';
  }
  if (typeof value === 'number') {
    return `<table:table-cell office:value-type="float" office:value="${value}">${paragraph(String(value))}</table:table-cell>`;
  }
  if (typeof value === 'boolean') {
    return `<table:table-cell office:value-type="boolean" office:boolean-value="${value}">${paragraph(value ? 'TRUE' : 'FALSE')}</table:table-cell>`;
  }
  return `<table:table-cell office:value-type="string">${paragraph(value)}</table:table-cell>`;
}

function documentContent(body: string): string {
  return `${XML_DECLARATION}<office:document-content ${NAMESPACES} office:version="${ODF_VERSION}"><office:body>${body}</office:body></office:document-content>`;
}

function emptyCells(count: number): string {
  return count > 1 ? `<table:table-cell table:number-columns-repeated="${count}"/>` : cell(null);
}

function emptyRows(count: number): string {
  const repeat = count > 1 ? ` table:number-rows-repeated="${count}"` : '';
  return `<table:table-row${repeat}>${cell(null)}</table:table-row>`;
}

function tableRow(cells: SheetCell[]): string {
  if (cells.length === 0) {
    return emptyRows(1);
  }
  let next = 0;
  let xml = '';
  for (const { column, value } of cells) {
    if (column > next) {
      xml += emptyCells(column - next);
    }
    xml += cell(value);
    next = column + 1;
  }
  return `<table:table-row>${xml}</table:table-row>`;
}

/**
 * content.xml of a spreadsheet with a single table
 *
 * Gaps between rows and cells are written as repeated empty runs.
 */
export function spreadsheetContent(tableName: string, rows: SheetRow[]): string {
  const columnCount = rows.reduce(
    (max, row) => row.cells.reduce((rowMax, c) => Math.max(rowMax, c.column + 1), max),
    1
  );

  let next = 0;
  let renderedRows = '';
  for (const row of rows) {
    if (row.index > next) {
      renderedRows += emptyRows(row.index - next);
    }
    renderedRows += tableRow(row.cells);
    next = row.index + 1;
  }
  if (renderedRows === '') {
    renderedRows = emptyRows(1);
  }

  return documentContent(
    `<office:spreadsheet><table:table table:name="${escapeXml(tableName)}">` +
      `<table:table-column table:number-columns-repeated="${columnCount}"/>` +
      renderedRows +
      '</table:table></office:spreadsheet>'
  );
}

/**
 * content.xml of a text document, one text:p per paragraph
 */
export function textContent(paragraphs: string[]): string {
  return documentContent(`<office:text>${paragraphs.map(paragraph).join('')}</office:text>`);
}

/**
 * A slide as a list of text frames, each a list of paragraphs
 */
export type SlideFrames = string[][];

const FRAME_WIDTH = '25cm';
const FRAME_HEIGHT = '2.5cm';

function frame(paragraphs: string[], index: number): string {
  const y = (1 + index * 3).toFixed(1);
  return (
    `<draw:frame svg:x="1.5cm" svg:y="${y}cm" svg:width="${FRAME_WIDTH}" svg:height="${FRAME_HEIGHT}">` +
    `<draw:text-box>${paragraphs.map(paragraph).join('')}</draw:text-box></draw:frame>`
  );
}

/**
 * content.xml of a presentation, one draw:page per slide
 */
export function presentationContent(slides: SlideFrames[]): string {
  const pages = slides
    .map(
      (frames, index) =>
        `<draw:page draw:name="page${index + 1}" draw:master-page-name="Default">${frames.map(frame).join('')}</draw:page>`
    )
    .join('');
  return documentContent(`<office:presentation>${pages}</office:presentation>`);
}

function stylesXml(): string {
  return (
    `${XML_DECLARATION}<office:document-styles ${NAMESPACES} office:version="${ODF_VERSION}">` +
    '<office:automatic-styles><style:page-layout style:name="PM1"/></office:automatic-styles>' +
    '<office:master-styles><style:master-page style:name="Default" style:page-layout-name="PM1"/></office:master-styles>' +
    '</office:document-styles>'
  );
}

function metaXml(createdAt: Date): string {
  return (
    `${XML_DECLARATION}<office:document-meta ${NAMESPACES} office:version="${ODF_VERSION}"><office:meta>` +
    '<meta:generator>officeconv</meta:generator>' +
    `<meta:creation-date>${createdAt.toISOString()}</meta:creation-date>` +
    '</office:meta></office:document-meta>'
  );
}

function manifestXml(format: TargetFormat): string {
  const entry = (fullPath: string, mediaType: string) =>
    `<manifest:file-entry manifest:full-path="${fullPath}" manifest:media-type="${mediaType}"/>`;
  return (
    `${XML_DECLARATION}<manifest:manifest xmlns:manifest="urn:oasis:names:tc:opendocument:xmlns:manifest:1.0" manifest:version="${ODF_VERSION}">` +
    `<manifest:file-entry manifest:full-path="/" manifest:version="${ODF_VERSION}" manifest:media-type="${ODF_MIME_TYPES[format]}"/>` +
    entry('content.xml', 'text/xml') +
    entry('styles.xml', 'text/xml') +
    entry('meta.xml', 'text/xml') +
    '</manifest:manifest>'
  );
}

/**
 * Zip a content.xml into a complete OpenDocument package
 */
export async function buildOdfPackage(
  format: TargetFormat,
  contentXml: string,
  createdAt: Date = new Date()
): Promise<Buffer> {
  const zip = new JSZip();

  // mimetype must be the first entry and uncompressed
  zip.file('mimetype', ODF_MIME_TYPES[format], { compression: 'STORE' });
  zip.file('META-INF/manifest.xml', manifestXml(format));
  zip.file('content.xml', contentXml);
  zip.file('styles.xml', stylesXml());
  zip.file('meta.xml', metaXml(createdAt));

  return zip.generateAsync({
    type: 'nodebuffer',
    compression: 'DEFLATE',
    compressionOptions: { level: 6 },
  });
}
