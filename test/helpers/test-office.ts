import JSZip from 'jszip';

/**
 * Minimal OOXML packages built in memory.
 *
 * Each contains only the parts the in-process converters read, which is
 * enough for them and is not meant to open in an office suite.
 */

const XML_HEADER = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

function relationships(entries: Array<{ id: string; target: string }>): string {
  const items = entries
    .map(
      (e) =>
        `<Relationship Id="${e.id}" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/x" Target="${e.target}"/>`
    )
    .join('');
  return `${XML_HEADER}<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">${items}</Relationships>`;
}

async function toBuffer(zip: JSZip): Promise<Buffer> {
  return zip.generateAsync({
    type: 'nodebuffer',
    compression: 'DEFLATE',
    compressionOptions: { level: 6 },
  });
}

export interface TestSheet {
  name: string;
  /** Raw <sheetData> inner XML */
  sheetData: string;
}

/**
 * Creates an XLSX buffer; `sharedStrings` become xl/sharedStrings.xml
 */
export async function createTestXlsxBuffer(options: {
  sheets?: TestSheet[];
  sharedStrings?: string[];
  activeTab?: number;
} = {}): Promise<Buffer> {
  const sheets = options.sheets ?? [
    {
      name: 'People',
      sheetData:
        '<row r="1"><c r="A1" t="s"><v>0</v></c><c r="B1" t="s"><v>1</v></c></row>' +
        '<row r="2"><c r="A2" t="s"><v>2</v></c><c r="B2"><v>30</v></c></row>' +
        '<row r="3"><c r="A3" t="s"><v>3</v></c><c r="B3"><v>25</v></c></row>',
    },
  ];
  const sharedStrings = options.sharedStrings ?? ['Name', 'Age', 'Alice', 'Bob'];

  const zip = new JSZip();
  const bookViews =
    options.activeTab !== undefined
      ? `<bookViews><workbookView activeTab="${options.activeTab}"/></bookViews>`
      : '';
  const sheetEntries = sheets
    .map((s, i) => `<sheet name="${s.name}" sheetId="${i + 1}" r:id="rId${i + 1}"/>`)
    .join('');

  zip.file(
    'xl/workbook.xml',
    `${XML_HEADER}<workbook xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main" xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships">${bookViews}<sheets>${sheetEntries}</sheets></workbook>`
  );
  zip.file(
    'xl/_rels/workbook.xml.rels',
    relationships(sheets.map((_, i) => ({ id: `rId${i + 1}`, target: `worksheets/sheet${i + 1}.xml` })))
  );
  sheets.forEach((s, i) => {
    zip.file(
      `xl/worksheets/sheet${i + 1}.xml`,
      `${XML_HEADER}<worksheet xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main"><sheetData>${s.sheetData}</sheetData></worksheet>`
    );
  });
  if (sharedStrings.length > 0) {
    const items = sharedStrings.map((s) => `<si><t>${s}</t></si>`).join('');
    zip.file(
      'xl/sharedStrings.xml',
      `${XML_HEADER}<sst xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main" count="${sharedStrings.length}">${items}</sst>`
    );
  }

  return toBuffer(zip);
}

/**
 * Creates a DOCX buffer from raw <w:body> inner XML, or one paragraph per string
 */
export async function createTestDocxBuffer(content: string[] | { bodyXml: string } = ['Hello World']): Promise<Buffer> {
  const bodyXml = Array.isArray(content)
    ? content.map((text) => `<w:p><w:r><w:t xml:space="preserve">${text}</w:t></w:r></w:p>`).join('')
    : content.bodyXml;

  const zip = new JSZip();
  zip.file(
    'word/document.xml',
    `${XML_HEADER}<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"><w:body>${bodyXml}</w:body></w:document>`
  );
  return toBuffer(zip);
}

/**
 * Creates a PPTX buffer; each slide is raw <p:spTree> inner XML
 */
export async function createTestPptxBuffer(slides: string[] = [textShape('Title')]): Promise<Buffer> {
  const zip = new JSZip();
  const ids = slides.map((_, i) => `<p:sldId id="${256 + i}" r:id="rId${i + 1}"/>`).join('');

  zip.file(
    'ppt/presentation.xml',
    `${XML_HEADER}<p:presentation xmlns:p="http://schemas.openxmlformats.org/presentationml/2006/main" xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships"><p:sldIdLst>${ids}</p:sldIdLst></p:presentation>`
  );
  zip.file(
    'ppt/_rels/presentation.xml.rels',
    relationships(slides.map((_, i) => ({ id: `rId${i + 1}`, target: `slides/slide${i + 1}.xml` })))
  );
  slides.forEach((spTree, i) => {
    zip.file(
      `ppt/slides/slide${i + 1}.xml`,
      `${XML_HEADER}<p:sld xmlns:p="http://schemas.openxmlformats.org/presentationml/2006/main" xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main"><p:cSld><p:spTree>${spTree}</p:spTree></p:cSld></p:sld>`
    );
  });
  return toBuffer(zip);
}

/**
 * A text shape with one paragraph per string
 */
export function textShape(...paragraphs: string[]): string {
  const body = paragraphs.map((p) => `<a:p><a:r><a:t>${p}</a:t></a:r></a:p>`).join('');
  return `<p:sp><p:nvSpPr><p:cNvPr id="2" name="Text"/></p:nvSpPr><p:txBody><a:bodyPr/>${body}</p:txBody></p:sp>`;
}

/**
 * Read a part of a generated OpenDocument package
 */
export async function readOdfPart(buffer: Buffer, partName: string): Promise<string> {
  const zip = await JSZip.loadAsync(buffer);
  const file = zip.file(partName);
  if (!file) {
    throw new Error(`Missing part ${partName}`);
  }
  return file.async('string');
}
