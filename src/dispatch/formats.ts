import type { ConversionStrategy, DocumentFamily, FormatRoute, TargetFormat } from '../types';

interface FamilyFormats {
  targetFormat: TargetFormat;
  /** Extensions read in-process from their OOXML package */
  library: readonly string[];
  /** Extensions handed to soffice */
  external: readonly string[];
}

/**
 * Hand-maintained routing table.
 *
 * Legacy binary formats (xls, ppt, pps) go to soffice; the in-process
 * converters only read OOXML zip packages. Templates and macro-enabled
 * templates go to soffice as well. Access databases come out as spreadsheets.
 */
export const SUPPORTED_FORMATS: Readonly<Record<DocumentFamily, FamilyFormats>> = {
  excel: {
    targetFormat: 'ods',
    library: ['xlsx', 'xlsm'],
    external: ['xls', 'xlsb', 'xltx', 'xltm'],
  },
  word: {
    targetFormat: 'odt',
    library: ['docx'],
    external: ['doc', 'dotx', 'dotm'],
  },
  powerpoint: {
    targetFormat: 'odp',
    library: ['pptx', 'ppsx'],
    external: ['ppt', 'pps', 'potx', 'potm'],
  },
  publisher: {
    targetFormat: 'odt',
    library: [],
    external: ['pub'],
  },
  access: {
    targetFormat: 'ods',
    library: [],
    external: ['mdb', 'accdb'],
  },
};

const FAMILIES: readonly DocumentFamily[] = ['excel', 'word', 'powerpoint', 'publisher', 'access'];

function buildRouteTable(): ReadonlyMap<string, FormatRoute> {
  const routes = new Map<string, FormatRoute>();

  for (const family of FAMILIES) {
    const { targetFormat, library, external } = SUPPORTED_FORMATS[family];
    const add = (strategy: ConversionStrategy) => (extension: string) => {
      if (routes.has(extension)) {
        throw new Error(`Extension .${extension} is routed twice`);
      }
      routes.set(extension, { family, strategy, targetFormat });
    };
    library.forEach(add('library'));
    external.forEach(add('external'));
  }

  return routes;
}

export const ROUTES = buildRouteTable();

/**
 * Every extension the service accepts, sorted
 */
export function supportedExtensions(): string[] {
  return [...ROUTES.keys()].sort();
}
