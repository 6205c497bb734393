import type { DocumentFamily } from '../types';
import { ErrorContext, UnsupportedFormatError } from '../errors';
import { convertPresentation, convertSpreadsheet, convertWordDocument } from './ooxml';

type LibraryConverter = (input: Buffer, context: ErrorContext) => Promise<Buffer>;

const LIBRARY_CONVERTERS: Partial<Record<DocumentFamily, LibraryConverter>> = {
  excel: convertSpreadsheet,
  word: convertWordDocument,
  powerpoint: convertPresentation,
};

/**
 * Convert an OOXML document in-process
 *
 * @throws UnsupportedFormatError for families with no in-process converter
 */
export async function convertInProcess(
  input: Buffer,
  family: DocumentFamily,
  context: ErrorContext = {}
): Promise<Buffer> {
  const converter = LIBRARY_CONVERTERS[family];
  if (!converter) {
    throw new UnsupportedFormatError(context.extension ?? family, context);
  }
  return converter(input, context);
}
