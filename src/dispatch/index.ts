import type { DispatchResult } from '../types';
import { MissingExtensionError, UnsupportedFormatError, ErrorContext } from '../errors';
import { ROUTES } from './formats';

export { SUPPORTED_FORMATS, ROUTES, supportedExtensions } from './formats';

/**
 * Split a filename on its last dot
 *
 * @returns base name and lower-cased extension, or null when there is none
 */
export function splitExtension(fileName: string): { baseName: string; extension: string } | null {
  const dot = fileName.lastIndexOf('.');
  if (dot === -1 || dot === fileName.length - 1) {
    return null;
  }
  return {
    baseName: fileName.slice(0, dot),
    extension: fileName.slice(dot + 1).toLowerCase(),
  };
}

/**
 * Select the conversion strategy and target format for an uploaded file
 *
 * @throws MissingExtensionError if the filename has no extension
 * @throws UnsupportedFormatError if the extension is not in the routing table
 */
export function dispatch(fileName: string, context: ErrorContext = {}): DispatchResult {
  const parts = splitExtension(fileName);
  if (!parts) {
    throw new MissingExtensionError(fileName, context);
  }

  const route = ROUTES.get(parts.extension);
  if (!route) {
    throw new UnsupportedFormatError(parts.extension, { ...context, fileName });
  }

  return {
    ...route,
    baseName: parts.baseName,
    extension: parts.extension,
    outputFileName: `${parts.baseName}.${route.targetFormat}`,
  };
}
