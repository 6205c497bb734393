// Conversion Module
// Format-specific converters, the soffice pool and the pipeline tying them together

export { LibreOfficeConverter, createLibreOfficeConverter, type LibreOfficeConverterOptions } from './soffice';
export { ConversionService, type UploadedDocument, type ConversionServiceOptions } from './service';
export { convertInProcess } from './library';
export { withTempWorkspace, type TempWorkspace } from './workspace';
export { buildOdfPackage, ODF_MIME_TYPES } from './odf';
