export {
  parseFile,
  validateFile,
  isSupportedFileType,
  getFileExtension,
  getMimeType,
  SUPPORTED_EXTENSIONS,
  MAX_FILE_SIZE,
  type ParseResult,
  type SupportedExtension,
  type SupportedMimeType,
} from './file-parser';
