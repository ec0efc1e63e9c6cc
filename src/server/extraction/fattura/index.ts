export * from './types.js';
export { ALLEGATI_PATTERN, FIELD_PATTERNS, matchField } from './patterns.js';
export type { AttachmentField } from './patterns.js';
export { enumerateSourceDocuments, listCandidateFiles, readDocumentText } from './SourceEnumerator.js';
export { locateAttachmentBlocks } from './BlockLocator.js';
export {
  decodeAttachment,
  decodeAttachments,
  decodeBase64Payload,
  resolveAttachmentName,
  resolveExtension,
  PDF_SIGNATURE,
  UNKNOWN_FORMAT_EXTENSION,
} from './AttachmentDecoder.js';
export type { DecodeResult } from './AttachmentDecoder.js';
export { writeAttachment, resolveTargetPath, openFlagFor } from './AttachmentWriter.js';
export { runExtraction, createEmptySummary } from './AttachmentExtractionPipeline.js';
