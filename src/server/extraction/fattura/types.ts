/**
 * Types flowing through the attachment extraction pipeline:
 * SourceDocument → AttachmentBlock → MaterializedAttachment.
 */

/**
 * One input file, read as text
 */
export interface SourceDocument {
  path: string; // Absolute path
  text: string;
}

/**
 * Inner text of one <Allegati> container
 */
export interface AttachmentBlock {
  sourcePath: string; // Absolute path of the document the block was found in
  index: number; // 1-based position among the blocks of the same document
  text: string;
}

export type NameSource = 'tag' | 'fallback';

export type ExtensionSource = 'signature' | 'tag' | 'fallback';

export interface AttachmentMetadata {
  name: string;
  nameSource: NameSource;
  extension: string;
  extensionSource: ExtensionSource;
  compression?: string; // <AlgoritmoCompressione>, informational only
  description?: string; // <DescrizioneAttachment>, informational only
}

/**
 * A decoded attachment ready to be written. The payload is never empty.
 */
export interface MaterializedAttachment {
  directory: string; // Directory of the source document
  filename: string; // `${name}.${extension}`
  payload: Buffer;
  metadata: AttachmentMetadata;
}

/**
 * Anything other than 'low' refuses to overwrite
 */
export type OverwritePolicy = 'low' | 'max' | (string & {});

export interface WriteOptions {
  outputDirectory?: string;
  overwritePolicy: OverwritePolicy;
}

export interface ExtractionOptions extends WriteOptions {
  inputPath: string;
}

export interface ExtractionSummary {
  documents: number;
  unreadableDocuments: number;
  blocks: number;
  decoded: number;
  decodeFailures: number;
  emptyPayloads: number;
  written: number;
  writeFailures: number;
}
