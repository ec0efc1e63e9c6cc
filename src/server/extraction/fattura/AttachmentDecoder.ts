/**
 * AttachmentDecoder - Turn an <Allegati> block into a file to write
 *
 * Resolves the attachment name, decodes the base64 payload and picks an
 * extension. A missing or undecodable payload is logged and dropped; an
 * empty payload is dropped without a diagnostic.
 */

import * as path from 'path';
import type { Logger } from 'pino';
import { AttachmentPayloadMissingError, Base64DecodeError, getErrorMessage } from '../../types/errors.js';
import { matchField } from './patterns.js';
import type { AttachmentBlock, AttachmentMetadata, ExtensionSource, MaterializedAttachment, NameSource } from './types.js';

export const PDF_SIGNATURE = Buffer.from('%PDF-', 'latin1');

export const UNKNOWN_FORMAT_EXTENSION = 'formatoSconosciuto';

export type DecodeResult =
  | { status: 'decoded'; attachment: MaterializedAttachment }
  | { status: 'empty'; name: string }
  | { status: 'failed'; name: string; error: Error };

const BASE64_CHARACTER = /[A-Za-z0-9+/]/;

/**
 * Decode base64 text leniently, in 4-character groups.
 *
 * Characters outside the alphabet are skipped, as is a `=` in the first or
 * second position of a group. The first padding that completes a group ends
 * the data; anything after it is ignored.
 *
 * @throws Base64DecodeError when the data stops in the middle of a group
 */
export function decodeBase64Payload(encoded: string): Buffer {
  let data = '';
  let groupPosition = 0;
  let pads = 0;
  let terminated = false;

  for (const char of encoded) {
    if (char === '=') {
      if (groupPosition >= 2) {
        pads++;
        if (groupPosition + pads >= 4) {
          terminated = true;
          break;
        }
      }
      continue;
    }
    if (!BASE64_CHARACTER.test(char)) {
      continue;
    }
    pads = 0;
    data += char;
    groupPosition = (groupPosition + 1) % 4;
  }

  if (!terminated && groupPosition === 1) {
    throw new Base64DecodeError(
      `Invalid base64-encoded string: number of data characters (${data.length}) cannot be 1 more than a multiple of 4`
    );
  }
  if (!terminated && groupPosition !== 0) {
    throw new Base64DecodeError('Incorrect padding');
  }
  return Buffer.from(data, 'base64');
}

export function resolveAttachmentName(block: AttachmentBlock): { name: string; source: NameSource } {
  const tagged = matchField(block.text, 'name');
  if (tagged !== undefined) {
    return { name: tagged, source: 'tag' };
  }
  const documentName = path.parse(block.sourcePath).name;
  return { name: `${documentName}_allegato_${block.index}`, source: 'fallback' };
}

/**
 * The PDF signature wins over <FormatoAttachment>
 */
export function resolveExtension(payload: Buffer, blockText: string): { extension: string; source: ExtensionSource } {
  if (payload.subarray(0, PDF_SIGNATURE.length).equals(PDF_SIGNATURE)) {
    return { extension: 'pdf', source: 'signature' };
  }
  const format = matchField(blockText, 'format');
  if (format !== undefined) {
    return { extension: format.toLowerCase(), source: 'tag' };
  }
  return { extension: UNKNOWN_FORMAT_EXTENSION, source: 'fallback' };
}

export function decodeAttachment(block: AttachmentBlock, logger: Logger): DecodeResult {
  const { name, source: nameSource } = resolveAttachmentName(block);
  const documentBasename = path.basename(block.sourcePath);

  let payload: Buffer;
  try {
    const encoded = matchField(block.text, 'payload');
    if (encoded === undefined) {
      throw new AttachmentPayloadMissingError({ name, document: documentBasename });
    }
    payload = decodeBase64Payload(encoded);
  } catch (error) {
    const message = getErrorMessage(error);
    logger.error(
      { attachment: name, error: message },
      `Error decoding "${name}" in "${documentBasename}" : ${message}`
    );
    return { status: 'failed', name, error: error instanceof Error ? error : new Error(message) };
  }

  if (payload.length === 0) {
    logger.trace({ attachment: name }, 'Skipping empty attachment');
    return { status: 'empty', name };
  }

  const { extension, source: extensionSource } = resolveExtension(payload, block.text);
  const metadata: AttachmentMetadata = {
    name,
    nameSource,
    extension,
    extensionSource,
    compression: matchField(block.text, 'compression'),
    description: matchField(block.text, 'description'),
  };

  logger.debug(
    { index: block.index, bytes: payload.length, ...metadata },
    'Decoded attachment'
  );

  return {
    status: 'decoded',
    attachment: {
      directory: path.dirname(block.sourcePath),
      filename: `${name}.${extension}`,
      payload,
      metadata,
    },
  };
}

/**
 * Decode each block of one document, yielding only the attachments that
 * carry bytes
 */
export function* decodeAttachments(blocks: Iterable<AttachmentBlock>, logger: Logger): Generator<MaterializedAttachment> {
  for (const block of blocks) {
    const result = decodeAttachment(block, logger);
    if (result.status === 'decoded') {
      yield result.attachment;
    }
  }
}
