import { ALLEGATI_PATTERN } from './patterns.js';
import type { AttachmentBlock, SourceDocument } from './types.js';

/**
 * All <Allegati> containers of a document, in document order.
 * A document without containers yields an empty list.
 */
export function locateAttachmentBlocks(document: SourceDocument): AttachmentBlock[] {
  const blocks: AttachmentBlock[] = [];
  for (const match of document.text.matchAll(ALLEGATI_PATTERN)) {
    blocks.push({
      sourcePath: document.path,
      index: blocks.length + 1,
      text: match[1],
    });
  }
  return blocks;
}
