/**
 * AttachmentExtractionPipeline - Enumerate, locate, decode and write
 *
 * Runs the four stages one document at a time. Per-file, per-attachment
 * and per-write failures are counted and logged by the stage that hit
 * them; only InputNotFoundError leaves this function.
 */

import type { Logger } from 'pino';
import { createChildLogger } from '../../utils/logger.js';
import { decodeAttachment } from './AttachmentDecoder.js';
import { writeAttachment } from './AttachmentWriter.js';
import { locateAttachmentBlocks } from './BlockLocator.js';
import { enumerateSourceDocuments } from './SourceEnumerator.js';
import type { ExtractionOptions, ExtractionSummary } from './types.js';

export function createEmptySummary(): ExtractionSummary {
  return {
    documents: 0,
    unreadableDocuments: 0,
    blocks: 0,
    decoded: 0,
    decodeFailures: 0,
    emptyPayloads: 0,
    written: 0,
    writeFailures: 0,
  };
}

export function runExtraction(options: ExtractionOptions, logger: Logger): ExtractionSummary {
  const summary = createEmptySummary();
  const documents = enumerateSourceDocuments(options.inputPath, logger, () => {
    summary.unreadableDocuments++;
  });

  for (const document of documents) {
    summary.documents++;
    const documentLogger = createChildLogger(logger, { document: document.path });
    const blocks = locateAttachmentBlocks(document);
    documentLogger.debug({ blocks: blocks.length }, 'Located attachment blocks');
    summary.blocks += blocks.length;

    for (const block of blocks) {
      const result = decodeAttachment(block, documentLogger);
      if (result.status === 'failed') {
        summary.decodeFailures++;
        continue;
      }
      if (result.status === 'empty') {
        summary.emptyPayloads++;
        continue;
      }

      summary.decoded++;
      if (writeAttachment(result.attachment, options, documentLogger)) {
        summary.written++;
      } else {
        summary.writeFailures++;
      }
    }
  }

  logger.debug({ ...summary }, 'Extraction finished');
  return summary;
}
