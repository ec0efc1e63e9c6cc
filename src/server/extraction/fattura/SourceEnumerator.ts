/**
 * SourceEnumerator - Yield the invoice documents found at a path
 *
 * A directory yields its direct `.xml` children (no recursion, listing
 * order); any other path yields that single file. A file that cannot be
 * read is logged and skipped so one bad file never stops a batch.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from 'pino';
import { InputNotFoundError, getErrorMessage } from '../../types/errors.js';
import type { SourceDocument } from './types.js';

const XML_SUFFIX = '.xml';

/**
 * Read a file as strict UTF-8; invalid byte sequences throw
 */
export function readDocumentText(filePath: string): string {
  const bytes = fs.readFileSync(filePath);
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

function isRegularFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    // Dangling symlink or entry removed while listing
    return false;
  }
}

/**
 * Candidate files for a path
 *
 * @throws InputNotFoundError if the path does not exist
 */
export function listCandidateFiles(inputPath: string): string[] {
  const absolutePath = path.resolve(inputPath);

  let stats: fs.Stats;
  try {
    stats = fs.statSync(absolutePath);
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      throw new InputNotFoundError(absolutePath);
    }
    if (code === 'ENOTDIR') {
      // A file used as a directory: reading it reports the failure
      return [absolutePath];
    }
    throw error;
  }

  if (!stats.isDirectory()) {
    return [absolutePath];
  }

  return fs
    .readdirSync(absolutePath)
    .filter((entry) => entry.endsWith(XML_SUFFIX))
    .map((entry) => path.join(absolutePath, entry))
    .filter(isRegularFile);
}

/**
 * Lazily read every candidate document.
 *
 * The path is checked on the first pull, so a missing input surfaces as an
 * InputNotFoundError from the first `next()`.
 */
export function* enumerateSourceDocuments(
  inputPath: string,
  logger: Logger,
  onUnreadable?: (filePath: string, error: unknown) => void
): Generator<SourceDocument> {
  const files = listCandidateFiles(inputPath);
  logger.debug({ inputPath, candidates: files.length }, 'Enumerated candidate documents');

  for (const filePath of files) {
    let text: string;
    try {
      text = readDocumentText(filePath);
    } catch (error) {
      logger.error({ path: filePath, error: getErrorMessage(error) }, `Cannot read "${filePath}": ${getErrorMessage(error)}`);
      onUnreadable?.(filePath, error);
      continue;
    }
    yield { path: filePath, text };
  }
}
