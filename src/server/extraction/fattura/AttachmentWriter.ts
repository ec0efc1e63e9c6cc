import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from 'pino';
import { getErrorMessage } from '../../types/errors.js';
import type { MaterializedAttachment, OverwritePolicy, WriteOptions } from './types.js';

export function resolveTargetPath(attachment: MaterializedAttachment, outputDirectory?: string): string {
  return path.join(outputDirectory || attachment.directory, attachment.filename);
}

/**
 * 'low' truncates an existing file; every other policy is exclusive create
 */
export function openFlagFor(policy: OverwritePolicy): 'w' | 'wx' {
  return policy === 'low' ? 'w' : 'wx';
}

/**
 * Write an attachment to disk. Failures (target exists, permissions,
 * invalid path) are logged and reported as `false`, never thrown.
 */
export function writeAttachment(attachment: MaterializedAttachment, options: WriteOptions, logger: Logger): boolean {
  const target = resolveTargetPath(attachment, options.outputDirectory);

  try {
    fs.writeFileSync(target, attachment.payload, { flag: openFlagFor(options.overwritePolicy) });
  } catch (error) {
    logger.error({ target, error: getErrorMessage(error) }, getErrorMessage(error));
    return false;
  }

  logger.debug({ target, bytes: attachment.payload.length }, `Wrote "${target}"`);
  return true;
}
