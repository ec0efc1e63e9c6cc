#!/usr/bin/env node
/**
 * Extract the attachments embedded in FatturaPA invoices
 *
 * Usage:
 *   tsx src/server/scripts/extract-attachments.ts path/to/invoices
 *   tsx src/server/scripts/extract-attachments.ts -o ./allegati -s low fattura.xml
 */

import { getEnv } from '../config/env.js';
import { getLogger } from '../utils/logger.js';
import { runCli } from './extractAttachmentsCli.js';

try {
  process.exitCode = runCli(process.argv.slice(2), {
    env: getEnv(),
    logger: getLogger(),
    stdout: process.stdout,
    stderr: process.stderr,
  });
} catch (error) {
  console.error('❌ Error:', error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
