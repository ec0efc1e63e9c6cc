import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { Logger } from 'pino';
import { createLogger } from '../../utils/logger.js';

export interface LogEntry {
  level: string;
  msg: string;
  [key: string]: unknown;
}

/**
 * Logger writing JSON lines into memory, for asserting diagnostics
 */
export function createCapturingLogger(level: string = 'debug'): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger(
    { level, enablePrettyPrint: false },
    {
      write(chunk: string) {
        entries.push(JSON.parse(chunk) as LogEntry);
      },
    }
  );
  return { logger, entries };
}

export function entriesAtLevel(entries: LogEntry[], ...levels: string[]): LogEntry[] {
  return entries.filter((entry) => levels.includes(entry.level));
}

export function makeTempDir(prefix: string = 'fattura-allegati-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function base64(content: string | Buffer): string {
  return Buffer.from(content).toString('base64');
}

interface AllegatiFields {
  name?: string;
  format?: string;
  compression?: string;
  description?: string;
  payload?: string;
}

/**
 * One <Allegati> container; fields left undefined are omitted
 */
export function allegatiXml(fields: AllegatiFields): string {
  const parts: string[] = ['<Allegati>'];
  if (fields.name !== undefined) parts.push(`  <NomeAttachment>${fields.name}</NomeAttachment>`);
  if (fields.compression !== undefined) parts.push(`  <AlgoritmoCompressione>${fields.compression}</AlgoritmoCompressione>`);
  if (fields.format !== undefined) parts.push(`  <FormatoAttachment>${fields.format}</FormatoAttachment>`);
  if (fields.description !== undefined) parts.push(`  <DescrizioneAttachment>${fields.description}</DescrizioneAttachment>`);
  if (fields.payload !== undefined) parts.push(`  <Attachment>${fields.payload}</Attachment>`);
  parts.push('</Allegati>');
  return parts.join('\n');
}

export function invoiceXml(...allegati: string[]): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<p:FatturaElettronica versione="FPR12">',
    '<FatturaElettronicaBody>',
    '<DatiGenerali><DatiGeneraliDocumento><Numero>42</Numero></DatiGeneraliDocumento></DatiGenerali>',
    ...allegati,
    '</FatturaElettronicaBody>',
    '</p:FatturaElettronica>',
  ].join('\n');
}
