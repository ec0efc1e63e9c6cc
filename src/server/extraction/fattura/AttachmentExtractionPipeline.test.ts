import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { runExtraction } from './AttachmentExtractionPipeline.js';
import { InputNotFoundError } from '../../types/errors.js';
import {
  allegatiXml,
  base64,
  createCapturingLogger,
  entriesAtLevel,
  invoiceXml,
  makeTempDir,
  removeDir,
} from '../../__tests__/helpers/fixtures.js';

function wrap(encoded: string, width: number = 76): string {
  const lines: string[] = [];
  for (let i = 0; i < encoded.length; i += width) {
    lines.push(encoded.slice(i, i + width));
  }
  return `\n${lines.join('\n')}\n`;
}

describe('runExtraction', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('writes byte-identical files for arbitrary binary payloads', () => {
    const bytes = Buffer.alloc(1000);
    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = (i * 37 + 11) % 256;
    }
    fs.writeFileSync(
      path.join(dir, 'fattura.xml'),
      invoiceXml(allegatiXml({ name: 'binario', format: 'BIN', payload: wrap(bytes.toString('base64')) }))
    );
    const { logger } = createCapturingLogger();

    const summary = runExtraction({ inputPath: dir, overwritePolicy: 'max' }, logger);

    expect(summary.written).toBe(1);
    expect(fs.readFileSync(path.join(dir, 'binario.bin')).equals(bytes)).toBe(true);
  });

  it('processes every document and isolates per-attachment failures', () => {
    fs.writeFileSync(
      path.join(dir, 'invoice.xml'),
      invoiceXml(
        allegatiXml({ name: 'ordine', payload: base64('%PDF-1.4 ordine') }),
        allegatiXml({ format: 'TXT', payload: base64('note') }),
        allegatiXml({ name: 'rotto' }),
        allegatiXml({ name: 'vuoto', payload: '' })
      )
    );
    fs.writeFileSync(path.join(dir, 'second.xml'), invoiceXml(allegatiXml({ payload: base64('x') })));
    fs.writeFileSync(path.join(dir, 'broken.xml'), Buffer.from([0x3c, 0xe0, 0x28, 0x3e]));
    fs.writeFileSync(path.join(dir, 'readme.txt'), invoiceXml(allegatiXml({ name: 'ignorato', payload: base64('x') })));
    const { logger, entries } = createCapturingLogger();

    const summary = runExtraction({ inputPath: dir, overwritePolicy: 'max' }, logger);

    expect(summary).toEqual({
      documents: 2,
      unreadableDocuments: 1,
      blocks: 5,
      decoded: 3,
      decodeFailures: 1,
      emptyPayloads: 1,
      written: 3,
      writeFailures: 0,
    });
    expect(fs.readdirSync(dir).sort()).toEqual([
      'broken.xml',
      'invoice.xml',
      'invoice_allegato_2.txt',
      'ordine.pdf',
      'readme.txt',
      'second.xml',
      'second_allegato_1.formatoSconosciuto',
    ]);
    expect(entriesAtLevel(entries, 'error')).toHaveLength(2);
  });

  it('sends everything to the output directory and keeps going after a write conflict', () => {
    const outdir = path.join(dir, 'out');
    fs.mkdirSync(outdir);
    fs.writeFileSync(path.join(outdir, 'esistente.txt'), 'già qui');
    fs.writeFileSync(
      path.join(dir, 'f.xml'),
      invoiceXml(
        allegatiXml({ name: 'esistente', format: 'txt', payload: base64('nuovo') }),
        allegatiXml({ name: 'nuovo', format: 'txt', payload: base64('nuovo') })
      )
    );
    const { logger } = createCapturingLogger();

    const summary = runExtraction({ inputPath: path.join(dir, 'f.xml'), outputDirectory: outdir, overwritePolicy: 'max' }, logger);

    expect(summary.written).toBe(1);
    expect(summary.writeFailures).toBe(1);
    expect(fs.readFileSync(path.join(outdir, 'esistente.txt'), 'utf8')).toBe('già qui');
    expect(fs.readFileSync(path.join(outdir, 'nuovo.txt'), 'utf8')).toBe('nuovo');
    expect(fs.existsSync(path.join(dir, 'nuovo.txt'))).toBe(false);
  });

  it('overwrites existing outputs under the low policy', () => {
    fs.writeFileSync(path.join(dir, 'f.xml'), invoiceXml(allegatiXml({ name: 'doc', format: 'txt', payload: base64('v2') })));
    fs.writeFileSync(path.join(dir, 'doc.txt'), 'v1');
    const { logger } = createCapturingLogger();

    runExtraction({ inputPath: dir, overwritePolicy: 'low' }, logger);

    expect(fs.readFileSync(path.join(dir, 'doc.txt'), 'utf8')).toBe('v2');
  });

  it('keeps the diagnostic stream silent on a clean run at the info level', () => {
    fs.writeFileSync(path.join(dir, 'f.xml'), invoiceXml(allegatiXml({ name: 'doc', format: 'txt', payload: base64('ok') })));
    const { logger, entries } = createCapturingLogger('info');

    const summary = runExtraction({ inputPath: dir, overwritePolicy: 'max' }, logger);

    expect(summary.written).toBe(1);
    expect(entries).toEqual([]);
  });

  it('propagates InputNotFoundError for a missing input', () => {
    const { logger } = createCapturingLogger();

    expect(() => runExtraction({ inputPath: path.join(dir, 'nope'), overwritePolicy: 'max' }, logger)).toThrow(
      InputNotFoundError
    );
  });
});
