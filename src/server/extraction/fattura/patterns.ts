/**
 * Tag patterns for the attachment section of a FatturaPA document.
 *
 * Matching is textual on purpose: invoices found in the wild are often
 * truncated or carry stray bytes, and a regex still salvages what a strict
 * parser would reject. Tag names are case-sensitive; whitespace inside the
 * angle brackets is tolerated.
 */

export type AttachmentField = 'name' | 'compression' | 'format' | 'description' | 'payload';

/**
 * Builds `<Tag> capture </Tag>` with whitespace allowed around the tag name
 */
function tagPattern(tag: string, capture: string, trimCapture: boolean): RegExp {
  const open = `<\\s*${tag}\\s*>`;
  const close = `<\\s*\\/\\s*${tag}\\s*>`;
  const pad = trimCapture ? '\\s*' : '';
  return new RegExp(`${open}${pad}(${capture})${pad}${close}`);
}

/**
 * <Allegati> container, spanning lines
 */
export const ALLEGATI_PATTERN = /<\s*Allegati\s*>([\s\S]*?)<\s*\/\s*Allegati\s*>/g;

export const FIELD_PATTERNS: Readonly<Record<AttachmentField, RegExp>> = {
  name: tagPattern('NomeAttachment', '[^\\n]{1,60}?', true),
  compression: tagPattern('AlgoritmoCompressione', '[^\\n]{1,10}?', true),
  format: tagPattern('FormatoAttachment', '[^\\n]{1,10}?', true),
  description: tagPattern('DescrizioneAttachment', '[^\\n]{1,100}?', false),
  // Whitespace is part of the class: long payloads are wrapped over several lines
  payload: tagPattern('Attachment', '[A-Za-z0-9+/=\\s]*?', false),
};

/**
 * First captured value of a field inside a block, or undefined
 */
export function matchField(blockText: string, field: AttachmentField): string | undefined {
  const match = FIELD_PATTERNS[field].exec(blockText);
  return match ? match[1] : undefined;
}
