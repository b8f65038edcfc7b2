import { TextDecoder } from 'util';
import { XmlSyntaxError } from './xml-syntax.error';

export interface DecodedXml {
  text: string;
  encoding: string;
}

const ENCODING_DECLARATION = /^<\?xml\s[^>]*?encoding\s*=\s*["']([A-Za-z][A-Za-z0-9._-]*)["']/;

/**
 * Detects the character encoding of an XML document from its first bytes.
 * A byte order mark wins over the declaration; without either the
 * document is UTF-8.
 */
export function detectEncoding(content: Buffer): string {
  if (content.length >= 3 && content[0] === 0xef && content[1] === 0xbb && content[2] === 0xbf) {
    return 'utf-8';
  }
  if (content.length >= 2 && content[0] === 0xff && content[1] === 0xfe) {
    return 'utf-16le';
  }
  if (content.length >= 2 && content[0] === 0xfe && content[1] === 0xff) {
    return 'utf-16be';
  }
  // '<?' in UTF-16 without a BOM
  if (content.length >= 4 && content[0] === 0x3c && content[1] === 0x00 && content[2] === 0x3f && content[3] === 0x00) {
    return 'utf-16le';
  }
  if (content.length >= 4 && content[0] === 0x00 && content[1] === 0x3c && content[2] === 0x00 && content[3] === 0x3f) {
    return 'utf-16be';
  }

  const head = content.subarray(0, 256).toString('latin1');
  const match = ENCODING_DECLARATION.exec(head);
  if (!match) {
    return 'utf-8';
  }

  const declared = match[1].toLowerCase();
  // A declared UTF-16 without BOM or null bytes cannot be honoured; the bytes are single-byte.
  return declared === 'utf-16' ? 'utf-8' : declared;
}

export function decodeXml(content: Buffer): DecodedXml {
  const encoding = detectEncoding(content);

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch {
    throw new XmlSyntaxError(`Unsupported character encoding '${encoding}'`);
  }

  try {
    return { text: decoder.decode(content), encoding };
  } catch {
    throw new XmlSyntaxError(`Document bytes are not valid ${encoding}`);
  }
}
