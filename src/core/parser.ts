/**
 * CSA Header Parser: Siemens CSA header decoding
 *
 * Decodes the private "CSA Image Header Info" / "CSA Series Header Info"
 * blocks of Siemens DICOM files. Synchronous and stateless: every call owns
 * its cursor and result.
 *
 * Modular architecture:
 * - SafeDataView: Bounds-checked byte reading
 * - tagReader: Type 1 / Type 2 tag stream walking
 * - valueParsers: Per-VR item conversion
 * - protocolParser: ASCCONV / XProtocol text decoding
 */

import { parseProtocol } from './protocolParser';
import { readTags } from './tagReader';
import type { CsaTag, CsaValue, NumericEncoding, ParsedHeader, ProtocolBlock } from './types';
import { decodeLatin1 } from '../utils/SafeDataView';

/** Tags whose string value is ASCCONV / XProtocol text */
export const ASCII_HEADER_TAGS: readonly string[] = ['MrPhoenixProtocol'];

/**
 * Options for parsing
 */
export interface CsaParseOptions {
  /** Storage of SS/US/SL/UL/FL/FD items. Default: 'binary' */
  numericEncoding?: NumericEncoding;
  /** Decode protocol tags into a tree. Default: true */
  parseProtocol?: boolean;
  /** Names of protocol tags. Default: ASCII_HEADER_TAGS */
  protocolTags?: readonly string[];
}

/**
 * Parse a raw CSA header
 *
 * @param bytes - Value of a CSA header element
 * @returns Tags in stream order
 * @throws CsaParseError when the buffer is not a complete CSA header
 *
 * @example
 * ```typescript
 * const header = parseCsaHeader(bytes);
 * const thickness = getTagValue(header, 'SliceThickness');
 * ```
 */
export function parseCsaHeader(bytes: Uint8Array, options: CsaParseOptions = {}): ParsedHeader {
  const header = readTags(bytes, { numericEncoding: options.numericEncoding });

  if (options.parseProtocol === false) {
    return header;
  }

  for (const name of options.protocolTags ?? ASCII_HEADER_TAGS) {
    const tag = header.get(name);
    if (tag) {
      header.set(name, withDecodedProtocol(tag));
    }
  }

  return header;
}

function withDecodedProtocol(tag: CsaTag): CsaTag {
  const [first] = tag.values;
  let text: string | undefined;
  if (typeof first === 'string') {
    text = first;
  } else if (first instanceof Uint8Array) {
    text = decodeLatin1(first);
  }
  if (text === undefined) {
    return tag;
  }
  return { ...tag, values: [parseProtocol(text)] };
}

/**
 * A tag's value the way most consumers want it: the single value, an array
 * of values, or null when the tag is absent or empty
 */
export function getTagValue(header: ParsedHeader, name: string): CsaValue | CsaValue[] {
  const tag = header.get(name);
  if (!tag || tag.values.length === 0) {
    return null;
  }
  return tag.values.length === 1 ? tag.values[0] : [...tag.values];
}

/**
 * Serializable view of a tag
 */
export interface CsaTagObject {
  VR: string;
  VM: number;
  value: CsaValue | CsaValue[];
}

/**
 * Plain object keyed by tag name, in stream order
 */
export function headerToObject(header: ParsedHeader): Record<string, CsaTagObject> {
  const result: Record<string, CsaTagObject> = {};
  for (const [name, tag] of header) {
    result[name] = { VR: tag.vr, VM: tag.vm, value: getTagValue(header, name) };
  }
  return result;
}

/**
 * Decoded protocol tree of a header, if it carries one
 */
export function getProtocol(header: ParsedHeader, name: string = ASCII_HEADER_TAGS[0]): ProtocolBlock | undefined {
  const value = header.get(name)?.values[0];
  if (typeof value === 'object' && value !== null && !(value instanceof Uint8Array)) {
    return value;
  }
  return undefined;
}
