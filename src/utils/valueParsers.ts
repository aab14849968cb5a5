/**
 * Value Parsers: Per-VR conversion of raw CSA item bytes
 *
 * The tag decoder extracts each item's payload; these functions turn the
 * payload into a typed value. Adding a VR means adding a table entry here,
 * not touching the stream walker.
 */

import { createParseError } from '../core/errors';
import type { CsaItemValue, NumericEncoding } from '../core/types';
import { decodeLatin1, toNullTerminated } from './SafeDataView';
import { FIXED_WIDTH, detectVrKind, type VrKind } from './vrDetection';

/**
 * Options for converting a single item
 */
export interface ConvertOptions {
  /** How SS/US/SL/UL/FL/FD payloads are stored. Default: 'binary' */
  numericEncoding?: NumericEncoding;
}

type Converter = (bytes: Uint8Array, kind: VrKind, encoding: NumericEncoding) => CsaItemValue;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Decode a text item: cut at the first NUL and trim trailing whitespace
 */
export function parseText(bytes: Uint8Array): string | null {
  const text = decodeLatin1(toNullTerminated(bytes)).trimEnd();
  return text.length > 0 ? text : null;
}

/**
 * Parse Integer String (IS) text
 */
export function parseIntegerString(text: string | null): number | null {
  const trimmed = text?.trim() ?? '';
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  return parseInt(trimmed, 10);
}

/**
 * Parse Decimal String (DS) text
 */
export function parseDecimalString(text: string | null): number | null {
  const trimmed = text?.trim() ?? '';
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  return parseFloat(trimmed);
}

function readFixedWidth(bytes: Uint8Array, kind: VrKind): number {
  const width = FIXED_WIDTH[kind];
  if (width === undefined || bytes.byteLength !== width) {
    throw createParseError(
      'SizeMismatch',
      `Expected ${width ?? 0} bytes for ${kind} value but found ${bytes.byteLength}`
    );
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  switch (kind) {
    case 'int16':
      return view.getInt16(0, true);
    case 'uint16':
      return view.getUint16(0, true);
    case 'int32':
      return view.getInt32(0, true);
    case 'uint32':
      return view.getUint32(0, true);
    case 'float32':
      return view.getFloat32(0, true);
    default:
      return view.getFloat64(0, true);
  }
}

const fixedWidth: Converter = (bytes, kind, encoding) => {
  if (encoding === 'binary') {
    return readFixedWidth(bytes, kind);
  }
  const text = parseText(bytes);
  return kind === 'float32' || kind === 'float64' ? parseDecimalString(text) : parseIntegerString(text);
};

const CONVERTERS: Record<VrKind, Converter> = {
  string: (bytes) => parseText(bytes),
  integerString: (bytes) => parseIntegerString(parseText(bytes)),
  decimalString: (bytes) => parseDecimalString(parseText(bytes)),
  int16: fixedWidth,
  uint16: fixedWidth,
  int32: fixedWidth,
  uint32: fixedWidth,
  float32: fixedWidth,
  float64: fixedWidth,
  opaque: (bytes) => bytes.slice(),
};

/**
 * Convert one item's payload according to its VR
 *
 * @throws CsaParseError (SizeMismatch) for a binary numeric payload of the wrong width
 */
export function convertValue(vr: string, bytes: Uint8Array, options: ConvertOptions = {}): CsaItemValue {
  const kind = detectVrKind(vr);
  return CONVERTERS[kind](bytes, kind, options.numericEncoding ?? 'binary');
}
