/**
 * Tag Reader: Walks the binary CSA tag stream
 *
 * Layout (little endian):
 * - Type 2 only: "SV10" marker + 4 unused bytes
 * - tag count (int32) + 4 unused bytes
 * - per tag: name (64), VM (int32), VR (4), SyngoDT (int32), item count (int32), check bit (int32)
 * - per item: 4 x int32 (length fields), payload, padding to a 4-byte boundary
 */

import { createParseError, CsaParseError, isCsaParseError } from './errors';
import type { CsaItemValue, CsaTag, CsaType, NumericEncoding, ParsedHeader } from './types';
import { SafeDataView } from '../utils/SafeDataView';
import { convertValue } from '../utils/valueParsers';

/** Marker opening every Type 2 header */
export const TYPE_2_IDENTIFIER = 'SV10';

/** Accepted values of a tag's check bit */
export const VALID_CHECK_BIT_VALUES: ReadonlySet<number> = new Set([77, 205]);

const NAME_LENGTH = 64;
const VR_LENGTH = 4;
const BYTE_ALIGNMENT = 4;
/** Smallest possible encoded tag: its fixed fields and no items */
export const MIN_TAG_LENGTH = NAME_LENGTH + 4 + VR_LENGTH + 4 + 4 + 4;

export interface TagReaderOptions {
  numericEncoding?: NumericEncoding;
}

/**
 * Stream state shared by the tags of one decode
 */
interface ReadContext {
  view: SafeDataView;
  csaType: CsaType;
  numericEncoding: NumericEncoding;
  /** Item count of the first tag; Type 1 item lengths are stored relative to it */
  firstTagItems?: number;
}

/**
 * Check whether the buffer starts with the Type 2 marker
 */
export function detectCsaType(bytes: Uint8Array): CsaType {
  if (bytes.length < TYPE_2_IDENTIFIER.length) {
    return 1;
  }
  for (let i = 0; i < TYPE_2_IDENTIFIER.length; i++) {
    if (bytes[i] !== TYPE_2_IDENTIFIER.charCodeAt(i)) {
      return 1;
    }
  }
  return 2;
}

/**
 * Decode every tag of a CSA header, without protocol post-processing
 */
export function readTags(bytes: Uint8Array, options: TagReaderOptions = {}): ParsedHeader {
  const view = new SafeDataView(bytes);
  const csaType = detectCsaType(bytes);

  if (csaType === 2) {
    view.skip(TYPE_2_IDENTIFIER.length + 4);
  }

  const countOffset = view.position;
  const nTags = view.readInt32();
  view.skip(4);

  if (nTags < 0) {
    throw createParseError('MalformedHeader', `Negative tag count ${nTags}`, { offset: countOffset });
  }
  if (nTags * MIN_TAG_LENGTH > view.remaining()) {
    throw createParseError(
      'MalformedHeader',
      `Tag count ${nTags} cannot fit in the remaining ${view.remaining()} bytes`,
      { offset: countOffset }
    );
  }

  const context: ReadContext = {
    view,
    csaType,
    numericEncoding: options.numericEncoding ?? 'binary',
  };
  const header: ParsedHeader = new Map();

  for (let tagIndex = 0; tagIndex < nTags; tagIndex++) {
    const tag = readTag(context, tagIndex);
    header.set(tag.name, tag);
  }

  return header;
}

function readTag(context: ReadContext, tagIndex: number): CsaTag {
  const { view } = context;
  const start = view.position;
  let name: string | undefined;

  try {
    name = view.readString(NAME_LENGTH);
    const vm = view.readInt32();
    const vr = view.readString(VR_LENGTH).trim();
    const syngoDt = view.readInt32();
    const nItems = view.readInt32();
    const checkBit = view.readInt32();

    if (!VALID_CHECK_BIT_VALUES.has(checkBit)) {
      throw createParseError(
        'InvalidCheckBit',
        `Invalid check bit value ${checkBit}, expected one of ${[...VALID_CHECK_BIT_VALUES].join(', ')}`,
        { tag: name, tagIndex, offset: view.position - 4 }
      );
    }
    if (vm < 0 || nItems < 0) {
      throw createParseError('MalformedHeader', `Negative VM (${vm}) or item count (${nItems})`, {
        tag: name,
        tagIndex,
        offset: start,
      });
    }

    if (tagIndex === 0) {
      context.firstTagItems = nItems;
    }

    const values = readItems(context, { name, tagIndex, vr, vm, nItems });
    return { name, vr, vm, syngoDt, nItems, values };
  } catch (error) {
    throw withTagContext(error, name, tagIndex, start);
  }
}

interface ItemRequest {
  name: string;
  tagIndex: number;
  vr: string;
  vm: number;
  nItems: number;
}

/**
 * Consume all item slots of a tag and convert the first VM of them
 *
 * VM 0 declares a variable count: values run up to the first empty item.
 */
function readItems(context: ReadContext, request: ItemRequest): CsaItemValue[] {
  const { view } = context;
  const values: CsaItemValue[] = [];
  const variable = request.vm === 0;
  let valueLimit = variable ? request.nItems : request.vm;

  for (let itemIndex = 0; itemIndex < request.nItems; itemIndex++) {
    const itemOffset = view.position;
    const x0 = view.readInt32();
    const x1 = view.readInt32();
    view.skip(8); // x2, x3

    let itemLength: number;
    if (context.csaType === 1) {
      itemLength = x0 - (context.firstTagItems ?? 0);
      if (itemLength < 0 || itemLength > view.remaining()) {
        // Legacy layout: an impossible length ends the item list
        if (itemIndex < request.vm) {
          values.push(null);
        }
        break;
      }
    } else {
      itemLength = x1;
      if (itemLength < 0) {
        throw createParseError('MalformedHeader', `Negative item length ${itemLength}`, {
          tag: request.name,
          tagIndex: request.tagIndex,
          offset: itemOffset,
        });
      }
      if (itemLength > view.remaining()) {
        throw createParseError(
          'TruncatedStream',
          `Item length ${itemLength} reaches beyond the header (${view.remaining()} bytes left)`,
          { tag: request.name, tagIndex: request.tagIndex, offset: itemOffset }
        );
      }
    }

    const payload = view.read(itemLength);
    const remainder = itemLength % BYTE_ALIGNMENT;
    if (remainder !== 0) {
      view.skip(BYTE_ALIGNMENT - remainder);
    }

    if (itemIndex >= valueLimit) {
      continue;
    }
    if (itemLength === 0) {
      if (variable) {
        valueLimit = itemIndex;
      } else {
        values.push(null);
      }
      continue;
    }
    values.push(convertValue(request.vr, payload, { numericEncoding: context.numericEncoding }));
  }

  return values;
}

/**
 * Attach tag details to an error; cursor exhaustion inside a tag means the
 * stream declared more than it holds
 */
function withTagContext(
  error: unknown,
  name: string | undefined,
  tagIndex: number,
  offset: number
): CsaParseError {
  if (isCsaParseError(error, 'OutOfBounds')) {
    return createParseError(
      'TruncatedStream',
      'Header ended before all declared tags were read',
      { tag: name, tagIndex, offset: error.offset ?? offset },
      error
    );
  }
  if (isCsaParseError(error)) {
    if (error.tagIndex !== undefined) {
      return error;
    }
    return createParseError(error.kind, error.message, { tag: name, tagIndex, offset }, error);
  }
  if (error instanceof Error) {
    return createParseError('MalformedHeader', error.message, { tag: name, tagIndex, offset }, error);
  }
  return createParseError('MalformedHeader', String(error), { tag: name, tagIndex, offset });
}
