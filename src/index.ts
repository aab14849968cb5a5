/**
 * csa-header: Siemens CSA header decoding
 *
 * Decodes the binary CSA headers embedded in Siemens DICOM files and the
 * ASCCONV / XProtocol text they carry.
 *
 * @module csa-header
 */

/** Core parser entry points */
export {
  parseCsaHeader,
  getTagValue,
  getProtocol,
  headerToObject,
  ASCII_HEADER_TAGS,
  type CsaParseOptions,
  type CsaTagObject,
} from './core/parser';
export { readTags, detectCsaType, TYPE_2_IDENTIFIER, VALID_CHECK_BIT_VALUES } from './core/tagReader';
export {
  parseProtocol,
  parseProtocolDetailed,
  MAX_ARRAY_INDEX,
  parseLiteral,
  getSliceCount,
  type ProtocolParseResult,
} from './core/protocolParser';
export { CsaParseError, createParseError, isCsaParseError, type CsaErrorKind } from './core/errors';
export type {
  CsaItemValue,
  CsaTag,
  CsaType,
  CsaValue,
  NumericEncoding,
  ParsedHeader,
  ProtocolBlock,
  ProtocolNode,
  ProtocolScalar,
} from './core/types';
/** Safe byte readers and value conversion */
export { SafeDataView, decodeLatin1 } from './utils/SafeDataView';
export { convertValue, parseDecimalString, parseIntegerString, type ConvertOptions } from './utils/valueParsers';
export { detectVrKind, type VrKind } from './utils/vrDetection';
/** DICOM integration */
export {
  readCsaFromDicom,
  extractCsaBytes,
  extractXProtocolBytes,
  CSA_ELEMENT_TAGS,
  type CsaHeaderKind,
  type DicomCsaOptions,
  type DicomCsaResult,
} from './utils/dicom';
