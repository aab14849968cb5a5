/**
 * DICOM integration: locate CSA data inside a Part 10 file
 *
 * Container parsing is left to dicom-parser; this module only knows where
 * Siemens stores its private headers.
 */

import * as dicomParser from 'dicom-parser';
import { createParseError } from '../core/errors';
import { parseCsaHeader, type CsaParseOptions } from '../core/parser';
import { parseProtocol } from '../core/protocolParser';
import type { ParsedHeader, ProtocolBlock } from '../core/types';
import { decodeLatin1 } from './SafeDataView';

export type CsaHeaderKind = 'image' | 'series';

/**
 * CSA Image Header Info (0029,1010) and CSA Series Header Info (0029,1020)
 */
export const CSA_ELEMENT_TAGS: Readonly<Record<CsaHeaderKind, string>> = {
  image: 'x00291010',
  series: 'x00291020',
};

/** XA Enhanced: SharedFunctionalGroupsSequence > (0021,10FE) > (0021,1019) */
const SHARED_FUNCTIONAL_GROUPS_SEQUENCE = 'x52009229';
const MR_PROTOCOL_SEQUENCE = 'x002110fe';
const XPROTOCOL_ELEMENT = 'x00211019';

/**
 * Options for reading CSA data out of a DICOM file
 */
export interface DicomCsaOptions extends CsaParseOptions {
  /** Which CSA element to decode. Default: 'image' */
  kind?: CsaHeaderKind;
}

/**
 * CSA data found in a DICOM file: a binary CSA header, or for XA Enhanced
 * files the XProtocol that replaces it
 */
export type DicomCsaResult =
  | { source: 'csa'; header: ParsedHeader }
  | { source: 'xprotocol'; protocol: ProtocolBlock };

function loadDataSet(dicomBytes: Uint8Array): dicomParser.DataSet {
  try {
    return dicomParser.parseDicom(dicomBytes);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw createParseError(
      'InvalidDicom',
      `Unable to read DICOM data: ${reason}`,
      {},
      error instanceof Error ? error : undefined
    );
  }
}

function elementBytes(dataSet: dicomParser.DataSet, tag: string): Uint8Array | undefined {
  const element = dataSet.elements[tag];
  if (!element || element.length <= 0) {
    return undefined;
  }
  return dataSet.byteArray.subarray(element.dataOffset, element.dataOffset + element.length);
}

function firstItem(dataSet: dicomParser.DataSet | undefined, tag: string): dicomParser.DataSet | undefined {
  return dataSet?.elements[tag]?.items?.[0]?.dataSet;
}

/**
 * Raw bytes of the CSA image or series header element
 */
export function extractCsaBytes(dicomBytes: Uint8Array, kind: CsaHeaderKind = 'image'): Uint8Array | undefined {
  return elementBytes(loadDataSet(dicomBytes), CSA_ELEMENT_TAGS[kind]);
}

/**
 * Raw XProtocol bytes of an XA Enhanced file
 */
export function extractXProtocolBytes(dicomBytes: Uint8Array): Uint8Array | undefined {
  return findXProtocol(loadDataSet(dicomBytes));
}

function findXProtocol(dataSet: dicomParser.DataSet): Uint8Array | undefined {
  const protocolItem = firstItem(firstItem(dataSet, SHARED_FUNCTIONAL_GROUPS_SEQUENCE), MR_PROTOCOL_SEQUENCE);
  return protocolItem ? elementBytes(protocolItem, XPROTOCOL_ELEMENT) : undefined;
}

/**
 * Decode the CSA header of a DICOM file
 *
 * Numeric VRs default to text storage here, the way scanners write them.
 * Files without CSA elements fall back to the XA Enhanced XProtocol.
 *
 * @returns undefined when the file carries neither
 */
export function readCsaFromDicom(dicomBytes: Uint8Array, options: DicomCsaOptions = {}): DicomCsaResult | undefined {
  const dataSet = loadDataSet(dicomBytes);
  const raw = elementBytes(dataSet, CSA_ELEMENT_TAGS[options.kind ?? 'image']);

  if (raw) {
    const header = parseCsaHeader(raw, {
      ...options,
      numericEncoding: options.numericEncoding ?? 'text',
    });
    return { source: 'csa', header };
  }

  const xprotocol = findXProtocol(dataSet);
  if (xprotocol) {
    return { source: 'xprotocol', protocol: parseProtocol(decodeLatin1(xprotocol)) };
  }

  return undefined;
}
