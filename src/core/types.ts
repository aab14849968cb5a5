/**
 * Type definitions for the CSA header decoder
 */

/**
 * Scalar produced by the protocol text decoder
 */
export type ProtocolScalar = string | number;

/**
 * Node of a decoded ASCCONV / XProtocol tree
 */
export type ProtocolNode = ProtocolScalar | ProtocolNode[] | ProtocolBlock;

/**
 * Keyed node of a decoded protocol tree
 */
export interface ProtocolBlock {
  [key: string]: ProtocolNode;
}

/**
 * Value of a single CSA item after VR conversion
 */
export type CsaItemValue = string | number | Uint8Array | null;

/**
 * Value stored on a tag; the protocol tag holds its decoded tree
 */
export type CsaValue = CsaItemValue | ProtocolBlock;

/**
 * How fixed-width numeric VRs (SS, US, SL, UL, FL, FD) are stored
 */
export type NumericEncoding = 'binary' | 'text';

/**
 * CSA binary layout: 1 (legacy) or 2 (`SV10` marker)
 */
export type CsaType = 1 | 2;

/**
 * A single decoded CSA tag
 */
export interface CsaTag {
  name: string;
  /** Value representation code, e.g. "DS" */
  vr: string;
  /** Declared value multiplicity */
  vm: number;
  syngoDt: number;
  /** Item slots physically present in the stream */
  nItems: number;
  values: CsaValue[];
}

/**
 * Decoded header: tag name -> tag, iterated in stream order
 */
export type ParsedHeader = Map<string, CsaTag>;
