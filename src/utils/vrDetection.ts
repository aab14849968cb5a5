/**
 * VR Detection: Value representation lookup for CSA tags
 *
 * Maps the 2-character VR code stored with every CSA tag to the kind of
 * value its items carry.
 */

/**
 * How the bytes of a single CSA item are interpreted
 */
export type VrKind =
  | 'string'
  | 'integerString'
  | 'decimalString'
  | 'int16'
  | 'uint16'
  | 'int32'
  | 'uint32'
  | 'float32'
  | 'float64'
  | 'opaque';

/**
 * Fixed set of VR codes understood by the decoder
 */
const VR_MAP = new Map<string, VrKind>([
  // Text
  ['AE', 'string'], // Application Entity
  ['AS', 'string'], // Age String
  ['CS', 'string'], // Code String
  ['DA', 'string'], // Date
  ['DT', 'string'], // Date Time
  ['LO', 'string'], // Long String
  ['LT', 'string'], // Long Text
  ['PN', 'string'], // Person Name
  ['SH', 'string'], // Short String
  ['ST', 'string'], // Short Text
  ['TM', 'string'], // Time
  ['UC', 'string'], // Unlimited Characters
  ['UI', 'string'], // Unique Identifier
  ['UR', 'string'], // URI
  ['UT', 'string'], // Unlimited Text

  // Numbers written as text
  ['IS', 'integerString'],
  ['DS', 'decimalString'],

  // Fixed-width binary numbers
  ['SS', 'int16'],
  ['US', 'uint16'],
  ['SL', 'int32'],
  ['UL', 'uint32'],
  ['FL', 'float32'],
  ['FD', 'float64'],

  // Uninterpreted
  ['OB', 'opaque'],
  ['OW', 'opaque'],
  ['UN', 'opaque'],
]);

/**
 * Byte width of the fixed-width numeric kinds
 */
export const FIXED_WIDTH: Readonly<Partial<Record<VrKind, number>>> = {
  int16: 2,
  uint16: 2,
  int32: 4,
  uint32: 4,
  float32: 4,
  float64: 8,
};

/**
 * Resolve a VR code to its kind; codes outside the table are opaque
 */
export function detectVrKind(vr: string): VrKind {
  return VR_MAP.get(vr.trim().toUpperCase()) ?? 'opaque';
}

export function isStringVr(vr: string): boolean {
  return detectVrKind(vr) === 'string';
}

export function isFixedWidthVr(vr: string): boolean {
  return FIXED_WIDTH[detectVrKind(vr)] !== undefined;
}
