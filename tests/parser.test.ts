import { describe, expect, it } from 'vitest';
import { CsaParseError } from '../src/core/errors';
import { getProtocol, getTagValue, headerToObject, parseCsaHeader } from '../src/core/parser';
import { detectCsaType } from '../src/core/tagReader';
import { ascii, buildCsa1, buildCsa2, concatArrays, float64, int32, uint16, type TagSpec } from './helpers/csaBuilder';

function captureError(fn: () => unknown): CsaParseError {
  try {
    fn();
  } catch (error) {
    if (error instanceof CsaParseError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a CsaParseError');
}

const THREE_TAGS: TagSpec[] = [
  { name: 'ImaCoilString', vr: 'LO', vm: 1, items: ['HEA;HEP\0'] },
  { name: 'EchoLinePosition', vr: 'IS', vm: 1, syngoDt: 6, items: ['64\0'] },
  { name: 'SliceNormalVector', vr: 'FD', vm: 3, items: [float64(0), float64(0.5), float64(1)] },
];

const ASCCONV_TEXT = [
  '### ASCCONV BEGIN ###',
  'sSliceArray.lSize = 3',
  'sKSpace.dSliceResolution = 1.0',
  '### ASCCONV END ###',
  '',
].join('\n');

describe('detectCsaType', () => {
  it('recognizes the SV10 marker', () => {
    expect(detectCsaType(buildCsa2(THREE_TAGS))).toBe(2);
    expect(detectCsaType(buildCsa1(THREE_TAGS))).toBe(1);
    expect(detectCsaType(ascii('SV1'))).toBe(1);
  });
});

describe('parseCsaHeader', () => {
  describe('Type 2', () => {
    it('decodes tags field by field in stream order', () => {
      const header = parseCsaHeader(buildCsa2(THREE_TAGS));

      expect([...header.keys()]).toEqual(['ImaCoilString', 'EchoLinePosition', 'SliceNormalVector']);
      expect(header.get('ImaCoilString')).toEqual({
        name: 'ImaCoilString',
        vr: 'LO',
        vm: 1,
        syngoDt: 0,
        nItems: 1,
        values: ['HEA;HEP'],
      });
      expect(header.get('EchoLinePosition')).toEqual({
        name: 'EchoLinePosition',
        vr: 'IS',
        vm: 1,
        syngoDt: 6,
        nItems: 1,
        values: [64],
      });
      expect(header.get('SliceNormalVector')?.values).toEqual([0, 0.5, 1]);
    });

    it('is deterministic', () => {
      const bytes = buildCsa2(THREE_TAGS);
      const first = parseCsaHeader(bytes);
      const second = parseCsaHeader(bytes);
      expect(second).toEqual(first);
      expect([...second.keys()]).toEqual([...first.keys()]);
    });

    it('keeps only VM values when more items are present', () => {
      const header = parseCsaHeader(
        buildCsa2([
          { name: 'Decoupled', vr: 'IS', vm: 2, items: ['1', '2', '3', '4', '5'] },
          { name: 'After', vr: 'LO', vm: 1, items: ['ok'] },
        ])
      );

      expect(header.get('Decoupled')?.values).toEqual([1, 2]);
      expect(header.get('Decoupled')?.nItems).toBe(5);
      expect(header.get('After')?.values).toEqual(['ok']);
    });

    it('consumes the item slots of VM 0 tags', () => {
      const header = parseCsaHeader(
        buildCsa2([
          { name: 'Empty', vr: 'DS', vm: 0, items: ['', '', '', '', '', ''] },
          { name: 'After', vr: 'LO', vm: 1, items: ['ok'] },
        ])
      );

      expect(header.get('Empty')?.values).toEqual([]);
      expect(header.get('After')?.values).toEqual(['ok']);
    });

    it('reads VM 0 tags up to the first empty item', () => {
      const header = parseCsaHeader(
        buildCsa2([
          { name: 'Variable', vr: 'IS', vm: 0, items: ['42\0\0', '7', '', '9'] },
          { name: 'After', vr: 'LO', vm: 1, items: ['ok'] },
        ])
      );

      expect(header.get('Variable')?.values).toEqual([42, 7]);
      expect(getTagValue(header, 'Variable')).toEqual([42, 7]);
      expect(header.get('After')?.values).toEqual(['ok']);
    });

    it('returns the single value of a populated VM 0 tag', () => {
      const header = parseCsaHeader(
        buildCsa2([{ name: 'Variable', vr: 'IS', vm: 0, items: ['42\0\0', '', '', ''] }])
      );
      expect(getTagValue(header, 'Variable')).toBe(42);
    });

    it('turns zero-length items into null', () => {
      const header = parseCsaHeader(buildCsa2([{ name: 'Partial', vr: 'IS', vm: 2, items: ['5', ''] }]));
      expect(header.get('Partial')?.values).toEqual([5, null]);
    });

    it('keeps opaque items as bytes and decodes binary numbers', () => {
      const header = parseCsaHeader(
        buildCsa2([
          { name: 'Blob', vr: 'UN', vm: 1, items: [new Uint8Array([1, 2, 3])] },
          { name: 'Rows', vr: 'US', vm: 1, items: [uint16(3)] },
        ])
      );

      const blob = header.get('Blob')?.values[0];
      expect(blob).toBeInstanceOf(Uint8Array);
      expect(blob instanceof Uint8Array ? Array.from(blob) : []).toEqual([1, 2, 3]);
      expect(header.get('Rows')?.values).toEqual([3]);
    });

    it('reads numeric VRs stored as text when asked to', () => {
      const bytes = buildCsa2([{ name: 'Rows', vr: 'US', vm: 1, items: ['256\0'] }]);

      expect(parseCsaHeader(bytes, { numericEncoding: 'text' }).get('Rows')?.values).toEqual([256]);
      expect(captureError(() => parseCsaHeader(bytes)).kind).toBe('SizeMismatch');
    });

    it('uses the whole name field when it has no terminating null', () => {
      const name = 'A'.repeat(64);
      const header = parseCsaHeader(buildCsa2([{ name, vr: 'IS', vm: 1, items: ['42\0'] }]));
      expect([...header.keys()]).toEqual([name]);
    });
  });

  describe('Type 1', () => {
    it('reads item lengths relative to the first tag item count', () => {
      const header = parseCsaHeader(
        buildCsa1([
          { name: 'Tag1', vr: 'IS', vm: 1, items: ['42\0\0'] },
          { name: 'Tag2', vr: 'LO', vm: 1, items: ['abc'] },
        ])
      );

      expect([...header.keys()]).toEqual(['Tag1', 'Tag2']);
      expect(header.get('Tag1')?.values).toEqual([42]);
      expect(header.get('Tag2')?.values).toEqual(['abc']);
    });

    it('stops reading a tag at an impossible item length', () => {
      const header = parseCsaHeader(
        buildCsa1([{ name: 'Tag1', vr: 'IS', vm: 1, nItems: 100, items: [{ data: new Uint8Array(0), x0: 50 }] }])
      );

      expect(header.get('Tag1')?.values).toEqual([null]);
      expect(header.get('Tag1')?.nItems).toBe(100);
    });
  });

  describe('malformed input', () => {
    it('fails with OutOfBounds below the minimum header', () => {
      expect(captureError(() => parseCsaHeader(new Uint8Array(0))).kind).toBe('OutOfBounds');
      expect(captureError(() => parseCsaHeader(new Uint8Array(3))).kind).toBe('OutOfBounds');
      expect(captureError(() => parseCsaHeader(concatArrays(ascii('SV10'), int32(1)))).kind).toBe('OutOfBounds');
    });

    it('fails with MalformedHeader for implausible tag counts', () => {
      const tooMany = concatArrays(ascii('SV10'), new Uint8Array([4, 3, 2, 1]), int32(10000), int32(0), new Uint8Array(100));
      expect(captureError(() => parseCsaHeader(tooMany)).kind).toBe('MalformedHeader');

      const negative = concatArrays(int32(-1), int32(0), new Uint8Array(100));
      const error = captureError(() => parseCsaHeader(negative));
      expect(error.kind).toBe('MalformedHeader');
      expect(error.offset).toBe(0);
    });

    it('fails with InvalidCheckBit and reports the tag', () => {
      const bytes = buildCsa2([
        { name: 'First', vr: 'IS', vm: 1, items: ['1'] },
        { name: 'Second', vr: 'IS', vm: 1, checkBit: 0, items: ['2'] },
      ]);

      const error = captureError(() => parseCsaHeader(bytes));
      expect(error.kind).toBe('InvalidCheckBit');
      expect(error.tagIndex).toBe(1);
      expect(error.tag).toBe('Second');
      expect(error.offset).toBe(200);
    });

    it('fails with TruncatedStream when the last byte is missing', () => {
      const bytes = buildCsa2(THREE_TAGS);

      const error = captureError(() => parseCsaHeader(bytes.slice(0, bytes.length - 1)));
      expect(error.kind).toBe('TruncatedStream');
      expect(error.tagIndex).toBe(2);
      expect(error.tag).toBe('SliceNormalVector');
    });

    it('fails with TruncatedStream when a tag is cut inside its fixed fields', () => {
      const first: TagSpec = { name: 'First', vr: 'IS', vm: 1, items: ['1'] };
      const bytes = buildCsa2([first, { name: 'Second', vr: 'IS', vm: 1, items: ['2'] }]);
      // prefix (16) + first tag (104) + name and VM of the second tag (68) + 2 VR bytes
      const cut = bytes.slice(0, 16 + 104 + 70);

      const error = captureError(() => parseCsaHeader(cut));
      expect(error.kind).toBe('TruncatedStream');
      expect(error.tagIndex).toBe(1);
      expect(error.tag).toBe('Second');
      expect(error.cause).toBeInstanceOf(CsaParseError);
    });

    it('fails with TruncatedStream when an item claims more bytes than remain', () => {
      const bytes = buildCsa2([{ name: 'Long', vr: 'LO', vm: 1, items: [{ data: ascii('ab'), x1: 1000 }] }]);
      expect(captureError(() => parseCsaHeader(bytes)).kind).toBe('TruncatedStream');
    });

    it('fails with MalformedHeader for a negative item length', () => {
      const bytes = buildCsa2([{ name: 'Negative', vr: 'LO', vm: 1, items: [{ data: ascii('ab'), x1: -4 }] }]);
      expect(captureError(() => parseCsaHeader(bytes)).kind).toBe('MalformedHeader');
    });

    it('fails with SizeMismatch and reports the tag', () => {
      const bytes = buildCsa2([{ name: 'Rows', vr: 'US', vm: 1, items: [new Uint8Array([1, 2, 3])] }]);

      const error = captureError(() => parseCsaHeader(bytes));
      expect(error.kind).toBe('SizeMismatch');
      expect(error.tag).toBe('Rows');
      expect(error.tagIndex).toBe(0);
    });

    it('rejects protocol text passed to the binary decoder', () => {
      const text = ascii('<XProtocol> { <Name> "PhoenixMetaProtocol" }');
      expect(captureError(() => parseCsaHeader(text)).kind).toBe('MalformedHeader');
    });
  });

  describe('protocol tags', () => {
    it('replaces the MrPhoenixProtocol string with its decoded tree', () => {
      const header = parseCsaHeader(
        buildCsa2([
          { name: 'UsedPatientWeight', vr: 'IS', vm: 1, items: ['70\0'] },
          { name: 'MrPhoenixProtocol', vr: 'ST', vm: 1, items: [ASCCONV_TEXT] },
        ])
      );

      expect([...header.keys()]).toEqual(['UsedPatientWeight', 'MrPhoenixProtocol']);
      expect(header.get('MrPhoenixProtocol')?.values).toEqual([
        { sSliceArray: { lSize: 3 }, sKSpace: { dSliceResolution: 1 } },
      ]);
      expect(getProtocol(header)).toEqual({ sSliceArray: { lSize: 3 }, sKSpace: { dSliceResolution: 1 } });
    });

    it('decodes protocol text stored under an opaque VR', () => {
      const header = parseCsaHeader(
        buildCsa2([{ name: 'MrPhoenixProtocol', vr: 'UN', vm: 1, items: [ascii(ASCCONV_TEXT)] }])
      );
      expect(getProtocol(header)).toEqual({ sSliceArray: { lSize: 3 }, sKSpace: { dSliceResolution: 1 } });
    });

    it('leaves the text alone when protocol parsing is disabled', () => {
      const header = parseCsaHeader(
        buildCsa2([{ name: 'MrPhoenixProtocol', vr: 'ST', vm: 1, items: [ASCCONV_TEXT] }]),
        { parseProtocol: false }
      );

      expect(header.get('MrPhoenixProtocol')?.values).toEqual([ASCCONV_TEXT.trimEnd()]);
      expect(getProtocol(header)).toBeUndefined();
    });

    it('decodes custom protocol tags', () => {
      const header = parseCsaHeader(buildCsa2([{ name: 'MyProtocol', vr: 'LT', vm: 1, items: ['sWipMemBlock.alFree[1] = 0x10'] }]), {
        protocolTags: ['MyProtocol'],
      });
      expect(getProtocol(header, 'MyProtocol')).toEqual({ sWipMemBlock: { alFree: [{}, 16] } });
    });
  });
});

describe('value accessors', () => {
  const header = parseCsaHeader(
    buildCsa2([
      { name: 'EchoLinePosition', vr: 'IS', vm: 1, items: ['64'] },
      { name: 'ImagePositionPatient', vr: 'DS', vm: 3, items: ['-10.5', '2', '30'] },
      { name: 'Empty', vr: 'DS', vm: 0, items: ['', '', '', ''] },
    ])
  );

  it('getTagValue collapses values', () => {
    expect(getTagValue(header, 'EchoLinePosition')).toBe(64);
    expect(getTagValue(header, 'ImagePositionPatient')).toEqual([-10.5, 2, 30]);
    expect(getTagValue(header, 'Empty')).toBeNull();
    expect(getTagValue(header, 'Missing')).toBeNull();
  });

  it('headerToObject keeps stream order', () => {
    const object = headerToObject(header);
    expect(Object.keys(object)).toEqual(['EchoLinePosition', 'ImagePositionPatient', 'Empty']);
    expect(object['ImagePositionPatient']).toEqual({ VR: 'DS', VM: 3, value: [-10.5, 2, 30] });
    expect(object['Empty']).toEqual({ VR: 'DS', VM: 0, value: null });
  });
});
