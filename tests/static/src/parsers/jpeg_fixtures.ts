/**
 * Helpers to assemble small JPEG byte streams for tests.
 */

/** Worked AC chrominance table: 16 buckets, index = code length - 1 */
export const CHROMINANCE_AC_BUCKETS: number[][] = [
    [],
    [0x01],
    [0x02, 0x11],
    [0x00, 0x03, 0x04, 0x21],
    [0x05, 0x12, 0x31],
    [0x06, 0x41, 0x51, 0x61],
    [0x13, 0x22, 0x71, 0x81, 0x91, 0xa1],
    [0x14, 0x32, 0xb1, 0xd1, 0xf0],
    [0x15, 0x23, 0x35, 0x42, 0xb2, 0xc1],
    [0x07, 0x16, 0x24, 0x33, 0x52, 0x72, 0x73, 0xe1],
    [0x25, 0x34, 0x43, 0x53, 0x62, 0x74, 0x82, 0x94, 0xa2, 0xf1],
    [0x26, 0x44, 0x54, 0x63, 0x64, 0x92, 0x93, 0xc2, 0xd2],
    [0x55, 0x56, 0x84, 0xb3],
    [0x45, 0x83],
    [0x46, 0xa3, 0xe2],
    [],
];

/** Pad a list of leading buckets to all 16 code lengths */
export function buckets(...leading: number[][]): number[][] {
    const ret = leading.map(b => [...b]);
    while (ret.length < 16) ret.push([]);
    return ret;
}

/** A marker segment with a length field: FF tag len_hi len_lo payload... */
export function segment(tag: number, payload: ArrayLike<number>): number[] {
    const length = payload.length + 2;
    return [0xff, tag, length >> 8, length & 0xff, ...Array.from(payload)];
}

/** Payload of one DHT table definition */
export function huffmanTableDefinition(tc: number, th: number, table: number[][]): number[] {
    return [(tc << 4) | th, ...table.map(b => b.length), ...table.flat()];
}

/** SOS segment: length covers the metadata only, followed by raw scan data */
export function scanSegment(metadata: number[], data: number[]): number[] {
    return [0xff, 0xda, (metadata.length + 2) >> 8, (metadata.length + 2) & 0xff, ...metadata, ...data];
}

/** SOI + segments + EOI */
export function jpegFile(...segments: number[][]): Uint8Array {
    return Uint8Array.from([0xff, 0xd8, ...segments.flat(), 0xff, 0xd9]);
}
