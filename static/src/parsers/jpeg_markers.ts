/**
 * @file Data model produced by the JPEG segment scanner.
 * @see https://www.w3.org/Graphics/JPEG/itu-t81.pdf Annex B
 */
import { CorruptError } from "../errors.js";
import { hex } from "../trace.js";

/** Second byte of a marker; the first one is always 0xFF */
export enum JpegMarker {
    // Start of Frame markers, non-differential, Huffman coding
    SOF0 = 0xc0, // Baseline DCT
    SOF1 = 0xc1, // Extended sequential DCT
    SOF2 = 0xc2, // Progressive DCT
    SOF3 = 0xc3, // Lossless (sequential)
    // Huffman table specification
    DHT = 0xc4, // Define Huffman table(s)
    // Start of Frame markers, differential, Huffman coding
    SOF5 = 0xc5, // Differential sequential DCT
    SOF6 = 0xc6, // Differential progressive DCT
    SOF7 = 0xc7, // Differential lossless (sequential)
    // Start of Frame markers, non-differential, arithmetic coding
    SOF9 = 0xc9, // Extended sequential DCT
    SOF10 = 0xca, // Progressive DCT
    SOF11 = 0xcb, // Lossless (sequential)
    // Arithmetic coding conditioning specification
    DAC = 0xcc, // Define arithmetic coding conditioning(s)
    // Start of Frame markers, differential, arithmetic coding
    SOF13 = 0xcd, // Differential sequential DCT
    SOF14 = 0xce, // Differential progressive DCT
    SOF15 = 0xcf, // Differential lossless (sequential)
    // Restart interval termination
    RST0 = 0xd0,
    RST1 = 0xd1,
    RST2 = 0xd2,
    RST3 = 0xd3,
    RST4 = 0xd4,
    RST5 = 0xd5,
    RST6 = 0xd6,
    RST7 = 0xd7,

    /** Start of image */
    SOI = 0xd8,
    /** End of image */
    EOI = 0xd9,
    /** Start of scan */
    SOS = 0xda,
    /** Define quantization table(s) */
    DQT = 0xdb,
    /** Define number of lines */
    DNL = 0xdc,
    /** Define restart interval */
    DRI = 0xdd,
    /** Define hierarchical progression */
    DHP = 0xde,
    /** Expand reference component(s) */
    EXP = 0xdf,
    APP0 = 0xe0,
    APP1 = 0xe1,
    APP2 = 0xe2,
    APP3 = 0xe3,
    APP4 = 0xe4,
    APP5 = 0xe5,
    APP6 = 0xe6,
    APP7 = 0xe7,
    APP8 = 0xe8,
    APP9 = 0xe9,
    APP10 = 0xea,
    APP11 = 0xeb,
    APP12 = 0xec,
    APP13 = 0xed,
    APP14 = 0xee,
    APP15 = 0xef,
    /** Comment */
    COM = 0xfe,
}

/** Mnemonic of a marker tag byte, e.g. "DHT"; unassigned tags print as hex. */
export function markerName(tag: number): string {
    const name: string | undefined = JpegMarker[tag];
    return name ?? hex(tag);
}

export function isRestartMarker(tag: number): boolean {
    return tag >= JpegMarker.RST0 && tag <= JpegMarker.RST7;
}

/** Number of code lengths a Huffman table distinguishes (1..16 bits). */
export const MAX_CODE_LENGTH = 16;

export enum HuffmanTableClass {
    LuminanceDC = "LuminanceDC",
    LuminanceAC = "LuminanceAC",
    ChrominanceDC = "ChrominanceDC",
    ChrominanceAC = "ChrominanceAC",
}

/**
 * Map the (class, id) nibble pair of a DHT table definition to its table class.
 * Only ids 0 and 1 are recognised.
 */
export function huffmanTableClass(tc: number, th: number): HuffmanTableClass {
    switch ((tc << 4) | th) {
        case 0x00:
            return HuffmanTableClass.LuminanceDC;
        case 0x01:
            return HuffmanTableClass.LuminanceAC;
        case 0x10:
            return HuffmanTableClass.ChrominanceDC;
        case 0x11:
            return HuffmanTableClass.ChrominanceAC;
        default:
            throw new CorruptError(`Unrecognized Huffman table class/id pair (${tc},${th})`);
    }
}

/**
 * Symbols grouped by code length: entry `len - 1` holds the symbols coded
 * with `len` bits, in assignment order.
 */
export type SymbolBuckets = readonly [
    Uint8Array, Uint8Array, Uint8Array, Uint8Array,
    Uint8Array, Uint8Array, Uint8Array, Uint8Array,
    Uint8Array, Uint8Array, Uint8Array, Uint8Array,
    Uint8Array, Uint8Array, Uint8Array, Uint8Array,
];

export function isSymbolBuckets(buckets: ReadonlyArray<Uint8Array>): buckets is SymbolBuckets {
    return buckets.length === MAX_CODE_LENGTH;
}

/** Narrow a list of buckets to SymbolBuckets, or throw if it does not have one per code length */
export function toSymbolBuckets(buckets: ReadonlyArray<Uint8Array>): SymbolBuckets {
    if (!isSymbolBuckets(buckets)) {
        throw new CorruptError(`Huffman table needs ${MAX_CODE_LENGTH} length buckets, got ${buckets.length}`);
    }
    return buckets;
}

export interface HuffmanTable {
    class: HuffmanTableClass;
    symbols: SymbolBuckets;
}

/** Build a HuffmanTable, checking that there are exactly 16 buckets of byte values */
export function makeHuffmanTable(
    tableClass: HuffmanTableClass,
    buckets: ReadonlyArray<ArrayLike<number>>,
): HuffmanTable {
    const symbols = buckets.map((bucket, i) => {
        for (let j = 0; j < bucket.length; j++) {
            const value = bucket[j];
            if (!Number.isInteger(value) || value < 0 || value > 0xff) {
                throw new CorruptError(`Symbol ${value} of length ${i + 1} is not a byte value`);
            }
        }
        return Uint8Array.from(bucket);
    });
    return { class: tableClass, symbols: toSymbolBuckets(symbols) };
}

export interface ScanComponent {
    id: number;
    /** horizontal sampling factor (high nibble of the packed byte) */
    hFactor: number;
    /** vertical sampling factor (low nibble of the packed byte) */
    vFactor: number;
    /** quantization table index */
    quantId: number;
}

export interface ScanMetadata {
    precision: number;
    height: number;
    width: number;
    components: ScanComponent[];
}

export interface GenericMarker {
    kind: "generic";
    tag: number;
    /**
     * The declared segment length L exactly as stored in the file. L counts the
     * two length bytes themselves, so it is 2 more than `data.length`.
     */
    length: number;
    /** the L − 2 payload bytes that follow the length field */
    data: Uint8Array;
}

export interface HuffmanTableMarker {
    kind: "huffman";
    tables: HuffmanTable[];
}

export interface QuantizationTableMarker {
    kind: "quantization";
    /** raw id byte: precision in the high nibble, table id in the low nibble */
    id: number;
    /** 64 coefficients in zigzag order */
    coefficients: Uint8Array;
}

export interface ScanMarker {
    kind: "scan";
    /** declared header length, not used to delimit anything */
    length: number;
    metadata: ScanMetadata;
    /** entropy-coded payload, still byte-stuffed */
    data: Uint8Array;
}

export type Marker = GenericMarker | HuffmanTableMarker | QuantizationTableMarker | ScanMarker;

/** Tag byte a marker record was read from */
export function markerTag(marker: Marker): number {
    switch (marker.kind) {
        case "generic":
            return marker.tag;
        case "huffman":
            return JpegMarker.DHT;
        case "quantization":
            return JpegMarker.DQT;
        case "scan":
            return JpegMarker.SOS;
    }
}

/** First Huffman table of the given class across all DHT markers, in file order */
export function findHuffmanTable(
    markers: ReadonlyArray<Marker>,
    tableClass: HuffmanTableClass,
): HuffmanTable | undefined {
    for (const marker of markers) {
        if (marker.kind !== "huffman") continue;
        const table = marker.tables.find(t => t.class === tableClass);
        if (table) return table;
    }
    return undefined;
}
