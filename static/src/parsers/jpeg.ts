/**
 * @file JPEG segment scanner: splits a JPEG byte stream into its marker segments.
 * @see https://www.w3.org/Graphics/JPEG/itu-t81.pdf
 * @see https://www.w3.org/Graphics/JPEG/jfif3.pdf
 */
import { arrayBeginsWith } from '../bits/bits.js';
import { ByteReader } from '../bits/bytereader.js';
import { CorruptError, UnsupportedError } from '../errors.js';
import { TraceHook, hex } from '../trace.js';
import {
    HuffmanTable,
    JpegMarker,
    MAX_CODE_LENGTH,
    Marker,
    ScanComponent,
    ScanMarker,
    huffmanTableClass,
    isRestartMarker,
    markerName,
    toSymbolBuckets,
} from './jpeg_markers.js';

/**
 * Where the entropy-coded payload of a scan ends.
 * - `"eoi"`: at the first FF D9 byte pair. Byte-stuffing is ignored, so a file
 *   with several scans ends up with everything up to EOI in the first one.
 * - `"marker"`: at the first FF of a run of FF bytes that ends in a marker
 *   other than a restart marker. A run ending in 00 (a stuffed FF) or RSTn
 *   stays in the payload. Scanning then carries on with that marker.
 */
export type ScanEnd = "eoi" | "marker";

export interface DecodeOptions {
    /** receives one line per segment */
    trace?: TraceHook;
    scanEnd?: ScanEnd;
}

export const DEFAULT_DECODE_OPTIONS: Readonly<Required<Pick<DecodeOptions, "scanEnd">>> = {
    scanEnd: "eoi",
};

const SOI_BYTES = new Uint8Array([0xff, JpegMarker.SOI]);
const EOI_BYTES = new Uint8Array([0xff, JpegMarker.EOI]);

/** length field + class/id byte + 16 counts */
const MIN_DHT_LENGTH = 2 + 1 + MAX_CODE_LENGTH;
/** length field + id byte + 64 coefficients */
const DQT_LENGTH = 2 + 1 + 64;

/** Read a segment length field and check it against the smallest valid value. */
function readSegmentLength(reader: ByteReader, tag: number, minimum: number): number {
    const length = reader.readUint16();
    if (length < minimum) {
        throw new CorruptError(
            `${markerName(tag)} segment length ${length} is shorter than the minimum of ${minimum}`,
        );
    }
    return length;
}

/**
 * Parse the table definitions of a DHT segment body (everything after the length field).
 * B 2.4.2
 */
function parseHuffmanTables(body: Uint8Array): HuffmanTable[] {
    const reader = new ByteReader(body);
    const tables: HuffmanTable[] = [];
    while (reader.getRemainingBytes() > 0) {
        const [tc, th] = reader.readNibbles();
        const tableClass = huffmanTableClass(tc, th);
        // number of codes for each length
        const counts = reader.readBytes(MAX_CODE_LENGTH);
        const symbols: Uint8Array[] = [];
        for (let i = 0; i < MAX_CODE_LENGTH; i++) {
            symbols.push(reader.readBytes(counts[i]));
        }
        tables.push({ class: tableClass, symbols: toSymbolBuckets(symbols) });
    }
    return tables;
}

/**
 * Offset of the first marker that ends entropy-coded data, relative to the
 * reader position. Fill bytes (a run of FF before the marker) are not part of
 * the payload, so the offset points at the first FF of the run.
 */
function findMarkerAfterScan(reader: ByteReader): number {
    const remaining = reader.getRemainingBytes();
    for (let offset = 0; offset + 1 < remaining; offset++) {
        if (reader.peekUint8(offset) !== 0xff) continue;
        let last = offset;
        while (last + 1 < remaining && reader.peekUint8(last + 1) === 0xff) last++;
        if (last + 1 >= remaining) return -1;

        const next = reader.peekUint8(last + 1);
        if (next === 0x00 || isRestartMarker(next)) {
            // stuffed byte or restart marker: still scan data
            offset = last + 1;
            continue;
        }
        return offset;
    }
    return -1;
}

/** B 2.3, with the fixed metadata layout this library exposes as ScanMetadata */
function parseScan(reader: ByteReader, scanEnd: ScanEnd): ScanMarker {
    // the declared length does not delimit the payload
    const length = readSegmentLength(reader, JpegMarker.SOS, 2);

    const precision = reader.readUint8();
    const height = reader.readUint16();
    const width = reader.readUint16();
    const numComponents = reader.readUint8();

    const components: ScanComponent[] = [];
    for (let i = 0; i < numComponents; i++) {
        const id = reader.readUint8();
        const [hFactor, vFactor] = reader.readNibbles();
        const quantId = reader.readUint8();
        components.push({ id, hFactor, vFactor, quantId });
    }

    const dataLength = scanEnd === "marker" ? findMarkerAfterScan(reader) : reader.indexOf(EOI_BYTES);
    if (dataLength < 0) {
        throw new CorruptError(`Scan data at position ${reader.getPosition()} is not followed by an end marker`);
    }
    const data = reader.readBytes(dataLength);

    return {
        kind: "scan",
        length,
        metadata: { precision, height, width, components },
        data,
    };
}

/**
 * Split a JPEG file into its marker segments.
 *
 * The file must start with SOI and is read up to and including EOI; SOI and
 * EOI themselves are not part of the result. Any malformed or truncated
 * segment throws a ParserError and no markers are returned.
 */
export function decode(bytes: Uint8Array, options: DecodeOptions = {}): Marker[] {
    const { trace, scanEnd } = { ...DEFAULT_DECODE_OPTIONS, ...options };

    if (!arrayBeginsWith(bytes, SOI_BYTES)) {
        throw new CorruptError("SOI marker must be first marker, but data does not start with FF D8");
    }
    const reader = new ByteReader(bytes);
    reader.skip(SOI_BYTES.length);
    trace?.(`SOI (${hex(JpegMarker.SOI)})`);

    const markers: Marker[] = [];

    parseSegments: while (true) {
        if (reader.getRemainingBytes() === 0) {
            throw new CorruptError("Reached end of data before EOI marker");
        }
        const position = reader.getPosition();
        const ff = reader.readUint8();
        if (ff !== 0xff) {
            throw new CorruptError(`Expected FF at position ${position} but got ${hex(ff)} instead`);
        }

        let tag = reader.readUint8();
        // B 1.1.2: any marker may be preceded by FF fill bytes
        while (tag === 0xff) {
            tag = reader.readUint8();
        }

        let marker: Marker;
        switch (tag) {
            case JpegMarker.EOI:
                trace?.(`EOI (${hex(tag)})`);
                break parseSegments;
            case JpegMarker.SOI:
                throw new CorruptError(`Multiple SOI markers (second one at position ${position})`);
            case JpegMarker.SOS:
                marker = parseScan(reader, scanEnd);
                trace?.(`SOS (${hex(tag)}) length=${marker.length} scan data=${marker.data.length} bytes`);
                break;
            case JpegMarker.DHT: {
                // B 2.4.2
                const length = readSegmentLength(reader, tag, MIN_DHT_LENGTH);
                const tables = parseHuffmanTables(reader.readBytes(length - 2));
                marker = { kind: "huffman", tables };
                trace?.(`DHT (${hex(tag)}) length=${length} tables=${tables.map(t => t.class).join(",")}`);
                break;
            }
            case JpegMarker.DQT: {
                // B 2.4.1
                const length = readSegmentLength(reader, tag, DQT_LENGTH);
                if (length !== DQT_LENGTH) {
                    throw new UnsupportedError(
                        `DQT segment length ${length}: only a single 8-bit table per segment is supported`,
                    );
                }
                const id = reader.readUint8();
                const coefficients = reader.readBytes(64);
                marker = { kind: "quantization", id, coefficients };
                trace?.(`DQT (${hex(tag)}) length=${length} id=${hex(id)}`);
                break;
            }
            default: {
                const length = readSegmentLength(reader, tag, 2);
                const data = reader.readBytes(length - 2);
                marker = { kind: "generic", tag, length, data };
                trace?.(`${markerName(tag)} (${hex(tag)}) length=${length}`);
                break;
            }
        }
        markers.push(marker);
    }

    return markers;
}

/**
 * Remove byte-stuffing (FF 00 -> FF), fill bytes and restart markers from
 * entropy-coded scan data, leaving the bare bit sequence.
 */
export function unstuffScanData(data: Uint8Array): Uint8Array {
    const out: number[] = [];
    for (let i = 0; i < data.length; i++) {
        const byte = data[i];
        if (byte !== 0xff) {
            out.push(byte);
            continue;
        }
        if (i + 1 >= data.length) {
            throw new CorruptError(`Scan data ends in an incomplete marker at offset ${i}`);
        }
        const next = data[i + 1];
        if (next === 0xff) {
            // fill byte
            continue;
        }
        if (next === 0x00) {
            out.push(0xff);
        } else if (!isRestartMarker(next)) {
            throw new CorruptError(`Unexpected marker ${markerName(next)} inside scan data at offset ${i}`);
        }
        i++;
    }
    return Uint8Array.from(out);
}

/** Decode a COM segment payload */
export function parseComment(data: Uint8Array): string {
    const reader = new ByteReader(data);
    return reader.readFixedString(data.length, "latin1");
}

export enum JFIFUnits {
    NoUnits = 0,
    Inch = 1,
    Cm = 2,
}

export interface JFIFThumbnail {
    width: number;
    height: number;
    /** width × height RGB triples, row by row */
    rgb: Uint8Array;
}

/** Contents of a JFIF APP0 payload */
export interface JFIFData {
    version: { major: number; minor: number };
    /** pixel density, or only the aspect ratio when `units` is NoUnits */
    density: { units: JFIFUnits; x: number; y: number };
    thumbnail: JFIFThumbnail | null;
}

/** "JFIF" and a terminating zero byte */
const JFIF_SIGNATURE = Uint8Array.from([0x4a, 0x46, 0x49, 0x46, 0x00]);

function jfifUnits(value: number): JFIFUnits {
    switch (value) {
        case JFIFUnits.NoUnits:
            return JFIFUnits.NoUnits;
        case JFIFUnits.Inch:
            return JFIFUnits.Inch;
        case JFIFUnits.Cm:
            return JFIFUnits.Cm;
        default:
            throw new CorruptError(`Unknown JFIF density unit ${value}`);
    }
}

/** Parse the payload of an APP0 segment that carries a JFIF header */
export function parseJFIF(data: Uint8Array): JFIFData {
    if (!arrayBeginsWith(data, JFIF_SIGNATURE)) {
        throw new CorruptError("APP0 payload does not start with the JFIF signature");
    }
    const reader = new ByteReader(data).skip(JFIF_SIGNATURE.length);

    const [major, minor] = [reader.readUint8(), reader.readUint8()];
    const density = {
        units: jfifUnits(reader.readUint8()),
        x: reader.readUint16(),
        y: reader.readUint16(),
    };

    const width = reader.readUint8();
    const height = reader.readUint8();
    const thumbnail = width * height === 0 ? null : { width, height, rgb: reader.readBytes(width * height * 3) };

    return { version: { major, minor }, density, thumbnail };
}
