export { decode, unstuffScanData, parseComment, parseJFIF, JFIFUnits, DEFAULT_DECODE_OPTIONS } from "./parsers/jpeg.js";
export type { DecodeOptions, ScanEnd, JFIFData, JFIFThumbnail } from "./parsers/jpeg.js";
export {
    JpegMarker,
    HuffmanTableClass,
    MAX_CODE_LENGTH,
    markerName,
    markerTag,
    isRestartMarker,
    huffmanTableClass,
    makeHuffmanTable,
    isSymbolBuckets,
    toSymbolBuckets,
    findHuffmanTable,
} from "./parsers/jpeg_markers.js";
export type {
    Marker,
    GenericMarker,
    HuffmanTableMarker,
    QuantizationTableMarker,
    ScanMarker,
    ScanMetadata,
    ScanComponent,
    HuffmanTable,
    SymbolBuckets,
} from "./parsers/jpeg_markers.js";
export { CanonicalCodeMap, huffmanDecode } from "./bits/huffman.js";
export type { CanonicalCode, HuffmanDecodeOptions } from "./bits/huffman.js";
export { BitBuffer } from "./bits/bits.js";
export { ByteReader } from "./bits/bytereader.js";
export { ParserError, CorruptError, HuffmanDecodeError, UnsupportedError } from "./errors.js";
export { consoleTrace } from "./trace.js";
export type { TraceHook } from "./trace.js";
