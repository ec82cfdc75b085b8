import { describe, test, expect } from 'vitest';
import {
    HuffmanTableClass,
    JpegMarker,
    Marker,
    SymbolBuckets,
    findHuffmanTable,
    huffmanTableClass,
    isRestartMarker,
    isSymbolBuckets,
    makeHuffmanTable,
    markerName,
    markerTag,
    toSymbolBuckets,
} from '../../../../static/src/parsers/jpeg_markers.js';
import { CorruptError } from '../../../../static/src/errors.js';
import { buckets } from './jpeg_fixtures.js';

describe('marker names', () => {
    test('known tags', () => {
        expect(markerName(JpegMarker.DHT)).toBe('DHT');
        expect(markerName(0xe0)).toBe('APP0');
        expect(markerName(0xfe)).toBe('COM');
        expect(markerName(0xc9)).toBe('SOF9');
    });

    test('unassigned tags print as hex', () => {
        expect(markerName(0x01)).toBe('0x01');
        expect(markerName(0xf0)).toBe('0xF0');
    });

    test('restart markers', () => {
        expect(isRestartMarker(0xd0)).toBe(true);
        expect(isRestartMarker(0xd7)).toBe(true);
        expect(isRestartMarker(0xd8)).toBe(false);
        expect(isRestartMarker(0xcf)).toBe(false);
    });
});

describe('Huffman table classes', () => {
    test('maps the four class/id pairs', () => {
        expect(huffmanTableClass(0, 0)).toBe(HuffmanTableClass.LuminanceDC);
        expect(huffmanTableClass(0, 1)).toBe(HuffmanTableClass.LuminanceAC);
        expect(huffmanTableClass(1, 0)).toBe(HuffmanTableClass.ChrominanceDC);
        expect(huffmanTableClass(1, 1)).toBe(HuffmanTableClass.ChrominanceAC);
    });

    test('rejects any other pair', () => {
        expect(() => huffmanTableClass(2, 0))
            .toThrow(new CorruptError('Unrecognized Huffman table class/id pair (2,0)'));
        expect(() => huffmanTableClass(0, 2)).toThrow(CorruptError);
        expect(() => huffmanTableClass(1, 3)).toThrow(CorruptError);
    });

    test('makeHuffmanTable checks the buckets', () => {
        const table = makeHuffmanTable(HuffmanTableClass.LuminanceAC, buckets([], [0x01]));
        expect(table.symbols.length).toBe(16);
        expect(Array.from(table.symbols[1])).toEqual([0x01]);

        expect(() => makeHuffmanTable(HuffmanTableClass.LuminanceAC, [[0x01]]))
            .toThrow('Huffman table needs 16 length buckets, got 1');
        expect(() => makeHuffmanTable(HuffmanTableClass.LuminanceAC, buckets([0x100])))
            .toThrow('Symbol 256 of length 1 is not a byte value');
    });
});

describe('symbol buckets', () => {
    const sixteen = Array.from({ length: 16 }, (_, i) => Uint8Array.of(i));

    test('one bucket per code length', () => {
        expect(isSymbolBuckets(sixteen)).toBe(true);
        expect(isSymbolBuckets(sixteen.slice(1))).toBe(false);
        expect(isSymbolBuckets([...sixteen, new Uint8Array(0)])).toBe(false);
    });

    test('toSymbolBuckets keeps the buckets and types the last one', () => {
        const symbols: SymbolBuckets = toSymbolBuckets(sixteen);
        const longest: Uint8Array = symbols[15];
        expect(Array.from(longest)).toEqual([15]);
        expect(symbols[0]).toBe(sixteen[0]);
    });

    test('toSymbolBuckets rejects 15 buckets', () => {
        expect(() => toSymbolBuckets(sixteen.slice(0, 15)))
            .toThrow(new CorruptError('Huffman table needs 16 length buckets, got 15'));
    });
});

describe('marker helpers', () => {
    const luminanceDC = makeHuffmanTable(HuffmanTableClass.LuminanceDC, buckets([0x00]));
    const chrominanceAC = makeHuffmanTable(HuffmanTableClass.ChrominanceAC, buckets([0x01]));
    const chrominanceAC2 = makeHuffmanTable(HuffmanTableClass.ChrominanceAC, buckets([0x02]));
    const markers: Marker[] = [
        { kind: 'generic', tag: 0xe0, length: 2, data: new Uint8Array(0) },
        { kind: 'huffman', tables: [luminanceDC] },
        { kind: 'huffman', tables: [chrominanceAC, chrominanceAC2] },
        { kind: 'quantization', id: 0, coefficients: new Uint8Array(64) },
        {
            kind: 'scan',
            length: 8,
            metadata: { precision: 8, height: 1, width: 1, components: [] },
            data: new Uint8Array(0),
        },
    ];

    test('markerTag', () => {
        expect(markers.map(markerTag)).toEqual([0xe0, 0xc4, 0xc4, 0xdb, 0xda]);
    });

    test('findHuffmanTable returns the first table of a class', () => {
        expect(findHuffmanTable(markers, HuffmanTableClass.ChrominanceAC)).toBe(chrominanceAC);
        expect(findHuffmanTable(markers, HuffmanTableClass.LuminanceDC)).toBe(luminanceDC);
        expect(findHuffmanTable(markers, HuffmanTableClass.LuminanceAC)).toBeUndefined();
    });
});
