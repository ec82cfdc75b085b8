import { BitBuffer, binstr } from "./bits.js";
import { CorruptError, HuffmanDecodeError } from "../errors.js";
import { HuffmanTable, MAX_CODE_LENGTH } from "../parsers/jpeg_markers.js";
import { TraceHook, hex } from "../trace.js";

/** One assigned code: `code` is read as a `length`-bit MSB-first pattern. */
export interface CanonicalCode {
    readonly length: number;
    readonly code: number;
    readonly symbol: number;
}

export interface HuffmanDecodeOptions {
    /** called once per decoded symbol */
    trace?: TraceHook;
}

/**
 * Canonical Huffman code of a JPEG DHT table: maps (code length, bit pattern)
 * pairs to symbol bytes.
 *
 * Codes are handed out in increasing numeric order within each length, in
 * the order the symbols appear in their bucket, and the running code value is
 * shifted left by one bit after every length (ITU T.81 Annex C). The result
 * is prefix-free whenever the buckets describe a valid canonical code.
 */
export class CanonicalCodeMap {
    private constructor(
        /** `byLength[len - 1]` maps a `len`-bit code to its symbol */
        private readonly byLength: ReadonlyArray<ReadonlyMap<number, number>>,
        /** codes in assignment order */
        private readonly codes: ReadonlyArray<CanonicalCode>,
    ) { }

    /* ------------------------------------------------------------------ */
    /*                                BUILD                               */
    /* ------------------------------------------------------------------ */

    static fromTable(table: HuffmanTable): CanonicalCodeMap {
        return CanonicalCodeMap.fromBuckets(table.symbols);
    }

    /**
     * Build the code map from 16 length buckets.
     * Throws a CorruptError when the symbols of a length overflow its code space.
     */
    static fromBuckets(buckets: ReadonlyArray<ArrayLike<number>>): CanonicalCodeMap {
        if (buckets.length !== MAX_CODE_LENGTH) {
            throw new CorruptError(`Huffman table needs ${MAX_CODE_LENGTH} length buckets, got ${buckets.length}`);
        }

        const byLength: Map<number, number>[] = [];
        const codes: CanonicalCode[] = [];
        let code = 0;

        for (let length = 1; length <= MAX_CODE_LENGTH; length++) {
            const bucket = buckets[length - 1];
            const assigned = new Map<number, number>();
            for (let i = 0; i < bucket.length; i++) {
                if (code >= 1 << length) {
                    throw new CorruptError(
                        `Huffman table overflows the ${length}-bit code space at symbol ${hex(bucket[i])}`,
                    );
                }
                assigned.set(code, bucket[i]);
                codes.push({ length, code, symbol: bucket[i] });
                code++;
            }
            byLength.push(assigned);
            code <<= 1;
        }

        return new CanonicalCodeMap(byLength, codes);
    }

    /* ------------------------------------------------------------------ */
    /*                               LOOKUP                               */
    /* ------------------------------------------------------------------ */

    /** Number of assigned codes */
    get size(): number {
        return this.codes.length;
    }

    /** Symbol coded by the `length`-bit pattern `code`, if any. */
    get(length: number, code: number): number | undefined {
        if (length < 1 || length > MAX_CODE_LENGTH) return undefined;
        return this.byLength[length - 1].get(code);
    }

    entries(): ReadonlyArray<CanonicalCode> {
        return this.codes;
    }

    /* ------------------------------------------------------------------ */
    /*                               PARSE                                */
    /* ------------------------------------------------------------------ */

    /**
     * Decode one symbol at the cursor of `bitBuffer`, trying code lengths
     * 1..16 in increasing order. Consumes the matched bits.
     * @returns null if no code matches before the bits run out
     */
    tryParse(bitBuffer: BitBuffer): CanonicalCode | null {
        for (let length = 1; length <= MAX_CODE_LENGTH; length++) {
            if (length > bitBuffer.remaining) break;

            const code = bitBuffer.peekn(length);
            const symbol = this.byLength[length - 1].get(code);
            if (symbol !== undefined) {
                bitBuffer.next(length);
                return { length, code, symbol };
            }
        }
        return null;
    }

    /**
     * Decode a whole MSB-first bit sequence into its symbols. Every bit must
     * belong to a code; the first position where nothing matches aborts with a
     * HuffmanDecodeError.
     */
    decode(data: Uint8Array, options: HuffmanDecodeOptions = {}): Uint8Array {
        const bitBuffer = new BitBuffer(data);
        const result: number[] = [];

        while (!bitBuffer.eof) {
            const cursor = bitBuffer.position;
            const parsed = this.tryParse(bitBuffer);
            if (parsed === null) {
                throw new HuffmanDecodeError(cursor, bitBuffer.bitLength);
            }
            options.trace?.(`translated ${binstr(parsed.code, parsed.length)} to ${hex(parsed.symbol)}`);
            result.push(parsed.symbol);
        }

        return Uint8Array.from(result);
    }
}

/**
 * Entropy-decode `data` with `table`. The code map is built for this call only.
 * Magnitude bits that follow each symbol in real scan data are not handled here.
 */
export function huffmanDecode(
    table: HuffmanTable,
    data: Uint8Array,
    options: HuffmanDecodeOptions = {},
): Uint8Array {
    const codeMap = CanonicalCodeMap.fromTable(table);
    if (options.trace) {
        for (const { length, code, symbol } of codeMap.entries()) {
            options.trace(`code ${binstr(code, length)} -> ${hex(symbol)}`);
        }
    }
    return codeMap.decode(data, options);
}
