import { CorruptError } from "../errors.js";

export function arrayBeginsWith(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length < b.length) return false;
    for (let i = 0; i < b.length; i++) {
        if (a[i] != b[i]) return false;
    }
    return true;
}

/** Return *b* as a binary string padded to *n* bits (debug helper). */
export function binstr(b: number, n: number): string {
    return b.toString(2).padStart(n, "0");
}
/** Bit‑mask with the lowest *n* bits set. */
export function bitmask(n: number): number {
    if (n > 32) throw new RangeError(`Cannot create bitmask with >32 bits (asked for ${n})`);
    if (n == 32) return 0xffffffff;
    return (1 << n) - 1;
}

/**
 * MSB‑first view of a byte array as a bit sequence, with an explicit bit
 * cursor. Bit 0 is the most significant bit of the first byte, as in JPEG
 * entropy-coded data. At most 32 bits can be read at a time.
 */
export class BitBuffer {
    /** bit cursor, 0 ≤ position ≤ bitLength */
    private cursor = 0;

    constructor(public readonly data: Uint8Array) { }

    /** Total number of bits in the underlying data. */
    get bitLength(): number {
        return this.data.length * 8;
    }

    get position(): number {
        return this.cursor;
    }

    /** Bits left after the cursor. */
    get remaining(): number {
        return this.bitLength - this.cursor;
    }

    /** True if the cursor reached the end of the data. */
    get eof(): boolean {
        return this.cursor >= this.bitLength;
    }

    /** Peek *n* bits without consuming. The first bit read ends up as the MSB of the result. */
    peekn(n: number): number {
        if (n < 1 || n > 32) throw new RangeError(`n must be in 1..32 (asked for ${n})`);
        if (n > this.remaining) {
            throw new CorruptError(
                `Not enough bits: requested ${n} at bit ${this.cursor}, but only ${this.remaining} remaining`,
            );
        }

        let ret = 0;
        let pos = this.cursor;
        let left = n;
        while (left > 0) {
            const byte = this.data[pos >>> 3];
            const inner = pos & 7;
            const take = Math.min(left, 8 - inner);
            const chunk = (byte >>> (8 - inner - take)) & bitmask(take);
            ret = ((ret << take) | chunk) >>> 0;
            pos += take;
            left -= take;
        }
        return ret;
    }

    /** Return *n* bits and CONSUME them. */
    nbits(n: number): number {
        const ret = this.peekn(n);
        this.cursor += n;
        return ret;
    }

    /** Discard *n* bits (default = 1). */
    next(n: number = 1): void {
        if (n < 0) throw new RangeError("Cannot skip negative bits");
        if (n > this.remaining) throw new CorruptError("Buffer underrun on skip");
        this.cursor += n;
    }
}
