import { CorruptError } from "../errors.js";

/**
 * ByteReader - A cursor over a Uint8Array for reading big-endian binary data
 * with position tracking. Every read is bounds checked and throws a
 * CorruptError instead of reading past the end.
 */
export class ByteReader {
    /** Current read position in bytes */
    private position: number = 0;

    /**
     * Create a new ByteReader
     * @param data - bytes to read from, never modified
     */
    constructor(private readonly data: Uint8Array) { }

    /**
     * Skip ahead by n bytes
     * @returns This ByteReader for chaining
     */
    skip(bytes: number): ByteReader {
        this.checkBounds(bytes);
        this.position += bytes;
        return this;
    }

    getPosition(): number {
        return this.position;
    }

    /**
     * Get remaining bytes from current position
     */
    getRemainingBytes(): number {
        return this.data.length - this.position;
    }

    /**
     * Check if we have enough bytes remaining for a read operation
     */
    private checkBounds(bytesNeeded: number): void {
        if (bytesNeeded < 0) {
            throw new CorruptError(`Invalid read of ${bytesNeeded} bytes at position ${this.position}`);
        }
        if (bytesNeeded > this.getRemainingBytes()) {
            throw new CorruptError(
                `Not enough bytes: need ${bytesNeeded} at position ${this.position}, ` +
                `but only ${this.getRemainingBytes()} bytes remaining`,
            );
        }
    }

    /**
     * Read an 8-bit unsigned integer
     */
    readUint8(): number {
        this.checkBounds(1);
        const value = this.data[this.position];
        this.position += 1;
        return value;
    }

    /**
     * Read a 16-bit big-endian unsigned integer
     */
    readUint16(): number {
        this.checkBounds(2);
        const value = (this.data[this.position] << 8) | this.data[this.position + 1];
        this.position += 2;
        return value;
    }

    /**
     * Read a byte holding two 4-bit fields, high nibble first
     */
    readNibbles(): [high: number, low: number] {
        const value = this.readUint8();
        return [value >> 4, value & 0xF];
    }

    /**
     * Read a sequence of bytes. The result is a view into the source, not a copy.
     * @param length - Number of bytes to read
     */
    readBytes(length: number): Uint8Array {
        this.checkBounds(length);
        const bytes = this.data.subarray(this.position, this.position + length);
        this.position += length;
        return bytes;
    }

    /**
     * Read a fixed-length string
     * @param length - Exact number of bytes to read
     * @param encoding - Text encoding used for TextDecoder (default: 'ascii')
     */
    readFixedString(length: number, encoding: string = "ascii"): string {
        const bytes = this.readBytes(length);
        const decoder = new TextDecoder(encoding);
        return decoder.decode(bytes);
    }

    /**
     * Peek at the next byte without advancing position
     * @param offset - Optional offset from current position
     */
    peekUint8(offset: number = 0): number {
        this.checkBounds(offset + 1);
        return this.data[this.position + offset];
    }

    /**
     * Find the next occurrence of `pattern` at or after the current position.
     * @returns offset relative to the current position, or -1 if absent
     */
    indexOf(pattern: Uint8Array): number {
        const last = this.data.length - pattern.length;
        outer: for (let i = this.position; i <= last; i++) {
            for (let j = 0; j < pattern.length; j++) {
                if (this.data[i + j] !== pattern[j]) continue outer;
            }
            return i - this.position;
        }
        return -1;
    }
}
