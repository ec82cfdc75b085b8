/** Base class of every error thrown while reading JPEG data. `reason` mirrors the message. */
export class ParserError extends Error {
    constructor(public readonly reason: string) {
        super(reason);
        this.name = "ParserError";
    }
}

/** Structural failure such as a bad prefix, a bad length or truncated data */
export class CorruptError extends ParserError {
    constructor(reason: string) {
        super(reason);
        this.name = "CorruptError";
    }
}

/** No Huffman code matched the bits at `cursor`; `remaining` bits were left from there. */
export class HuffmanDecodeError extends ParserError {
    public readonly remaining: number;

    constructor(
        public readonly cursor: number,
        public readonly bitLength: number,
    ) {
        super(
            `error huffman decoding stream: symbol not found at cursor ${cursor} ` +
            `with ${bitLength - cursor} bits remaining of ${bitLength}`,
        );
        this.name = "HuffmanDecodeError";
        this.remaining = bitLength - cursor;
    }
}

/** Valid JPEG syntax this library does not handle */
export class UnsupportedError extends ParserError {
    constructor(reason: string) {
        super(reason);
        this.name = "UnsupportedError";
    }
}
