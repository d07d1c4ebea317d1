/**
 * REFERENCE: feross - buffer - <https://github.com/feross/buffer/blob/master/index.js>
 */

const HEX_PAIR_REGEX = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * This function checks if the arrays are equal
 * @param a `Uint8Array`
 * @param b `Uint8Array`
 */
export function uint8_equals(a: Uint8Array, b: Uint8Array): boolean {
    if (a.byteLength != b.byteLength) {
        return false;
    }

    for (let i = 0; i < a.byteLength; i++) {
        if (a[i] != b[i]) {
            return false;
        }
    }

    return true;
}

export function uint8_mutateSet(target: Uint8Array, source: Uint8Array, offset: number = 0): Uint8Array {
    let i = 0;
    while (offset < target.byteLength && i < source.byteLength) {
        target[offset++] = source[i++];
    }

    return target;
}

export function uint8_concat(list: readonly Uint8Array[]): Uint8Array {
    let totalLength = list.reduce((sum, { byteLength }) => sum + byteLength, 0);

    let buffer = new Uint8Array(totalLength);

    let i = 0, offset = 0;

    while (i < list.length) {
        uint8_mutateSet(buffer, list[i], offset)
        offset += list[i].byteLength;

        i++;
    }

    return buffer;
}

/**
 * Decodes hex text into the bytes it denotes, two digits per byte.
 * "0aff" becomes [0x0a, 0xff], never the character codes of the text.
 */
export function uint8_fromHex(hex: string): Uint8Array {
    if (!HEX_PAIR_REGEX.test(hex)) {
        throw new Error("cannot decode hex: " + hex);
    }

    let buffer = new Uint8Array(hex.length / 2);
    for (let i = 0; i < buffer.length; i++) {
        buffer[i] = parseInt(hex.substring(i * 2, (i * 2) + 2), 16);
    }

    return buffer;
}

export function uint8_toHex(source: Uint8Array, separator: string = ""): string {
    let octets = new Array<string>(source.byteLength);

    for (let i = 0; i < source.byteLength; i++) {
        octets[i] = source[i].toString(16).padStart(2, "0");
    }

    return octets.join(separator);
}

export function uint8_readUint32BE(source: Uint8Array, offset = 0) {
    offset = offset >>> 0; // make positive
    return (source[offset] * 0x1000000) +
        ((source[offset + 1] << 16) | (source[offset + 2] << 8) | source[offset + 3])
}

export function uint8_writeUint32BE(target: Uint8Array, value: number, offset = 0): Uint8Array {
    offset = offset >>> 0;
    target[offset] = (value >>> 24) & 0xff;
    target[offset + 1] = (value >>> 16) & 0xff;
    target[offset + 2] = (value >>> 8) & 0xff;
    target[offset + 3] = value & 0xff;
    return target;
}

export function uint8_isZero(source: Uint8Array): boolean {
    return source.every((n) => n == 0);
}

export function uint8_matchLength(buffer1: Uint8Array, buffer2: Uint8Array): number {
    let length = 0;
    for (let i = 0; i < buffer1.byteLength && i < buffer2.byteLength; i++) {
        if (buffer1[i] == buffer2[i]) {
            length += 8;
        } else {
            let b1 = buffer1[i], b2 = buffer2[i];
            if ((b1 & 0xfe) == (b2 & 0xfe)) return length + 7;
            if ((b1 & 0xfc) == (b2 & 0xfc)) return length + 6;
            if ((b1 & 0xf8) == (b2 & 0xf8)) return length + 5;
            if ((b1 & 0xf0) == (b2 & 0xf0)) return length + 4;
            if ((b1 & 0xe0) == (b2 & 0xe0)) return length + 3;
            if ((b1 & 0xc0) == (b2 & 0xc0)) return length + 2;
            if ((b1 & 0x80) == (b2 & 0x80)) return length + 1;

            return length;
        }
    }

    return length;
}
