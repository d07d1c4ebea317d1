import { uint8_matchLength } from "../../binary/uint8-array";
import { ValidationError } from "../../errors";
import { BaseAddress } from "../base";
import { ADDRESS_TYPESV6 } from "./reserved";

const GROUP_REGEX = /^[0-9a-f]{1,4}$/;

export class IPV6Address implements BaseAddress {
    static ADDRESS_LENGTH: number = 128;
    static FIELD_NAME = "IPv6 address";

    /** @throws ValidationError */
    static parse(input: string): Uint8Array {
        input = input.toLowerCase().trim();
        let buffer = new Uint8Array(IPV6Address.ADDRESS_LENGTH / 8);

        let halves = input.split("::");
        if (halves.length > 2) {
            throw invalid(input, `"::" may appear only once`);
        }

        let head = halves[0] ? halves[0].split(":") : [];
        let tail = halves.length == 2 && halves[1] ? halves[1].split(":") : [];

        let split: string[];
        if (halves.length == 2) {
            let missingCount = 8 - head.length - tail.length;
            if (missingCount < 1) {
                throw invalid(input, "too many groups");
            }
            // fill the gap with the correct amount of zeroes
            split = [...head, ...new Array<string>(missingCount).fill("0"), ...tail];
        } else {
            split = head;
        }

        if (split.length != 8) {
            throw invalid(input, `expected 8 groups, got ${split.length}`);
        }

        for (let i = 0; i < 8; i++) {
            if (!GROUP_REGEX.test(split[i])) {
                throw invalid(input, `bad group "${split[i]}"`);
            }
            let group = split[i].padStart(4, "0");
            buffer[i * 2] = parseInt(group.substring(0, 2), 16)
            buffer[i * 2 + 1] = parseInt(group.substring(2, 4), 16)
        }

        return buffer;
    }

    buffer: Uint8Array;

    constructor(input: string | Uint8Array | IPV6Address) {
        if (typeof input == "string") {
            this.buffer = IPV6Address.parse(input)
        } else if (input instanceof IPV6Address) {
            this.buffer = new Uint8Array(input.buffer);
        } else if (input.length == IPV6Address.ADDRESS_LENGTH / 8) {
            this.buffer = new Uint8Array(input)
        } else {
            throw new ValidationError(IPV6Address.FIELD_NAME, `${IPV6Address.FIELD_NAME} must be ${IPV6Address.ADDRESS_LENGTH / 8} bytes, got ${input.length}`);
        }
    }

    /**
     * (-1) No shortening;
     * (4) Remove leading zeroes and the longest run of zero groups (RFC 5952);
     */
    toString(simplify: -1 | 4 = 4): string {
        let a = new Array<string>(8).fill("");

        for (let i = 0; i < a.length; i++) {
            let group = (this.buffer[i * 2] << 8) | this.buffer[i * 2 + 1];
            a[i] = simplify < 0 ? group.toString(16).padStart(4, "0") : group.toString(16);
        }

        if (simplify < 0) {
            return a.join(":");
        }

        type Sequence = [startIndex: number, length: number]
        let longest: Sequence = [-1, 0];

        for (let i = 0; i < a.length; i++) {
            if (parseInt(a[i], 16) != 0) continue;

            let len = 1
            while (i + len < a.length && parseInt(a[i + len], 16) == 0) {
                len += 1
            }

            // first one wins a tie
            if (len > longest[1]) {
                longest = [i, len];
            }
            i += len
        }

        // a lone zero group is not compressed
        if (longest[1] < 2) {
            return a.join(":");
        }

        let [start, len] = longest;
        return a.slice(0, start).join(":") + "::" + a.slice(start + len).join(":");
    }

    isUniqueLocal(): boolean {
        return this.matches(ADDRESS_TYPESV6.UNIQUE_LOCAL);
    }

    private matches([network, length]: readonly [string, number]): boolean {
        return uint8_matchLength(IPV6Address.parse(network), this.buffer) >= length;
    }
}

function invalid(input: string, reason: string): ValidationError {
    return new ValidationError(IPV6Address.FIELD_NAME, `${IPV6Address.FIELD_NAME} "${input}" is invalid: ${reason}`);
}
