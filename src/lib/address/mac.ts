import { uint8_fromHex, uint8_toHex } from "../binary/uint8-array";
import { ValidationError } from "../errors";
import { validateHex } from "../utils/hex";
import { BaseAddress } from "./base";

const POSSIBLE_SEPARATOR = ["-", ":", ".", ""] as const;

/**
 * Low 24 bits that show up when someone types an address instead of looking it up.
 * SOURCE <http://www.kame.net/~suz/gen-ula.html>
 */
export const PLACEHOLDER_NIC_IDS = ["010203", "000000", "000001", "000102", "123456"] as const;

export class MACAddress implements BaseAddress {
    static ADDRESS_LENGTH = 48;
    static FIELD_NAME = "MAC address";

    /** @throws ValidationError */
    static parse(input: string): Uint8Array {
        return uint8_fromHex(validateHex(input, MACAddress.ADDRESS_LENGTH / 4, MACAddress.FIELD_NAME));
    }

    buffer: Uint8Array;
    constructor(input: string);
    constructor(input: Uint8Array);
    constructor(input: MACAddress);
    constructor(input: string | Uint8Array | MACAddress) {
        if (typeof input == "string") {
            this.buffer = MACAddress.parse(input);
        } else if (input instanceof MACAddress) {
            this.buffer = new Uint8Array(input.buffer);
        } else if ((input.length * 8) == MACAddress.ADDRESS_LENGTH) {
            this.buffer = new Uint8Array(input);
        } else {
            throw new ValidationError(MACAddress.FIELD_NAME, `${MACAddress.FIELD_NAME} must be ${MACAddress.ADDRESS_LENGTH / 8} bytes, got ${input.length}`, {
                expectedLength: MACAddress.ADDRESS_LENGTH / 8,
                actualLength: input.length,
            });
        }
    }

    /** canonical form is twelve lowercase hex digits */
    toString(separator: typeof POSSIBLE_SEPARATOR[number] = "") {
        return uint8_toHex(this.buffer, separator);
    }

    /** Organizationally unique identifier, uppercase like the IEEE registry. */
    oui(): string {
        return uint8_toHex(this.buffer.subarray(0, 3)).toUpperCase();
    }

    nicId(): string {
        return uint8_toHex(this.buffer.subarray(3));
    }

    isLocal(): boolean {
        // 7th bit
        return (this.buffer[0] & 2) == 2;
    }
    isUniversal(): boolean {
        return !this.isLocal();
    }
    isMulticast(): boolean {
        // 8th bit
        return (this.buffer[0] & 1) == 1;
    }
    isUnicast(): boolean {
        return !this.isMulticast();
    }
    isPlaceholder(): boolean {
        return PLACEHOLDER_NIC_IDS.some((id) => id == this.nicId());
    }
};
