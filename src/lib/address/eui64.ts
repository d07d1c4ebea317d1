import { uint8_fromHex, uint8_toHex } from "../binary/uint8-array";
import { GroupAddressError, InternalInvariantError, ValidationError } from "../errors";
import { BaseAddress } from "./base";
import { MACAddress } from "./mac";

/**
 * Second hex digit of an individual address with the universal/local bit flipped.
 * Odd digits are group addresses and never get here.
 * SOURCE <https://www.rfc-editor.org/rfc/rfc4291#appendix-A>
 */
const UL_BIT_FLIP: Readonly<Partial<Record<string, string>>> = {
    "0": "2", "2": "0",
    "4": "6", "6": "4",
    "8": "a", "a": "8",
    "c": "e", "e": "c",
};

const GROUP_NIBBLES = "13579bdf";

export class EUI64Address implements BaseAddress {
    static ADDRESS_LENGTH = 64;

    buffer: Uint8Array;

    constructor(input: Uint8Array) {
        if (input.length * 8 != EUI64Address.ADDRESS_LENGTH) {
            throw new ValidationError("EUI-64", `EUI-64 must be ${EUI64Address.ADDRESS_LENGTH / 8} bytes, got ${input.length}`, {
                expectedLength: EUI64Address.ADDRESS_LENGTH / 8,
                actualLength: input.length,
            });
        }
        this.buffer = new Uint8Array(input);
    }

    toString(separator: "" | ":" | "-" = ""): string {
        return uint8_toHex(this.buffer, separator);
    }
}

/**
 * Modified EUI-64 interface identifier: u/l bit inverted and `fffe` inserted
 * between the OUI and the NIC specific part.
 *
 * @throws GroupAddressError for multicast MAC addresses
 */
export function deriveEui64(mac: MACAddress): EUI64Address {
    let hex = mac.toString();

    let first = hex.substring(0, 1),
        second = hex.substring(1, 2),
        macu = hex.substring(2, 6),
        macl = hex.substring(6, 12);

    if (GROUP_NIBBLES.includes(second)) {
        throw new GroupAddressError(mac.toString(":"));
    }

    let flipped = UL_BIT_FLIP[second];
    if (flipped === undefined) {
        throw new InternalInvariantError(`no universal/local flip for first octet "${first}${second}" of ${mac.toString(":")}`);
    }

    return new EUI64Address(uint8_fromHex(`${first}${flipped}${macu}fffe${macl}`));
}
