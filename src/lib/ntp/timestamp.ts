import { uint8_fromHex, uint8_readUint32BE, uint8_toHex, uint8_writeUint32BE } from "../binary/uint8-array";
import { ValidationError } from "../errors";
import { validateHex } from "../utils/hex";

/** seconds between the 1900 and 1970 epochs */
export const NTP_EPOCH_DELTA_SECONDS = 2208988800n;

/**
 * 64 bit NTP timestamp, 32 bits of seconds since 1900 and 32 bits of fraction.
 * <https://www.rfc-editor.org/rfc/rfc5905#section-6>
 */
export class NtpTimestamp {
    static LENGTH = 64;
    static FIELD_NAME = "NTP time";

    /**
     * Accepts `dcf4268b.208dd000` as printed by ntpq or the bare 16 digits.
     * @throws ValidationError
     */
    static parse(input: string): Uint8Array {
        return uint8_fromHex(validateHex(input, NtpTimestamp.LENGTH / 4, NtpTimestamp.FIELD_NAME));
    }

    /** Uses BigInt to avoid precision loss. */
    static fromUnixMs(unixMs: number): NtpTimestamp {
        const totalMs = BigInt(Math.max(0, Math.floor(unixMs)));
        const seconds = totalMs / 1000n + NTP_EPOCH_DELTA_SECONDS;
        const fraction = ((totalMs % 1000n) << 32n) / 1000n;

        let buffer = new Uint8Array(8);
        uint8_writeUint32BE(buffer, Number(seconds & 0xffffffffn), 0);
        uint8_writeUint32BE(buffer, Number(fraction), 4);
        return new NtpTimestamp(buffer);
    }

    readonly buffer: Uint8Array;

    constructor(input: string | Uint8Array) {
        if (typeof input == "string") {
            this.buffer = NtpTimestamp.parse(input);
        } else if (input.length * 8 == NtpTimestamp.LENGTH) {
            this.buffer = new Uint8Array(input);
        } else {
            throw new ValidationError(NtpTimestamp.FIELD_NAME, `${NtpTimestamp.FIELD_NAME} must be ${NtpTimestamp.LENGTH / 8} bytes, got ${input.length}`, {
                expectedLength: NtpTimestamp.LENGTH / 8,
                actualLength: input.length,
            });
        }
    }

    get seconds(): number {
        return uint8_readUint32BE(this.buffer, 0);
    }

    get fraction(): number {
        return uint8_readUint32BE(this.buffer, 4);
    }

    /** Era 0 only; timestamps past 2036 wrap around. */
    toUnixMs(): number {
        const unixSeconds = BigInt(this.seconds) - NTP_EPOCH_DELTA_SECONDS;
        const millis = (BigInt(this.fraction) * 1000n) >> 32n;
        return Number(unixSeconds * 1000n + millis);
    }

    toDate(): Date {
        return new Date(this.toUnixMs());
    }

    /** "" gives the canonical 16 digits, "." the seconds.fraction form */
    toString(separator: "" | "." = ""): string {
        return uint8_toHex(this.buffer.subarray(0, 4)) + separator + uint8_toHex(this.buffer.subarray(4));
    }
}
