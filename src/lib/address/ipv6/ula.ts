import { createHash } from "node:crypto";
import { uint8_concat, uint8_fromHex } from "../../binary/uint8-array";
import { InternalInvariantError } from "../../errors";
import { NtpTimestamp } from "../../ntp/timestamp";
import { lookupVendor, OuiRegistry } from "../../oui/registry";
import { validateHex } from "../../utils/hex";
import { deriveEui64, EUI64Address } from "../eui64";
import { MACAddress } from "../mac";
import { IPV6Address } from "./ipv6";
import { ULA_LOCAL_PREFIX, ULA_PREFIX_LENGTH } from "./reserved";

// <https://www.rfc-editor.org/rfc/rfc4193#section-3.2.2>

/** 40 bits, ten lowercase hex digits */
export type GlobalId = string;

/**
 * "fixed" always prints three four-digit groups: fd58:00f0:0519::/48
 * "canonical" prints RFC 5952 text: fd58:f0:519::/48
 */
export type UlaStyle = "fixed" | "canonical";

export const GLOBAL_ID_LENGTH = 40;

/**
 * SHA-1 over the bytes of timestamp ++ EUI-64 (16 bytes, not 32 characters of
 * hex text), keeping the least significant 40 bits of the digest.
 */
export function deriveGlobalId(timestamp: NtpTimestamp, eui64: EUI64Address): GlobalId {
    let key = uint8_concat([timestamp.buffer, eui64.buffer]);

    let digest = createHash("sha1").update(key).digest("hex");

    return digest.substring(digest.length - GLOBAL_ID_LENGTH / 4);
}

export function ulaNetworkAddress(globalId: GlobalId): IPV6Address {
    let id = validateHex(globalId, GLOBAL_ID_LENGTH / 4, "global ID");

    let buffer = new Uint8Array(IPV6Address.ADDRESS_LENGTH / 8);
    buffer[0] = ULA_LOCAL_PREFIX;
    buffer.set(uint8_fromHex(id), 1);

    return new IPV6Address(buffer);
}

export function formatUla(globalId: GlobalId, style: UlaStyle = "fixed"): string {
    let id = validateHex(globalId, GLOBAL_ID_LENGTH / 4, "global ID");

    if (style == "canonical") {
        return `${ulaNetworkAddress(id).toString(4)}/${ULA_PREFIX_LENGTH}`;
    }

    let prefix = ULA_LOCAL_PREFIX.toString(16) + id;
    return `${prefix.substring(0, 4)}:${prefix.substring(4, 8)}:${prefix.substring(8, 12)}::/${ULA_PREFIX_LENGTH}`;
}

export type UlaInput = {
    mac: string | MACAddress;
    timestamp: string | NtpTimestamp;
};

export type UlaResult = {
    mac: MACAddress;
    vendor: string;
    timestamp: NtpTimestamp;
    eui64: EUI64Address;
    globalId: GlobalId;
    network: IPV6Address;
    prefix: string;
};

/**
 * Validate -> vendor lookup -> EUI-64 -> global ID -> prefix.
 * Every failure throws; there is no partial result.
 */
export function generateUla(input: UlaInput, registry: OuiRegistry, style: UlaStyle = "fixed"): UlaResult {
    let mac = typeof input.mac == "string" ? new MACAddress(input.mac) : input.mac;
    let timestamp = typeof input.timestamp == "string" ? new NtpTimestamp(input.timestamp) : input.timestamp;

    let vendor = lookupVendor(mac.oui(), registry, mac.toString(":"));
    let eui64 = deriveEui64(mac);
    let globalId = deriveGlobalId(timestamp, eui64);
    let network = ulaNetworkAddress(globalId);

    if (!network.isUniqueLocal()) {
        throw new InternalInvariantError(`generated network ${network.toString()} is outside fc00::/7`);
    }

    return {
        mac,
        vendor,
        timestamp,
        eui64,
        globalId,
        network,
        prefix: formatUla(globalId, style),
    };
}
