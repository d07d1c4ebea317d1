import { VendorNotFoundError } from "../errors";
import { validateHex } from "../utils/hex";

/**
 * IEEE oui.txt carries every assignment twice:
 *
 * 00-0D-3A   (hex)		Microsoft Corp.
 * 000D3A     (base 16)		Microsoft Corp.
 * 				One Microsoft Way
 *
 * SOURCE <https://standards-oui.ieee.org/oui/oui.txt>
 */
const HEX_LINE_REGEX = /^([0-9A-Fa-f]{2})-([0-9A-Fa-f]{2})-([0-9A-Fa-f]{2})\s+\(hex\)\s*(.*)$/;
const BASE16_LINE_REGEX = /^([0-9A-Fa-f]{6})\s+\(base 16\)\s*(.*)$/;

export type OuiRegistry = ReadonlyMap<string, string>;

export function parseOuiText(text: string): OuiRegistry {
    let registry = new Map<string, string>();

    for (let line of text.split("\n")) {
        line = line.replace(/\r$/, "");

        let oui: string | undefined, vendor: string | undefined;

        let match = HEX_LINE_REGEX.exec(line);
        if (match) {
            oui = match[1] + match[2] + match[3];
            vendor = match[4];
        } else if ((match = BASE16_LINE_REGEX.exec(line))) {
            oui = match[1];
            vendor = match[2];
        }

        if (oui === undefined || vendor === undefined) continue;

        oui = oui.toUpperCase();
        vendor = vendor.trim();

        // an assignment without a name does not count as registered
        if (vendor) {
            registry.set(oui, vendor);
        }
    }

    return registry;
}

/**
 * Exact match on the six digit prefix, case-insensitive.
 * @throws ValidationError when the prefix is not six hex digits
 * @throws VendorNotFoundError
 */
export function lookupVendor(macPrefix: string, registry: OuiRegistry, mac?: string): string {
    let oui = validateHex(macPrefix, 6, "OUI").toUpperCase();

    let vendor = registry.get(oui);
    if (vendor === undefined) {
        throw new VendorNotFoundError(oui, mac);
    }

    return vendor;
}
