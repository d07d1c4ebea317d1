import { ValidationError } from "../errors";

// colon, dash, period and line breaks
const DELIMITER_REGEX = /[:\-.\r\n]/g;
const NON_HEX_REGEX = /[^0-9a-fA-F]/g;

/**
 * Normalizes hex input into lowercase digits without delimiters.
 * @throws ValidationError
 */
export function validateHex(input: string, expectedLength: number, fieldName: string): string {
    let stripped = input.trim().replace(DELIMITER_REGEX, "");

    let offending = [...new Set(stripped.match(NON_HEX_REGEX) ?? [])];
    if (offending.length > 0) {
        throw new ValidationError(
            fieldName,
            `${fieldName} "${input.trim()}" contains invalid characters: ${offending.map((c) => JSON.stringify(c)).join(", ")}`,
            { offending },
        );
    }

    if (stripped.length != expectedLength) {
        throw new ValidationError(
            fieldName,
            `${fieldName} "${stripped}" must be ${expectedLength} hex digits (${expectedLength * 4} bits), got ${stripped.length}`,
            { expectedLength, actualLength: stripped.length },
        );
    }

    return stripped.toLowerCase();
}
