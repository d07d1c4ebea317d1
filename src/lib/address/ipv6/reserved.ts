// <https://www.rfc-editor.org/rfc/rfc4291.html>
// <https://www.rfc-editor.org/rfc/rfc4193.html>

// SOURCE <https://www.rfc-editor.org/rfc/rfc4193.html#section-3.1>
export const ADDRESS_TYPESV6 = {
    UNIQUE_LOCAL: ["fc00::", 7],
} as const;

/** L bit set, the only half of fc00::/7 with a defined allocation */
export const ULA_LOCAL_PREFIX = 0xfd;
export const ULA_PREFIX_LENGTH = 48;
