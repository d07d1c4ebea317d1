export type UlaErrorKind =
    | "validation"
    | "group-address"
    | "vendor-not-found"
    | "acquisition"
    | "internal";

export abstract class UlaError extends Error {
    abstract readonly kind: UlaErrorKind;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export type ValidationDetails = {
    /** deduplicated, in the order they first appear */
    offending?: string[];
    expectedLength?: number;
    actualLength?: number;
};

export class ValidationError extends UlaError {
    readonly kind = "validation";
    readonly field: string;
    readonly details: ValidationDetails;

    constructor(field: string, message: string, details: ValidationDetails = {}) {
        super(message);
        this.field = field;
        this.details = details;
    }
}

export class GroupAddressError extends UlaError {
    readonly kind = "group-address";
    readonly mac: string;

    constructor(mac: string) {
        super(`MAC address "${mac}" is a group (multicast) address, not an individual station address`);
        this.mac = mac;
    }
}

export class VendorNotFoundError extends UlaError {
    readonly kind = "vendor-not-found";
    readonly oui: string;

    constructor(oui: string, mac?: string) {
        super(`MAC address "${mac ?? oui}" is not registered to IEEE (OUI ${oui} not found). Please use a REAL MAC address.`);
        this.oui = oui;
    }
}

export type AcquisitionSource = "time" | "registry" | "hardware" | "input";

export class AcquisitionError extends UlaError {
    readonly kind = "acquisition";
    readonly source: AcquisitionSource;

    constructor(source: AcquisitionSource, message: string, cause?: unknown) {
        super(cause === undefined ? message : `${message}: ${describeCause(cause)}`, { cause });
        this.source = source;
    }
}

/** Reaching one of these means the implementation itself is broken. */
export class InternalInvariantError extends UlaError {
    readonly kind = "internal";

    constructor(message: string) {
        super(message);
    }
}

export function describeCause(cause: unknown): string {
    if (cause instanceof Error) {
        return cause.message;
    }
    return String(cause);
}
