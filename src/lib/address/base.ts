export interface BaseAddress {
    buffer: Uint8Array;
    toString(): string;
}

