import { readFileSync } from "node:fs";
import path from "node:path";
import { Writable } from "node:stream";

export const OUI_FIXTURE_PATH = path.join(__dirname, "fixtures", "oui.txt");

export function readOuiFixture(): string {
    return readFileSync(OUI_FIXTURE_PATH, "utf-8");
}

/** returns whatever `fn` throws */
export function thrown(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error("expected function to throw");
}

export async function rejected(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    throw new Error("expected promise to reject");
}

export function createSink(): { stream: Writable; lines: string[] } {
    let lines: string[] = [];
    let stream = new Writable({
        write(chunk, _encoding, callback) {
            lines.push(String(chunk));
            callback();
        },
    });
    return { stream, lines };
}
