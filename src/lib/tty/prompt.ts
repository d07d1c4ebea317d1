import { createInterface } from "node:readline/promises";
import { AcquisitionError } from "../errors";

export interface Prompt {
    question(query: string): Promise<string>;
    close(): void;
}

/**
 * @param onInterrupt Ctrl+C while a question is pending; readline swallows the
 * signal otherwise
 */
export function createPrompt(input: NodeJS.ReadableStream, output: NodeJS.WritableStream, onInterrupt?: () => void): Prompt {
    let rl = createInterface({ input, output });
    if (onInterrupt) {
        rl.on("SIGINT", onInterrupt);
    }

    return {
        async question(query) {
            try {
                return await rl.question(query);
            } catch (error) {
                throw new AcquisitionError("input", "cannot read answer", error);
            }
        },
        close() {
            rl.close();
        },
    }
}
