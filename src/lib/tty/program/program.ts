export * from "./helpers"

export enum TTYProgramStatus {
    OK,
    ERROR,
    CANCELED
}

/** process exit code for each status */
export const TTY_EXIT_CODES: Record<TTYProgramStatus, number> = {
    [TTYProgramStatus.OK]: 0,
    [TTYProgramStatus.ERROR]: 1,
    // 128 + SIGINT
    [TTYProgramStatus.CANCELED]: 130,
};

export type TTYProgramAbout = {
    description: string;
    content: string;
}

export type TTYProgram<H> = TTYProgramMetaData & TTYProgramInitializer<H>;

export type TTYProgramInitializer<H> = (writer: TTYWriter, host: H) => {
    cancel(): void;
    run(argv: string[]): Promise<TTYProgramStatus>;
}

export type TTYProgramMetaData = {
    about: TTYProgramAbout;
}

export type TTYWriter = {
    /** program output, stdout */
    write(text: string): void;
    /** diagnostics, stderr */
    error(text: string): void;
}

export function createTTYWriter(stdout: NodeJS.WritableStream, stderr: NodeJS.WritableStream): TTYWriter {
    return {
        write(text) { stdout.write(text.endsWith("\n") ? text : text + "\n") },
        error(text) { stderr.write(text.endsWith("\n") ? text : text + "\n") },
    }
}
