#!/usr/bin/env node
import { networkInterfaces } from "node:os";
import { loadConfig, UlaConfig } from "./lib/config";
import { reportError, ttyProgramUla, UlaProgramHost } from "./lib/tty/program/ula";
import { createTTYWriter, TTY_EXIT_CODES, TTYProgramStatus } from "./lib/tty/program/program";
import { createPrompt } from "./lib/tty/prompt";
import { logManager } from "./lib/logging/logger";
import { NtpTimeSource, SystemTimeSource } from "./lib/ntp/client";
import { CachedOuiSource } from "./lib/oui/source";

async function main(argv: string[]): Promise<TTYProgramStatus> {
    let writer = createTTYWriter(process.stdout, process.stderr);

    let config: UlaConfig;
    try {
        config = loadConfig(process.env);
    } catch (error) {
        return reportError(writer, error);
    }
    logManager.configure({ level: config.logLevel });

    let cancel = () => program.cancel();

    let host: UlaProgramHost = {
        config,
        prompt: process.stdin.isTTY ? createPrompt(process.stdin, process.stderr, cancel) : undefined,
        ouiSource: (options) => new CachedOuiSource(options),
        ntpTimeSource: (options) => new NtpTimeSource(options),
        systemTimeSource: () => new SystemTimeSource(),
        networkInterfaces: () => networkInterfaces(),
    };

    let program = ttyProgramUla(writer, host);
    process.once("SIGINT", cancel);

    try {
        return await program.run(argv);
    } finally {
        process.off("SIGINT", cancel);
        host.prompt?.close();
    }
}

main(process.argv.slice(2)).then(
    (status) => { process.exitCode = TTY_EXIT_CODES[status] },
    (error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    },
);
