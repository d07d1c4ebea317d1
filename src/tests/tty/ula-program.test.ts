import { beforeEach, describe, expect, test } from "vitest";
import { DEFAULT_CONFIG } from "../../lib/config";
import { InterfaceTable } from "../../lib/device/interfaces";
import { AcquisitionError } from "../../lib/errors";
import { logManager } from "../../lib/logging/logger";
import { FixedTimeSource, NtpClientOptions, TimeSource } from "../../lib/ntp/client";
import { NtpTimestamp } from "../../lib/ntp/timestamp";
import { parseOuiText } from "../../lib/oui/registry";
import { CachedOuiSourceOptions, OuiSource } from "../../lib/oui/source";
import { TTYProgramStatus, TTYWriter } from "../../lib/tty/program/program";
import { reportError, ttyProgramUla, UlaProgramHost } from "../../lib/tty/program/ula";
import { Prompt } from "../../lib/tty/prompt";
import { createSink, readOuiFixture } from "../helpers";

class CapturingWriter implements TTYWriter {
    out: string[] = [];
    err: string[] = [];

    write(text: string) { this.out.push(text) }
    error(text: string) { this.err.push(text) }
}

class ScriptedPrompt implements Prompt {
    questions: string[] = [];
    closed = false;

    constructor(private readonly answers: string[]) { }

    private pending?: (answer: string) => void;

    question(query: string): Promise<string> {
        this.questions.push(query);
        let answer = this.answers.shift();
        if (answer !== undefined) {
            return Promise.resolve(answer);
        }
        // no more answers: wait like a user who never types
        return new Promise<string>((resolve) => { this.pending = resolve });
    }

    answerPending(answer: string) {
        this.pending?.(answer);
    }

    close() {
        this.closed = true;
    }
}

const INTERFACES: InterfaceTable = {
    eth0: [
        { address: "192.0.2.10", netmask: "255.255.255.0", family: "IPv4", mac: "00:1b:21:3a:4c:5d", internal: false, cidr: "192.0.2.10/24" },
    ],
};

class FakeHost implements UlaProgramHost {
    config = { ...DEFAULT_CONFIG };
    prompt?: Prompt;

    ouiRequests: CachedOuiSourceOptions[] = [];
    ntpRequests: NtpClientOptions[] = [];
    systemClockUsed = false;
    registryError?: Error;
    /** when set, the NTP query waits for this */
    pendingClock?: Promise<NtpTimestamp>;

    constructor(prompt?: Prompt) {
        this.prompt = prompt;
    }

    ouiSource(options: CachedOuiSourceOptions): OuiSource {
        this.ouiRequests.push(options);
        return {
            load: async () => {
                if (this.registryError) {
                    throw this.registryError;
                }
                return parseOuiText(readOuiFixture());
            },
        };
    }

    ntpTimeSource(options: NtpClientOptions): TimeSource {
        this.ntpRequests.push(options);
        const pending = this.pendingClock;
        if (pending) {
            return { now: () => pending };
        }
        return new FixedTimeSource("dcf4268b.208dd000");
    }

    systemTimeSource(): TimeSource {
        this.systemClockUsed = true;
        return new FixedTimeSource("dcf4268b.00000076");
    }

    networkInterfaces(): InterfaceTable {
        return INTERFACES;
    }
}

function run(argv: string[], host = new FakeHost()) {
    let writer = new CapturingWriter();
    let program = ttyProgramUla(writer, host);
    return { writer, host, program, status: program.run(argv) };
}

describe("ula-gen", () => {
    let log = createSink();

    beforeEach(() => {
        log = createSink();
        logManager.configure({ level: "warn", stream: log.stream });
    })

    test("MAC address and clock", async () => {
        let { writer, status } = run(["--mac", "00:0d:3a:00:00:01", "--clock", "dcf4268b.208dd000"]);

        expect(await status).eq(TTYProgramStatus.OK)
        expect(writer.out).toStrictEqual(["fd58:e975:6519::/48"])
        expect(writer.err).toStrictEqual([])
    })

    test("canonical", async () => {
        let { writer, status } = run(["-m", "000d3a000001", "-c", "dcf4268b00000076", "--canonical"]);

        expect(await status).eq(TTYProgramStatus.OK)
        expect(writer.out).toStrictEqual(["fd72:f0:89da::/48"])
    })

    test("verbose", async () => {
        let { writer, status } = run(["--mac", "00-0D-3A-00-00-01", "--clock", "dcf4268b.208dd000", "-v"]);

        expect(await status).eq(TTYProgramStatus.OK)
        expect(writer.out).toStrictEqual([[
            "## Inputs ##",
            "MAC address = 00:0d:3a:00:00:01 (Example Cloud Corp.)",
            "NTP time    = dcf4268b.208dd000 (2017-06-20T22:56:11.127Z)",
            "",
            "## Intermediary values ##",
            "EUI64 address = 020d3afffe000001",
            "Global ID     = 58e9756519",
            "",
            "## Generated ULA ##",
            "fd58:e975:6519::/48",
        ].join("\n")])
    })

    test("placeholder MAC address is a warning", async () => {
        let { status } = run(["--mac", "00:0d:3a:00:00:01", "--clock", "dcf4268b.208dd000"]);

        expect(await status).eq(TTYProgramStatus.OK)
        expect(log.lines.length).eq(1)
        expect(log.lines[0].endsWith("][WARN][ula] MAC address looks like a placeholder [mac=00:0d:3a:00:00:01]\n")).true
    })

    test("placeholder MAC address is an error with --strict", async () => {
        let { writer, status } = run(["--mac", "00:0d:3a:00:00:01", "--clock", "dcf4268b.208dd000", "--strict"]);

        expect(await status).eq(TTYProgramStatus.ERROR)
        expect(writer.out).toStrictEqual([])
        expect(writer.err).toStrictEqual([
            '== Error ==\nMAC address "00:0d:3a:00:00:01" looks like a placeholder, not a real interface address',
        ])
    })

    test("queries NTP without a clock", async () => {
        let { writer, host, status } = run(["--mac", "00:1b:21:3a:4c:5d"]);

        expect(await status).eq(TTYProgramStatus.OK)
        expect(writer.out).toStrictEqual(["fd2f:a133:1ee8::/48"])
        expect(host.ntpRequests).toStrictEqual([{ server: "0.pool.ntp.org", port: 123, timeoutMs: 5000 }])
    })

    test("NTP server option", async () => {
        let { host, status } = run(["--mac", "00:1b:21:3a:4c:5d", "-s", "time.example"]);

        expect(await status).eq(TTYProgramStatus.OK)
        expect(host.ntpRequests[0].server).eq("time.example")
    })

    test("system clock", async () => {
        let { writer, host, status } = run(["--mac", "00:0d:3a:00:00:01", "--clock", "system"]);

        expect(await status).eq(TTYProgramStatus.OK)
        expect(host.systemClockUsed).true
        expect(host.ntpRequests).toStrictEqual([])
        expect(writer.out).toStrictEqual(["fd72:00f0:89da::/48"])
    })

    test("MAC address from an interface", async () => {
        let { writer, status } = run(["--interface", "eth0", "--clock", "dcf4268b.208dd000"]);

        expect(await status).eq(TTYProgramStatus.OK)
        expect(writer.out).toStrictEqual(["fd2f:a133:1ee8::/48"])
    })

    test("registry options", async () => {
        let { host, status } = run(["--mac", "00:1b:21:3a:4c:5d", "--clock", "system", "--oui-file", "/tmp/oui.txt", "--refresh-oui"]);

        expect(await status).eq(TTYProgramStatus.OK)
        expect(host.ouiRequests).toStrictEqual([{
            filePath: "/tmp/oui.txt",
            url: "https://standards-oui.ieee.org/oui/oui.txt",
            refresh: true,
        }])
    })

    test("prompts for missing inputs", async () => {
        let prompt = new ScriptedPrompt(["00-0D-3A-00-00-01", "dcf4268b.208dd000"]);
        let { writer, host, status } = run([], new FakeHost(prompt));

        expect(await status).eq(TTYProgramStatus.OK)
        expect(writer.out).toStrictEqual(["fd58:e975:6519::/48"])
        expect(prompt.questions.length).eq(2)
        expect(prompt.questions[0]).eq("MAC address: ")
        expect(prompt.questions[1].endsWith("Clock: ")).true
        expect(host.ntpRequests).toStrictEqual([])
    })

    test("empty clock answer queries NTP", async () => {
        let prompt = new ScriptedPrompt(["  "]);
        let { host, status } = run(["--mac", "00:1b:21:3a:4c:5d"], new FakeHost(prompt));

        expect(await status).eq(TTYProgramStatus.OK)
        expect(host.ntpRequests.length).eq(1)
    })

    test("no MAC address and nobody to ask", async () => {
        let { writer, status } = run(["--clock", "system"]);

        expect(await status).eq(TTYProgramStatus.ERROR)
        expect(writer.err).toStrictEqual(["== Error ==\nno MAC address given, use --mac or --interface"])
    })

    test("--mac and --interface", async () => {
        let { writer, status } = run(["--mac", "00:1b:21:3a:4c:5d", "--interface", "eth0"]);

        expect(await status).eq(TTYProgramStatus.ERROR)
        expect(writer.err).toStrictEqual(["== Error ==\nuse either --mac or --interface, not both"])
    })

    test("malformed MAC address", async () => {
        let { writer, status } = run(["--mac", "00:0d:3a:00:00", "--clock", "system"]);

        expect(await status).eq(TTYProgramStatus.ERROR)
        expect(writer.out).toStrictEqual([])
        expect(writer.err).toStrictEqual(['== Error ==\nMAC address "000d3a0000" must be 12 hex digits (48 bits), got 10'])
    })

    test("unregistered vendor", async () => {
        let { writer, status } = run(["--mac", "01:02:03:04:05:06", "--clock", "dcf4268b.208dd000"]);

        expect(await status).eq(TTYProgramStatus.ERROR)
        expect(writer.out).toStrictEqual([])
        expect(writer.err).toStrictEqual([
            '== Error ==\nMAC address "01:02:03:04:05:06" is not registered to IEEE (OUI 010203 not found). Please use a REAL MAC address.',
        ])
    })

    test("registry unavailable", async () => {
        let host = new FakeHost();
        host.registryError = new AcquisitionError("registry", "cannot download vendor registry from https://registry.example/oui.txt", new Error("offline"));

        let { writer, status } = run(["--mac", "00:1b:21:3a:4c:5d", "--clock", "system"], host);

        expect(await status).eq(TTYProgramStatus.ERROR)
        expect(writer.err).toStrictEqual(["== Error ==\ncannot download vendor registry from https://registry.example/oui.txt: offline"])
    })

    test("unexpected failure", async () => {
        let host = new FakeHost();
        host.registryError = new Error("boom");

        let { writer, status } = run(["--mac", "00:1b:21:3a:4c:5d", "--clock", "system"], host);

        expect(await status).eq(TTYProgramStatus.ERROR)
        expect(writer.err).toStrictEqual(["== Internal error ==\nboom\n(this is a bug in ula-gen)"])
    })

    test("bad arguments", async () => {
        let { writer, status } = run(["--bogus"]);

        expect(await status).eq(TTYProgramStatus.ERROR)
        expect(writer.err).toStrictEqual(['argument: "--bogus" unknown\nTry "ula-gen --help".'])

        let missing = run(["--mac"]);
        expect(await missing.status).eq(TTYProgramStatus.ERROR)
        expect(missing.writer.err).toStrictEqual(['option: "--mac" missing value\nTry "ula-gen --help".'])
    })

    test("help", async () => {
        let { writer, host, status } = run(["--help"]);

        expect(await status).eq(TTYProgramStatus.OK)
        expect(writer.out.length).eq(1)
        expect(writer.out[0].startsWith("ula-gen: Generates an RFC 4193 unique local IPv6 /48 prefix")).true
        expect(writer.out[0]).toContain("-m, --mac <mac>")
        expect(writer.out[0]).toContain("    --canonical")
        expect(host.ouiRequests).toStrictEqual([])
    })

    test("cancel while prompting", async () => {
        let prompt = new ScriptedPrompt([]);
        let { program, status } = run([], new FakeHost(prompt));

        program.cancel();

        expect(await status).eq(TTYProgramStatus.CANCELED)
        expect(prompt.closed).true
    })

    test("cancel while waiting for the clock", async () => {
        let release = (_timestamp: NtpTimestamp) => { };
        let host = new FakeHost();
        host.pendingClock = new Promise<NtpTimestamp>((resolve) => { release = resolve });

        let { writer, program, status } = run(["--mac", "00:0d:3a:00:00:01"], host);
        // let the program reach the NTP query
        await new Promise((resolve) => setImmediate(resolve));
        expect(host.ntpRequests.length).eq(1)

        program.cancel();
        expect(await status).eq(TTYProgramStatus.CANCELED)

        release(new NtpTimestamp("dcf4268b208dd000"));
        await new Promise((resolve) => setImmediate(resolve));

        expect(writer.out).toStrictEqual([])
        expect(writer.err).toStrictEqual([])
        expect(host.ouiRequests).toStrictEqual([])
    })

    test("no error block after cancelling a prompt", async () => {
        let prompt = new ScriptedPrompt([]);
        let host = new FakeHost(prompt);
        let { writer, program, status } = run([], host);

        program.cancel();
        expect(await status).eq(TTYProgramStatus.CANCELED)

        // the closed prompt now gives an empty answer
        prompt.answerPending("");
        await new Promise((resolve) => setImmediate(resolve));

        expect(writer.out).toStrictEqual([])
        expect(writer.err).toStrictEqual([])
        expect(host.ntpRequests).toStrictEqual([])
    })

    test("reportError", () => {
        let writer = new CapturingWriter();
        expect(reportError(writer, "not an error")).eq(TTYProgramStatus.ERROR)
        expect(writer.err).toStrictEqual(["== Internal error ==\nnot an error\n(this is a bug in ula-gen)"])
    })
})
