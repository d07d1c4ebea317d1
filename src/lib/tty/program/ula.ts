import { generateUla, UlaResult } from "../../address/ipv6/ula";
import { MACAddress } from "../../address/mac";
import { UlaConfig } from "../../config";
import { InterfaceTable, resolveHardwareAddress } from "../../device/interfaces";
import { InternalInvariantError, UlaError, ValidationError } from "../../errors";
import { createLogger, logManager } from "../../logging/logger";
import { FixedTimeSource, NtpClientOptions, TimeSource } from "../../ntp/client";
import { CachedOuiSourceOptions, OuiSource } from "../../oui/source";
import { POFactory, ProgramOptionDefinition, ProgramOptionValues } from "../../utils/program-options";
import { Prompt } from "../prompt";
import { TTYProgram, TTYProgramInitializer, TTYProgramMetaData, TTYProgramStatus, TTYWriter, formatTable } from "./program";

const log = createLogger("ula");

/** Everything the program reaches outside of itself. */
export interface UlaProgramHost {
    config: UlaConfig;
    /** only set when someone can answer */
    prompt?: Prompt;
    ouiSource(options: CachedOuiSourceOptions): OuiSource;
    ntpTimeSource(options: NtpClientOptions): TimeSource;
    systemTimeSource(): TimeSource;
    networkInterfaces(): InterfaceTable;
}

export const ULA_OPTIONS = new ProgramOptionDefinition({
    "mac": POFactory.value({ alias: "m", placeholder: "mac", description: "MAC address, any of : - . separators" }),
    "interface": POFactory.value({ alias: "i", placeholder: "name|auto", description: "take the MAC address from a local network interface" }),
    "clock": POFactory.value({ alias: "c", placeholder: "ntp-time|system", description: "NTP time as ssssssss.ffffffff, or \"system\" for the local clock" }),
    "ntp-server": POFactory.value({ alias: "s", placeholder: "host", description: "NTP server to query when no clock is given" }),
    "oui-file": POFactory.value({ placeholder: "path", description: "IEEE OUI registry cache" }),
    "oui-url": POFactory.value({ placeholder: "url", description: "where to download the registry from" }),
    "refresh-oui": POFactory.flag({ description: "download the registry even if the cache exists" }),
    "canonical": POFactory.flag({ description: "print RFC 5952 text (fd72:f0:89da::/48) instead of fixed width groups" }),
    "strict": POFactory.flag({ description: "reject well-known placeholder MAC addresses" }),
    "verbose": POFactory.flag({ alias: "v", description: "print inputs and intermediary values" }),
    "debug": POFactory.flag({ description: "debug logging on stderr" }),
    "help": POFactory.flag({ alias: "h", description: "show this help" }),
});

type UlaOptions = ProgramOptionValues<typeof ULA_OPTIONS.definition>;

const CLOCK_PROMPT = "For a deterministic calculation, you may enter the NTP clock time.\n"
    + "Leave empty to query an NTP server.\n"
    + "Clock: ";

async function resolveMac(options: UlaOptions, host: UlaProgramHost): Promise<MACAddress> {
    if (options.mac !== undefined && options.interface !== undefined) {
        throw new ValidationError(MACAddress.FIELD_NAME, "use either --mac or --interface, not both");
    }

    if (options.mac !== undefined) {
        return new MACAddress(options.mac);
    }

    if (options.interface !== undefined) {
        let iface = resolveHardwareAddress(options.interface, host.networkInterfaces());
        log.debug("using interface hardware address", { interface: iface.name, mac: iface.mac });
        return new MACAddress(iface.mac);
    }

    if (host.prompt) {
        return new MACAddress(await host.prompt.question("MAC address: "));
    }

    throw new ValidationError(MACAddress.FIELD_NAME, "no MAC address given, use --mac or --interface");
}

async function resolveTimeSource(options: UlaOptions, host: UlaProgramHost): Promise<TimeSource> {
    let clock = options.clock;

    if (clock === undefined && host.prompt) {
        clock = (await host.prompt.question(CLOCK_PROMPT)).trim() || undefined;
    }

    if (clock == "system") {
        return host.systemTimeSource();
    }

    if (clock !== undefined) {
        return new FixedTimeSource(clock);
    }

    return host.ntpTimeSource({
        server: options["ntp-server"] ?? host.config.ntpServer,
        port: host.config.ntpPort,
        timeoutMs: host.config.ntpTimeoutMs,
    });
}

export function formatUlaReport(result: UlaResult): string {
    return [
        "## Inputs ##",
        formatTable([
            ["MAC address", "=", `${result.mac.toString(":")} (${result.vendor})`],
            ["NTP time", "=", `${result.timestamp.toString(".")} (${result.timestamp.toDate().toISOString()})`],
        ], " "),
        "",
        "## Intermediary values ##",
        formatTable([
            ["EUI64 address", "=", result.eui64.toString()],
            ["Global ID", "=", result.globalId],
        ], " "),
        "",
        "## Generated ULA ##",
        result.prefix,
    ].join("\n");
}

function usage(): string {
    return [
        `ula-gen: ${ttyProgramUla.about.description}`,
        ttyProgramUla.about.content,
        formatTable(ULA_OPTIONS.content(), "  "),
    ].join("\n");
}

async function runUla(writer: TTYWriter, host: UlaProgramHost, argv: string[], signal: AbortSignal): Promise<TTYProgramStatus> {
    let parsed = ULA_OPTIONS.parse(argv);
    if (!parsed.success) {
        writer.error(`${ULA_OPTIONS.message(parsed)}\nTry "ula-gen --help".`);
        return TTYProgramStatus.ERROR;
    }

    let options = parsed.options;
    if (options.help) {
        writer.write(usage());
        return TTYProgramStatus.OK;
    }

    if (options.debug) {
        logManager.configure({ level: "debug" });
    }

    let mac = await resolveMac(options, host);
    signal.throwIfAborted();

    if (mac.isPlaceholder()) {
        if (options.strict) {
            throw new ValidationError(MACAddress.FIELD_NAME, `MAC address "${mac.toString(":")}" looks like a placeholder, not a real interface address`);
        }
        log.warn("MAC address looks like a placeholder", { mac: mac.toString(":") });
    }

    let timeSource = await resolveTimeSource(options, host);
    signal.throwIfAborted();

    let timestamp = await timeSource.now();
    signal.throwIfAborted();

    let registry = await host.ouiSource({
        filePath: options["oui-file"] ?? host.config.ouiFile,
        url: options["oui-url"] ?? host.config.ouiUrl,
        refresh: options["refresh-oui"] ?? false,
    }).load();
    signal.throwIfAborted();

    let result = generateUla({ mac, timestamp }, registry, options.canonical ? "canonical" : "fixed");
    log.debug("generated", { prefix: result.prefix, eui64: result.eui64.toString() });

    writer.write(options.verbose ? formatUlaReport(result) : result.prefix);
    return TTYProgramStatus.OK;
}

export function reportError(writer: TTYWriter, error: unknown): TTYProgramStatus {
    if (error instanceof InternalInvariantError || !(error instanceof UlaError)) {
        let message = error instanceof Error ? error.message : String(error);
        writer.error(`== Internal error ==\n${message}\n(this is a bug in ula-gen)`);
        return TTYProgramStatus.ERROR;
    }

    writer.error(`== Error ==\n${error.message}`);
    return TTYProgramStatus.ERROR;
}

export const ttyProgramUla: TTYProgram<UlaProgramHost> = Object.assign<TTYProgramInitializer<UlaProgramHost>, TTYProgramMetaData>((writer, host) => {
    let controller = new AbortController();

    // nothing reaches the terminal once cancelled
    let output: TTYWriter = {
        write(text) { if (!controller.signal.aborted) writer.write(text) },
        error(text) { if (!controller.signal.aborted) writer.error(text) },
    };

    let cancel = () => { };
    return {
        cancel() { cancel() },
        run(argv) {
            return new Promise(resolve => {
                cancel = () => {
                    controller.abort();
                    host.prompt?.close();
                    resolve(TTYProgramStatus.CANCELED);
                };

                runUla(output, host, argv, controller.signal).then(resolve, (error: unknown) => resolve(reportError(output, error)));
            })
        },
    }
}, {
    about: {
        description: "Generates an RFC 4193 unique local IPv6 /48 prefix from a MAC address and an NTP timestamp.",
        content: `
        <ula-gen>                        prompts for the MAC address and the clock
        <ula-gen --mac [mac]>            queries an NTP server for the clock
        <ula-gen --mac [mac] --clock [ntp-time]>
                                         repeatable output for the same inputs
        The prefix is printed as fdXX:XXXX:XXXX::/48 unless --canonical is given.
        `,
    },
});
