import { ValidationError } from "./errors";
import { isLogLevel, LogLevel } from "./logging/logger";
import { NTP_PORT } from "./ntp/client";
import { IEEE_OUI_URL } from "./oui/source";

/**
 * Settings the program reads before looking at its arguments.
 */
export interface UlaConfig {
    ntpServer: string;
    ntpPort: number;
    ntpTimeoutMs: number;
    ouiUrl: string;
    /** cached copy of the IEEE registry, relative to the working directory */
    ouiFile: string;
    logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<UlaConfig> = {
    ntpServer: "0.pool.ntp.org",
    ntpPort: NTP_PORT,
    ntpTimeoutMs: 5000,
    ouiUrl: IEEE_OUI_URL,
    ouiFile: "oui.txt",
    logLevel: "warn",
};

export type Environment = Record<string, string | undefined>;

function readPositiveInt(env: Environment, name: string, fallback: number, max: number): number {
    let raw = env[name]?.trim();
    if (!raw) return fallback;

    let n = Number(raw);
    if (!Number.isInteger(n) || n < 1 || n > max) {
        throw new ValidationError(name, `${name} must be an integer between 1 and ${max}, got "${raw}"`);
    }
    return n;
}

function readString(env: Environment, name: string, fallback: string): string {
    return env[name]?.trim() || fallback;
}

/** @throws ValidationError for malformed overrides */
export function loadConfig(env: Environment = process.env): UlaConfig {
    let logLevel = readString(env, "ULA_LOG_LEVEL", DEFAULT_CONFIG.logLevel).toLowerCase();
    if (!isLogLevel(logLevel)) {
        throw new ValidationError("ULA_LOG_LEVEL", `ULA_LOG_LEVEL must be one of debug, info, warn, error, none, got "${logLevel}"`);
    }

    return {
        ntpServer: readString(env, "ULA_NTP_SERVER", DEFAULT_CONFIG.ntpServer),
        ntpPort: readPositiveInt(env, "ULA_NTP_PORT", DEFAULT_CONFIG.ntpPort, 65535),
        ntpTimeoutMs: readPositiveInt(env, "ULA_NTP_TIMEOUT_MS", DEFAULT_CONFIG.ntpTimeoutMs, 600_000),
        ouiUrl: readString(env, "ULA_OUI_URL", DEFAULT_CONFIG.ouiUrl),
        ouiFile: readString(env, "ULA_OUI_FILE", DEFAULT_CONFIG.ouiFile),
        logLevel,
    };
}
