/**
 * Minimal SNTPv4 client, just enough to read a server's transmit timestamp.
 * @module ntp/client
 *
 * See:
 * - RFC 4330, Simple Network Time Protocol (SNTP) Version 4
 *   https://www.rfc-editor.org/rfc/rfc4330
 */
import { createSocket } from "node:dgram";
import { uint8_equals, uint8_isZero } from "../binary/uint8-array";
import { AcquisitionError } from "../errors";
import { createLogger } from "../logging/logger";
import { NtpTimestamp } from "./timestamp";

const log = createLogger("ntp", "client");

export const NTP_PORT = 123;
export const NTP_PACKET_LENGTH = 48;
export const NTP_VERSION = 4;

const MODE_CLIENT = 3;
const MODE_SERVER = 4;
const ORIGINATE_TIMESTAMP_OFFSET = 24;
const TRANSMIT_TIMESTAMP_OFFSET = 40;

/** Anything that can hand out the current time as an NTP timestamp. */
export interface TimeSource {
    /** @throws AcquisitionError */
    now(): Promise<NtpTimestamp>;
}

/** One request, one reply. */
export interface NtpTransport {
    exchange(packet: Uint8Array, host: string, port: number, timeoutMs: number): Promise<Uint8Array>;
}

export type NtpClientOptions = {
    server: string;
    port?: number;
    timeoutMs?: number;
    transport?: NtpTransport;
};

/**
 * Client mode request: LI 0, VN 4, Mode 3, everything else zero except the
 * optional transmit timestamp, which the server echoes as its originate timestamp.
 */
export function buildNtpRequest(transmit?: NtpTimestamp): Uint8Array {
    let packet = new Uint8Array(NTP_PACKET_LENGTH);
    packet[0] = (0 << 6) | (NTP_VERSION << 3) | MODE_CLIENT;
    if (transmit) {
        packet.set(transmit.buffer, TRANSMIT_TIMESTAMP_OFFSET);
    }
    return packet;
}

/** A reply answers our request when it echoes the request's transmit timestamp. */
export function isReplyTo(reply: Uint8Array, request: Uint8Array): boolean {
    if (reply.byteLength < NTP_PACKET_LENGTH || request.byteLength < NTP_PACKET_LENGTH) {
        return false;
    }
    return uint8_equals(
        reply.subarray(ORIGINATE_TIMESTAMP_OFFSET, ORIGINATE_TIMESTAMP_OFFSET + 8),
        request.subarray(TRANSMIT_TIMESTAMP_OFFSET, TRANSMIT_TIMESTAMP_OFFSET + 8),
    );
}

/** @throws AcquisitionError if the reply is not a usable server reply */
export function parseNtpResponse(packet: Uint8Array): NtpTimestamp {
    if (packet.byteLength < NTP_PACKET_LENGTH) {
        throw new AcquisitionError("time", `NTP reply too short (${packet.byteLength} bytes)`);
    }

    let mode = packet[0] & 0x07;
    if (mode != MODE_SERVER) {
        throw new AcquisitionError("time", `unexpected NTP mode ${mode} in reply`);
    }

    // stratum 0 is a kiss-of-death packet
    if (packet[1] == 0) {
        let code = String.fromCharCode(...packet.subarray(12, 16)).replace(/\0+$/, "");
        throw new AcquisitionError("time", `NTP server refused the request (kiss code "${code}")`);
    }

    let transmit = packet.subarray(TRANSMIT_TIMESTAMP_OFFSET, TRANSMIT_TIMESTAMP_OFFSET + 8);
    if (uint8_isZero(transmit)) {
        throw new AcquisitionError("time", "NTP reply carries no transmit timestamp");
    }

    return new NtpTimestamp(transmit);
}

export class UdpNtpTransport implements NtpTransport {
    exchange(packet: Uint8Array, host: string, port: number, timeoutMs: number): Promise<Uint8Array> {
        let socket = createSocket("udp4");

        return new Promise<Uint8Array>((resolve, reject) => {
            let timer = setTimeout(() => {
                reject(new Error(`no reply within ${timeoutMs}ms`));
            }, timeoutMs);

            socket.on("error", (err) => {
                clearTimeout(timer);
                reject(err);
            });
            socket.on("message", (msg, rinfo) => {
                let reply = new Uint8Array(msg);
                // stray datagrams are dropped, the timeout still applies
                if (rinfo.port != port || !isReplyTo(reply, packet)) {
                    log.debug("ignoring unrelated datagram", { from: `${rinfo.address}:${rinfo.port}` });
                    return;
                }
                clearTimeout(timer);
                resolve(reply);
            });

            socket.send(packet, port, host, (err) => {
                if (err) {
                    clearTimeout(timer);
                    reject(err);
                }
            });
        }).finally(() => socket.close());
    }
}

export class NtpTimeSource implements TimeSource {
    readonly server: string;
    readonly port: number;
    readonly timeoutMs: number;
    private readonly transport: NtpTransport;

    constructor(options: NtpClientOptions) {
        this.server = options.server;
        this.port = options.port ?? NTP_PORT;
        this.timeoutMs = options.timeoutMs ?? 5000;
        this.transport = options.transport ?? new UdpNtpTransport();
    }

    async now(): Promise<NtpTimestamp> {
        log.debug("querying NTP server", { server: this.server, port: this.port });

        let reply: Uint8Array;
        try {
            reply = await this.transport.exchange(buildNtpRequest(NtpTimestamp.fromUnixMs(Date.now())), this.server, this.port, this.timeoutMs);
        } catch (error) {
            throw new AcquisitionError("time", `NTP query to ${this.server} failed`, error);
        }

        let timestamp = parseNtpResponse(reply);
        log.debug("NTP transmit timestamp", { clock: timestamp.toString(".") });
        return timestamp;
    }
}

/** Operator supplied clock for repeatable output. */
export class FixedTimeSource implements TimeSource {
    readonly timestamp: NtpTimestamp;

    constructor(clock: string | NtpTimestamp) {
        this.timestamp = typeof clock == "string" ? new NtpTimestamp(clock) : clock;
    }

    async now(): Promise<NtpTimestamp> {
        return this.timestamp;
    }
}

export class SystemTimeSource implements TimeSource {
    constructor(private readonly clock: () => number = Date.now) { }

    async now(): Promise<NtpTimestamp> {
        return NtpTimestamp.fromUnixMs(this.clock());
    }
}
