import { networkInterfaces } from "node:os";
import { AcquisitionError } from "../errors";

const EMPTY_MAC = "00:00:00:00:00:00";

export type HardwareInterface = {
    name: string;
    mac: string;
};

export type InterfaceTable = ReturnType<typeof networkInterfaces>;

/** Non-internal interfaces that report a real hardware address, in system order. */
export function listHardwareInterfaces(nets: InterfaceTable = networkInterfaces()): HardwareInterface[] {
    let found: HardwareInterface[] = [];

    for (let name of Object.keys(nets)) {
        for (let net of nets[name] ?? []) {
            if (net.internal || !net.mac || net.mac == EMPTY_MAC) {
                continue;
            }
            if (!found.some((iface) => iface.name == name)) {
                found.push({ name, mac: net.mac });
            }
        }
    }

    return found;
}

/**
 * @param name interface name, or "auto" for the first one with a hardware address
 * @throws AcquisitionError
 */
export function resolveHardwareAddress(name: string, nets: InterfaceTable = networkInterfaces()): HardwareInterface {
    let interfaces = listHardwareInterfaces(nets);

    if (name == "auto") {
        if (!interfaces.length) {
            throw new AcquisitionError("hardware", "no network interface with a hardware address found");
        }
        return interfaces[0];
    }

    let iface = interfaces.find((iface) => iface.name == name);
    if (!iface) {
        let known = interfaces.map((iface) => iface.name).join(", ") || "none";
        throw new AcquisitionError("hardware", `interface "${name}" has no hardware address (available: ${known})`);
    }

    return iface;
}
