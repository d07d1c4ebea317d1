export * from "./errors"
export { validateHex } from "./utils/hex"
export { MACAddress, PLACEHOLDER_NIC_IDS } from "./address/mac"
export { EUI64Address, deriveEui64 } from "./address/eui64"
export { IPV6Address } from "./address/ipv6/ipv6"
export { deriveGlobalId, formatUla, generateUla, ulaNetworkAddress } from "./address/ipv6/ula"
export type { GlobalId, UlaInput, UlaResult, UlaStyle } from "./address/ipv6/ula"
export { NtpTimestamp } from "./ntp/timestamp"
export { FixedTimeSource, NtpTimeSource, SystemTimeSource, UdpNtpTransport, buildNtpRequest, isReplyTo, parseNtpResponse } from "./ntp/client"
export type { NtpTransport, TimeSource } from "./ntp/client"
export { lookupVendor, parseOuiText } from "./oui/registry"
export type { OuiRegistry } from "./oui/registry"
export { CachedOuiSource, FileOuiSource, HttpOuiSource, IEEE_OUI_URL } from "./oui/source"
export type { OuiSource } from "./oui/source"
export { listHardwareInterfaces, resolveHardwareAddress } from "./device/interfaces"
