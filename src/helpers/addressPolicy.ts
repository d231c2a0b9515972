import net from "net";

const blockedRanges = new net.BlockList();
// private
blockedRanges.addSubnet("10.0.0.0", 8, "ipv4");
blockedRanges.addSubnet("172.16.0.0", 12, "ipv4");
blockedRanges.addSubnet("192.168.0.0", 16, "ipv4");
blockedRanges.addSubnet("fc00::", 7, "ipv6");
// link-local
blockedRanges.addSubnet("169.254.0.0", 16, "ipv4");
blockedRanges.addSubnet("fe80::", 10, "ipv6");
// multicast
blockedRanges.addSubnet("224.0.0.0", 4, "ipv4");
blockedRanges.addSubnet("ff00::", 8, "ipv6");
// unspecified
blockedRanges.addSubnet("0.0.0.0", 8, "ipv4");
blockedRanges.addAddress("::", "ipv6");

const loopbackRanges = new net.BlockList();
loopbackRanges.addSubnet("127.0.0.0", 8, "ipv4");
loopbackRanges.addAddress("::1", "ipv6");

const MAPPED_IPV4 = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;

/** Reduces IPv4-mapped IPv6 addresses to their IPv4 form. */
export function normalizeAddress(address: string): string {
  const mapped = MAPPED_IPV4.exec(address);
  return mapped ? mapped[1] : address;
}

function family(address: string): "ipv4" | "ipv6" {
  return net.isIPv4(address) ? "ipv4" : "ipv6";
}

export function isLoopbackAddress(address: string): boolean {
  const normalized = normalizeAddress(address);
  return loopbackRanges.check(normalized, family(normalized));
}

export function isBlockedAddress(address: string): boolean {
  const normalized = normalizeAddress(address);
  return blockedRanges.check(normalized, family(normalized));
}

/**
 * A host may be fetched when every address it resolves to is loopback,
 * or when none of them falls in a blocked range.
 */
export function isAllowedResolution(addresses: string[]): boolean {
  if (addresses.length > 0 && addresses.every(isLoopbackAddress)) {
    return true;
  }
  return !addresses.some(isBlockedAddress);
}
