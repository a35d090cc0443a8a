import { isIP } from "node:net"

export type HostPort = { host: string; port: string }

export type SplitHostPortResult =
  | ({ ok: true } & HostPort)
  | { ok: false; reason: string }

/**
 * An IPv4 or IPv6 literal. Zoned IPv6 (`fe80::1%eth0`) is rejected.
 */
export function isIpAddress(value: string): boolean {
  return !value.includes("%") && isIP(value) !== 0
}

/**
 * Split `host:port`, `[host]:port` or `[ipv6]:port`. A bare IPv6 address
 * (more than one colon, no brackets) is rejected.
 */
export function splitHostPort(hostport: string): SplitHostPortResult {
  const fail = (reason: string): SplitHostPortResult => ({
    ok: false,
    reason: `address ${hostport}: ${reason}`,
  })

  const lastColon = hostport.lastIndexOf(":")
  if (lastColon < 0) return fail("missing port in address")

  let host: string

  if (hostport.startsWith("[")) {
    const end = hostport.indexOf("]")
    if (end < 0) return fail("missing ']' in address")

    if (end + 1 === hostport.length) return fail("missing port in address")
    if (end + 1 !== lastColon) {
      return fail(hostport[end + 1] === ":" ? "too many colons in address" : "missing port in address")
    }

    host = hostport.slice(1, end)
    if (host.includes("[")) return fail("unexpected '[' in address")
  } else {
    host = hostport.slice(0, lastColon)
    if (host.includes(":")) return fail("too many colons in address")
    if (host.includes("[")) return fail("unexpected '[' in address")
    if (host.includes("]")) return fail("unexpected ']' in address")
  }

  const port = hostport.slice(lastColon + 1)
  if (port.includes("]")) return fail("unexpected ']' in address")

  return { ok: true, host, port }
}
