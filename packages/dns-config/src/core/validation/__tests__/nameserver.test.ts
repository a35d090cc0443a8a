import { describe, expect, it } from "vitest"
import { DnsConfigError } from "../../dns-config.errors"
import {
  validateNameserverIpAndPort,
  validateStubDomains,
  validateStubNameserver,
  validateUpstreamNameservers,
} from "../nameserver"

function catchError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error("expected an error")
}

describe("validateNameserverIpAndPort", () => {
  it("gives a bare IP the default port", () => {
    expect(validateNameserverIpAndPort("10.0.0.1")).toEqual({ host: "10.0.0.1", port: "53" })
  })

  it("accepts a bare IPv6 address", () => {
    expect(validateNameserverIpAndPort("2001:db8::1")).toEqual({ host: "2001:db8::1", port: "53" })
  })

  it("keeps an explicit port", () => {
    expect(validateNameserverIpAndPort("10.0.0.1:5353")).toEqual({
      host: "10.0.0.1",
      port: "5353",
    })
  })

  it.each(["10.0.0.1:1", "10.0.0.1:65535"])("accepts boundary port in %j", (ns) => {
    expect(() => validateNameserverIpAndPort(ns)).not.toThrow()
  })

  it.each([
    ["10.0.0.1:70000", 'bad port number: "70000"'],
    ["10.0.0.1:0", 'bad port number: "0"'],
    ["10.0.0.1:dns", 'bad port number: "dns"'],
    ["not-an-ip:53", 'bad IP address: "not-an-ip"'],
    ["ns.example.com", "address ns.example.com: missing port in address"],
    ["fe80::1%eth0", "address fe80::1%eth0: too many colons in address"],
    ["[fe80::1%eth0]:53", 'bad IP address: "fe80::1%eth0"'],
  ])("rejects %j", (ns, reason) => {
    const err = catchError(() => validateNameserverIpAndPort(ns))

    expect(err).toBeInstanceOf(DnsConfigError)
    expect(err).toMatchObject({
      code: "invalid_upstream_nameserver",
      message: `invalid upstream nameserver ${JSON.stringify(ns)}: ${reason}`,
      context: { pass: "upstreamNameservers", nameserver: ns },
    })
  })
})

describe("validateUpstreamNameservers", () => {
  it("accepts up to three entries", () => {
    expect(() =>
      validateUpstreamNameservers(["10.0.0.1", "10.0.0.2:53", "10.0.0.3"]),
    ).not.toThrow()
  })

  it("rejects four entries even when each is valid", () => {
    const err = catchError(() =>
      validateUpstreamNameservers(["10.0.0.1", "10.0.0.2", "10.0.0.3", "10.0.0.4"]),
    )

    expect(err).toMatchObject({
      code: "too_many_upstream_nameservers",
      message: "upstreamNameservers cannot have more than 3 entries, got 4",
    })
  })

  it("rejects too many entries before looking at their content", () => {
    const err = catchError(() => validateUpstreamNameservers(["x", "y", "z", "w", "v"]))

    expect(err).toMatchObject({ code: "too_many_upstream_nameservers" })
  })
})

describe("validateStubNameserver", () => {
  it.each([
    "10.0.0.1",
    "10.0.0.1:5353",
    "10.0.0.1:0",
    "10.0.0.1:65535",
    "ns.example.com",
    "resolver",
  ])("accepts %j", (ns) => {
    expect(() => validateStubNameserver("acme.local", ns)).not.toThrow()
  })

  it.each([
    "10.0.0.1:65536",
    "10.0.0.1:-1",
    "10.0.0.1:",
    "ns.example.com:53",
    "not-an-ip:53",
    "NS.example.com",
    "2001:db8::1",
    "fe80::1%eth0",
  ])("rejects %j", (ns) => {
    const err = catchError(() => validateStubNameserver("acme.local", ns))

    expect(err).toMatchObject({
      code: "invalid_stub_nameserver",
      message: `invalid nameserver: ${JSON.stringify(ns)}`,
      context: { pass: "stubDomains", domain: "acme.local", nameserver: ns },
    })
  })

  it("accepts a hostname the upstream pass rejects", () => {
    expect(() => validateStubNameserver("acme.local", "ns.example.com")).not.toThrow()
    expect(() => validateNameserverIpAndPort("ns.example.com")).toThrow(DnsConfigError)
  })
})

describe("validateStubDomains", () => {
  it("accepts valid domains and nameservers", () => {
    expect(() =>
      validateStubDomains({
        "acme.local": ["10.0.0.1", "10.0.0.2:5353"],
        "corp.example.com": ["ns1.corp.example.com"],
      }),
    ).not.toThrow()
  })

  it("accepts a domain without nameservers", () => {
    expect(() => validateStubDomains({ "acme.local": [] })).not.toThrow()
  })

  it("rejects an uppercase domain", () => {
    const err = catchError(() => validateStubDomains({ "UPPER.local": ["10.0.0.1"] }))

    expect(err).toMatchObject({
      code: "invalid_stub_domain",
      message: 'invalid domain name: "UPPER.local"',
      context: { pass: "stubDomains", domain: "UPPER.local" },
    })
  })
})
