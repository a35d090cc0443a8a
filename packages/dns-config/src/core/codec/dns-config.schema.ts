import { z } from "zod"

// null decodes like a missing field
export const federationsSchema = z.record(z.string(), z.string()).nullish()
export const stubDomainsSchema = z.record(z.string(), z.array(z.string())).nullish()
export const upstreamNameserversSchema = z.array(z.string()).nullish()

/**
 * Wire shape of a whole config object. Unknown keys are ignored.
 */
export const dnsConfigSchema = z.object({
  federations: federationsSchema,
  stubDomains: stubDomainsSchema,
  upstreamNameservers: upstreamNameserversSchema,
})

export type DnsConfigWire = z.infer<typeof dnsConfigSchema>
