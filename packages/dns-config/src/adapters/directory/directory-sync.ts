import { readdir, readFile } from "node:fs/promises"
import { join } from "node:path"
import { type Clock, type Milliseconds, ticks } from "@dnssync/clock"
import type { Logger } from "@dnssync/logger"
import type { ConfigSync } from "../../ports/config-sync"
import type { DnsConfig } from "../../ports/dns-config"
import { type ConfigEntry, decodeConfigEntries } from "../../core/codec/decode-config"
import { DnsConfigError } from "../../core/dns-config.errors"
import { validateDnsConfig } from "../../core/validation/validate-config"

export type DirectorySyncDeps = {
  clock: Clock
  logger: Logger
}

export type DirectorySyncOptions = {
  dir: string
  periodMs: Milliseconds
}

/**
 * Reads config from the files of a directory, such as a mounted ConfigMap
 * volume, and re-reads it every `periodMs`.
 */
export class DirectorySync implements ConfigSync {
  readonly name: string
  private readonly logger: Logger

  constructor(
    private readonly deps: DirectorySyncDeps,
    private readonly opts: DirectorySyncOptions,
  ) {
    this.name = `dir:${opts.dir}`
    this.logger = deps.logger.child({ module: "directory-sync", source: this.name, dir: opts.dir })
  }

  async fetchOnce(): Promise<DnsConfig> {
    const entries = await this.readEntries()
    const { config, ignored } = decodeConfigEntries(entries)

    if (ignored.length > 0) {
      this.logger.debug("Ignoring unrecognized config files", { ignored })
    }

    validateDnsConfig(config)

    return config
  }

  async *stream(): AsyncGenerator<DnsConfig, void, undefined> {
    for await (const tick of ticks(this.deps.clock, this.opts.periodMs)) {
      let config: DnsConfig

      try {
        config = await this.fetchOnce()
      } catch (err) {
        this.logger.warn("Skipping config update", { err, tick })
        continue
      }

      yield config
    }
  }

  // kubelet's atomic writer keeps `..data` and timestamped dirs beside the
  // visible symlinks; dot-names are never config.
  private async readEntries(): Promise<ConfigEntry[]> {
    try {
      const dirents = await readdir(this.opts.dir, { withFileTypes: true })
      const entries: ConfigEntry[] = []

      for (const dirent of dirents) {
        if (dirent.name.startsWith(".")) continue
        if (!dirent.isFile() && !dirent.isSymbolicLink()) continue

        const content = await readFile(join(this.opts.dir, dirent.name), "utf8")
        entries.push({ name: dirent.name, content })
      }

      return entries
    } catch (err) {
      throw DnsConfigError.readFailed(this.name, err)
    }
  }
}
