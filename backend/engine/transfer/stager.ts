// transfer/stager.ts
// Move the stats working set between the order host and the local machine
// with scp/ssh, and verify pushed files by comparing cksum output.

import * as fs from "fs"
import * as path from "path"

import { makeError } from "../errors/index.js"
import { logger } from "../../observability/logger.js"
import { executeCommand, type CommandExecutor } from "./exec.js"

export interface RemoteFileStager {
  /** Copy the remote directory tree into `localDir` (which must not exist yet). */
  fetch(remoteDir: string, localDir: string): Promise<void>
  /** Copy every file of `localDir` into `remoteDir`, then verify them; returns the file names. */
  push(localDir: string, remoteDir: string): Promise<string[]>
  /** Compare local and remote checksums of `files`; a mismatch is a Transfer error. */
  verify(localDir: string, remoteDir: string, files: readonly string[]): Promise<void>
}

const SSH_OPTS = ["-q", "-o", "StrictHostKeyChecking=no"]
const SCP_OPTS = [...SSH_OPTS, "-C"]

/** Quote for a POSIX shell. */
export function shellQuote(s: string): string {
  return /^[\w@%+=:,./-]+$/.test(s) ? s : `'${s.replace(/'/g, `'\\''`)}'`
}

/** First whitespace-separated field of `cksum` output (the CRC). */
export function checksumOf(output: string): string {
  return output.trim().split(/\s+/)[0] ?? ""
}

export class ScpFileStager implements RemoteFileStager {
  constructor(
    private readonly host: string,
    private readonly run: CommandExecutor = executeCommand
  ) {}

  private remote(p: string) {
    return shellQuote(`${this.host}:${p}`)
  }

  private async step(cmd: string, failure: string): Promise<string> {
    logger.debug(cmd)
    try {
      return await this.run(cmd)
    } catch (e) {
      logger.error(failure)
      throw makeError("Transfer", failure, e, { cmd })
    }
  }

  async fetch(remoteDir: string, localDir: string): Promise<void> {
    const cmd = ["scp", ...SCP_OPTS, "-r", this.remote(remoteDir), shellQuote(localDir)].join(" ")
    await this.step(cmd, `Failed retrieving stats from ${this.host}:${remoteDir}`)
    logger.info(`Retrieved ${this.host}:${remoteDir} → ${localDir}`)
  }

  async push(localDir: string, remoteDir: string): Promise<string[]> {
    logger.info(`Creating ${remoteDir} on ${this.host}`)
    await this.step(
      ["ssh", ...SSH_OPTS, shellQuote(this.host), "mkdir", "-p", shellQuote(remoteDir)].join(" "),
      `Failed creating ${remoteDir} on ${this.host}`
    )

    const files = fs
      .readdirSync(localDir, { withFileTypes: true })
      .filter((d) => d.isFile())
      .map((d) => d.name)
      .sort()
    if (!files.length) {
      logger.warn(`Nothing to transfer from ${localDir}`)
      return files
    }

    const sources = files.map((f) => shellQuote(path.join(localDir, f)))
    await this.step(
      ["scp", ...SCP_OPTS, ...sources, this.remote(remoteDir)].join(" "),
      `Failed to transfer ${files.length} file(s) to ${this.host}:${remoteDir}`
    )
    logger.info("Transfer complete - SCP")

    await this.verify(localDir, remoteDir, files)
    return files
  }

  async verify(localDir: string, remoteDir: string, files: readonly string[]): Promise<void> {
    logger.info("Verifying statistics transfers")
    for (const file of files) {
      const localFile = path.join(localDir, file)
      const remoteFile = path.posix.join(remoteDir, file)
      const local = checksumOf(
        await this.step(`cksum ${shellQuote(localFile)}`, `Failed computing checksum of ${localFile}`)
      )
      const remote = checksumOf(
        await this.step(
          ["ssh", ...SSH_OPTS, shellQuote(this.host), "cksum", shellQuote(remoteFile)].join(" "),
          `Failed computing checksum of ${this.host}:${remoteFile}`
        )
      )
      if (!local || local !== remote) {
        throw makeError("Transfer", `Failed checksum validation between ${file} and ${this.host}:${remoteFile}`, undefined, {
          file,
          local,
          remote,
        })
      }
    }
  }
}
