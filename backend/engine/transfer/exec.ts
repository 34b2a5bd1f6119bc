// transfer/exec.ts
// Run a shell command, hand back its combined stdout/stderr.

import { exec as _exec } from "node:child_process"
import { promisify } from "node:util"

import { makeError } from "../errors/index.js"

const exec = promisify(_exec)

export type CommandExecutor = (cmd: string) => Promise<string>

type ExecFailure = Error & {
  code?: number | string | null
  signal?: NodeJS.Signals | null
  stdout?: string
  stderr?: string
}

function isExecFailure(e: unknown): e is ExecFailure {
  return e instanceof Error
}

/**
 * Non-zero exit → Command error "Application failed to execute [cmd]";
 * killed by a signal → "Application terminated by signal [cmd]".
 * The captured output rides along in `details.output`.
 */
export const executeCommand: CommandExecutor = async (cmd) => {
  try {
    const { stdout, stderr } = await exec(cmd, { encoding: "utf8", maxBuffer: 16 * 1024 * 1024 })
    return `${stdout}${stderr}`
  } catch (e) {
    if (!isExecFailure(e)) throw makeError("Command", `Application failed to execute [${cmd}]`, e, { cmd })
    const output = `${e.stdout ?? ""}${e.stderr ?? ""}`
    const message = e.signal
      ? `Application terminated by signal [${cmd}]`
      : `Application failed to execute [${cmd}]`
    throw makeError("Command", message, e, { cmd, output, exitCode: e.code ?? null, signal: e.signal ?? null })
  }
}
