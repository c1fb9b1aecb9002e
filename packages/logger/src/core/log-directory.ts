import { mkdirSync } from "node:fs"
import os from "node:os"
import path from "node:path"
import { SinkIOError } from "../errors/logger-error"
import type { SideChannel } from "../ports/side-channel"
import { validatePathLabel } from "./label"

export type LogDirectoryEnvironment = {
  platform: NodeJS.Platform
  env: Record<string, string | undefined>
  homedir: string
}

/**
 * Per-user log directory of `appName` on the current platform:
 *
 * - macOS: `~/Library/Logs/<app>`
 * - Windows: `%LOCALAPPDATA%\<app>\Logs`
 * - elsewhere: `$XDG_STATE_HOME/<app>/logs`, falling back to `~/.local/state`
 *
 * @throws ConfigurationError when `appName` isn't a single path segment.
 */
export function defaultLogDirectory(
  appName: string,
  environment: Partial<LogDirectoryEnvironment> = {},
): string {
  validatePathLabel(appName)

  const platform = environment.platform ?? process.platform
  const env = environment.env ?? process.env
  const home = environment.homedir ?? os.homedir()

  if (platform === "darwin") {
    return path.posix.join(home, "Library", "Logs", appName)
  }

  if (platform === "win32") {
    const base = env.LOCALAPPDATA || path.win32.join(home, "AppData", "Local")
    return path.win32.join(base, appName, "Logs")
  }

  const base = env.XDG_STATE_HOME || path.posix.join(home, ".local", "state")
  return path.posix.join(base, appName, "logs")
}

/**
 * Create `directory` and its parents if missing.
 *
 * @returns whether the directory can be used. Failures go to `sideChannel`.
 */
export function ensureLogDirectory(directory: string, sideChannel: SideChannel): boolean {
  try {
    mkdirSync(directory, { recursive: true })
    return true
  } catch (err) {
    sideChannel.report("Can't create log directory", new SinkIOError("create", directory, err))
    return false
  }
}
