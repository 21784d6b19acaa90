import { homedir, platform } from 'os'
import { isAbsolute, join } from 'path'
import Debug from 'debug'

const debug = Debug('directories')

/** Supplies the platform-conventional base directory for per-user settings. */
export interface DirectoryProvider {
  /** `undefined` when no such directory can be determined. */
  userConfigRoot(): string | undefined
}

export interface PlatformEnvironment {
  platform: NodeJS.Platform
  env: NodeJS.ProcessEnv
  /** Returns an empty string when the home directory is unknown. */
  homedir: () => string
}

/**
 * %APPDATA% on Windows, ~/Library/Application Support on macOS, $XDG_CONFIG_HOME or ~/.config elsewhere.
 */
export class PlatformDirectoryProvider implements DirectoryProvider {
  private environment: PlatformEnvironment

  constructor(environment?: Partial<PlatformEnvironment>) {
    this.environment = {
      platform: environment?.platform ?? platform(),
      env: environment?.env ?? process.env,
      homedir: environment?.homedir ?? safeHomedir,
    }
  }

  userConfigRoot(): string | undefined {
    const { env } = this.environment
    const home = this.environment.homedir()
    let root: string | undefined
    switch (this.environment.platform) {
      case 'win32':
        if (env['APPDATA']) root = env['APPDATA']
        else if (home) root = join(home, 'AppData', 'Roaming')
        break
      case 'darwin':
        if (home) root = join(home, 'Library', 'Application Support')
        break
      default: {
        // Relative values are invalid per the XDG base directory rules
        const xdg = env['XDG_CONFIG_HOME']
        if (xdg && isAbsolute(xdg)) root = xdg
        else if (home) root = join(home, '.config')
      }
    }
    debug('userConfigRoot(' + this.environment.platform + '): ' + root)
    return root
  }
}

/** Always answers with the same root; `undefined` simulates a system without one. */
export class FixedDirectoryProvider implements DirectoryProvider {
  constructor(private root: string | undefined) {}

  userConfigRoot(): string | undefined {
    return this.root
  }
}

function safeHomedir(): string {
  try {
    return homedir()
  } catch (e) {
    debug('homedir unavailable: ' + e)
    return ''
  }
}
