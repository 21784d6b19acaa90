import { join } from 'path'
import Debug from 'debug'
import { DirectoryUnavailableError } from '../errors.js'
import { defaultName } from '../format.js'
import { StoreDescriptor } from './descriptor.js'
import { DirectoryProvider } from './directories.js'

const debug = Debug('locationResolver')

/**
 * Composes the settings file path for a descriptor. Pure path arithmetic: nothing is checked on disk.
 * The config root is only asked for by the `auto` and `file` strategies.
 */
export function resolveConfigPath(descriptor: StoreDescriptor, directories: DirectoryProvider): string {
  const { app, location, format } = descriptor
  const appDir = (): string => {
    const root = directories.userConfigRoot()
    if (root === undefined) throw new DirectoryUnavailableError(app)
    return join(root, app)
  }

  const result = ((): string => {
    switch (location.kind) {
      case 'auto':
        return join(appDir(), defaultName(format))
      case 'path':
        return location.path
      case 'dir':
        return join(location.dir, defaultName(format))
      case 'file':
        return join(appDir(), location.file)
    }
  })()
  debug(location.kind + ' ' + app + ' -> ' + result)
  return result
}
