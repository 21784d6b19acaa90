import { Format, Formats } from '../format.js'

export type LocationStrategy =
  | { readonly kind: 'auto' }
  | { readonly kind: 'path'; readonly path: string }
  | { readonly kind: 'file'; readonly file: string }
  | { readonly kind: 'dir'; readonly dir: string }

export const Location = {
  /** `<config root>/<app>/<default name of the format>` */
  auto(): LocationStrategy {
    return { kind: 'auto' }
  },
  /** Full path to the settings file. App name and format do not take part. */
  path(path: string): LocationStrategy {
    return { kind: 'path', path }
  },
  /** Config root and app directory are derived, the file name is given. */
  file(file: string): LocationStrategy {
    return { kind: 'file', file }
  },
  /** The directory is given and owned by the caller, the file name is derived. */
  dir(dir: string): LocationStrategy {
    return { kind: 'dir', dir }
  },
}

/**
 * Identifies one settings store. Immutable; the same descriptor can be passed to any number of operations.
 */
export interface StoreDescriptor {
  readonly app: string
  readonly location: LocationStrategy
  readonly format: Format
}

export function createDescriptor(
  app: string,
  location: LocationStrategy = Location.auto(),
  format: Format = Formats.json
): StoreDescriptor {
  const options = format.options ? Object.freeze({ ...format.options }) : undefined
  return Object.freeze({
    app,
    location: Object.freeze({ ...location }),
    format: Object.freeze(options ? { tag: format.tag, options } : { tag: format.tag }),
  })
}
