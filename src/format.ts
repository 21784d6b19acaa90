/**
 * Options that only change how a record is laid out, never which file it lands in.
 */
export interface FormatOptions {
  /** Pretty-print with a tab or with the given number of spaces. JSON only. */
  readonly indent?: number | 'tab'
}

/**
 * A serialization format. `tag` selects the codec in the registry and names the default file.
 */
export interface Format {
  readonly tag: string
  readonly options?: FormatOptions
}

export interface BuiltinFormats {
  readonly json: Format
  jsonPretty(indent?: number): Format
  readonly jsonPrettyTabs: Format
  readonly yaml: Format
  readonly toml: Format
  readonly ini: Format
  readonly pickle: Format
}

export const Formats: BuiltinFormats = {
  json: { tag: 'json' },
  jsonPretty(indent: number = 2): Format {
    return { tag: 'json', options: { indent } }
  },
  jsonPrettyTabs: { tag: 'json', options: { indent: 'tab' } },
  yaml: { tag: 'yaml' },
  toml: { tag: 'toml' },
  ini: { tag: 'ini' },
  pickle: { tag: 'pickle' },
}

/** Default file name for a format, e.g. `config.yaml`. Variants of one format share it. */
export function defaultName(format: Format): string {
  return `config.${format.tag}`.toLowerCase()
}
