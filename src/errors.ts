/// # errors
///
/// markup problems never throw: the parser degrades them to plain text.
/// what does throw is a configuration the output cannot honour, and
/// those failures go straight to the caller.

export class PredocError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/// bad option values, caught while resolving options.
export class ConfigError extends PredocError {}

/// a heading asked for a section command past `paragraph`.
export class SectionLevelError extends ConfigError {
  constructor(readonly level: number) {
    super(`no latex section command at level ${level}`);
  }
}

/// `\verb` needs a delimiter that does not occur in its text.
export class VerbatimDelimiterError extends PredocError {
  constructor(readonly text: string) {
    super(`no free \\verb delimiter for ${JSON.stringify(text)}`);
  }
}

export class RegistryFrozenError extends PredocError {
  constructor(readonly key: string) {
    super(`cannot register ${key}: the registry is frozen`);
  }
}
