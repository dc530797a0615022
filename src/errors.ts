export class KekError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Unreadable, unparseable or invalid configuration, including bad globs. */
export class ConfigError extends KekError {}

/** Standard output is an interactive terminal. */
export class OutputTargetError extends KekError {}
