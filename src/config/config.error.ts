/**
 * Thrown while validating the environment at startup. Fatal: the
 * application refuses to boot.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly problems: string[] = [],
  ) {
    super(problems.length ? `${message}\n  - ${problems.join('\n  - ')}` : message);
    this.name = 'ConfigError';
  }
}
