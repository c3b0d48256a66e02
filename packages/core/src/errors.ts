/**
 * Error thrown when the configuration lacks something required before any
 * remote call can be made.
 *
 * `missingFields` lists every absent field so that one run reports them all.
 * @public
 */
export class ConfigurationError extends Error {
  public constructor(
    message: string,
    public readonly missingFields: readonly string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
