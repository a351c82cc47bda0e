/**
 * Configuration errors
 *
 * The only error class allowed to abort a run: raised while resolving
 * configuration, before any record is processed.
 */

export class ConfigError extends Error {
  /** One entry per problem, formatted as `path: message` */
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((issue) => `  - ${issue}`).join('\n')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
