/**
 * Fatal setup problem: missing credential, unreadable or invalid rule
 * document, bad environment value. Raised before any candidate is processed.
 */
export class ConfigurationError extends Error {
  public readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(
      problems.length > 0
        ? `${message}:\n  - ${problems.join("\n  - ")}`
        : message,
    );
    this.name = "ConfigurationError";
    this.problems = problems;
  }
}
