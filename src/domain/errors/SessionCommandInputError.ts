export class SessionCommandInputError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "SessionCommandInputError";
  }

  static because(issues: readonly string[]): SessionCommandInputError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid session command input"
        : issues.length === 1
          ? (firstIssue ?? "Invalid session command input")
          : `Invalid session command input: ${issues.join("; ")}`;
    return new SessionCommandInputError(message, issues);
  }
}
