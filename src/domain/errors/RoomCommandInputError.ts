export class RoomCommandInputError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "RoomCommandInputError";
  }

  static because(issues: readonly string[]): RoomCommandInputError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid room command input"
        : issues.length === 1
          ? (firstIssue ?? "Invalid room command input")
          : `Invalid room command input: ${issues.join("; ")}`;
    return new RoomCommandInputError(message, issues);
  }
}
