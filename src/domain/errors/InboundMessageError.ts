export class InboundMessageError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "InboundMessageError";
  }

  static because(issues: readonly string[]): InboundMessageError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid inbound message"
        : issues.length === 1
          ? (firstIssue ?? "Invalid inbound message")
          : `Invalid inbound message: ${issues.join("; ")}`;
    return new InboundMessageError(message, issues);
  }
}
