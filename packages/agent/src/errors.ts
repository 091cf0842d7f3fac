export type AgentErrorCode = "MissingApiKey" | "AvailabilityParseFailed" | "EmptyExplanation";

export class AgentError extends Error {
  constructor(
    readonly code: AgentErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AgentError";
  }
}
