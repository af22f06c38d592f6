/**
 * Anything that can answer a line of user text
 */
export interface IResponder {
  /**
   * Human-readable name for logs
   */
  readonly name: string;

  /**
   * Produce a reply for one user message. Each call is independent.
   */
  respond(userText: string): Promise<string>;
}
