/**
 * Source of user input lines
 */
export interface ILineSource {
  /**
   * Resolve with the next line, or null once the input has ended
   */
  readLine(): Promise<string | null>;

  close(): void;
}

/**
 * Destination for everything the user sees
 */
export interface IOutputSink {
  write(text: string): void;
}
