/**
 * Summarizer Port (Driven Port)
 * Sends extracted text to a chat-completion API with a fixed instruction.
 */
export interface SummarizerPort {
  /**
   * Summarize the text. Blank input yields an empty summary.
   * Throws SummarizationError on upstream failure, ConfigurationError without credentials.
   */
  summarize(text: string): Promise<string>;

  /**
   * Verify that the upstream API is configured and answering
   */
  checkAvailability(): Promise<{ model: string; baseUrl: string }>;
}
