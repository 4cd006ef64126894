/**
 * Mutable state shared by the tools during a conversation. The chat history
 * itself lives in the ChatSession; this tracks what the tools have learned.
 */
export class ReActSession {
  private readonly topics: string[] = [];
  private readonly urls: string[] = [];
  private continuing = true;
  private finalAnswer: string | undefined;

  get searchHistory(): readonly string[] {
    return this.topics;
  }

  get sources(): readonly string[] {
    return this.urls;
  }

  get shouldContinue(): boolean {
    return this.continuing;
  }

  get answer(): string | undefined {
    return this.finalAnswer;
  }

  recordSearch(topic: string, url: string): void {
    this.topics.push(topic);
    this.urls.push(url);
  }

  lastTopic(): string | undefined {
    return this.topics.length ? this.topics[this.topics.length - 1] : undefined;
  }

  finish(answer: string): void {
    this.finalAnswer = answer;
    this.continuing = false;
  }

  // Called at the start of every run; search history carries over to follow-up questions.
  resume(): void {
    this.continuing = true;
    this.finalAnswer = undefined;
  }

  reset(): void {
    this.topics.length = 0;
    this.urls.length = 0;
    this.resume();
  }
}
