export type CompletionRequest = {
  system: string;
  user: string;
  signal: AbortSignal;
};

export type Completion = {
  content: string;
  tokens: number;
};

/** One chat-completion round trip against a hosted or local model. */
export interface ReasonerClient {
  readonly provider: string;
  readonly model: string;
  complete(request: CompletionRequest): Promise<Completion>;
}
