export interface CompletionRequest {
  prompt: string;
  temperature: number;
  maxTokens: number;
}

export interface CompletionProvider {
  readonly name: string;
  complete(request: CompletionRequest): Promise<string>;
}
