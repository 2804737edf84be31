// src/rewrite/index.ts
import type { CompletionProvider } from './provider';
import { OpenAIChatProvider } from './openai';
import { config } from '../config';

let _provider: CompletionProvider | null = null;

export function getCompletionProvider(): CompletionProvider {
  if (_provider) return _provider;

  _provider = new OpenAIChatProvider({
    apiKey: config.openai.apiKey,
    model: config.openai.model,
    timeoutMs: config.openai.timeoutMs,
  });
  return _provider;
}
