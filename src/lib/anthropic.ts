import Anthropic from '@anthropic-ai/sdk';

// API key is read from ANTHROPIC_API_KEY. The client is created on first call
// so that modules importing `complete` can load without credentials.
let client: Anthropic | undefined;

function getClient(): Anthropic {
  if (!client) {
    client = new Anthropic();
  }
  return client;
}

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  model?: string;
}

export type CompletionFn = (
  systemPrompt: string,
  userPrompt: string,
  options?: CompletionOptions
) => Promise<string>;

export const complete: CompletionFn = async (systemPrompt, userPrompt, options = {}) => {
  const {
    maxTokens = 2048,
    temperature = 0.1,
    model = 'claude-sonnet-4-20250514'
  } = options;

  const response = await getClient().messages.create({
    model,
    max_tokens: maxTokens,
    system: systemPrompt,
    messages: [
      { role: 'user', content: userPrompt }
    ],
    temperature,
  });

  const textContent = response.content.find(c => c.type === 'text');
  if (!textContent || textContent.type !== 'text') {
    throw new Error('No text content in response');
  }

  return textContent.text;
};
