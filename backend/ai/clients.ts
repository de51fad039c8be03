import OpenAI from 'openai';
import { ElevenLabsClient } from 'elevenlabs';
import { config } from '../config';

let openai: OpenAI | null = null;
let eleven: ElevenLabsClient | null = null;

export function getOpenAI(): OpenAI {
  if (!config.openai.apiKey) {
    throw new Error('OPENAI_API_KEY is not configured');
  }
  if (!openai) openai = new OpenAI({ apiKey: config.openai.apiKey });
  return openai;
}

export function getElevenLabs(): ElevenLabsClient {
  if (!config.tts.elevenApiKey) {
    throw new Error('ELEVEN_API_KEY is not configured');
  }
  if (!eleven) eleven = new ElevenLabsClient({ apiKey: config.tts.elevenApiKey });
  return eleven;
}

export type ChatOptions = {
  maxTokens?: number;
  temperature?: number;
  json?: boolean;
};

/** Single-turn chat completion; throws on an empty reply. */
export async function chatText(system: string, user: string, opts: ChatOptions = {}): Promise<string> {
  const completion = await getOpenAI().chat.completions.create({
    model: config.openai.chatModel,
    messages: [
      { role: 'system', content: system },
      { role: 'user', content: user }
    ],
    max_tokens: opts.maxTokens ?? 500,
    temperature: opts.temperature,
    ...(opts.json ? { response_format: { type: 'json_object' as const } } : {})
  });
  const content = completion.choices[0]?.message?.content?.trim();
  if (!content) throw new Error('OpenAI returned an empty response');
  return content;
}
