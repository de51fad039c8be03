import { chatText } from './clients';
import type { TopicGroup } from '../news/types';

const VERIFY_SYSTEM = `You check whether a cluster of news headlines from different outlets describes ONE real, significant breaking event.
Answer false for routine news, opinion, sports results, anniversaries, or headlines that describe different events.
Return ONLY JSON: {"verified": true|false, "reason": "..."}`;

export function parseVerification(reply: string): boolean {
  const parsed: unknown = JSON.parse(reply);
  return typeof parsed === 'object' && parsed !== null && 'verified' in parsed && parsed.verified === true;
}

/** LLM confirmation that a corroborated group is one significant event. */
export async function verifyBreakingGroup(group: TopicGroup): Promise<boolean> {
  const headlines = group.members.slice(0, 10).map((m) => `- [${m.source}] ${m.title}`);
  const reply = await chatText(VERIFY_SYSTEM, headlines.join('\n'), { maxTokens: 150, temperature: 0, json: true });
  return parseVerification(reply);
}
