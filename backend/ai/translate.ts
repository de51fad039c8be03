import { chatText } from './clients';
import { alignTranslation } from '../video/subtitles';

/** Numbered line-for-line translation for subtitle cues. */
export async function translateLines(texts: string[], languageName: string): Promise<string[]> {
  const numbered = texts.map((text, i) => `${i + 1}. ${text}`);
  const reply = await chatText(
    `Translate to ${languageName} for video subtitles.

RULES:
- Translate each numbered line
- Keep the same numbering (1. 2. 3. ...)
- Output EXACTLY ${texts.length} numbered lines
- Keep translations concise
- Do NOT merge or skip any line`,
    numbered.join('\n'),
    { maxTokens: 2000 }
  );
  return alignTranslation(reply, texts);
}
