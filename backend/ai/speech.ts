import fs from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import { getElevenLabs, getOpenAI } from './clients';
import type { NarrationSegment } from '../video/editScript';
import { concatAudio, probeDurationSeconds } from '../video/ffmpeg';
import { config } from '../config';
import { errorMessage } from '../errors';
import { logger } from '../logger';

/** Writes speech for `text` to `outputPath` (mp3). */
export type SpeechSynthesizer = (text: string, outputPath: string) => Promise<void>;

export const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
export type OpenAiVoice = (typeof OPENAI_VOICES)[number];

export function toOpenAiVoice(name: string): OpenAiVoice {
  const voice = OPENAI_VOICES.find((v) => v === name.trim().toLowerCase());
  if (!voice) {
    logger.warn(`Unknown OpenAI voice "${name}", using nova`);
    return 'nova';
  }
  return voice;
}

export function openAiSpeech(voice: OpenAiVoice): SpeechSynthesizer {
  return async (text, outputPath) => {
    const res = await getOpenAI().audio.speech.create({
      model: 'tts-1',
      voice,
      input: text,
      response_format: 'mp3'
    });
    fs.writeFileSync(outputPath, Buffer.from(await res.arrayBuffer()));
  };
}

export function elevenLabsSpeech(voiceId: string): SpeechSynthesizer {
  return async (text, outputPath) => {
    const audioStream = await getElevenLabs().generate({
      voice: voiceId,
      text,
      model_id: 'eleven_multilingual_v2'
    });
    await pipeline(audioStream, fs.createWriteStream(outputPath));
  };
}

/** Synthesizer from TTS_PROVIDER; `voice` overrides the configured voice. */
export function speechFromConfig(voice?: string): SpeechSynthesizer {
  if (config.tts.provider === 'elevenlabs') {
    return elevenLabsSpeech(voice || config.tts.elevenVoiceId);
  }
  return openAiSpeech(toOpenAiVoice(voice || config.tts.voice));
}

export type SynthesisOptions = {
  workDir: string;
  prefix: string;
  synthesize: SpeechSynthesizer;
  measure?: (audioPath: string) => Promise<number>;
};

export type SynthesizedNarration = {
  segments: NarrationSegment[];
  audioFiles: string[];
};

/**
 * One audio file per segment, retried once. Durations come from the files
 * themselves. A segment that fails twice fails the whole narration.
 */
export async function synthesizeSegments(
  segments: readonly NarrationSegment[],
  opts: SynthesisOptions
): Promise<SynthesizedNarration> {
  const measure = opts.measure ?? probeDurationSeconds;
  fs.mkdirSync(opts.workDir, { recursive: true });
  const out: NarrationSegment[] = [];
  const audioFiles: string[] = [];

  for (const [i, segment] of segments.entries()) {
    const audioPath = path.join(opts.workDir, `${opts.prefix}_seg_${String(i).padStart(2, '0')}.mp3`);
    const text = segment.text.trim() || '.';
    try {
      await opts.synthesize(text, audioPath);
    } catch (err) {
      logger.warn(`TTS failed for segment ${i}, retrying once`, { error: errorMessage(err) });
      await opts.synthesize(text, audioPath);
    }
    const duration = await measure(audioPath);
    out.push({ ...segment, spokenDurationSeconds: duration });
    audioFiles.push(audioPath);
  }

  const total = out.reduce((sum, s) => sum + s.spokenDurationSeconds, 0);
  logger.info('Narration synthesized', { segments: out.length, seconds: Number(total.toFixed(2)) });
  return { segments: out, audioFiles };
}

/** Merge segment files into one track and remove the pieces. */
export async function mergeSpeech(audioFiles: readonly string[], outputPath: string): Promise<string> {
  await concatAudio(audioFiles, outputPath);
  for (const file of [...audioFiles, `${outputPath}.txt`]) {
    fs.rmSync(file, { force: true });
  }
  return outputPath;
}
