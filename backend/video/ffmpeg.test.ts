import { describe, expect, it } from 'vitest';
import { escapeFilterPath, FRAME_SIZES, renderOutputOptions, videoFilter } from './ffmpeg';
import type { EditScript } from './editScript';

const script: EditScript = {
  entries: [{ imagePath: '/img/a.png', durationSeconds: 17, label: 'intro' }],
  audioPath: '/tmp/voice.mp3',
  totalDurationSeconds: 17,
  audioOffsetSeconds: 0,
  skipped: []
};

describe('videoFilter', () => {
  it('scales to the frame and burns subtitles when given', () => {
    expect(videoFilter(FRAME_SIZES.vertical)).toBe('scale=1080:1920,setsar=1:1');
    expect(videoFilter(FRAME_SIZES.horizontal, '/out/run_subtitles_en.srt')).toBe(
      "scale=1920:1080,setsar=1:1,subtitles='/out/run_subtitles_en.srt'"
    );
  });

  it('escapes drive colons and quotes in the subtitle path', () => {
    expect(escapeFilterPath("C:\\out\\it's.srt")).toBe("'C\\:/out/it\\'s.srt'");
  });
});

describe('renderOutputOptions', () => {
  it('trims the output to the script total', () => {
    const options = renderOutputOptions(script, FRAME_SIZES.vertical);
    expect(options).toContain('-t 17.000');
    expect(options).toContain('-b:a 192k');
    expect(options).toContain('-pix_fmt yuv420p');
    expect(options).toContain('-r 30');
    expect(options.slice(0, 2)).toEqual(['-vf', 'scale=1080:1920,setsar=1:1']);
  });
});
