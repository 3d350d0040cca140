/**
 * Progress Signal Tests
 */

import { createFfmpegLineParser, createYtDlpLineParser, TaskProgress } from '../src/progress.js';
import { createRecordingSink } from './helpers.js';

describe('createYtDlpLineParser', () => {
  const parser = createYtDlpLineParser();

  it('should read the custom progress marker', () => {
    expect(parser.parse('PROGRESS: 42.5%')).toEqual({ percent: 42.5 });
    expect(parser.parse('PROGRESS:100.0%')).toEqual({ percent: 100 });
  });

  it('should ignore regular output lines', () => {
    expect(parser.parse('[info] Downloading 1 format(s): 1080p+audio-en')).toBeNull();
    expect(parser.parse('[download] Destination: movie.mp4')).toBeNull();
  });
});

describe('createFfmpegLineParser', () => {
  it('should ignore time lines until a duration is known', () => {
    const parser = createFfmpegLineParser();
    expect(parser.parse('size=    1024kB time=00:00:10.00 bitrate= 838.9kbits/s')).toBeNull();
  });

  it('should compute percent from time over duration with the bitrate', () => {
    const parser = createFfmpegLineParser();
    expect(parser.parse('  Duration: 00:01:40.00, start: 0.000000, bitrate: 1000 kb/s')).toBeNull();
    expect(parser.parse('frame= 1250 fps=250 q=-1.0 size=   10240kB time=00:00:50.00 bitrate=1234.5kbits/s speed=10x')).toEqual({
      percent: 50,
      bitrate: '1234.5kbits/s',
    });
  });

  it('should clamp to 100', () => {
    const parser = createFfmpegLineParser();
    parser.parse('Duration: 00:01:40.00, start: 0.000000');
    expect(parser.parse('time=00:02:00.00')).toEqual({ percent: 100 });
  });

  it('should not establish a duration from N/A', () => {
    const parser = createFfmpegLineParser();
    expect(parser.parse('Duration: N/A, start: 0.000000, bitrate: N/A')).toBeNull();
    expect(parser.parse('time=00:00:05.00 bitrate=100.0kbits/s')).toBeNull();
  });
});

describe('TaskProgress', () => {
  it('should never move backwards', () => {
    const sink = createRecordingSink();
    const progress = new TaskProgress(sink);

    const seen = [40, 30, 90].map((percent) => {
      progress.update({ percent });
      return progress.percent;
    });

    expect(seen).toEqual([40, 40, 90]);
    expect(sink.updates).toEqual([40, 90]);
  });

  it('should drop duplicate updates', () => {
    const sink = createRecordingSink();
    const progress = new TaskProgress(sink);

    expect(progress.update({ percent: 25 })).toBe(true);
    expect(progress.update({ percent: 25 })).toBe(false);
    expect(sink.updates).toEqual([25]);
  });

  it('should keep the last known bitrate', () => {
    const sink = createRecordingSink();
    const progress = new TaskProgress(sink);

    progress.update({ percent: 10, bitrate: '900.0kbits/s' });
    progress.update({ percent: 20 });

    expect(sink.bitrates).toEqual(['900.0kbits/s', '900.0kbits/s']);
  });

  it('should feed lines through a parser', () => {
    const sink = createRecordingSink();
    const progress = new TaskProgress(sink);
    const parser = createYtDlpLineParser();

    ['PROGRESS: 12.5%', '[download] noise', 'PROGRESS: 40.0%', 'PROGRESS: 30.0%'].forEach((line) =>
      progress.feed(parser, line),
    );

    expect(sink.updates).toEqual([12.5, 40]);
  });

  it('should map slices onto their range of the parent', () => {
    const sink = createRecordingSink();
    const progress = new TaskProgress(sink);

    progress.slice(60, 90).update({ percent: 50 });
    progress.slice(50, 100).slice(0, 50).update({ percent: 100 });

    expect(sink.updates).toEqual([75]);
    expect(progress.percent).toBe(75);
  });

  it('should force 100 on successful completion', () => {
    const sink = createRecordingSink();
    const progress = new TaskProgress(sink);

    progress.update({ percent: 60 });
    progress.complete(true, 'Fight Club (1999)');

    expect(sink.updates).toEqual([60, 100]);
    expect(sink.finished).toEqual([{ success: true, text: 'Fight Club (1999)' }]);
  });

  it('should leave the percentage alone on failure', () => {
    const sink = createRecordingSink();
    const progress = new TaskProgress(sink);

    progress.update({ percent: 60 });
    progress.complete(false, 'Movie 550 - download failed');

    expect(sink.updates).toEqual([60]);
    expect(sink.finished).toEqual([{ success: false, text: 'Movie 550 - download failed' }]);
  });
});
