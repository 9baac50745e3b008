/**
 * srt.ts — SubRip parsing
 *
 * Cues are separated by blank lines. The index line is optional (some
 * transcription tools omit it) and both "," and "." are accepted as the
 * millisecond separator. Malformed blocks are skipped rather than failing
 * the whole file.
 */

export interface SubtitleCue {
  /** Milliseconds from the start of the track. */
  start: number;
  end: number;
  /** Lines joined with "\n". */
  text: string;
}

const TIMING = /(\d{1,2}):(\d{2}):(\d{2})[,.](\d{1,3})\s*-->\s*(\d{1,2}):(\d{2}):(\d{2})[,.](\d{1,3})/;

function toMillis(h: string, m: string, s: string, ms: string): number {
  return (
    parseInt(h, 10) * 3_600_000 +
    parseInt(m, 10) * 60_000 +
    parseInt(s, 10) * 1000 +
    parseInt(ms.padEnd(3, "0"), 10)
  );
}

export function parseSrt(content: string): SubtitleCue[] {
  const blocks = content
    .replace(/^\uFEFF/, "")
    .replace(/\r\n?/g, "\n")
    .split(/\n\s*\n/);

  const cues: SubtitleCue[] = [];
  for (const block of blocks) {
    const lines = block.split("\n").filter((line) => line.trim() !== "");
    const timingIndex = lines.findIndex((line) => TIMING.test(line));
    if (timingIndex === -1) continue;

    const match = TIMING.exec(lines[timingIndex]);
    if (!match) continue;
    const [, h1, m1, s1, ms1, h2, m2, s2, ms2] = match;
    const text = lines.slice(timingIndex + 1).join("\n").trim();
    if (!text) continue;

    cues.push({
      start: toMillis(h1, m1, s1, ms1),
      end: toMillis(h2, m2, s2, ms2),
      text,
    });
  }
  return cues;
}
