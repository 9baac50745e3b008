/**
 * specs.ts — Output format specifications
 *
 * PURPOSE:
 *   The fixed targets every render stage encodes to. Keeping them in one place
 *   is what lets the background cuts be joined by stream copy: every cut, every
 *   library clip and every composited part comes out at the same size, frame
 *   rate and pixel format.
 *
 * TARGETS:
 *   - Horizontal: 1920x1080 @ 30fps
 *   - Vertical:   1080x1920 @ 30fps
 *   - Audio intermediates: 24-bit PCM stereo WAV, resampled once up front so
 *     every later duration probe and mux sees the same format
 */

export interface FrameSpec {
  width: number;
  height: number;
  fps: number;
}

export const HORIZONTAL_SPEC: FrameSpec = { width: 1920, height: 1080, fps: 30 };
export const VERTICAL_SPEC: FrameSpec = { width: 1080, height: 1920, fps: 30 };

/** Keyframe every 2 seconds. */
export const GOP_SIZE = HORIZONTAL_SPEC.fps * 2;

export function frameSpec(vertical: boolean): FrameSpec {
  return vertical ? VERTICAL_SPEC : HORIZONTAL_SPEC;
}

export interface AudioNormalizationSpec {
  codec: string;
  sampleRate: number;
  channels: number;
}

export const AUDIO_NORMALIZATION: AudioNormalizationSpec = {
  codec: "pcm_s24le",
  sampleRate: 48000,
  channels: 2,
};

/** Final mux audio. */
export const OUTPUT_AUDIO_ARGS = ["-c:a", "aac", "-b:a", "192k", "-ar", "48000", "-ac", "2"];

/** Length of the thumbnail fade-in and fade-out, in seconds. */
export const THUMBNAIL_FADE_SECONDS = 0.5;

/**
 * One frame at the output rate. Selection, cutting and the final duration
 * check all tolerate this much rounding.
 */
export const FRAME_EPSILON = 1 / HORIZONTAL_SPEC.fps;
