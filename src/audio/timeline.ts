export const MAX_SPEEDUP = 1.3;

/** A slot overrun smaller than this fraction is left alone. */
const OVERRUN_TOLERANCE = 1.05;
/** Slots this short are too small to be worth retiming. */
const MIN_RETIME_SLOT_SEC = 0.5;

export interface TimelineClip {
  startSec: number;
  sampleRate: number;
  samples: Int16Array;
}

export function resampleLinear(samples: Int16Array, sourceRate: number, targetRate: number): Int16Array {
  if (sourceRate === targetRate || samples.length === 0) {
    return samples;
  }

  const ratio = targetRate / sourceRate;
  const targetLength = Math.max(1, Math.round(samples.length * ratio));
  const output = new Int16Array(targetLength);

  for (let index = 0; index < targetLength; index += 1) {
    const sourcePosition = index / ratio;
    const left = Math.min(Math.floor(sourcePosition), samples.length - 1);
    const right = Math.min(left + 1, samples.length - 1);
    const alpha = sourcePosition - left;
    output[index] = Math.round(samples[left] * (1 - alpha) + samples[right] * alpha);
  }

  return output;
}

/**
 * Tempo factor that brings a clip back inside its slot, capped at
 * `MAX_SPEEDUP`. Returns 1 when no change is needed.
 */
export function speedUpFactor(clipSec: number, slotSec: number): number {
  if (slotSec <= MIN_RETIME_SLOT_SEC || clipSec <= slotSec * OVERRUN_TOLERANCE) {
    return 1;
  }
  return Math.min(clipSec / slotSec, MAX_SPEEDUP);
}

/**
 * Mixes clips onto one mono track, each starting at its `startSec`. The track
 * lasts at least `durationSec` and is extended when a clip runs past it.
 * Overlapping clips are summed and clamped to 16 bits.
 */
export function composeTimeline(params: {
  clips: TimelineClip[];
  sampleRate: number;
  durationSec?: number;
}): Int16Array {
  const placed = params.clips.map((clip) => ({
    startIndex: Math.max(0, Math.round(clip.startSec * params.sampleRate)),
    samples: resampleLinear(clip.samples, clip.sampleRate, params.sampleRate),
  }));

  const totalSamples = Math.max(
    Math.ceil((params.durationSec ?? 0) * params.sampleRate),
    ...placed.map((clip) => clip.startIndex + clip.samples.length),
  );
  const accumulator = new Int32Array(totalSamples);

  for (const clip of placed) {
    for (let sampleIndex = 0; sampleIndex < clip.samples.length; sampleIndex += 1) {
      accumulator[clip.startIndex + sampleIndex] += clip.samples[sampleIndex];
    }
  }

  const finalSamples = new Int16Array(totalSamples);
  for (let index = 0; index < totalSamples; index += 1) {
    finalSamples[index] = Math.max(-32768, Math.min(32767, accumulator[index]));
  }

  return finalSamples;
}
