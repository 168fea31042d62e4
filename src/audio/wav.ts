import fs from "node:fs/promises";

export interface WavReadResult {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
  samples: Int16Array;
}

function writeString(target: Buffer, offset: number, value: string): void {
  target.write(value, offset, "ascii");
}

export function pcm16ToWavBuffer(pcmData: Buffer, sampleRate: number, channels = 1): Buffer {
  const bitsPerSample = 16;
  const byteRate = sampleRate * channels * (bitsPerSample / 8);
  const blockAlign = channels * (bitsPerSample / 8);
  const dataSize = pcmData.length;

  const header = Buffer.alloc(44);
  writeString(header, 0, "RIFF");
  header.writeUInt32LE(36 + dataSize, 4);
  writeString(header, 8, "WAVE");
  writeString(header, 12, "fmt ");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  writeString(header, 36, "data");
  header.writeUInt32LE(dataSize, 40);

  return Buffer.concat([header, pcmData]);
}

/** Reads little-endian 16-bit PCM without relying on the buffer's byte alignment. */
export function pcm16ToSamples(pcm: Buffer): Int16Array {
  const samples = new Int16Array(Math.floor(pcm.length / 2));
  for (let index = 0; index < samples.length; index += 1) {
    samples[index] = pcm.readInt16LE(index * 2);
  }
  return samples;
}

export function samplesToPcm16(samples: Int16Array): Buffer {
  const pcm = Buffer.alloc(samples.length * 2);
  for (let index = 0; index < samples.length; index += 1) {
    pcm.writeInt16LE(samples[index], index * 2);
  }
  return pcm;
}

export function parseWavPcm16Mono(data: Buffer, label = "buffer"): WavReadResult {
  if (data.length < 44) {
    throw new Error(`Invalid WAV file (too small): ${label}`);
  }

  const riff = data.toString("ascii", 0, 4);
  const wave = data.toString("ascii", 8, 12);
  if (riff !== "RIFF" || wave !== "WAVE") {
    throw new Error(`Unsupported WAV header: ${label}`);
  }

  let offset = 12;
  let channels = 1;
  let sampleRate = 24000;
  let bitsPerSample = 16;
  let pcmOffset = -1;
  let pcmSize = 0;

  while (offset + 8 <= data.length) {
    const chunkId = data.toString("ascii", offset, offset + 4);
    const chunkSize = data.readUInt32LE(offset + 4);
    const chunkDataOffset = offset + 8;

    if (chunkId === "fmt ") {
      channels = data.readUInt16LE(chunkDataOffset + 2);
      sampleRate = data.readUInt32LE(chunkDataOffset + 4);
      bitsPerSample = data.readUInt16LE(chunkDataOffset + 14);
    }

    if (chunkId === "data") {
      pcmOffset = chunkDataOffset;
      pcmSize = Math.min(chunkSize, data.length - chunkDataOffset);
      break;
    }

    // RIFF chunks are word-aligned.
    offset = chunkDataOffset + chunkSize + (chunkSize % 2);
  }

  if (pcmOffset < 0) {
    throw new Error(`WAV data chunk not found: ${label}`);
  }

  if (bitsPerSample !== 16) {
    throw new Error(`Only 16-bit PCM WAV is supported: ${label}`);
  }

  const source = pcm16ToSamples(data.subarray(pcmOffset, pcmOffset + pcmSize));
  if (channels === 1) {
    return { sampleRate, channels, bitsPerSample, samples: source };
  }

  // Downmix multi-channel audio to mono by averaging channels.
  const totalFrames = Math.floor(source.length / channels);
  const mono = new Int16Array(totalFrames);

  for (let frame = 0; frame < totalFrames; frame += 1) {
    let sum = 0;
    for (let channel = 0; channel < channels; channel += 1) {
      sum += source[frame * channels + channel];
    }
    mono[frame] = Math.max(-32768, Math.min(32767, Math.round(sum / channels)));
  }

  return { sampleRate, channels: 1, bitsPerSample, samples: mono };
}

export async function readWavPcm16Mono(path: string): Promise<WavReadResult> {
  return parseWavPcm16Mono(await fs.readFile(path), path);
}

export async function writeWavPcm16Mono(path: string, sampleRate: number, samples: Int16Array): Promise<void> {
  await fs.writeFile(path, pcm16ToWavBuffer(samplesToPcm16(samples), sampleRate, 1));
}

export function concatSamples(buffers: Int16Array[]): Int16Array {
  const totalLength = buffers.reduce((sum, buffer) => sum + buffer.length, 0);
  const merged = new Int16Array(totalLength);

  let offset = 0;
  for (const buffer of buffers) {
    merged.set(buffer, offset);
    offset += buffer.length;
  }

  return merged;
}

/** Appends silence so the result lasts at least `durationSec`. Longer input is returned as is. */
export function padSamplesToDuration(samples: Int16Array, sampleRate: number, durationSec: number): Int16Array {
  const targetLength = Math.ceil(durationSec * sampleRate);
  if (samples.length >= targetLength) {
    return samples;
  }

  const padded = new Int16Array(targetLength);
  padded.set(samples, 0);
  return padded;
}
