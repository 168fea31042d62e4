import fs from "node:fs/promises";
import { writeAtomically } from "../util/atomic.js";
import type { Segment } from "../types.js";

export function formatSrtTimestamp(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const ms = totalMs % 1000;
  const totalSeconds = Math.floor(totalMs / 1000);
  const s = totalSeconds % 60;
  const totalMinutes = Math.floor(totalSeconds / 60);
  const m = totalMinutes % 60;
  const h = Math.floor(totalMinutes / 60);

  return `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}:${String(s).padStart(2, "0")},${String(ms).padStart(3, "0")}`;
}

export function renderSrt(segments: Segment[]): string {
  const lines: string[] = [];

  for (let index = 0; index < segments.length; index += 1) {
    const segment = segments[index];
    lines.push(String(index + 1));
    lines.push(`${formatSrtTimestamp(segment.startSec)} --> ${formatSrtTimestamp(segment.endSec)}`);
    lines.push(segment.text);
    lines.push("");
  }

  return lines.join("\n");
}

/** Writes `text` exactly as given. No trailing newline is added. */
export async function writeTextFile(outputPath: string, text: string): Promise<void> {
  await writeAtomically(outputPath, (partialPath) => fs.writeFile(partialPath, text, "utf8"));
}

export async function writeSegmentsJson(params: {
  outputPath: string;
  sourceLanguage: string;
  targetLanguage: string;
  inputPath: string;
  segments: Segment[];
  createdAt?: Date;
}): Promise<void> {
  const payload = {
    createdAt: (params.createdAt ?? new Date()).toISOString(),
    inputPath: params.inputPath,
    sourceLanguage: params.sourceLanguage,
    targetLanguage: params.targetLanguage,
    segments: params.segments,
  };

  await writeTextFile(params.outputPath, JSON.stringify(payload, null, 2));
}

export async function writeSrt(params: { outputPath: string; segments: Segment[] }): Promise<void> {
  await writeTextFile(params.outputPath, renderSrt(params.segments));
}
