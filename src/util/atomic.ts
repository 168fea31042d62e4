import fs from "node:fs/promises";
import path from "node:path";

export function partialPathFor(finalPath: string): string {
  const parsed = path.parse(finalPath);
  return path.join(parsed.dir, `${parsed.name}.partial${parsed.ext}`);
}

/**
 * Runs `write` against a `.partial` sibling of `finalPath` and renames it into
 * place once `write` resolves. On failure the partial file is removed, so
 * `finalPath` only ever holds a complete file.
 */
export async function writeAtomically<T>(
  finalPath: string,
  write: (partialPath: string) => Promise<T>,
): Promise<T> {
  await fs.mkdir(path.dirname(finalPath), { recursive: true });
  const partialPath = partialPathFor(finalPath);

  try {
    const result = await write(partialPath);
    await fs.rename(partialPath, finalPath);
    return result;
  } catch (error) {
    await fs.rm(partialPath, { force: true });
    throw error;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}
