import { promises as fs } from 'fs';
import { dirname } from 'path';

export function isMissingFile(error: unknown): boolean {
     return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Parsed JSON content of `path`, or undefined when the file does not exist. */
export async function readJsonIfExists(path: string): Promise<unknown> {
     let text: string;
     try {
          text = await fs.readFile(path, 'utf-8');
     } catch (error) {
          if (isMissingFile(error)) {
               return undefined;
          }
          throw error;
     }
     return JSON.parse(text);
}

/**
 * Writes to a sibling temp file, then renames it over `path`, so readers see
 * either the old or the new content.
 */
export async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
     await fs.mkdir(dirname(path), { recursive: true });
     const temp = `${path}.${process.pid}.tmp`;
     await fs.writeFile(temp, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
     await fs.rename(temp, path);
}
