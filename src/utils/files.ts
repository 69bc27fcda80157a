import { promises as fs } from 'node:fs';
import { gunzipSync } from 'node:zlib';

/** Read a file as UTF-8 text. Gzip-compressed files are detected and inflated. */
export async function readTextFile(file: string): Promise<string> {
  const raw = await fs.readFile(file);
  const bytes = raw.length > 2 && raw[0] === 0x1f && raw[1] === 0x8b ? gunzipSync(raw) : raw;
  return bytes.toString('utf-8');
}
