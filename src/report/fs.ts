import { promises as fs } from 'node:fs';
import path from 'node:path';

export async function ensureDir(p: string): Promise<void> {
  await fs.mkdir(p, { recursive: true });
}

export async function fileExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export async function readText(p: string): Promise<string> {
  return await fs.readFile(p, 'utf8');
}

/**
 * Atomic-ish write for local filesystem:
 * - write to a temp file in the same directory
 * - fsync the file
 * - rename over the destination
 *
 * A reader of `p` sees either the previous content or the new one, never a partial file.
 */
export async function writeTextAtomic(p: string, content: string): Promise<void> {
  const dir = path.dirname(p);
  await ensureDir(dir);

  const tmp = path.join(dir, `.${path.basename(p)}.${process.pid}.${Date.now()}.tmp`);

  const fh = await fs.open(tmp, 'w');
  try {
    await fh.writeFile(content, 'utf8');
    await fh.sync();
  } finally {
    await fh.close();
  }

  await fs.rename(tmp, p);
}

export async function writeJson(p: string, data: unknown, indent = 2): Promise<void> {
  await writeTextAtomic(p, `${JSON.stringify(data, null, indent)}\n`);
}

export async function moveFile(from: string, to: string): Promise<void> {
  await fs.rename(from, to);
}

export async function modifiedAt(p: string): Promise<Date> {
  const st = await fs.stat(p);
  return st.mtime;
}

export async function removeFile(p: string): Promise<void> {
  await fs.unlink(p);
}

/** Plain files directly inside `dir` whose basename satisfies `predicate`. */
export async function listFiles(dir: string, predicate?: (name: string) => boolean): Promise<string[]> {
  if (!(await fileExists(dir))) return [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((ent) => ent.isFile() && (!predicate || predicate(ent.name)))
    .map((ent) => path.join(dir, ent.name))
    .sort();
}
