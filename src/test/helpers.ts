import os from 'node:os';
import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { vi } from 'vitest';
import { createLogger, type Logger } from '../utils/logger.js';

export function silentSink() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function testLogger(verbose = false): Logger {
  return createLogger({ verbose, sink: silentSink() });
}

export async function createTempDir(prefix = 'menu-pos-'): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fsp.rm(dir, { recursive: true, force: true });
}

/** Writes `relative path → contents` pairs under root, creating directories. */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, contents] of Object.entries(files)) {
    const target = path.join(root, ...relative.split('/'));
    await fsp.mkdir(path.dirname(target), { recursive: true });
    await fsp.writeFile(target, contents, 'utf8');
  }
}

export function menuFile(frontMatter: string, body = ''): string {
  return `---\n${frontMatter}\n---\n${body}`;
}
