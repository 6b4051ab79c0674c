import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { contentRootMissing } from '../errors.js';
import { describeError } from '../utils/describe-error.js';
import { isDirectory } from '../utils/fs.js';
import type { Logger } from '../utils/logger.js';
import type { MenuItem, SkippedFile } from '../types/menu.js';
import { parseMenuFile } from './front-matter.js';
import { validateMenuItem } from './menu-validator.js';

export type ScanResult = {
  items: Map<string, MenuItem>;
  skipped: SkippedFile[];
};

const CONTENT_EXTENSION = '.md';
const INDEX_STEM = '_index';

async function readDirectoryRecursive(root: string): Promise<string[]> {
  const entries = await fsp.readdir(root, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  const results: string[] = [];
  for (const entry of entries) {
    const resolved = path.join(root, entry.name);
    if (entry.isDirectory()) {
      results.push(...(await readDirectoryRecursive(resolved)));
    } else if (entry.isFile() || (entry.isSymbolicLink() && !(await isDirectory(resolved)))) {
      // Linked files are read through the link; a broken link fails on read and is skipped.
      results.push(resolved);
    }
  }
  return results;
}

export function isContentFile(filePath: string): boolean {
  const { ext, name } = path.parse(filePath);
  return ext === CONTENT_EXTENSION && name !== INDEX_STEM;
}

export async function scanMenuItems(contentDir: string, logger: Logger): Promise<ScanResult> {
  if (!(await isDirectory(contentDir))) {
    throw contentRootMissing(contentDir);
  }

  const items = new Map<string, MenuItem>();
  const skipped: SkippedFile[] = [];
  const skip = (filePath: string, reason: string) => {
    skipped.push({ filePath, reason });
  };

  const files = (await readDirectoryRecursive(contentDir)).filter(isContentFile);
  logger.debug(`Scanning ${files.length} content files under ${contentDir}`);

  for (const file of files) {
    try {
      const text = await fsp.readFile(file, 'utf8');
      const parsed = parseMenuFile(file, contentDir, text);

      if (parsed.status === 'no_front_matter') {
        logger.debug(`Skipping ${file}: ${parsed.reason}`);
        skip(file, parsed.reason);
        continue;
      }
      if (parsed.status === 'malformed') {
        logger.error(`Error parsing front matter in ${file}: ${parsed.reason}`);
        skip(file, parsed.reason);
        continue;
      }

      for (const warning of parsed.warnings) {
        logger.warn(`YAML warning in ${file}: ${warning}`);
      }

      const validation = validateMenuItem(parsed.record);
      if (!validation.valid) {
        logger.warn(`Menu item ${parsed.record.slug} rejected: ${validation.reason}`);
        skip(file, validation.reason);
        continue;
      }

      const { item } = validation;
      const previous = items.get(item.slug);
      if (previous) {
        logger.debug(`Slug ${item.slug} from ${file} replaces ${previous.filePath}`);
      }
      items.set(item.slug, item);
    } catch (error) {
      const message = describeError(error);
      logger.error(`Error processing ${file}: ${message}`);
      skip(file, message);
    }
  }

  logger.info(`Found ${items.size} menu items`);
  return { items, skipped };
}
