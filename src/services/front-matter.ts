import path from 'node:path';
import matter from 'gray-matter';
import { parseYaml } from '../utils/yaml.js';
import type { FrontMatter, RawMenuRecord } from '../types/menu.js';

// gray-matter ignores an opening line of four or more dashes.
const OPENING = /^---(?!-)/;
const DELIMITER = '---';

export const UNCATEGORIZED = 'uncategorized';

export type FrontMatterFailure =
  | { status: 'no_front_matter'; reason: string }
  | { status: 'malformed'; reason: string };

export type SplitResult = { status: 'ok'; data: FrontMatter; body: string; warnings: string[] } | FrontMatterFailure;

export type ParseResult = { status: 'parsed'; record: RawMenuRecord; warnings: string[] } | FrontMatterFailure;

class NotAMappingError extends Error {
  constructor() {
    super('front matter must be a key/value mapping');
  }
}

function isPlainObject(value: unknown): value is FrontMatter {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Repeated keys keep the last value.
function yamlEngine(warnings: string[]) {
  return (block: string): FrontMatter => {
    const parsed = parseYaml(block, { uniqueKeys: false });
    warnings.push(...parsed.warnings);
    if (parsed.data == null) return {};
    if (!isPlainObject(parsed.data)) throw new NotAMappingError();
    return parsed.data;
  };
}

export function splitFrontMatter(text: string): SplitResult {
  const source = text.replace(/^\uFEFF/, '');
  const lines = source.split('\n');

  if (!OPENING.test(lines[0] ?? '')) {
    return { status: 'no_front_matter', reason: 'file does not start with a front matter delimiter' };
  }

  const closing = lines.findIndex((line, index) => index > 0 && line.startsWith(DELIMITER));
  if (closing === -1) {
    return { status: 'malformed', reason: 'front matter is not closed' };
  }
  if (closing === 1) {
    return { status: 'malformed', reason: 'front matter is empty' };
  }

  const warnings: string[] = [];
  try {
    const file = matter(source, { engines: { yaml: yamlEngine(warnings) } });
    return { status: 'ok', data: file.data, body: file.content.trim(), warnings };
  } catch (error) {
    if (error instanceof NotAMappingError) {
      return { status: 'malformed', reason: error.message };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { status: 'malformed', reason: `invalid YAML: ${message}` };
  }
}

export function extractCategory(filePath: string, contentRoot: string): string {
  const parts = path.relative(contentRoot, filePath).split(path.sep);
  return parts.length > 1 ? parts[0] : UNCATEGORIZED;
}

export function parseMenuFile(filePath: string, contentRoot: string, text: string): ParseResult {
  const split = splitFrontMatter(text);
  if (split.status !== 'ok') {
    return split;
  }

  return {
    status: 'parsed',
    record: {
      ...split.data,
      slug: path.parse(filePath).name,
      filePath,
      category: extractCategory(filePath, contentRoot),
      content: split.body,
    },
    warnings: split.warnings,
  };
}
