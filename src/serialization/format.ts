import { basename, extname } from 'node:path';
import YAML from 'yaml';

export type FileFormat = 'yaml' | 'json';

export function inferFormat(path: string): FileFormat {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  throw new Error(
    `Could not infer format for filename '${basename(path)}'. Use the fmt option to specify the format.`,
  );
}

export function stemOf(path: string): string {
  const base = basename(path);
  const ext = extname(base);
  return base.slice(0, base.length - ext.length);
}

export function parseDocument(content: string, fmt: FileFormat): unknown {
  return fmt === 'yaml' ? YAML.parse(content) : JSON.parse(content);
}

export function stringifyDocument(data: unknown, fmt: FileFormat): string {
  return fmt === 'yaml'
    ? YAML.stringify(data, { sortMapEntries: false })
    : `${JSON.stringify(data, null, 2)}\n`;
}
