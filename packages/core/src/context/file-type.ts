import { readFileSync } from 'node:fs';
import { posix } from 'node:path';
import { z } from 'zod';
import type { FileType } from '../types/index.js';

type ExtensionFileType = Exclude<FileType, 'unknown'>;

const fileTypeTableSchema = z.object({
  configurationNames: z.array(z.string().min(1)),
  extensions: z.object({
    code: z.array(z.string().min(1)),
    documentation: z.array(z.string().min(1)),
    configuration: z.array(z.string().min(1)),
    data: z.array(z.string().min(1)),
  }),
});

interface FileTypeTable {
  configurationNames: ReadonlySet<string>;
  /** Lowercase extension without the dot → type. The first list to name an extension wins. */
  byExtension: ReadonlyMap<string, ExtensionFileType>;
}

const EXTENSION_ORDER: readonly ExtensionFileType[] = ['code', 'documentation', 'configuration', 'data'];

let cached: FileTypeTable | undefined;

function loadTable(): FileTypeTable {
  if (cached) {
    return cached;
  }
  const url = new URL('./data/file-types.json', import.meta.url);
  const parsed = fileTypeTableSchema.safeParse(JSON.parse(readFileSync(url, 'utf-8')));
  if (!parsed.success) {
    throw new Error(`Malformed file type table: ${parsed.error.message}`);
  }

  const byExtension = new Map<string, ExtensionFileType>();
  for (const type of EXTENSION_ORDER) {
    for (const ext of parsed.data.extensions[type]) {
      const key = ext.toLowerCase();
      if (!byExtension.has(key)) {
        byExtension.set(key, type);
      }
    }
  }
  cached = { configurationNames: new Set(parsed.data.configurationNames), byExtension };
  return cached;
}

/**
 * Classifies a `/`-separated path by its name. Well-known build and
 * settings files (`package.json`, `Dockerfile`) count as configuration
 * whatever their extension says.
 */
export function detectFileType(filePath: string): FileType {
  const table = loadTable();
  const name = posix.basename(filePath);
  if (table.configurationNames.has(name)) {
    return 'configuration';
  }
  const ext = posix.extname(name);
  if (ext === '') {
    return 'unknown';
  }
  return table.byExtension.get(ext.slice(1).toLowerCase()) ?? 'unknown';
}
