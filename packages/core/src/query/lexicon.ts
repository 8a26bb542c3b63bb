import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * Word lists used by query classification and semantic-need scoring. They
 * ship as JSON beside this module and are read once, on first use.
 */
export interface Lexicon {
  fileExtensions: readonly string[];
  broadCodeKeywords: ReadonlySet<string>;
  strongCodeKeywords: ReadonlySet<string>;
  /** Word → weight in 0..255. */
  semanticVocabulary: ReadonlyMap<string, number>;
  /** "first second" → weight in 0..255. */
  coherentBigrams: ReadonlyMap<string, number>;
  conceptAffixes: ReadonlyArray<{ affix: string; weight: number }>;
}

const weightSchema = z.number().int().min(0).max(255);

const fileExtensionsSchema = z.array(z.string().startsWith('.'));
const codeKeywordsSchema = z.object({
  broad: z.array(z.string().min(1)),
  strong: z.array(z.string().min(1)),
});
const vocabularySchema = z.record(z.string(), weightSchema);
const bigramsSchema = z.array(
  z.object({ first: z.string().min(1), second: z.string().min(1), weight: weightSchema }),
);
const affixesSchema = z.array(z.object({ affix: z.string().min(1), weight: weightSchema }));

function readData<T>(fileName: string, schema: z.ZodType<T>): T {
  const url = new URL(`./data/${fileName}`, import.meta.url);
  const parsed = schema.safeParse(JSON.parse(readFileSync(url, 'utf-8')));
  if (!parsed.success) {
    // Shipped data, so a mismatch is a packaging bug rather than user input.
    throw new Error(`Malformed lexicon file ${fileName}: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function bigramKey(first: string, second: string): string {
  return `${first} ${second}`;
}

let cached: Lexicon | undefined;

export function loadLexicon(): Lexicon {
  if (cached) {
    return cached;
  }

  const keywords = readData('code-keywords.json', codeKeywordsSchema);
  const bigrams = readData('coherent-bigrams.json', bigramsSchema);

  cached = {
    fileExtensions: readData('file-extensions.json', fileExtensionsSchema).map((ext) => ext.toLowerCase()),
    broadCodeKeywords: new Set(keywords.broad.map((word) => word.toLowerCase())),
    strongCodeKeywords: new Set(keywords.strong.map((word) => word.toLowerCase())),
    semanticVocabulary: new Map(Object.entries(readData('semantic-vocabulary.json', vocabularySchema))),
    coherentBigrams: new Map(bigrams.map((b) => [bigramKey(b.first, b.second), b.weight])),
    conceptAffixes: readData('concept-affixes.json', affixesSchema),
  };
  return cached;
}
