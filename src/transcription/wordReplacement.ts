import { promises as fs } from 'fs';
import { z } from 'zod';
import { log } from '../log';

export interface WordReplacement {
  apply(text: string): string;
}

const DictionarySchema = z.record(z.string(), z.string());

export type ReplacementDictionary = z.infer<typeof DictionarySchema>;

interface CompiledRule {
  pattern: RegExp;
  replacement: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Dictionary replacement. Keys may list several comma-separated variants;
 * each is matched case-insensitively as a whole word.
 */
export class DictionaryWordReplacement implements WordReplacement {
  private readonly rules: CompiledRule[];

  constructor(dictionary: ReplacementDictionary) {
    this.rules = [];
    for (const [variants, replacement] of Object.entries(dictionary)) {
      for (const variant of variants.split(',')) {
        const word = variant.trim();
        if (word === '') continue;
        // \b only works next to word characters; fall back to whitespace/edge lookarounds otherwise
        const pattern = /^\w.*\w$|^\w$/.test(word)
          ? new RegExp(`\\b${escapeRegExp(word)}\\b`, 'gi')
          : new RegExp(`(?<=^|\\s)${escapeRegExp(word)}(?=$|\\s)`, 'gi');
        this.rules.push({ pattern, replacement });
      }
    }
  }

  get size(): number {
    return this.rules.length;
  }

  apply(text: string): string {
    let result = text;
    for (const rule of this.rules) {
      result = result.replace(rule.pattern, () => rule.replacement);
    }
    return result;
  }
}

export const noWordReplacement: WordReplacement = {
  apply: (text) => text,
};

export async function loadWordReplacement(filePath: string | undefined): Promise<WordReplacement> {
  if (!filePath) {
    return noWordReplacement;
  }
  const raw = await fs.readFile(filePath, 'utf8');
  const parsed = DictionarySchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new Error(`Invalid word replacement dictionary ${filePath}: ${issues}`);
  }
  const replacement = new DictionaryWordReplacement(parsed.data);
  log.info({ event: 'word_replacements_loaded', path: filePath, rules: replacement.size }, 'word replacements loaded');
  return replacement;
}

export interface ResolvedWordReplacement {
  replacement: WordReplacement;
  /** What health and response metadata report; false when no dictionary backs the flag. */
  enabled: boolean;
}

/** Loads the dictionary when replacement is switched on. */
export async function resolveWordReplacement(
  enabled: boolean,
  filePath: string | undefined,
): Promise<ResolvedWordReplacement> {
  if (!enabled) {
    return { replacement: noWordReplacement, enabled: false };
  }
  if (!filePath) {
    log.warn(
      { event: 'word_replacement_without_dictionary' },
      'word replacement is enabled but WORD_REPLACEMENTS_PATH is not set; reporting it as disabled',
    );
    return { replacement: noWordReplacement, enabled: false };
  }
  return { replacement: await loadWordReplacement(filePath), enabled: true };
}
