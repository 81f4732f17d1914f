import { z } from "zod";
import type { StreamKind } from "../streams/kinds.js";
import lexiconData from "../../data/lexicons.json" with { type: "json" };

const wordList = z.array(z.string().min(1));

const lexiconsSchema = z.object({
  stopwords: z.object({
    common: wordList,
    paper: wordList,
    patent: wordList,
    social: wordList,
    news: wordList,
    finance: wordList,
  }),
  research: z.object({ basic: wordList, applied: wordList }),
  venues: z.object({ conference: wordList, industry: wordList }),
  assignees: z.object({ academic: wordList, corporate: wordList }),
});

export type Lexicons = z.infer<typeof lexiconsSchema>;

export const LEXICONS: Lexicons = lexiconsSchema.parse(lexiconData);

const stopwordCache = new Map<StreamKind, ReadonlySet<string>>();

export function stopwordsFor(stream: StreamKind): ReadonlySet<string> {
  let set = stopwordCache.get(stream);
  if (!set) {
    set = new Set([...LEXICONS.stopwords.common, ...LEXICONS.stopwords[stream]]);
    stopwordCache.set(stream, set);
  }
  return set;
}

/** Number of lexicon phrases found as substrings of already-lowercased text. */
export function countMatches(text: string, phrases: readonly string[]): number {
  let hits = 0;
  for (const phrase of phrases) {
    if (text.includes(phrase)) hits += 1;
  }
  return hits;
}

export function matchesAny(text: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => text.includes(phrase));
}
