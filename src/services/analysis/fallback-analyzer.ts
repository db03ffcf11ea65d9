/**
 * Fallback Analyzer
 * Keyword analysis used when the generative model is unavailable or its
 * answer cannot be used. Pure and deterministic; the keyword tables are
 * loaded from data/fallback-lexicon.json.
 *
 * Every keyword counts once when it occurs anywhere in the lowercased,
 * space-joined review texts.
 */

import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { MAX_COMPLAINTS, MAX_HIGHLIGHTS } from '../../config/index.js';
import type { AnalysisResult, AnalyzableReview } from './analysis.types.js';

const PhraseRuleSchema = z.object({
  anyOf: z.array(z.string().min(1)).optional(),
  allOf: z.array(z.string().min(1)).optional(),
  label: z.string().min(1),
}).refine(rule => Boolean(rule.anyOf?.length || rule.allOf?.length), {
  message: 'rule needs anyOf or allOf phrases',
});

export const FallbackLexiconSchema = z.object({
  cuisines: z.array(z.object({
    name: z.string().min(1),
    keywords: z.array(z.string().min(1)).min(1),
  })).min(1),
  positiveWords: z.array(z.string().min(1)),
  negativeWords: z.array(z.string().min(1)),
  highlightRules: z.array(PhraseRuleSchema),
  complaintRules: z.array(PhraseRuleSchema),
  priceRules: z.array(PhraseRuleSchema),
});

export type FallbackLexicon = z.infer<typeof FallbackLexiconSchema>;
type PhraseRule = z.infer<typeof PhraseRuleSchema>;

export const DEFAULT_LEXICON_PATH = fileURLToPath(new URL('./data/fallback-lexicon.json', import.meta.url));

export const FALLBACK_AMBIENCE = 'Analysis temporarily unavailable due to high demand. Please try again later.';
export const FALLBACK_SERVICE_QUALITY = 'Basic analysis: Check individual reviews for service details';
export const NO_HIGHLIGHTS = 'Analysis unavailable - please try again later';
export const NO_COMPLAINTS = 'No major complaints identified';

/**
 * Reads and validates a lexicon file. Throws on a missing or malformed file;
 * called once at start-up.
 */
export function loadFallbackLexicon(filePath: string = DEFAULT_LEXICON_PATH): FallbackLexicon {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return FallbackLexiconSchema.parse(raw);
}

function countPresent(words: readonly string[], text: string): number {
  return words.filter(word => text.includes(word)).length;
}

function matches(rule: PhraseRule, text: string): boolean {
  const any = rule.anyOf ? rule.anyOf.some(p => text.includes(p)) : true;
  const all = rule.allOf ? rule.allOf.every(p => text.includes(p)) : true;
  return any && all;
}

export function detectCuisine(text: string, lexicon: FallbackLexicon): string {
  let detected = 'Not specified';
  let best = 0;
  for (const cuisine of lexicon.cuisines) {
    const count = countPresent(cuisine.keywords, text);
    // strict > keeps the earlier cuisine on ties
    if (count > best) {
      best = count;
      detected = cuisine.name;
    }
  }
  return detected;
}

export function classifySentiment(positive: number, negative: number): string {
  if (positive > negative * 2) return 'Very positive';
  if (positive > negative) return 'Positive';
  if (negative > positive) return 'Mixed with concerns';
  return 'Mixed';
}

export function analyzeWithKeywords(reviews: readonly AnalyzableReview[], lexicon: FallbackLexicon): AnalysisResult {
  const text = reviews.map(r => r.text.toLowerCase()).join(' ');

  const highlights = lexicon.highlightRules.filter(rule => matches(rule, text)).map(rule => rule.label).slice(0, MAX_HIGHLIGHTS);
  const complaints = lexicon.complaintRules.filter(rule => matches(rule, text)).map(rule => rule.label).slice(0, MAX_COMPLAINTS);
  const price = lexicon.priceRules.find(rule => matches(rule, text));

  return {
    cuisineType: detectCuisine(text, lexicon),
    ambience: FALLBACK_AMBIENCE,
    highlights: highlights.length > 0 ? highlights : [NO_HIGHLIGHTS],
    complaints: complaints.length > 0 ? complaints : [NO_COMPLAINTS],
    overallSentiment: classifySentiment(
      countPresent(lexicon.positiveWords, text),
      countPresent(lexicon.negativeWords, text)
    ),
    priceRange: price ? price.label : 'Not mentioned',
    bestDishes: ['Analysis unavailable'],
    serviceQuality: FALLBACK_SERVICE_QUALITY,
    usedFallback: true,
  };
}
