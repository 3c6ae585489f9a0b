/**
 * Query keyword extraction
 *
 * The primary path asks the LLM for a `{"keywords": [...]}` object. The local
 * path needs no model: stopword-filtered tokens, capitalized phrases and
 * noun phrases found by compromise.
 */

import nlp from 'compromise';
import { z } from 'zod';
import type { LLMProvider } from '../llm/provider.js';
import { ErrorCategory, ErrorHandler, ErrorSeverity, GenerationError, toError } from '../utils/error-handler.js';
import { KEYWORD_EXTRACTION_PROMPT, keywordUserPrompt } from './prompts.js';
import stopwordList from './stopwords.json';

export const keywordsResponseSchema = z.object({
  keywords: z.array(z.string())
});

export interface KeywordExtractorConfig {
  /** Chat model override; the provider default when unset */
  model?: string;
  temperature: number;
  /** Add compromise noun phrases to the local extraction */
  useNounPhrases: boolean;
}

const STOPWORDS = new Set(stopwordList);

const CAPITALIZED_PHRASE = /\b[A-Z][a-z]+(?:\s+[A-Z][a-z]+)*\b/g;
const LEADING_DETERMINER = /^(?:the|a|an|this|that|these|those|my|your|our|their|its)\s+/;

/**
 * Trim, lowercase, drop one-character entries and duplicates (first wins)
 */
export function cleanKeywords(keywords: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const keyword of keywords) {
    const cleaned = keyword.trim().toLowerCase();
    if (cleaned.length <= 1 || seen.has(cleaned)) continue;
    seen.add(cleaned);
    result.push(cleaned);
  }

  return result;
}

export class KeywordExtractor {
  private llm: LLMProvider;
  private config: KeywordExtractorConfig;

  constructor(llm: LLMProvider, config: Partial<KeywordExtractorConfig> = {}) {
    this.llm = llm;
    this.config = {
      model: config.model,
      temperature: config.temperature ?? 0.1,
      useNounPhrases: config.useNounPhrases ?? true
    };
  }

  /**
   * Keywords from the LLM; failures reject with a GenerationError
   */
  async extract(query: string): Promise<string[]> {
    let response: z.infer<typeof keywordsResponseSchema>;
    try {
      response = await this.llm.generate(KEYWORD_EXTRACTION_PROMPT, keywordUserPrompt(query), keywordsResponseSchema, {
        model: this.config.model,
        temperature: this.config.temperature
      });
    } catch (error) {
      if (error instanceof GenerationError) throw error;
      throw new GenerationError(`Keyword extraction failed: ${toError(error).message}`, { cause: error });
    }

    return cleanKeywords(response.keywords);
  }

  /**
   * LLM keywords, or the local extraction if the LLM call fails
   */
  async extractWithFallback(query: string): Promise<string[]> {
    try {
      return await this.extract(query);
    } catch (error) {
      ErrorHandler.handle(
        ErrorCategory.GENERATION,
        ErrorSeverity.LOW,
        'Keyword extraction fell back to local extraction',
        toError(error),
        { query }
      );
      return this.simpleExtract(query);
    }
  }

  /**
   * Model-free keywords, sorted
   */
  simpleExtract(query: string): string[] {
    const keywords = new Set<string>();

    for (const token of query.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
      if (token.length > 2 && !STOPWORDS.has(token)) {
        keywords.add(token);
      }
    }

    for (const phrase of query.match(CAPITALIZED_PHRASE) ?? []) {
      const lowered = phrase.toLowerCase();
      if (!STOPWORDS.has(lowered)) {
        keywords.add(lowered);
      }
    }

    if (this.config.useNounPhrases) {
      for (const phrase of this.nounPhrases(query)) {
        keywords.add(phrase);
      }
    }

    return [...keywords].sort();
  }

  private nounPhrases(query: string): string[] {
    const raw: unknown = nlp(query).nouns().out('array');
    if (!Array.isArray(raw)) return [];

    const phrases: string[] = [];
    for (const item of raw) {
      if (typeof item !== 'string') continue;
      const phrase = item
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s-]/gu, '')
        .replace(/\s+/g, ' ')
        .trim()
        .replace(LEADING_DETERMINER, '');
      if (phrase.length > 2 && !STOPWORDS.has(phrase)) {
        phrases.push(phrase);
      }
    }
    return phrases;
  }
}
