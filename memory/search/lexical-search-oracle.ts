import type { MemoryRepository } from '../repositories/memory-repository';
import type { SearchFilter, SearchHit, SearchOracle } from './search-oracle';

export interface ParsedQuery {
  terms: string[];
  phrases: string[];
}

/**
 * Keyword search over memory content. Candidates must contain at least one
 * term and every quoted phrase; they rank by the share of terms they contain.
 */
export class LexicalSearchOracle implements SearchOracle {
  constructor(private readonly repository: MemoryRepository) {}

  async search(text: string, filter: SearchFilter, limit: number): Promise<SearchHit[]> {
    const query = parseQuery(text);
    const needles = [...new Set([...query.terms, ...query.phrases.flatMap((phrase) => phrase.split(' '))])];
    if (!needles.length || limit <= 0) {
      return [];
    }

    const candidates = await this.repository.query({
      states: filter.includeInactive ? ['active', 'superseded', 'retired'] : ['active'],
      category: filter.category,
      project: filter.project,
      contentTerms: needles
    });

    const hits: SearchHit[] = [];
    for (const candidate of candidates) {
      const relevance = relevanceOf(candidate.content, query);
      if (relevance > 0) {
        hits.push({ id: candidate.id, relevance });
      }
    }

    return hits
      .sort((a, b) => b.relevance - a.relevance || a.id - b.id)
      .slice(0, limit);
  }
}

export function parseQuery(text: string): ParsedQuery {
  const phrases: string[] = [];
  const withoutPhrases = text.replace(/"([^"]*)"/gu, (_match, phrase: string) => {
    const normalized = tokenize(phrase).join(' ');
    if (normalized) {
      phrases.push(normalized);
    }
    return ' ';
  });

  return {
    terms: [...new Set(tokenize(withoutPhrases))],
    phrases
  };
}

export function relevanceOf(content: string, query: ParsedQuery): number {
  const normalized = tokenize(content).join(' ');
  if (query.phrases.some((phrase) => !normalized.includes(phrase))) {
    return 0;
  }

  const tokens = new Set(normalized.split(' '));
  const matchedTerms = query.terms.filter((term) => tokens.has(term)).length;
  if (!query.terms.length) {
    return 1;
  }
  return matchedTerms / query.terms.length;
}

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{M}\p{N}]+/u)
    .filter((token) => token.length > 1);
}
