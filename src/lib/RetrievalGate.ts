import { ConstraintSet, FactCategory, RetrievalResult, RetrievalStore, RetrievedFact } from '../types';
import { inventoryItems } from './ConstraintMerger';
import { DeadlineExceededError, RetrievalUnavailableError, StoreUnavailableError, TurnCancelledError } from './errors';
import { createLogger } from './logger';
import { withDeadline } from './utils';

const logger = createLogger('RetrievalGate');

export interface RetrievalQuery {
  text: string;
  requiredTags: string[];
  anyTags: string[];
}

export interface RetrievalGateOptions {
  timeoutMs: number;
  // Diets that no recipe is tagged with; they never narrow a search.
  untaggedDiets?: string[];
}

/**
 * Combines the utterance with the active constraints. Excluded ingredients
 * stay out of the text so they cannot pull matching recipes up the ranking.
 */
export function buildRetrievalQuery(
  utterance: string,
  constraints: ConstraintSet,
  untaggedDiets: string[] = ['omnivore']
): RetrievalQuery {
  const terms = [
    utterance.trim(),
    ...constraints.diet,
    ...constraints.mealType,
    ...constraints.cookingMethod,
    ...inventoryItems(constraints.availableIngredients)
  ].filter(Boolean);

  return {
    text: terms.join(' '),
    requiredTags: constraints.diet.filter(diet => !untaggedDiets.includes(diet)),
    anyTags: [...constraints.mealType]
  };
}

function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

export class RetrievalGate {
  constructor(
    private store: RetrievalStore,
    private options: RetrievalGateOptions
  ) {}

  buildQuery(utterance: string, constraints: ConstraintSet): RetrievalQuery {
    return buildRetrievalQuery(utterance, constraints, this.options.untaggedDiets);
  }

  /**
   * Yields at most `k` facts in descending score order, ties broken by
   * source id. Each call queries the store afresh; a generator that has
   * been consumed stays exhausted.
   */
  async *retrieve(
    query: RetrievalQuery,
    category: FactCategory,
    k: number,
    signal?: AbortSignal
  ): AsyncGenerator<RetrievedFact> {
    if (k <= 0) return;

    let results: RetrievalResult[];
    try {
      results = await withDeadline(
        abortSignal =>
          this.store.query(
            query.text,
            {
              category,
              requiredTags: category === 'recipe_reference' ? query.requiredTags : undefined,
              anyTags: category === 'recipe_reference' ? query.anyTags : undefined
            },
            k,
            abortSignal
          ),
        this.options.timeoutMs,
        signal
      );
    } catch (error) {
      if (error instanceof TurnCancelledError) throw error;
      if (error instanceof DeadlineExceededError) {
        throw new RetrievalUnavailableError(
          `Retrieval store did not answer within ${error.timeoutMs}ms`,
          'timeout',
          error
        );
      }
      if (error instanceof StoreUnavailableError) {
        throw new RetrievalUnavailableError(error.message, 'unavailable', error);
      }
      throw new RetrievalUnavailableError(
        `Retrieval store failed: ${error instanceof Error ? error.message : String(error)}`,
        'unavailable',
        error
      );
    }

    const facts = results
      .filter(result => result.category === category)
      .map(result =>
        Object.freeze({
          sourceId: result.id,
          snippet: result.text,
          score: clampScore(result.score),
          category: result.category
        })
      )
      .sort((a, b) => b.score - a.score || a.sourceId.localeCompare(b.sourceId))
      .slice(0, k);

    logger.debug(`Retrieved ${facts.length} ${category} facts`, { query: query.text });

    for (const fact of facts) {
      yield fact;
    }
  }

  /** Drains `retrieve` into an array. */
  async collect(
    query: RetrievalQuery,
    category: FactCategory,
    k: number,
    signal?: AbortSignal
  ): Promise<RetrievedFact[]> {
    const facts: RetrievedFact[] = [];
    for await (const fact of this.retrieve(query, category, k, signal)) {
      facts.push(fact);
    }
    return facts;
  }
}
