import { describe, it, expect } from 'vitest';
import { buildRetrievalQuery, RetrievalGate } from './RetrievalGate';
import { RetrievalUnavailableError, StoreUnavailableError, TurnCancelledError } from './errors';
import { RetrievalFilters, RetrievalResult, RetrievalStore } from '../types';
import { constraints } from '../__tests__/helpers';

class FakeStore implements RetrievalStore {
  readonly calls: { text: string; filters: RetrievalFilters; k: number }[] = [];

  constructor(private answer: (signal?: AbortSignal) => Promise<RetrievalResult[]>) {}

  query(text: string, filters: RetrievalFilters, k: number, signal?: AbortSignal): Promise<RetrievalResult[]> {
    this.calls.push({ text, filters, k });
    return this.answer(signal);
  }
}

const query = { text: 'vegan breakfast', requiredTags: ['vegan'], anyTags: ['breakfast'] };

describe('buildRetrievalQuery', () => {
  it('adds constraint terms but leaves exclusions out', () => {
    const built = buildRetrievalQuery(
      ' breakfast ideas ',
      constraints({
        diet: ['vegan'],
        mealType: ['breakfast'],
        cookingMethod: ['no-cook'],
        availableIngredients: { kind: 'only', items: ['banana', 'oat'] },
        excludedIngredients: ['peanut']
      })
    );

    expect(built).toEqual({
      text: 'breakfast ideas vegan breakfast no-cook banana oat',
      requiredTags: ['vegan'],
      anyTags: ['breakfast']
    });
  });

  it('does not narrow by a diet no recipe is tagged with', () => {
    expect(buildRetrievalQuery('dinner', constraints({ diet: ['omnivore'] })).requiredTags).toEqual([]);
  });
});

describe('RetrievalGate', () => {
  it('yields at most k frozen facts of the requested category, best first', async () => {
    const store = new FakeStore(async () => [
      { id: 'b', text: 'B', score: 0.5, category: 'recipe_reference' },
      { id: 'a', text: 'A', score: 0.5, category: 'recipe_reference' },
      { id: 'c', text: 'C', score: 1.7, category: 'recipe_reference' },
      { id: 'd', text: 'D', score: 0.9, category: 'safety_rule' }
    ]);
    const gate = new RetrievalGate(store, { timeoutMs: 100 });

    const facts = await gate.collect(query, 'recipe_reference', 2);

    expect(facts).toEqual([
      { sourceId: 'c', snippet: 'C', score: 1, category: 'recipe_reference' },
      { sourceId: 'a', snippet: 'A', score: 0.5, category: 'recipe_reference' }
    ]);
    expect(facts.every(fact => Object.isFrozen(fact))).toBe(true);
    expect(store.calls[0]).toEqual({
      text: 'vegan breakfast',
      filters: { category: 'recipe_reference', requiredTags: ['vegan'], anyTags: ['breakfast'] },
      k: 2
    });
  });

  it('does not apply recipe tags to safety rules', async () => {
    const store = new FakeStore(async () => []);
    const gate = new RetrievalGate(store, { timeoutMs: 100 });

    expect(await gate.collect(query, 'safety_rule', 3)).toEqual([]);
    expect(store.calls[0].filters).toEqual({ category: 'safety_rule', requiredTags: undefined, anyTags: undefined });
  });

  it('skips the store when k is zero', async () => {
    const store = new FakeStore(async () => []);
    expect(await new RetrievalGate(store, { timeoutMs: 100 }).collect(query, 'safety_rule', 0)).toEqual([]);
    expect(store.calls).toHaveLength(0);
  });

  it('reports an unreachable store', async () => {
    const gate = new RetrievalGate(
      new FakeStore(async () => {
        throw new StoreUnavailableError('connection refused');
      }),
      { timeoutMs: 100 }
    );

    const error = await gate.collect(query, 'safety_rule', 3).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(RetrievalUnavailableError);
    expect(error).toMatchObject({ reason: 'unavailable', message: 'connection refused', backend: 'retrieval' });
  });

  it('gives up on a store that does not answer in time', async () => {
    const gate = new RetrievalGate(new FakeStore(() => new Promise<RetrievalResult[]>(() => undefined)), {
      timeoutMs: 20
    });

    const error = await gate.collect(query, 'safety_rule', 3).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(RetrievalUnavailableError);
    expect(error).toMatchObject({ reason: 'timeout' });
  });

  it('propagates cancellation', async () => {
    const controller = new AbortController();
    controller.abort();
    const store = new FakeStore(async () => []);

    await expect(
      new RetrievalGate(store, { timeoutMs: 100 }).collect(query, 'safety_rule', 3, controller.signal)
    ).rejects.toBeInstanceOf(TurnCancelledError);
    expect(store.calls).toHaveLength(0);
  });
});
