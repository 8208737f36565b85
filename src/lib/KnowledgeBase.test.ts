import { describe, it, expect } from 'vitest';
import { KnowledgeBase, tokenize } from './KnowledgeBase';
import { StoreUnavailableError } from './errors';
import { loadFixtures } from '../__tests__/helpers';

function smallKnowledgeBase(): KnowledgeBase {
  const knowledgeBase = new KnowledgeBase();
  knowledgeBase.load(
    [
      { id: 'r-oats', name: 'Banana Oats', tags: ['vegan', 'breakfast'], ingredients: ['oats', 'banana'], steps: ['Mix.'] },
      { id: 'r-eggs', name: 'Scrambled Eggs', tags: ['vegetarian', 'breakfast'], ingredients: ['eggs', 'butter'], steps: ['Stir.'] },
      { id: 'r-curry', name: 'Chickpea Curry', tags: ['vegan', 'dinner'], ingredients: ['chickpeas', 'rice'], steps: ['Simmer.'] }
    ],
    [{ id: 's-rice', topic: 'cooked rice', rule: 'Never leave cooked rice out.' }],
    { 'egg substitute': 'Use flaxseed.' }
  );
  return knowledgeBase;
}

describe('tokenize', () => {
  it('drops filler words and singularizes', () => {
    expect(tokenize('What can I make with eggs and gluten-free oats?')).toEqual(['egg', 'gluten', 'free', 'oat']);
  });
});

describe('KnowledgeBase.query', () => {
  it('ranks entries by the share of query words they contain', async () => {
    const results = await smallKnowledgeBase().query('banana oats breakfast', { category: 'recipe_reference' }, 5);

    expect(results.map(result => result.id)).toEqual(['r-oats', 'r-eggs']);
    expect(results[0].score).toBe(1);
    expect(results[1].score).toBeCloseTo(1 / 3);
    expect(results[0].text).toBe('Banana Oats (vegan, breakfast)\nIngredients: oats; banana\nSteps: Mix.');
  });

  it('breaks ties by id and honours k', async () => {
    const knowledgeBase = smallKnowledgeBase();

    const all = await knowledgeBase.query('breakfast', { category: 'recipe_reference' }, 5);
    expect(all.map(result => result.id)).toEqual(['r-eggs', 'r-oats']);

    const one = await knowledgeBase.query('breakfast', { category: 'recipe_reference' }, 1);
    expect(one.map(result => result.id)).toEqual(['r-eggs']);
  });

  it('applies required and any-of tag filters', async () => {
    const knowledgeBase = smallKnowledgeBase();

    const vegan = await knowledgeBase.query('breakfast', { category: 'recipe_reference', requiredTags: ['vegan'] }, 5);
    expect(vegan.map(result => result.id)).toEqual(['r-oats']);

    const meal = await knowledgeBase.query(
      'rice',
      { category: 'recipe_reference', anyTags: ['lunch', 'dinner'] },
      5
    );
    expect(meal.map(result => result.id)).toEqual(['r-curry']);
  });

  it('searches safety rules separately', async () => {
    const results = await smallKnowledgeBase().query('is cooked rice safe', { category: 'safety_rule' }, 3);

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ id: 's-rice', text: 'Never leave cooked rice out.', category: 'safety_rule' });
    expect(results[0].score).toBeCloseTo(2 / 3);
  });

  it('returns nothing for a query made only of filler words', async () => {
    expect(await smallKnowledgeBase().query('what can I make', { category: 'recipe_reference' }, 3)).toEqual([]);
  });

  it('finds the vegan breakfast references in the bundled collection', async () => {
    const { knowledgeBase } = await loadFixtures();
    const results = await knowledgeBase.query(
      'vegan breakfast oats banana',
      { category: 'recipe_reference', requiredTags: ['vegan'], anyTags: ['breakfast'] },
      3
    );

    expect(results[0].id).toBe('recipe-overnight-oats');
    expect(results.map(result => result.id)).not.toContain('recipe-banana-oat-pancakes');
  });

  it('reports a missing data directory as an unavailable store', async () => {
    const knowledgeBase = new KnowledgeBase('/nonexistent/knowledge-data');
    await expect(knowledgeBase.query('rice', { category: 'safety_rule' }, 3)).rejects.toBeInstanceOf(
      StoreUnavailableError
    );
    expect(knowledgeBase.isReady()).toBe(false);
  });
});

describe('KnowledgeBase.lookup', () => {
  it('matches constants whose key words all appear, most specific first', async () => {
    const { knowledgeBase } = await loadFixtures();

    expect(knowledgeBase.lookup('How many grams in a cup of flour?')).toEqual([
      '1 cup of all-purpose flour weighs about 125 g.',
      '1 US cup = 16 tablespoons = about 240 ml.'
    ]);
    expect(knowledgeBase.lookup('What can I substitute for eggs?')).toEqual([
      'Replace 1 egg with 1 tbsp ground flaxseed mixed with 3 tbsp water, rested for 5 minutes, or with 1/4 cup mashed banana in sweet bakes.'
    ]);
  });

  it('returns nothing before the data is loaded', () => {
    expect(new KnowledgeBase('/nonexistent/knowledge-data').lookup('egg substitute')).toEqual([]);
  });
});
