import { describe, it, expect, beforeAll } from 'vitest';
import { describeVerdict, prohibitedTerms, RecipeValidator } from './RecipeValidator';
import { emptyConstraintSet, mergeConstraints } from '../lib/ConstraintMerger';
import { RecipeDraft, RetrievedFact } from '../types';
import { constraints, loadFixtures } from '../__tests__/helpers';

function draft(partial: Partial<RecipeDraft> = {}): RecipeDraft {
  return {
    title: 'Test Dish',
    mealType: 'breakfast',
    ingredients: [{ name: 'oats' }],
    steps: ['Mix.', 'Serve.'],
    ...partial
  };
}

const kidneyBeanRule: RetrievedFact = {
  sourceId: 'safety-kidney-beans',
  snippet: 'Never eat raw kidney beans; boil them hard for at least 10 minutes first.',
  score: 0.5,
  category: 'safety_rule'
};

describe('RecipeValidator', () => {
  let validator: RecipeValidator;

  beforeAll(async () => {
    const { lexicon, dietTable } = await loadFixtures();
    validator = new RecipeValidator({
      dietTable,
      pantryStaples: lexicon.pantryStaples,
      ingredientGroups: lexicon.ingredientGroups,
      ingredients: lexicon.ingredients
    });
  });

  it('rejects an ingredient outside the inventory and names it', () => {
    const verdict = validator.validate(
      draft({ ingredients: [{ name: 'egg' }, { name: 'milk' }] }),
      constraints({ availableIngredients: { kind: 'only', items: ['egg'] } }),
      []
    );

    expect(verdict.kind).toBe('rejected');
    if (verdict.kind !== 'rejected') return;
    expect(verdict.violatedConstraint).toBe('milk');
    expect(verdict.reason).toBe('milk is not among the available ingredients');
    expect(verdict.violations).toHaveLength(1);
  });

  it('accepts anything when there are no constraints', () => {
    const verdict = validator.validate(
      draft({ mealType: 'dessert', ingredients: [{ name: 'flour' }, { name: 'sugar' }, { name: 'butter' }] }),
      emptyConstraintSet(),
      []
    );
    expect(verdict).toEqual({ kind: 'accepted' });
  });

  it('always allows pantry staples and matches plurals', () => {
    const verdict = validator.validate(
      draft({ ingredients: [{ name: 'Rolled oats', quantity: '1/2 cup' }, { name: 'water' }, { name: 'salt' }] }),
      constraints({ availableIngredients: { kind: 'only', items: ['oat'] } }),
      []
    );
    expect(verdict).toEqual({ kind: 'accepted' });
  });

  it('resolves compound ingredients before checking the inventory', () => {
    expect(
      describeVerdict(
        validator.validate(
          draft({ ingredients: [{ name: 'peanut butter' }] }),
          constraints({ availableIngredients: { kind: 'only', items: ['butter'] } }),
          []
        )
      )
    ).toBe('peanut butter is not among the available ingredients');

    expect(
      describeVerdict(
        validator.validate(
          draft({ ingredients: [{ name: 'oat milk' }] }),
          constraints({ availableIngredients: { kind: 'only', items: ['oat'] } }),
          []
        )
      )
    ).toBe('oat milk is not among the available ingredients');
  });

  it('judges unknown ingredients by their head word', () => {
    const onHand = constraints({ availableIngredients: { kind: 'only', items: ['egg'] } });

    expect(describeVerdict(validator.validate(draft({ ingredients: [{ name: 'egg noodles' }] }), onHand, []))).toBe(
      'egg noodles is not among the available ingredients'
    );
    expect(validator.validate(draft({ ingredients: [{ name: 'large eggs' }, { name: 'sea salt' }] }), onHand, [])).toEqual({
      kind: 'accepted'
    });
  });

  it('rejects everything but staples once the last ingredient is retracted', () => {
    const withEggs = constraints({ availableIngredients: { kind: 'only', items: ['egg'] } });
    const retracted = mergeConstraints(withEggs, emptyConstraintSet(), [], ['egg']);

    const verdict = validator.validate(
      draft({ ingredients: [{ name: 'egg' }, { name: 'bacon' }, { name: 'salt' }] }),
      retracted,
      []
    );

    expect(verdict.kind).toBe('rejected');
    if (verdict.kind !== 'rejected') return;
    expect(verdict.reason).toBe('egg is not available (nothing on hand)');
    expect(verdict.violations.map(violation => violation.violatedConstraint)).toEqual(['egg', 'bacon']);
  });

  it('treats an empty kitchen as staples only', () => {
    const verdict = validator.validate(
      draft({ ingredients: [{ name: 'rice' }] }),
      constraints({ availableIngredients: { kind: 'nothing' } }),
      []
    );
    expect(describeVerdict(verdict)).toBe('rice is not available (nothing on hand)');
  });

  it('expands ingredient groups when checking exclusions', () => {
    const verdict = validator.validate(
      draft({ ingredients: [{ name: 'oats' }, { name: 'butter' }] }),
      constraints({ excludedIngredients: ['dairy'] }),
      []
    );

    expect(verdict.kind).toBe('rejected');
    if (verdict.kind !== 'rejected') return;
    expect(verdict.violations).toEqual([
      { check: 'exclusion', violatedConstraint: 'butter', reason: 'butter is excluded (dairy)' }
    ]);
  });

  it('checks the diet table, honouring allowed phrases', () => {
    const vegan = constraints({ diet: ['vegan'] });

    expect(
      validator.validate(
        draft({ ingredients: [{ name: 'oat milk' }, { name: 'oats' }, { name: 'peanut butter' }] }),
        vegan,
        []
      )
    ).toEqual({ kind: 'accepted' });

    const verdict = validator.validate(draft({ ingredients: [{ name: 'oats' }, { name: 'Honey' }] }), vegan, []);
    expect(verdict.kind).toBe('rejected');
    if (verdict.kind !== 'rejected') return;
    expect(verdict.violatedConstraint).toBe('honey');
    expect(verdict.reason).toBe('honey is not compatible with a vegan diet');
  });

  it('rejects a dish for the wrong meal', () => {
    const verdict = validator.validate(draft({ mealType: 'dinner' }), constraints({ mealType: ['breakfast'] }), []);

    expect(verdict.kind).toBe('rejected');
    if (verdict.kind !== 'rejected') return;
    expect(verdict.violatedConstraint).toBe('meal type breakfast');
    expect(verdict.reason).toBe('the recipe is a dinner dish, not breakfast');
  });

  it('rejects a declared cooking method outside the requested ones', () => {
    const verdict = validator.validate(
      draft({ cookingMethod: 'bake' }),
      constraints({ cookingMethod: ['no-cook'] }),
      []
    );
    expect(describeVerdict(verdict)).toBe('the recipe uses bake, not no-cook');
  });

  it('rejects a draft that contradicts a retrieved safety rule', () => {
    const verdict = validator.validate(
      draft({
        mealType: 'lunch',
        ingredients: [{ name: 'kidney beans' }],
        steps: ['Soak the raw kidney beans overnight.', 'Blend into a dip.']
      }),
      emptyConstraintSet(),
      [kidneyBeanRule]
    );

    expect(verdict.kind).toBe('rejected');
    if (verdict.kind !== 'rejected') return;
    expect(verdict.violatedConstraint).toBe('safety rule safety-kidney-beans');
  });

  it('accepts a draft that follows the safety rule', () => {
    const verdict = validator.validate(
      draft({
        mealType: 'lunch',
        ingredients: [{ name: 'kidney beans' }],
        steps: ['Boil the kidney beans hard for 10 minutes.', 'Blend into a dip.']
      }),
      emptyConstraintSet(),
      [kidneyBeanRule]
    );
    expect(verdict).toEqual({ kind: 'accepted' });
  });

  it('asks for regeneration when the draft is incomplete', () => {
    const verdict = validator.validate(draft({ steps: [] }), emptyConstraintSet(), []);
    expect(verdict).toEqual({ kind: 'needs_regeneration', feedback: 'The recipe was incomplete: no steps.' });
  });

  it('reports the first violation and keeps the rest', () => {
    const verdict = validator.validate(
      draft({ mealType: 'dinner', ingredients: [{ name: 'egg' }, { name: 'bacon' }] }),
      constraints({ diet: ['vegetarian'], mealType: ['breakfast'], availableIngredients: { kind: 'only', items: ['egg'] } }),
      []
    );

    expect(verdict.kind).toBe('rejected');
    if (verdict.kind !== 'rejected') return;
    expect(verdict.violatedConstraint).toBe('bacon');
    expect(verdict.violations.map(violation => violation.check)).toEqual(['inventory', 'diet', 'meal_type']);
  });
});

describe('prohibitedTerms', () => {
  it('keeps the content words of each prohibition', () => {
    expect(prohibitedTerms(kidneyBeanRule.snippet)).toEqual([['raw', 'kidney', 'bean']]);
    expect(prohibitedTerms('Do not wash raw chicken, because splashing spreads bacteria.')).toEqual([
      ['wash', 'raw', 'chicken']
    ]);
    expect(prohibitedTerms('Cook chicken to 74°C.')).toEqual([]);
  });
});
