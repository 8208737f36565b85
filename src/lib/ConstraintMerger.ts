import { ConstraintCategory, ConstraintExtraction, ConstraintSet, Inventory } from '../types';
import { uniqueSorted } from './utils';

// Dietary labels replace each other; everything else accumulates.
const EXCLUSIVE_CATEGORIES: ReadonlySet<ConstraintCategory> = new Set<ConstraintCategory>(['diet']);

export function emptyConstraintSet(): ConstraintSet {
  return {
    diet: [],
    mealType: [],
    cookingMethod: [],
    availableIngredients: { kind: 'unrestricted' },
    excludedIngredients: []
  };
}

export function inventoryItems(inventory: Inventory): string[] {
  return inventory.kind === 'only' ? inventory.items : [];
}

function toInventory(items: string[]): Inventory {
  return items.length > 0 ? { kind: 'only', items: uniqueSorted(items) } : { kind: 'unrestricted' };
}

function isEmptyInventory(inventory: Inventory): boolean {
  return inventory.kind === 'unrestricted';
}

function mergeValues(
  category: ConstraintCategory,
  prior: string[],
  extracted: string[],
  negated: boolean
): string[] {
  const base = negated ? [] : prior;
  if (extracted.length === 0) return uniqueSorted(base);
  if (EXCLUSIVE_CATEGORIES.has(category)) return uniqueSorted(extracted);
  return uniqueSorted([...base, ...extracted]);
}

function mergeInventory(prior: Inventory, extracted: Inventory, negated: boolean): Inventory {
  const base: Inventory = negated ? { kind: 'unrestricted' } : prior;

  switch (extracted.kind) {
    case 'unrestricted':
      return base.kind === 'only' ? toInventory(base.items) : base;
    case 'nothing':
      return { kind: 'nothing' };
    case 'only':
      // Items stated after "I have nothing" replace the sentinel.
      return toInventory([...inventoryItems(base), ...extracted.items]);
  }
}

/**
 * Combines the constraint state carried by a session with the constraints
 * extracted from the current turn.
 *
 * Categories listed in `negations` are cleared before the new values are
 * applied. `retractions` removes individual available ingredients ("I don't
 * have eggs anymore"); nothing else ever shrinks the inventory.
 */
export function mergeConstraints(
  prior: ConstraintSet,
  extracted: ConstraintSet,
  negations: Iterable<ConstraintCategory> = [],
  retractions: Iterable<string> = []
): ConstraintSet {
  const negated = new Set(negations);

  let inventory = mergeInventory(prior.availableIngredients, extracted.availableIngredients, negated.has('availableIngredients'));
  let excluded = mergeValues(
    'excludedIngredients',
    prior.excludedIngredients,
    extracted.excludedIngredients,
    negated.has('excludedIngredients')
  );

  // Retracting the last item leaves the user with nothing, not with no constraint.
  const retracted = new Set(retractions);
  if (retracted.size > 0 && inventory.kind === 'only') {
    const remaining = inventory.items.filter(item => !retracted.has(item));
    inventory = remaining.length > 0 ? toInventory(remaining) : { kind: 'nothing' };
  }

  // Available and excluded stay disjoint: the newer statement wins, and
  // within a single turn the exclusion wins.
  const newlyExcluded = new Set(extracted.excludedIngredients);
  const reinstated = new Set(
    inventoryItems(extracted.availableIngredients).filter(item => !newlyExcluded.has(item))
  );
  excluded = excluded.filter(item => !reinstated.has(item));
  const excludedSet = new Set(excluded);
  if (inventory.kind === 'only') {
    const usable = inventory.items.filter(item => !excludedSet.has(item));
    inventory = usable.length > 0 ? toInventory(usable) : { kind: 'nothing' };
  }

  return {
    diet: mergeValues('diet', prior.diet, extracted.diet, negated.has('diet')),
    mealType: mergeValues('mealType', prior.mealType, extracted.mealType, negated.has('mealType')),
    cookingMethod: mergeValues('cookingMethod', prior.cookingMethod, extracted.cookingMethod, negated.has('cookingMethod')),
    availableIngredients: inventory,
    excludedIngredients: excluded
  };
}

export function applyExtraction(prior: ConstraintSet, extraction: ConstraintExtraction): ConstraintSet {
  return mergeConstraints(prior, extraction.extracted, extraction.negations, extraction.retractions);
}

export function isEmptyExtraction(extraction: ConstraintExtraction): boolean {
  const { extracted } = extraction;
  return (
    extracted.diet.length === 0 &&
    extracted.mealType.length === 0 &&
    extracted.cookingMethod.length === 0 &&
    extracted.excludedIngredients.length === 0 &&
    isEmptyInventory(extracted.availableIngredients) &&
    extraction.negations.length === 0 &&
    extraction.retractions.length === 0
  );
}

export function constraintSetsEqual(a: ConstraintSet, b: ConstraintSet): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

export function describeInventory(inventory: Inventory): string {
  switch (inventory.kind) {
    case 'unrestricted':
      return 'any';
    case 'nothing':
      return 'nothing on hand';
    case 'only':
      return inventory.items.join(', ');
  }
}

/** One line per active category, for display next to the conversation. */
export function summarizeConstraints(constraints: ConstraintSet): string[] {
  const lines: string[] = [];
  if (constraints.diet.length > 0) lines.push(`diet: ${constraints.diet.join(', ')}`);
  if (constraints.mealType.length > 0) lines.push(`meal type: ${constraints.mealType.join(', ')}`);
  if (constraints.cookingMethod.length > 0) lines.push(`cooking method: ${constraints.cookingMethod.join(', ')}`);
  if (constraints.availableIngredients.kind !== 'unrestricted') {
    lines.push(`available ingredients: ${describeInventory(constraints.availableIngredients)}`);
  }
  if (constraints.excludedIngredients.length > 0) {
    lines.push(`excluded ingredients: ${constraints.excludedIngredients.join(', ')}`);
  }
  return lines;
}
