import {
  ConstraintSet,
  ConstraintViolation,
  DietIncompatibilityTable,
  DraftIngredient,
  RecipeDraft,
  RetrievedFact,
  ValidationVerdict
} from '../types';
import { createLogger } from '../lib/logger';
import { LexiconTerm } from '../lib/schemas';
import { containsTerm, normalizeTerm } from '../lib/utils';

const logger = createLogger('RecipeValidator');

const PROHIBITION = /\b(?:never|do not|don't|dont|avoid|must not|should not|shouldn't)\s+([^.;,!?]+)/gi;

const STOPWORDS = new Set([
  'a', 'an', 'the', 'to', 'of', 'for', 'in', 'on', 'at', 'by', 'with', 'and', 'or', 'than', 'more', 'less',
  'it', 'them', 'they', 'any', 'your', 'you', 'be', 'is', 'are', 'that', 'thi', 'before', 'after', 'into',
  'from', 'until', 'other', 'over', 'under', 'eat', 'eating', 'serve', 'serving', 'give', 'giving', 'use',
  'using', 'consume', 'consuming', 'leave', 'leaving', 'let', 'keep', 'store', 'put', 'ever', 'out'
]);

export interface RecipeValidatorOptions {
  dietTable: DietIncompatibilityTable;
  pantryStaples?: string[];
  ingredientGroups?: Record<string, string[]>;
  ingredients?: LexiconTerm[];
}

interface IngredientAlias {
  name: string;
  alias: string;
}

function endsWithTerm(normalizedText: string, term: string): boolean {
  return normalizedText === term || normalizedText.endsWith(` ${term}`);
}

function displayName(ingredient: DraftIngredient): string {
  return ingredient.name.trim().toLowerCase();
}

/**
 * Checks a generated recipe against the active constraints and the safety
 * rules retrieved for the turn. Pure: the same inputs give the same verdict.
 */
export class RecipeValidator {
  private staples: string[];
  private groups: Record<string, string[]>;
  private aliases: IngredientAlias[];

  constructor(private options: RecipeValidatorOptions) {
    this.staples = (options.pantryStaples ?? []).map(normalizeTerm);
    this.groups = options.ingredientGroups ?? {};
    this.aliases = (options.ingredients ?? [])
      .flatMap(term =>
        [term.name, ...term.aliases].map(alias => ({ name: normalizeTerm(term.name), alias: normalizeTerm(alias) }))
      )
      // Longest first so "peanut butter" resolves before "butter".
      .sort((a, b) => b.alias.length - a.alias.length);
  }

  validate(draft: RecipeDraft, constraints: ConstraintSet, facts: readonly RetrievedFact[]): ValidationVerdict {
    const gaps = this.findGaps(draft);
    if (gaps.length > 0) {
      return { kind: 'needs_regeneration', feedback: `The recipe was incomplete: ${gaps.join(', ')}.` };
    }

    const violations = [
      ...this.checkIngredients(draft, constraints),
      ...this.checkDietAndMealType(draft, constraints),
      ...this.checkSafety(draft, facts)
    ];

    if (violations.length === 0) {
      return { kind: 'accepted' };
    }

    logger.debug('Draft rejected', { title: draft.title, violations });
    const [first] = violations;
    return {
      kind: 'rejected',
      reason: first.reason,
      violatedConstraint: first.violatedConstraint,
      violations
    };
  }

  private findGaps(draft: RecipeDraft): string[] {
    const gaps: string[] = [];
    if (!draft.title.trim()) gaps.push('missing title');
    if (draft.ingredients.filter(ingredient => ingredient.name.trim()).length === 0) gaps.push('no ingredients');
    if (draft.steps.filter(step => step.trim()).length === 0) gaps.push('no steps');
    return gaps;
  }

  private expandExclusion(term: string): string[] {
    return [term, ...(this.groups[term] ?? [])].map(normalizeTerm);
  }

  private checkIngredients(draft: RecipeDraft, constraints: ConstraintSet): ConstraintViolation[] {
    const violations: ConstraintViolation[] = [];
    const inventory = constraints.availableIngredients;
    const onHand =
      inventory.kind === 'only' ? inventory.items.map(normalizeTerm) : inventory.kind === 'nothing' ? [] : null;

    for (const ingredient of draft.ingredients) {
      const name = normalizeTerm(ingredient.name);
      const shown = displayName(ingredient);

      const excludedBy = constraints.excludedIngredients.find(term =>
        this.expandExclusion(term).some(expanded => containsTerm(name, expanded))
      );
      if (excludedBy) {
        violations.push({
          check: 'exclusion',
          violatedConstraint: shown,
          reason: `${shown} is excluded (${excludedBy})`
        });
      }

      if (onHand && !this.isOnHand(name, onHand)) {
        violations.push({
          check: 'inventory',
          violatedConstraint: shown,
          reason:
            inventory.kind === 'nothing'
              ? `${shown} is not available (nothing on hand)`
              : `${shown} is not among the available ingredients`
        });
      }
    }
    return violations;
  }

  /**
   * An ingredient is on hand when the known ingredient it names is in the
   * inventory, or when it is a pantry staple. Names the lexicon does not know
   * are judged by their head word, so "egg noodles" is not covered by "egg".
   */
  private isOnHand(name: string, onHand: string[]): boolean {
    if (this.staples.includes(name)) return true;
    const known = this.resolveIngredient(name);
    if (known) return onHand.includes(known);
    if (this.staples.some(staple => endsWithTerm(name, staple))) return true;
    return onHand.some(item => endsWithTerm(name, item));
  }

  private resolveIngredient(name: string): string | undefined {
    return this.aliases.find(entry => endsWithTerm(name, entry.alias))?.name;
  }

  private checkDietAndMealType(draft: RecipeDraft, constraints: ConstraintSet): ConstraintViolation[] {
    const violations: ConstraintViolation[] = [];

    for (const diet of constraints.diet) {
      const rule = this.options.dietTable[diet];
      if (!rule) {
        logger.debug(`No incompatibility entry for diet "${diet}"`);
        continue;
      }
      const allowedPhrases = rule.allowed.map(normalizeTerm);
      const incompatible = rule.incompatible.map(normalizeTerm);

      for (const ingredient of draft.ingredients) {
        let remaining = ` ${normalizeTerm(ingredient.name)} `;
        for (const phrase of allowedPhrases) {
          remaining = remaining.split(` ${phrase} `).join('  ');
        }
        const clash = incompatible.find(term => containsTerm(remaining.trim(), term));
        if (clash) {
          const shown = displayName(ingredient);
          violations.push({
            check: 'diet',
            violatedConstraint: shown,
            reason: `${shown} is not compatible with a ${diet} diet`
          });
        }
      }
    }

    if (constraints.mealType.length > 0 && !constraints.mealType.includes(normalizeTerm(draft.mealType))) {
      violations.push({
        check: 'meal_type',
        violatedConstraint: `meal type ${constraints.mealType.join('/')}`,
        reason: `the recipe is a ${draft.mealType || 'unspecified'} dish, not ${constraints.mealType.join(' or ')}`
      });
    }

    if (
      constraints.cookingMethod.length > 0 &&
      draft.cookingMethod &&
      !constraints.cookingMethod.includes(normalizeTerm(draft.cookingMethod))
    ) {
      violations.push({
        check: 'cooking_method',
        violatedConstraint: `cooking method ${constraints.cookingMethod.join('/')}`,
        reason: `the recipe uses ${draft.cookingMethod}, not ${constraints.cookingMethod.join(' or ')}`
      });
    }

    return violations;
  }

  private checkSafety(draft: RecipeDraft, facts: readonly RetrievedFact[]): ConstraintViolation[] {
    const violations: ConstraintViolation[] = [];
    const draftText = normalizeTerm(
      [draft.title, ...draft.ingredients.map(ingredient => ingredient.name), ...draft.steps].join(' ')
    );

    for (const fact of facts) {
      if (fact.category !== 'safety_rule') continue;
      for (const terms of prohibitedTerms(fact.snippet)) {
        if (terms.every(term => containsTerm(draftText, term))) {
          violations.push({
            check: 'safety',
            violatedConstraint: `safety rule ${fact.sourceId}`,
            reason: `the recipe contradicts a safety rule: ${fact.snippet}`
          });
          break;
        }
      }
    }
    return violations;
  }
}

/** Content words of each prohibition ("never ...", "do not ...") in a rule. */
export function prohibitedTerms(snippet: string): string[][] {
  const result: string[][] = [];
  for (const match of Array.from(snippet.matchAll(PROHIBITION))) {
    const terms = normalizeTerm(match[1])
      .split(' ')
      .filter(word => word && !STOPWORDS.has(word));
    if (terms.length > 0) result.push(terms);
  }
  return result;
}

export function describeVerdict(verdict: ValidationVerdict): string {
  switch (verdict.kind) {
    case 'accepted':
      return 'accepted';
    case 'rejected':
      return verdict.violations.map(violation => violation.reason).join('; ');
    case 'needs_regeneration':
      return verdict.feedback;
  }
}
