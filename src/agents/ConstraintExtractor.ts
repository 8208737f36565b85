import { ConstraintCategory, ConstraintExtraction, Inventory } from '../types';
import { Lexicon, LexiconTerm } from '../lib/schemas';
import { escapeRegExp, uniqueSorted } from '../lib/utils';

type CueKind = 'retract' | 'exclude' | 'available';

interface TermPattern {
  name: string;
  length: number;
  regex: RegExp;
}

interface Match {
  name: string;
  start: number;
  end: number;
}

interface Cue {
  kind: CueKind;
  start: number;
}

// Order matters: earlier cues claim their words before later ones look.
const CUE_PATTERNS: { kind: CueKind; regex: RegExp }[] = [
  { kind: 'retract', regex: /\b(?:don't|do not|dont|no longer) have(?: any)?(?: more)?\b/g },
  { kind: 'retract', regex: /\b(?:have|got) no\b/g },
  { kind: 'retract', regex: /\b(?:ran|run|running) out of\b/g },
  { kind: 'retract', regex: /\bout of\b/g },
  { kind: 'retract', regex: /\bno more\b/g },
  { kind: 'retract', regex: /\bused up\b/g },
  { kind: 'exclude', regex: /\ballerg(?:ic|y) to\b/g },
  { kind: 'exclude', regex: /\b(?:don't|do not|dont) (?:like|want|eat)\b/g },
  { kind: 'exclude', regex: /\b(?:can't|cannot|cant|can not) (?:eat|have|stand)\b/g },
  { kind: 'exclude', regex: /\b(?:without|exclude|excluding|avoid|avoiding|hate|skip|no)\b/g },
  { kind: 'exclude', regex: /\bfree of\b/g },
  { kind: 'available', regex: /\b(?:i've|we've) got\b/g },
  { kind: 'available', regex: /\b(?:have|got|with|using|use|i've|we've)\b/g },
  { kind: 'available', regex: /\bthere(?:'s| is| are)\b/g }
];

const DIET_NEGATION = /(?:no longer|not|stopped being|quit being|isn't|aren't)\s+(?:(?:a|an|be|being|really|fully|strictly)\s+)*$/;

const CLAUSE_BOUNDARY = /[.;!?]|\bbut\b/g;

function compileTerms(terms: LexiconTerm[]): TermPattern[] {
  const patterns: TermPattern[] = [];
  for (const term of terms) {
    for (const alias of [term.name, ...term.aliases]) {
      patterns.push({
        name: term.name,
        length: alias.length,
        regex: new RegExp(`\\b${escapeRegExp(alias.toLowerCase())}(?:s|es)?\\b`, 'g')
      });
    }
  }
  // Longest aliases first so "peanut butter" wins over "butter".
  return patterns.sort((a, b) => b.length - a.length);
}

function mask(text: string, start: number, end: number): string {
  return text.slice(0, start) + ' '.repeat(end - start) + text.slice(end);
}

export function normalizeUtterance(utterance: string): string {
  return utterance.toLowerCase().replace(/[’‘`]/g, "'");
}

/**
 * Rule layer that turns a user utterance into structured constraints.
 *
 * Every recognised term is masked out of the working text once claimed, so
 * a phrase contributes to exactly one category.
 */
export class ConstraintExtractor {
  private diets: TermPattern[];
  private mealTypes: TermPattern[];
  private cookingMethods: TermPattern[];
  private ingredients: TermPattern[];
  private resets: { category: ConstraintCategory; regex: RegExp }[];
  private nothingPhrases: RegExp[];

  constructor(lexicon: Lexicon) {
    this.diets = compileTerms(lexicon.diets);
    this.mealTypes = compileTerms(lexicon.mealTypes);
    this.cookingMethods = compileTerms(lexicon.cookingMethods);
    this.ingredients = compileTerms(lexicon.ingredients);
    this.resets = lexicon.categoryResets.map(reset => ({
      category: reset.category,
      regex: new RegExp(reset.pattern, 'g')
    }));
    this.nothingPhrases = lexicon.nothingAvailable.map(
      phrase => new RegExp(`\\b${escapeRegExp(phrase.toLowerCase())}\\b`, 'g')
    );
  }

  extract(utterance: string): ConstraintExtraction {
    let text = normalizeUtterance(utterance);
    const negations = new Set<ConstraintCategory>();

    for (const reset of this.resets) {
      const claimed = this.claim(text, reset.regex);
      text = claimed.text;
      if (claimed.count > 0) negations.add(reset.category);
    }

    let nothingAvailable = false;
    for (const phrase of this.nothingPhrases) {
      const claimed = this.claim(text, phrase);
      text = claimed.text;
      nothingAvailable = nothingAvailable || claimed.count > 0;
    }

    const diet: string[] = [];
    const dietMatches = this.matchTerms(text, this.diets);
    text = dietMatches.text;
    for (const match of dietMatches.matches) {
      const preceding = text.slice(Math.max(0, match.start - 30), match.start);
      if (DIET_NEGATION.test(preceding)) {
        negations.add('diet');
      } else {
        diet.push(match.name);
      }
    }

    const mealTypes = this.matchTerms(text, this.mealTypes);
    text = mealTypes.text;
    const methods = this.matchTerms(text, this.cookingMethods);
    text = methods.text;
    const ingredients = this.matchTerms(text, this.ingredients);
    text = ingredients.text;

    const cues = this.findCues(text);
    const boundaries = this.findClauseBoundaries(text);

    const available: string[] = [];
    const excluded: string[] = [];
    const retractions: string[] = [];

    for (const match of ingredients.matches) {
      const clauseStart = boundaries.filter(position => position < match.start).pop() ?? -1;
      const cue = cues
        .filter(candidate => candidate.start > clauseStart && candidate.start < match.start)
        .pop();
      if (!cue) continue;

      switch (cue.kind) {
        case 'available':
          available.push(match.name);
          break;
        case 'exclude':
          excluded.push(match.name);
          break;
        case 'retract':
          retractions.push(match.name);
          break;
      }
    }

    let inventory: Inventory = { kind: 'unrestricted' };
    if (available.length > 0) {
      inventory = { kind: 'only', items: uniqueSorted(available) };
    } else if (nothingAvailable) {
      inventory = { kind: 'nothing' };
    }

    return {
      extracted: {
        diet: uniqueSorted(diet),
        mealType: uniqueSorted(mealTypes.matches.map(match => match.name)),
        cookingMethod: uniqueSorted(methods.matches.map(match => match.name)),
        availableIngredients: inventory,
        excludedIngredients: uniqueSorted(excluded)
      },
      negations: Array.from(negations).sort(),
      retractions: uniqueSorted(retractions)
    };
  }

  private claim(text: string, regex: RegExp): { text: string; count: number } {
    let working = text;
    let count = 0;
    for (const match of Array.from(text.matchAll(regex))) {
      const start = match.index ?? 0;
      working = mask(working, start, start + match[0].length);
      count++;
    }
    return { text: working, count };
  }

  private matchTerms(text: string, patterns: TermPattern[]): { text: string; matches: Match[] } {
    let working = text;
    const matches: Match[] = [];
    for (const pattern of patterns) {
      for (const match of Array.from(working.matchAll(pattern.regex))) {
        const start = match.index ?? 0;
        const end = start + match[0].length;
        matches.push({ name: pattern.name, start, end });
        working = mask(working, start, end);
      }
    }
    matches.sort((a, b) => a.start - b.start);
    return { text: working, matches };
  }

  private findCues(text: string): Cue[] {
    let working = text;
    const cues: Cue[] = [];
    for (const pattern of CUE_PATTERNS) {
      for (const match of Array.from(working.matchAll(pattern.regex))) {
        const start = match.index ?? 0;
        cues.push({ kind: pattern.kind, start });
        working = mask(working, start, start + match[0].length);
      }
    }
    return cues.sort((a, b) => a.start - b.start);
  }

  private findClauseBoundaries(text: string): number[] {
    return Array.from(text.matchAll(CLAUSE_BOUNDARY)).map(match => match.index ?? 0);
  }
}
