import * as path from 'path';
import { z } from 'zod';
import { ConstantsLookup, RetrievalFilters, RetrievalResult, RetrievalStore } from '../types';
import { StoreUnavailableError } from './errors';
import { createLogger } from './logger';
import { readJsonFile } from './ReferenceData';
import { CulinaryConstantsSchema, RecipeEntry, RecipeEntrySchema, SafetyRule, SafetyRuleSchema } from './schemas';
import { normalizeTerm } from './utils';

const logger = createLogger('KnowledgeBase');

const QUERY_STOPWORDS = new Set([
  'a', 'an', 'the', 'i', 'me', 'my', 'we', 'you', 'it', 'is', 'are', 'am', 'be', 'to', 'of', 'for', 'in',
  'on', 'at', 'and', 'or', 'with', 'what', 'can', 'could', 'should', 'do', 'doe', 'how', 'some', 'something',
  'have', 'got', 'make', 'want', 'please', 'suggest', 'recipe', 'idea', 'any', 'that', 'thi', 'there'
]);

interface IndexedEntry {
  id: string;
  text: string;
  tags: string[];
  tokens: Set<string>;
}

export function tokenize(text: string): string[] {
  return normalizeTerm(text.replace(/-/g, ' '))
    .split(' ')
    .filter(token => token && !QUERY_STOPWORDS.has(token));
}

function formatRecipe(recipe: RecipeEntry): string {
  return [
    `${recipe.name} (${recipe.tags.join(', ')})`,
    `Ingredients: ${recipe.ingredients.join('; ')}`,
    `Steps: ${recipe.steps.join(' ')}`
  ].join('\n');
}

/**
 * In-process knowledge store over the JSON files in `<dataDir>/knowledge`.
 * Ranks entries by the share of query tokens they contain.
 */
export class KnowledgeBase implements RetrievalStore, ConstantsLookup {
  private recipes: IndexedEntry[] = [];
  private safetyRules: IndexedEntry[] = [];
  private constants: { key: string; keyTokens: string[]; value: string }[] = [];
  private isLoaded = false;
  private dataDir: string;

  constructor(dataDir: string = './data') {
    this.dataDir = dataDir;
  }

  async initialize(): Promise<void> {
    if (this.isLoaded) return;

    try {
      await this.loadData();
      this.isLoaded = true;
      logger.debug(
        `Loaded ${this.recipes.length} recipes, ${this.safetyRules.length} safety rules and ${this.constants.length} culinary constants`
      );
    } catch (error) {
      throw new StoreUnavailableError(
        `Failed to load knowledge base: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }

  private async loadData(): Promise<void> {
    const knowledgeDir = path.join(this.dataDir, 'knowledge');

    const [recipes, safetyRules, constants] = await Promise.all([
      readJsonFile(path.join(knowledgeDir, 'recipes.json'), z.array(RecipeEntrySchema)),
      readJsonFile(path.join(knowledgeDir, 'safety_rules.json'), z.array(SafetyRuleSchema)),
      readJsonFile(path.join(knowledgeDir, 'culinary_constants.json'), CulinaryConstantsSchema)
    ]);

    this.load(recipes, safetyRules, constants);
  }

  /** Replaces the indexed content; used by `initialize` and by tests. */
  load(recipes: RecipeEntry[], safetyRules: SafetyRule[], constants: Record<string, string>): void {
    this.recipes = recipes.map(recipe => ({
      id: recipe.id,
      text: formatRecipe(recipe),
      tags: recipe.tags.map(tag => tag.toLowerCase()),
      tokens: new Set(tokenize([recipe.name, ...recipe.tags, ...recipe.ingredients].join(' ')))
    }));
    this.safetyRules = safetyRules.map(rule => ({
      id: rule.id,
      text: rule.rule,
      tags: [],
      tokens: new Set(tokenize(`${rule.topic} ${rule.rule}`))
    }));
    this.constants = Object.entries(constants).map(([key, value]) => ({
      key,
      keyTokens: normalizeTerm(key).split(' '),
      value
    }));
    this.isLoaded = true;
  }

  async query(text: string, filters: RetrievalFilters, k: number): Promise<RetrievalResult[]> {
    await this.ensureLoaded();

    const queryTokens = Array.from(new Set(tokenize(text)));
    if (queryTokens.length === 0 || k <= 0) return [];

    const entries = filters.category === 'recipe_reference' ? this.recipes : this.safetyRules;
    const required = (filters.requiredTags ?? []).map(tag => tag.toLowerCase());
    const anyOf = (filters.anyTags ?? []).map(tag => tag.toLowerCase());

    return entries
      .filter(entry => required.every(tag => entry.tags.includes(tag)))
      .filter(entry => anyOf.length === 0 || anyOf.some(tag => entry.tags.includes(tag)))
      .map(entry => ({
        id: entry.id,
        text: entry.text,
        score: queryTokens.filter(token => entry.tokens.has(token)).length / queryTokens.length,
        category: filters.category
      }))
      .filter(result => result.score > 0)
      .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
      .slice(0, k);
  }

  /**
   * Culinary constants whose key words all occur in the query, most
   * specific key first.
   */
  lookup(query: string, limit = 3): string[] {
    if (!this.isLoaded) {
      logger.warning('Culinary constants requested before the knowledge base was loaded');
      return [];
    }
    const queryTokens = new Set(normalizeTerm(query).split(' '));
    return this.constants
      .filter(entry => entry.keyTokens.every(token => queryTokens.has(token)))
      .sort((a, b) => b.keyTokens.length - a.keyTokens.length || a.key.localeCompare(b.key))
      .slice(0, limit)
      .map(entry => entry.value);
  }

  getCounts(): { recipes: number; safetyRules: number; constants: number } {
    return {
      recipes: this.recipes.length,
      safetyRules: this.safetyRules.length,
      constants: this.constants.length
    };
  }

  private async ensureLoaded(): Promise<void> {
    if (!this.isLoaded) {
      await this.initialize();
    }
  }

  isReady(): boolean {
    return this.isLoaded;
  }
}
