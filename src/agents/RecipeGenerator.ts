import { ConstraintSet, GenerationRequest, Message, RecipeDraft, RetrievedFact } from '../types';
import { summarizeConstraints } from '../lib/ConstraintMerger';
import { extractJsonFromText } from '../lib/json';
import { createLogger } from '../lib/logger';
import { RecipeDraftSchema } from '../lib/schemas';

const logger = createLogger('RecipeGenerator');

export interface GenerationContext {
  utterance: string;
  constraints: ConstraintSet;
  facts: readonly RetrievedFact[];
  feedback: string[];
  history: Message[];
}

export interface RecipeGeneratorOptions {
  maxTokens: number;
  temperature?: number;
  historyWindow?: number;
}

export type DraftParseResult = { ok: true; draft: RecipeDraft } | { ok: false; error: string };

/**
 * Model output → RecipeDraft. Accepts fenced or bare JSON and repairs small
 * syntax slips before checking the shape.
 */
export function parseRecipeDraft(output: string): DraftParseResult {
  let raw: unknown;
  try {
    raw = extractJsonFromText(output);
  } catch (error) {
    return { ok: false, error: `the answer was not valid JSON (${error instanceof Error ? error.message : String(error)})` };
  }

  const parsed = RecipeDraftSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'root'}: ${issue.message}`);
    return { ok: false, error: `the JSON did not match the recipe format (${issues.join('; ')})` };
  }

  const { title, mealType, cookingMethod, ingredients, steps } = parsed.data;
  return {
    ok: true,
    draft: {
      title: title.trim(),
      mealType: mealType.trim().toLowerCase(),
      cookingMethod: cookingMethod?.trim().toLowerCase() || undefined,
      ingredients: ingredients.map(ingredient => ({
        name: ingredient.name.trim(),
        quantity: ingredient.quantity?.trim() || undefined
      })),
      steps: steps.map(step => step.trim()).filter(Boolean)
    }
  };
}

/** Plain-text rendering of an accepted draft. */
export function renderRecipe(draft: RecipeDraft): string {
  const details = [`Meal: ${draft.mealType}`];
  if (draft.cookingMethod) details.push(`Method: ${draft.cookingMethod}`);

  const ingredients = draft.ingredients.map(ingredient =>
    ingredient.quantity ? `- ${ingredient.quantity} ${ingredient.name}` : `- ${ingredient.name}`
  );
  const steps = draft.steps.map((step, index) => `${index + 1}. ${step}`);

  return [draft.title, details.join(' | '), '', 'Ingredients:', ...ingredients, '', 'Steps:', ...steps].join('\n');
}

export class RecipeGenerator {
  constructor(private options: RecipeGeneratorOptions) {}

  buildRequest(context: GenerationContext): GenerationRequest {
    return {
      system: this.getSystemPrompt(),
      prompt: this.buildRecipePrompt(context),
      maxTokens: this.options.maxTokens,
      temperature: this.options.temperature
    };
  }

  parse(output: string): DraftParseResult {
    const result = parseRecipeDraft(output);
    if (!result.ok) {
      logger.warning('Could not parse recipe draft:', result.error);
    }
    return result;
  }

  private getSystemPrompt(): string {
    return `You are a careful home-cooking assistant. You write one recipe at a time that respects every constraint the user has given.

Rules:
1. Use only ingredients the user has when an ingredient list is given. Water, salt, black pepper and ice are always available.
2. Never use an excluded ingredient, or anything incompatible with the stated diet.
3. Match the requested meal type and cooking method.
4. Never contradict a food-safety rule you are given.
5. Ingredient names must be plain ingredients ("oat milk", "banana"); put amounts in "quantity".

Answer with JSON only, in this shape:
{"title": string, "mealType": string, "cookingMethod": string, "ingredients": [{"name": string, "quantity": string}], "steps": [string]}`;
  }

  private buildRecipePrompt(context: GenerationContext): string {
    const summary = summarizeConstraints(context.constraints);
    const references = context.facts.filter(fact => fact.category === 'recipe_reference');
    const safetyRules = context.facts.filter(fact => fact.category === 'safety_rule');
    const window = this.options.historyWindow ?? 6;
    const recent = context.history.slice(-window);

    let prompt = '';

    if (recent.length > 0) {
      prompt += `Recent conversation:\n${recent.map(message => `${message.role}: ${message.content}`).join('\n')}\n\n`;
    }

    prompt += `Request: "${context.utterance}"\n\n`;

    prompt += summary.length > 0
      ? `Constraints:\n${summary.map(line => `- ${line}`).join('\n')}\n\n`
      : 'Constraints: none stated.\n\n';

    if (references.length > 0) {
      prompt += `Reference recipes (adapt, do not copy blindly):\n${references
        .map(fact => `[${fact.sourceId}]\n${fact.snippet}`)
        .join('\n\n')}\n\n`;
    }

    if (safetyRules.length > 0) {
      prompt += `Food-safety rules:\n${safetyRules.map(fact => `- ${fact.snippet}`).join('\n')}\n\n`;
    }

    if (context.feedback.length > 0) {
      prompt += `Your previous attempts were rejected:\n${context.feedback
        .map((line, index) => `${index + 1}. ${line}`)
        .join('\n')}\nFix these problems in the new recipe.\n\n`;
    }

    prompt += 'Recipe JSON:';
    return prompt;
  }
}
