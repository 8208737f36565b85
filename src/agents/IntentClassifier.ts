import { ConstraintSet, GenerativeModel, Intent } from '../types';
import { isEmptyExtraction, summarizeConstraints } from '../lib/ConstraintMerger';
import { DeadlineExceededError, ModelTimeoutError, TurnCancelledError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { withDeadline } from '../lib/utils';
import { ConstraintExtractor, normalizeUtterance } from './ConstraintExtractor';

const logger = createLogger('IntentClassifier');

export interface IntentClassifier {
  classify(utterance: string, constraints: ConstraintSet, signal?: AbortSignal): Promise<Intent>;
}

const SAFETY_PATTERNS = [
  /\b(?:safe|safely|unsafe|safety|dangerous|danger|poisoning|poisonous)\b/,
  /\b(?:raw|undercooked|expired|spoiled|spoilt|gone bad|go bad|mouldy|moldy|mold|mould)\b/,
  /\b(?:contaminat\w*|allergen|bacteria|salmonella|listeria|botulism)\b/,
  /\b(?:internal temperature|room temperature)\b/,
  /\bhow long (?:can|does|will|do) .+ (?:keep|last|stay good|sit out)\b/
];

const COOKING_QUESTION_PATTERNS = [
  /\b(?:convert|conversion|substitut\w*|instead of|replacement for|swap for)\b/,
  /\bhow (?:many|much) (?:grams|cups|ounces|oz|tablespoons|tbsp|teaspoons|tsp|ml|millilit\w*|calories|protein)\b/,
  /\b(?:fahrenheit|celsius)\b/,
  /\b(?:step \d+|next step|previous step|that step|this step)\b/,
  /\bhow long (?:do|should) (?:i|we)\b/,
  /\bwhat does .+ mean\b/,
  // General food knowledge: science, history, origins.
  /\b(?:why|how) (?:does|do|is|are|did) .+ (?:rise|brown|thicken|curdle|melt|ferment|caramel[iy]ze|caramelise|emulsify|split|set|work)\b/,
  /\b(?:history|origins?) of\b/,
  /\bwhere (?:does|do|did) .+ come from\b/,
  /\bwho invented\b/,
  /\bwhat(?: is|'s| are) the difference between\b/
];

const RECIPE_PATTERNS = [
  /\b(?:suggest|suggestion|recommend|recipe|recipes)\b/,
  /\bwhat (?:can|should|could) (?:i|we) (?:make|cook|eat|have)\b/,
  /\bwhat to (?:make|cook|eat)\b/,
  /\b(?:cook|make) me\b/,
  /\bhow (?:do|can) (?:i|you) (?:make|cook)\b/,
  /\b(?:ideas?|something) (?:for|to eat|to cook|to make)\b/,
  /\bhungry\b/,
  /\bwhat'?s for (?:breakfast|brunch|lunch|dinner)\b/
];

const CHAT_PATTERNS = [
  /^(?:hi|hello|hey|yo|howdy|good (?:morning|afternoon|evening))\b/,
  /\b(?:thanks|thank you|cheers|bye|goodbye|see you)\b/,
  /\b(?:how are you|who are you|what can you do|what are you)\b/
];

const AFFIRMATION = /^(?:yes|yeah|yep|sure|ok|okay|sounds good|please do|go ahead|let's do it)\b/;

/**
 * Deterministic keyword classifier. Safety wins over everything, then
 * cooking questions, then recipe requests; an utterance that only states
 * constraints is a constraint update.
 */
export class RuleBasedIntentClassifier implements IntentClassifier {
  constructor(private extractor: ConstraintExtractor) {}

  async classify(utterance: string, constraints: ConstraintSet): Promise<Intent> {
    return this.classifySync(utterance, constraints);
  }

  classifySync(utterance: string, constraints: ConstraintSet): Intent {
    const text = normalizeUtterance(utterance).trim();
    if (!text) return 'unknown';

    if (SAFETY_PATTERNS.some(pattern => pattern.test(text))) return 'safety_question';
    if (COOKING_QUESTION_PATTERNS.some(pattern => pattern.test(text))) return 'cooking_question';
    if (RECIPE_PATTERNS.some(pattern => pattern.test(text))) return 'recipe_request';
    if (!isEmptyExtraction(this.extractor.extract(utterance))) return 'constraint_update';
    if (CHAT_PATTERNS.some(pattern => pattern.test(text))) return 'chat';

    // "sure" after constraints are on the table reads as accepting a suggestion.
    if (AFFIRMATION.test(text) && summarizeConstraints(constraints).length > 0) {
      return 'recipe_request';
    }

    return 'unknown';
  }
}

const LABELS: Record<string, Intent> = {
  CHAT: 'chat',
  CONSTRAINT_UPDATE: 'constraint_update',
  RECIPE_REQUEST: 'recipe_request',
  SAFETY_QUESTION: 'safety_question',
  COOKING_QUESTION: 'cooking_question'
};

/** Exactly one known label in the output, otherwise the answer is ambiguous. */
export function parseIntentLabel(output: string): Intent {
  const tokens = new Set(output.toUpperCase().match(/[A-Z_]+/g) ?? []);
  const found = Object.keys(LABELS).filter(label => tokens.has(label));
  return found.length === 1 ? LABELS[found[0]] : 'unknown';
}

export interface ModelIntentClassifierOptions {
  maxTokens?: number;
  timeoutMs: number;
}

/**
 * Asks the generative model for a label. When the model cannot be reached
 * the rule classifier answers instead.
 */
export class ModelIntentClassifier implements IntentClassifier {
  constructor(
    private model: GenerativeModel,
    private fallback: IntentClassifier,
    private options: ModelIntentClassifierOptions
  ) {}

  async classify(utterance: string, constraints: ConstraintSet, signal?: AbortSignal): Promise<Intent> {
    if (!utterance.trim()) return 'unknown';

    try {
      const output = await withDeadline(
        abortSignal =>
          this.model.generate({
            system: this.getSystemPrompt(),
            prompt: this.buildUserPrompt(utterance, constraints),
            maxTokens: this.options.maxTokens ?? 10,
            temperature: 0,
            abortSignal
          }),
        this.options.timeoutMs,
        signal
      );
      const intent = parseIntentLabel(output);
      logger.debug('Model classified utterance', { utterance, output, intent });
      return intent;
    } catch (error) {
      if (error instanceof TurnCancelledError) throw error;
      const cause = error instanceof DeadlineExceededError ? new ModelTimeoutError(error.timeoutMs, error) : error;
      logger.warning('Intent model failed, using rule classifier:', cause);
      return this.fallback.classify(utterance, constraints, signal);
    }
  }

  private getSystemPrompt(): string {
    return `You route messages for a cooking assistant. Classify the user's message.
- RECIPE_REQUEST: wants to eat, asks for a recipe, a dish or a suggestion, or accepts a food offer.
- CONSTRAINT_UPDATE: only states diet, meal type, cooking method, ingredients they have or won't eat.
- SAFETY_QUESTION: food safety, hygiene, storage, allergens or dangerous items.
- COOKING_QUESTION: unit conversions, substitutions, a step of the current recipe, or general food knowledge (science, history, origins of dishes).
- CHAT: greetings, small talk or topics unrelated to food.
Output exactly one label.`;
  }

  private buildUserPrompt(utterance: string, constraints: ConstraintSet): string {
    const summary = summarizeConstraints(constraints);
    let prompt = '';
    if (summary.length > 0) {
      prompt += `Known constraints:\n${summary.map(line => `- ${line}`).join('\n')}\n\n`;
    }
    prompt += `User message: "${utterance}"\n\nLabel:`;
    return prompt;
  }
}
