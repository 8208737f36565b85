import { Backend } from '../lib/errors';
import { ConstraintSet, GenerationRequest, Message, RecipeSnapshot, RetrievedFact } from '../types';
import { summarizeConstraints } from '../lib/ConstraintMerger';

export const DISCLOSURES = {
  retrievalUnavailable:
    'The reference store could not be reached, so this answer is not grounded in the recipe and safety collection.',
  retrievalEmpty: 'Nothing in the recipe and safety collection matched, so this answer is not grounded in it.'
} as const;

const BACKEND_NAMES: Record<Backend, string> = {
  model: 'language model',
  retrieval: 'reference store',
  session_store: 'session store'
};

export interface ComposerOptions {
  maxTokens: number;
  temperature?: number;
  historyWindow?: number;
}

function formatHistory(history: Message[], window: number): string {
  const recent = history.slice(-window);
  if (recent.length === 0) return '';
  return `Recent conversation:\n${recent.map(message => `${message.role}: ${message.content}`).join('\n')}\n\n`;
}

function formatConstraints(constraints: ConstraintSet): string {
  const summary = summarizeConstraints(constraints);
  if (summary.length === 0) return '';
  return `What I know about the user:\n${summary.map(line => `- ${line}`).join('\n')}\n\n`;
}

/**
 * Everything the assistant says that is not a recipe: model prompts for chat,
 * safety and cooking questions, and the fixed texts used when a turn cannot
 * be answered normally.
 */
export class AnswerComposer {
  constructor(private options: ComposerOptions) {}

  chatRequest(utterance: string, constraints: ConstraintSet, history: Message[]): GenerationRequest {
    return {
      system: `You are a friendly cooking assistant. Keep replies short. If the user drifts away from food, answer briefly and offer to help with a meal. Do not invent a recipe unless asked.`,
      prompt: `${formatHistory(history, this.historyWindow())}${formatConstraints(constraints)}User: ${utterance}\nAssistant:`,
      maxTokens: this.options.maxTokens,
      temperature: this.options.temperature
    };
  }

  safetyRequest(utterance: string, facts: readonly RetrievedFact[]): GenerationRequest {
    const rules = facts.map(fact => `[${fact.sourceId}] ${fact.snippet}`).join('\n');
    return {
      system: `You answer food-safety questions using only the rules provided. If the rules do not settle the question, say so plainly and do not guess. Name the rule ids you relied on.`,
      prompt: `Rules:\n${rules}\n\nQuestion: ${utterance}\nAnswer:`,
      maxTokens: this.options.maxTokens,
      temperature: 0
    };
  }

  cookingQuestionRequest(
    utterance: string,
    constants: string[],
    lastRecipe: RecipeSnapshot | undefined,
    constraints: ConstraintSet,
    history: Message[]
  ): GenerationRequest {
    let prompt = formatHistory(history, this.historyWindow()) + formatConstraints(constraints);
    if (lastRecipe) {
      prompt += `The recipe the user is cooking:\n${lastRecipe.text}\n\n`;
    }
    if (constants.length > 0) {
      prompt += `Reference values:\n${constants.map(value => `- ${value}`).join('\n')}\n\n`;
    }
    prompt += `Question: ${utterance}\nAnswer:`;

    return {
      system: `You answer cooking questions: conversions, substitutions, the steps of the current recipe, and general food science and history. Prefer the reference values given. Any substitution must respect the user's diet and exclusions. Be concise.`,
      prompt,
      maxTokens: this.options.maxTokens,
      temperature: this.options.temperature
    };
  }

  acknowledgement(constraints: ConstraintSet): string {
    const summary = summarizeConstraints(constraints);
    if (summary.length === 0) {
      return 'Got it. No constraints are set right now, so anything goes. Ask me for a recipe whenever you like.';
    }
    return `Got it. Here is what I'm working with:\n${summary.map(line => `- ${line}`).join('\n')}\nAsk me for a recipe whenever you like.`;
  }

  clarification(): string {
    return "I'm not sure what you'd like. You can tell me your diet, what ingredients you have or want to avoid, ask a food-safety question, or ask me for a recipe.";
  }

  safetyHedge(): string {
    return "I don't have a safety rule that covers this, so I can't give you a reliable answer. When in doubt, throw it out, and check your local food-safety authority's guidance.";
  }

  refusal(violatedConstraint: string, reason: string): string {
    return `I couldn't come up with a recipe that respects ${violatedConstraint}: ${reason}. Try relaxing a constraint or telling me about more ingredients you have.`;
  }

  incompleteRefusal(feedback: string): string {
    return `I couldn't put together a complete recipe this time (${feedback.replace(/\.$/, '')}). Please ask again.`;
  }

  apology(backend: Backend): string {
    return `Sorry, the ${BACKEND_NAMES[backend]} is not responding right now, so I can't answer that. Your preferences are unchanged; please try again in a moment.`;
  }

  private historyWindow(): number {
    return this.options.historyWindow ?? 6;
  }
}
