import { describe, it, expect, beforeAll } from 'vitest';
import { ModelIntentClassifier, parseIntentLabel, RuleBasedIntentClassifier } from './IntentClassifier';
import { ConstraintExtractor } from './ConstraintExtractor';
import { emptyConstraintSet } from '../lib/ConstraintMerger';
import { ModelUnavailableError, TurnCancelledError } from '../lib/errors';
import { constraints, loadFixtures, ScriptedModel } from '../__tests__/helpers';

describe('RuleBasedIntentClassifier', () => {
  let classifier: RuleBasedIntentClassifier;

  beforeAll(async () => {
    const { lexicon } = await loadFixtures();
    classifier = new RuleBasedIntentClassifier(new ConstraintExtractor(lexicon));
  });

  const cases: [string, string][] = [
    ['hello there', 'chat'],
    ['Thanks a lot!', 'chat'],
    ['Is it safe to eat raw eggs?', 'safety_question'],
    ['How long can cooked rice sit out?', 'safety_question'],
    ['How many grams in a cup of flour?', 'cooking_question'],
    ['What can I substitute for eggs?', 'cooking_question'],
    ['What is the next step?', 'cooking_question'],
    ['Why does bread rise?', 'cooking_question'],
    ['Where does tofu come from?', 'cooking_question'],
    ["What's the difference between baking soda and baking powder?", 'cooking_question'],
    ['Suggest a vegan breakfast', 'recipe_request'],
    ["I'm hungry", 'recipe_request'],
    ["I'm vegan and I have eggs and oats", 'constraint_update'],
    ["I don't have milk anymore", 'constraint_update'],
    ['asdf qwerty', 'unknown'],
    ['   ', 'unknown']
  ];

  it.each(cases)('classifies %j as %s', (utterance, intent) => {
    expect(classifier.classifySync(utterance, emptyConstraintSet())).toBe(intent);
  });

  it('reads a bare affirmation as a recipe request only when constraints exist', () => {
    expect(classifier.classifySync('sure', emptyConstraintSet())).toBe('unknown');
    expect(classifier.classifySync('sure', constraints({ diet: ['vegan'] }))).toBe('recipe_request');
  });
});

describe('parseIntentLabel', () => {
  it('accepts exactly one label', () => {
    expect(parseIntentLabel('RECIPE_REQUEST')).toBe('recipe_request');
    expect(parseIntentLabel('I think it is CHAT.')).toBe('chat');
  });

  it('maps no label or several labels to unknown', () => {
    expect(parseIntentLabel('CHAT or SAFETY_QUESTION')).toBe('unknown');
    expect(parseIntentLabel('no idea')).toBe('unknown');
  });
});

describe('ModelIntentClassifier', () => {
  let rules: RuleBasedIntentClassifier;

  beforeAll(async () => {
    const { lexicon } = await loadFixtures();
    rules = new RuleBasedIntentClassifier(new ConstraintExtractor(lexicon));
  });

  it('asks the model for a single label', async () => {
    const model = new ScriptedModel(['COOKING_QUESTION']);
    const classifier = new ModelIntentClassifier(model, rules, { timeoutMs: 1000 });

    const intent = await classifier.classify('Can I use honey here?', constraints({ diet: ['vegan'] }));

    expect(intent).toBe('cooking_question');
    expect(model.requests).toHaveLength(1);
    expect(model.requests[0].temperature).toBe(0);
    expect(model.requests[0].maxTokens).toBe(10);
    expect(model.requests[0].prompt).toContain('- diet: vegan');
  });

  it('falls back to the rules when the model fails', async () => {
    const model = new ScriptedModel([new ModelUnavailableError('endpoint down')]);
    const classifier = new ModelIntentClassifier(model, rules, { timeoutMs: 1000 });

    expect(await classifier.classify('Suggest a vegan breakfast', emptyConstraintSet())).toBe('recipe_request');
  });

  it('does not call the model for an empty utterance', async () => {
    const model = new ScriptedModel();
    const classifier = new ModelIntentClassifier(model, rules, { timeoutMs: 1000 });

    expect(await classifier.classify('', emptyConstraintSet())).toBe('unknown');
    expect(model.requests).toHaveLength(0);
  });

  it('propagates cancellation instead of falling back', async () => {
    const controller = new AbortController();
    controller.abort();
    const classifier = new ModelIntentClassifier(new ScriptedModel(['CHAT']), rules, { timeoutMs: 1000 });

    await expect(classifier.classify('hello', emptyConstraintSet(), controller.signal)).rejects.toBeInstanceOf(
      TurnCancelledError
    );
  });
});
