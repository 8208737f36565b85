/**
 * Shared doubles and fixtures for the suites.
 */

import * as path from 'path';
import { AnswerComposer } from '../agents/AnswerComposer';
import { ConstraintExtractor } from '../agents/ConstraintExtractor';
import { IntentClassifier, RuleBasedIntentClassifier } from '../agents/IntentClassifier';
import { RecipeGenerator } from '../agents/RecipeGenerator';
import { RecipeValidator } from '../agents/RecipeValidator';
import { emptyConstraintSet } from '../lib/ConstraintMerger';
import { DialogueOrchestrator, OrchestratorOptions } from '../lib/DialogueOrchestrator';
import { KnowledgeBase } from '../lib/KnowledgeBase';
import { loadDietTable, loadLexicon } from '../lib/ReferenceData';
import { RetrievalGate } from '../lib/RetrievalGate';
import { Lexicon } from '../lib/schemas';
import { InMemorySessionStore } from '../lib/SessionStore';
import {
  ConstraintSet,
  ConversationState,
  DietIncompatibilityTable,
  GenerationRequest,
  GenerativeModel,
  RecipeDraft,
  RetrievalStore,
  SessionStore
} from '../types';

export const DATA_DIR = path.resolve(__dirname, '../../data');

export function constraints(partial: Partial<ConstraintSet> = {}): ConstraintSet {
  return { ...emptyConstraintSet(), ...partial };
}

export function sampleState(sessionId: string): ConversationState {
  return {
    sessionId,
    constraints: constraints({ diet: ['vegan'] }),
    history: [{ role: 'user', content: "I'm vegan", timestamp: '2026-03-01T08:00:00.000Z' }],
    turnCount: 1,
    createdAt: '2026-03-01T08:00:00.000Z',
    updatedAt: '2026-03-01T08:00:00.000Z'
  };
}

type ScriptStep = string | Error | ((request: GenerationRequest) => Promise<string> | string);

/** Answers generation requests from a fixed script, recording each request. */
export class ScriptedModel implements GenerativeModel {
  readonly requests: GenerationRequest[] = [];
  private steps: ScriptStep[];

  constructor(steps: ScriptStep[] = []) {
    this.steps = [...steps];
  }

  push(...steps: ScriptStep[]): void {
    this.steps.push(...steps);
  }

  get remaining(): number {
    return this.steps.length;
  }

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    const step = this.steps.shift();
    if (step === undefined) {
      throw new Error('ScriptedModel has no response left');
    }
    if (step instanceof Error) throw step;
    if (typeof step === 'function') return step(request);
    return step;
  }
}

/** A model step that never answers until its request is aborted. */
export function hang(request: GenerationRequest): Promise<string> {
  return new Promise<string>((_, reject) => {
    request.abortSignal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

export function draftJson(draft: Partial<RecipeDraft> & { ingredients: RecipeDraft['ingredients'] }): string {
  return JSON.stringify({
    title: 'Test Dish',
    mealType: 'breakfast',
    steps: ['Mix everything.', 'Serve.'],
    ...draft
  });
}

export interface Fixtures {
  lexicon: Lexicon;
  dietTable: DietIncompatibilityTable;
  knowledgeBase: KnowledgeBase;
}

let cached: Promise<Fixtures> | undefined;

/** Reference data from the repository's data directory, loaded once per file. */
export function loadFixtures(): Promise<Fixtures> {
  if (!cached) {
    cached = (async () => {
      const [lexicon, dietTable] = await Promise.all([
        loadLexicon(DATA_DIR),
        loadDietTable(path.join(DATA_DIR, 'diet_incompatibility.json'))
      ]);
      const knowledgeBase = new KnowledgeBase(DATA_DIR);
      await knowledgeBase.initialize();
      return { lexicon, dietTable, knowledgeBase };
    })();
  }
  return cached;
}

export interface TestOrchestratorOptions extends Partial<OrchestratorOptions> {
  model: GenerativeModel;
  store?: SessionStore;
  retrievalStore?: RetrievalStore;
  classifier?: IntentClassifier;
  retrievalTimeoutMs?: number;
}

export interface TestOrchestrator {
  orchestrator: DialogueOrchestrator;
  store: SessionStore;
}

export const FIXED_NOW = new Date('2026-03-01T08:00:00.000Z');

export async function createTestOrchestrator(options: TestOrchestratorOptions): Promise<TestOrchestrator> {
  const { lexicon, dietTable, knowledgeBase } = await loadFixtures();
  const extractor = new ConstraintExtractor(lexicon);
  const store = options.store ?? new InMemorySessionStore({ idleTimeoutMs: 60_000 });

  const orchestrator = new DialogueOrchestrator(
    {
      classifier: options.classifier ?? new RuleBasedIntentClassifier(extractor),
      extractor,
      retrieval: new RetrievalGate(options.retrievalStore ?? knowledgeBase, {
        timeoutMs: options.retrievalTimeoutMs ?? 1000
      }),
      generator: new RecipeGenerator({ maxTokens: 800 }),
      validator: new RecipeValidator({
        dietTable,
        pantryStaples: lexicon.pantryStaples,
        ingredientGroups: lexicon.ingredientGroups,
        ingredients: lexicon.ingredients
      }),
      composer: new AnswerComposer({ maxTokens: 300 }),
      model: options.model,
      constants: knowledgeBase,
      store
    },
    {
      retrievalK: options.retrievalK ?? 3,
      regenerationRetryBudget: options.regenerationRetryBudget ?? 2,
      modelTimeoutMs: options.modelTimeoutMs ?? 1000,
      maxHistoryMessages: options.maxHistoryMessages ?? 20,
      now: options.now ?? (() => FIXED_NOW),
      onPhaseChange: options.onPhaseChange
    }
  );

  return { orchestrator, store };
}
