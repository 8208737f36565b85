import { AnswerComposer } from '../agents/AnswerComposer';
import { ConstraintExtractor } from '../agents/ConstraintExtractor';
import { IntentClassifier, ModelIntentClassifier, RuleBasedIntentClassifier } from '../agents/IntentClassifier';
import { RecipeGenerator } from '../agents/RecipeGenerator';
import { RecipeValidator } from '../agents/RecipeValidator';
import { GenerativeModel, SessionStore } from '../types';
import { ConfigManager } from './ConfigManager';
import { DialogueOrchestrator, OrchestratorOptions } from './DialogueOrchestrator';
import { KnowledgeBase } from './KnowledgeBase';
import { createLogger, setDebugEnabled } from './logger';
import { OpenAIChatModel } from './OpenAIClient';
import { RedisSessionStore } from './RedisSessionStore';
import { loadDietTable, loadLexicon } from './ReferenceData';
import { RetrievalGate } from './RetrievalGate';
import { InMemorySessionStore } from './SessionStore';

const logger = createLogger('Bootstrap');

export interface BootstrapOverrides {
  // Used in place of the OpenAI-backed model for every purpose.
  model?: GenerativeModel;
  store?: SessionStore;
  onPhaseChange?: OrchestratorOptions['onPhaseChange'];
}

export interface Application {
  orchestrator: DialogueOrchestrator;
  knowledgeBase: KnowledgeBase;
  close(): Promise<void>;
}

/**
 * Loads reference data and wires the orchestrator from configuration.
 * Throws when the configuration is invalid.
 */
export async function createApplication(
  config: ConfigManager = ConfigManager.getInstance(),
  overrides: BootstrapOverrides = {}
): Promise<Application> {
  const validation = config.validateConfig();
  const apiKeyOnly = validation.errors.length === 1 && validation.errors[0].startsWith('OPENAI_API_KEY');
  if (!validation.isValid && !(apiKeyOnly && overrides.model)) {
    throw new Error(`Configuration validation failed: ${validation.errors.join(', ')}`);
  }
  if (config.isDebug()) setDebugEnabled(true);

  const dialogue = config.getDialogueConfig();
  const storage = config.getStorageConfig();

  const [lexicon, dietTable] = await Promise.all([
    loadLexicon(storage.dataDir),
    loadDietTable(storage.dietTablePath)
  ]);

  const knowledgeBase = new KnowledgeBase(storage.dataDir);
  await knowledgeBase.initialize();

  const recipeConfig = config.getModelConfig('recipe_generation');
  const chatConfig = config.getModelConfig('chat');
  const recipeModel = overrides.model ?? new OpenAIChatModel(recipeConfig);
  const chatModel = overrides.model ?? new OpenAIChatModel(chatConfig);

  const extractor = new ConstraintExtractor(lexicon);
  const rules = new RuleBasedIntentClassifier(extractor);
  let classifier: IntentClassifier = rules;
  if (dialogue.intentClassifier === 'model') {
    const intentConfig = config.getModelConfig('intent_classification');
    classifier = new ModelIntentClassifier(overrides.model ?? new OpenAIChatModel(intentConfig), rules, {
      timeoutMs: dialogue.modelTimeoutMs
    });
  }

  const idleTimeoutMs = dialogue.sessionIdleTimeoutSeconds * 1000;
  let redisStore: RedisSessionStore | undefined;
  let store = overrides.store;
  if (!store) {
    if (storage.redisUrl) {
      redisStore = RedisSessionStore.fromUrl(storage.redisUrl, { idleTimeoutMs });
      store = redisStore;
    } else {
      store = new InMemorySessionStore({ idleTimeoutMs });
    }
  }

  const orchestrator = new DialogueOrchestrator(
    {
      classifier,
      extractor,
      retrieval: new RetrievalGate(knowledgeBase, { timeoutMs: dialogue.retrievalTimeoutMs }),
      generator: new RecipeGenerator({ maxTokens: recipeConfig.maxTokens ?? 1024, temperature: recipeConfig.temperature }),
      validator: new RecipeValidator({
        dietTable,
        pantryStaples: lexicon.pantryStaples,
        ingredientGroups: lexicon.ingredientGroups,
        ingredients: lexicon.ingredients
      }),
      composer: new AnswerComposer({ maxTokens: 400, temperature: chatConfig.temperature }),
      model: recipeModel,
      chatModel,
      constants: knowledgeBase,
      store
    },
    {
      retrievalK: dialogue.retrievalK,
      regenerationRetryBudget: dialogue.regenerationRetryBudget,
      modelTimeoutMs: dialogue.modelTimeoutMs,
      maxHistoryMessages: dialogue.maxHistoryMessages,
      onPhaseChange: overrides.onPhaseChange
    }
  );

  logger.debug('Application ready', {
    classifier: dialogue.intentClassifier,
    sessionStore: redisStore ? 'redis' : 'memory',
    knowledge: knowledgeBase.getCounts()
  });

  return {
    orchestrator,
    knowledgeBase,
    close: async () => {
      if (redisStore) await redisStore.close();
    }
  };
}
