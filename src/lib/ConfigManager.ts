import * as dotenv from 'dotenv';
import * as path from 'path';

// Load environment variables
dotenv.config();

export interface ModelConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  temperature: number;
  maxTokens?: number;
}

export type ModelPurpose = 'intent_classification' | 'recipe_generation' | 'chat' | 'default';

export type IntentClassifierMode = 'rules' | 'model';

export interface DialogueConfig {
  retrievalK: number;
  regenerationRetryBudget: number;
  sessionIdleTimeoutSeconds: number;
  modelTimeoutMs: number;
  retrievalTimeoutMs: number;
  maxHistoryMessages: number;
  intentClassifier: IntentClassifierMode;
}

export interface StorageConfig {
  dataDir: string;
  dietTablePath: string;
  redisUrl?: string;
}

type Env = Record<string, string | undefined>;

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return parseInt(value, 10);
}

function readFloat(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return parseFloat(value);
}

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: {
    apiKey: string;
    baseURL?: string;
    defaultModel: string;
    defaultTemperature: number;
    defaultMaxTokens: number;
    dialogue: DialogueConfig;
    storage: StorageConfig;
    debug: boolean;
  };

  private constructor(private env: Env) {
    const dataDir = env.DATA_DIR || './data';

    this.config = {
      apiKey: env.OPENAI_API_KEY ?? '',
      baseURL: env.OPENAI_BASE_URL || undefined,
      defaultModel: env.OPENAI_MODEL || 'gpt-4o-mini',
      defaultTemperature: readFloat(env.OPENAI_TEMPERATURE, 0.3),
      defaultMaxTokens: readInt(env.OPENAI_MAX_TOKENS, 1024),
      dialogue: {
        retrievalK: readInt(env.RETRIEVAL_K, 3),
        regenerationRetryBudget: readInt(env.REGENERATION_RETRY_BUDGET, 2),
        sessionIdleTimeoutSeconds: readInt(env.SESSION_IDLE_TIMEOUT_SECONDS, 1800),
        modelTimeoutMs: readInt(env.MODEL_TIMEOUT_MS, 30000),
        retrievalTimeoutMs: readInt(env.RETRIEVAL_TIMEOUT_MS, 5000),
        maxHistoryMessages: readInt(env.MAX_HISTORY_MESSAGES, 20),
        intentClassifier: env.INTENT_CLASSIFIER === 'model' ? 'model' : 'rules'
      },
      storage: {
        dataDir,
        dietTablePath: env.DIET_TABLE_PATH || path.join(dataDir, 'diet_incompatibility.json'),
        redisUrl: env.REDIS_URL || undefined
      },
      debug: env.DEBUG === 'true' || env.DEBUG === '1'
    };
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager(process.env);
    }
    return ConfigManager.instance;
  }

  /** A configuration read from an explicit environment, outside the singleton. */
  public static fromEnv(env: Env): ConfigManager {
    return new ConfigManager(env);
  }

  public getModelConfig(purpose: ModelPurpose): ModelConfig {
    const modelEnvMap: Record<ModelPurpose, { model?: string; temperature?: string }> = {
      intent_classification: {
        model: this.env.INTENT_CLASSIFICATION_MODEL,
        temperature: this.env.INTENT_CLASSIFICATION_TEMPERATURE
      },
      recipe_generation: {
        model: this.env.RECIPE_GENERATION_MODEL,
        temperature: this.env.RECIPE_GENERATION_TEMPERATURE
      },
      chat: {
        model: this.env.CHAT_MODEL,
        temperature: this.env.CHAT_TEMPERATURE
      },
      default: {}
    };

    const purposeConfig = modelEnvMap[purpose];

    return {
      apiKey: this.config.apiKey,
      baseURL: this.config.baseURL,
      model: purposeConfig.model || this.config.defaultModel,
      temperature: purposeConfig.temperature ? parseFloat(purposeConfig.temperature) : this.config.defaultTemperature,
      maxTokens: this.config.defaultMaxTokens
    };
  }

  public getDialogueConfig(): DialogueConfig {
    return { ...this.config.dialogue };
  }

  public getStorageConfig(): StorageConfig {
    return { ...this.config.storage };
  }

  public isDebug(): boolean {
    return this.config.debug;
  }

  public validateConfig(): { isValid: boolean; errors: string[] } {
    const errors: string[] = [];
    const dialogue = this.config.dialogue;

    if (!this.config.apiKey) {
      errors.push('OPENAI_API_KEY is required');
    }

    if (!(this.config.defaultTemperature >= 0 && this.config.defaultTemperature <= 2)) {
      errors.push('Temperature must be between 0 and 2');
    }

    if (!(this.config.defaultMaxTokens >= 1 && this.config.defaultMaxTokens <= 8192)) {
      errors.push('Max tokens must be between 1 and 8192');
    }

    if (!(dialogue.retrievalK >= 1)) {
      errors.push('RETRIEVAL_K must be at least 1');
    }

    if (!(dialogue.regenerationRetryBudget >= 0)) {
      errors.push('REGENERATION_RETRY_BUDGET must be non-negative');
    }

    if (!(dialogue.sessionIdleTimeoutSeconds >= 1)) {
      errors.push('SESSION_IDLE_TIMEOUT_SECONDS must be at least 1');
    }

    if (!(dialogue.modelTimeoutMs >= 1) || !(dialogue.retrievalTimeoutMs >= 1)) {
      errors.push('Model and retrieval timeouts must be positive');
    }

    if (!(dialogue.maxHistoryMessages >= 2)) {
      errors.push('MAX_HISTORY_MESSAGES must be at least 2');
    }

    if (this.env.INTENT_CLASSIFIER && !['rules', 'model'].includes(this.env.INTENT_CLASSIFIER)) {
      errors.push('INTENT_CLASSIFIER must be "rules" or "model"');
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }
}
