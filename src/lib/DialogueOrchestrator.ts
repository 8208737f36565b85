import {
  ConstantsLookup,
  ConstraintCategory,
  ConstraintExtraction,
  ConstraintSet,
  ConversationState,
  FactCategory,
  GenerationRequest,
  GenerativeModel,
  Intent,
  Message,
  RecipeSnapshot,
  ResponseVerdict,
  RetrievedFact,
  SessionStore,
  TurnPhase,
  TurnRequest,
  TurnResponse,
  ValidationVerdict
} from '../types';
import { AnswerComposer, DISCLOSURES } from '../agents/AnswerComposer';
import { ConstraintExtractor } from '../agents/ConstraintExtractor';
import { IntentClassifier } from '../agents/IntentClassifier';
import { RecipeGenerator, renderRecipe } from '../agents/RecipeGenerator';
import { describeVerdict, RecipeValidator } from '../agents/RecipeValidator';
import { applyExtraction, emptyConstraintSet, summarizeConstraints } from './ConstraintMerger';
import {
  BackendError,
  DeadlineExceededError,
  isModelFailure,
  ModelTimeoutError,
  ModelUnavailableError,
  RetrievalUnavailableError,
  SessionConflictError,
  SessionStoreUnavailableError,
  TurnCancelledError
} from './errors';
import { createLogger } from './logger';
import { RetrievalGate, RetrievalQuery } from './RetrievalGate';
import { TurnRequestSchema } from './schemas';
import { KeyedMutex } from './SessionLock';
import { throwIfCancelled, withDeadline } from './utils';

const logger = createLogger('DialogueOrchestrator');

const VALID_TRANSITIONS: Record<TurnPhase, TurnPhase[]> = {
  idle: ['classifying', 'failed'],
  classifying: ['merging', 'retrieving', 'generating', 'responding', 'failed'],
  merging: ['retrieving', 'generating', 'responding', 'failed'],
  retrieving: ['generating', 'responding', 'failed'],
  generating: ['validating', 'responding', 'failed'],
  validating: ['generating', 'responding', 'failed'],
  responding: ['idle', 'failed'],
  failed: ['idle']
};

export function canTransition(from: TurnPhase, to: TurnPhase): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export interface PhaseChange {
  sessionId: string;
  from: TurnPhase;
  to: TurnPhase;
}

export interface OrchestratorDependencies {
  classifier: IntentClassifier;
  extractor: ConstraintExtractor;
  retrieval: RetrievalGate;
  generator: RecipeGenerator;
  validator: RecipeValidator;
  composer: AnswerComposer;
  model: GenerativeModel;
  // Answers chat, safety and cooking questions; defaults to `model`.
  chatModel?: GenerativeModel;
  constants: ConstantsLookup;
  store: SessionStore;
  lock?: KeyedMutex;
}

export interface OrchestratorOptions {
  retrievalK: number;
  regenerationRetryBudget: number;
  modelTimeoutMs: number;
  maxHistoryMessages: number;
  now?: () => Date;
  onPhaseChange?: (change: PhaseChange) => void;
}

/** What a handler produced; committed only once the turn reaches `responding`. */
interface TurnOutcome {
  text: string;
  verdict: ResponseVerdict;
  disclosures: string[];
  lastRecipe?: RecipeSnapshot;
}

interface LoadedSession {
  state: ConversationState;
  version: number;
}

interface FactsResult {
  facts: RetrievedFact[];
  disclosures: string[];
}

class TurnTracker {
  phase: TurnPhase = 'idle';

  constructor(
    private sessionId: string,
    private observer?: (change: PhaseChange) => void
  ) {}

  transition(to: TurnPhase): void {
    if (!canTransition(this.phase, to)) {
      throw new Error(`Illegal turn phase transition ${this.phase} -> ${to}`);
    }
    const from = this.phase;
    this.phase = to;
    logger.debug(`[${this.sessionId}] ${from} -> ${to}`);
    this.observer?.({ sessionId: this.sessionId, from, to });
  }

  fail(): void {
    if (this.phase !== 'failed') this.transition('failed');
    this.transition('idle');
  }
}

/**
 * Runs one dialogue turn at a time per session: classify, merge constraints,
 * retrieve, generate, validate, respond. Session state is written once, when
 * the turn completes; a cancelled or failed turn leaves it untouched.
 */
export class DialogueOrchestrator {
  private lock: KeyedMutex;
  private now: () => Date;

  constructor(
    private deps: OrchestratorDependencies,
    private options: OrchestratorOptions
  ) {
    this.lock = deps.lock ?? new KeyedMutex();
    this.now = options.now ?? (() => new Date());
  }

  async processTurn(request: TurnRequest, signal?: AbortSignal): Promise<TurnResponse> {
    const parsed = TurnRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new Error(`Invalid turn request: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
    }
    const turn: TurnRequest = parsed.data;
    return this.lock.runExclusive(turn.sessionId, () => this.runTurn(turn, signal));
  }

  async getSession(sessionId: string): Promise<ConversationState | null> {
    const result = await this.withStoreRetry(() => this.deps.store.load(sessionId), `load ${sessionId}`);
    return result.status === 'found' ? result.state : null;
  }

  private async runTurn(request: TurnRequest, signal?: AbortSignal): Promise<TurnResponse> {
    const tracker = new TurnTracker(request.sessionId, this.options.onPhaseChange);
    let session: LoadedSession | undefined;
    let intent: Intent = 'unknown';

    try {
      throwIfCancelled(signal);
      session = await this.loadSession(request.sessionId);

      tracker.transition('classifying');
      intent = await this.deps.classifier.classify(request.utterance, session.state.constraints, signal);
      throwIfCancelled(signal);
      logger.debug(`[${request.sessionId}] intent ${intent}`);

      const extraction = this.extractionFor(intent, request);
      let constraints = session.state.constraints;
      if (extraction) {
        tracker.transition('merging');
        constraints = applyExtraction(constraints, extraction);
      }

      const outcome = await this.handleIntent(intent, request, session.state, constraints, tracker, signal);

      tracker.transition('responding');
      const committed = await this.commit(request, session, extraction, outcome, signal);
      tracker.transition('idle');

      return {
        sessionId: request.sessionId,
        text: outcome.text,
        constraints: summarizeConstraints(committed.constraints),
        verdict: outcome.verdict,
        intent,
        disclosures: outcome.disclosures,
        turnCount: committed.turnCount
      };
    } catch (error) {
      tracker.fail();

      if (isModelFailure(error) && session) {
        logger.warning(`[${request.sessionId}] model failed, sending apology:`, error.message);
        return {
          sessionId: request.sessionId,
          text: this.deps.composer.apology(error.backend),
          constraints: summarizeConstraints(session.state.constraints),
          verdict: 'fallback',
          intent,
          disclosures: [`${error.name}: ${error.message}`],
          turnCount: session.state.turnCount
        };
      }

      if (!(error instanceof TurnCancelledError)) {
        logger.error(`[${request.sessionId}] turn failed:`, error);
      }
      throw error;
    }
  }

  /** Constraint changes this turn carries, if the turn merges at all. */
  private extractionFor(intent: Intent, request: TurnRequest): ConstraintExtraction | null {
    const explicit: ConstraintCategory[] = request.negations ?? [];
    const mergesUtterance = intent === 'constraint_update' || intent === 'recipe_request';
    if (!mergesUtterance && explicit.length === 0) return null;

    const extraction: ConstraintExtraction = mergesUtterance
      ? this.deps.extractor.extract(request.utterance)
      : { extracted: emptyConstraintSet(), negations: [], retractions: [] };

    return {
      ...extraction,
      negations: Array.from(new Set([...extraction.negations, ...explicit])).sort()
    };
  }

  private async handleIntent(
    intent: Intent,
    request: TurnRequest,
    state: ConversationState,
    constraints: ConstraintSet,
    tracker: TurnTracker,
    signal?: AbortSignal
  ): Promise<TurnOutcome> {
    switch (intent) {
      case 'chat':
        return this.handleChat(request, state, constraints, tracker, signal);
      case 'constraint_update':
        return { text: this.deps.composer.acknowledgement(constraints), verdict: 'accepted', disclosures: [] };
      case 'recipe_request':
        return this.handleRecipeRequest(request, state, constraints, tracker, signal);
      case 'safety_question':
        return this.handleSafetyQuestion(request, constraints, tracker, signal);
      case 'cooking_question':
        return this.handleCookingQuestion(request, state, constraints, tracker, signal);
      case 'unknown':
        return { text: this.deps.composer.clarification(), verdict: 'clarification', disclosures: [] };
    }
  }

  private async handleChat(
    request: TurnRequest,
    state: ConversationState,
    constraints: ConstraintSet,
    tracker: TurnTracker,
    signal?: AbortSignal
  ): Promise<TurnOutcome> {
    tracker.transition('generating');
    const text = await this.callModel(
      this.conversationModel(),
      this.deps.composer.chatRequest(request.utterance, constraints, state.history),
      signal
    );
    return { text: text.trim(), verdict: 'accepted', disclosures: [] };
  }

  private async handleRecipeRequest(
    request: TurnRequest,
    state: ConversationState,
    constraints: ConstraintSet,
    tracker: TurnTracker,
    signal?: AbortSignal
  ): Promise<TurnOutcome> {
    tracker.transition('retrieving');
    const query = this.deps.retrieval.buildQuery(request.utterance, constraints);
    const { facts, disclosures } = await this.retrieveFacts(query, ['recipe_reference', 'safety_rule'], signal);

    const feedback: string[] = [];
    let lastVerdict: ValidationVerdict | undefined;
    const attempts = this.options.regenerationRetryBudget + 1;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      tracker.transition('generating');
      const output = await this.callModel(
        this.deps.model,
        this.deps.generator.buildRequest({
          utterance: request.utterance,
          constraints,
          facts,
          feedback,
          history: state.history
        }),
        signal
      );

      tracker.transition('validating');
      const parsed = this.deps.generator.parse(output);
      const verdict: ValidationVerdict = parsed.ok
        ? this.deps.validator.validate(parsed.draft, constraints, facts)
        : { kind: 'needs_regeneration', feedback: `The recipe could not be read: ${parsed.error}.` };

      if (verdict.kind === 'accepted' && parsed.ok) {
        const text = renderRecipe(parsed.draft);
        return {
          text,
          verdict: 'accepted',
          disclosures,
          lastRecipe: { title: parsed.draft.title, text }
        };
      }

      lastVerdict = verdict;
      feedback.push(describeVerdict(verdict));
      logger.info(`[${request.sessionId}] draft ${attempt}/${attempts} not accepted: ${describeVerdict(verdict)}`);
    }

    const text =
      lastVerdict?.kind === 'rejected'
        ? this.deps.composer.refusal(lastVerdict.violatedConstraint, lastVerdict.reason)
        : this.deps.composer.incompleteRefusal(lastVerdict?.kind === 'needs_regeneration' ? lastVerdict.feedback : '');
    return { text, verdict: 'fallback', disclosures };
  }

  private async handleSafetyQuestion(
    request: TurnRequest,
    constraints: ConstraintSet,
    tracker: TurnTracker,
    signal?: AbortSignal
  ): Promise<TurnOutcome> {
    tracker.transition('retrieving');
    const query = this.deps.retrieval.buildQuery(request.utterance, constraints);
    const { facts, disclosures } = await this.retrieveFacts(query, ['safety_rule'], signal);

    if (facts.length === 0) {
      return { text: this.deps.composer.safetyHedge(), verdict: 'accepted', disclosures };
    }

    tracker.transition('generating');
    const text = await this.callModel(
      this.conversationModel(),
      this.deps.composer.safetyRequest(request.utterance, facts),
      signal
    );
    return { text: text.trim(), verdict: 'accepted', disclosures };
  }

  private async handleCookingQuestion(
    request: TurnRequest,
    state: ConversationState,
    constraints: ConstraintSet,
    tracker: TurnTracker,
    signal?: AbortSignal
  ): Promise<TurnOutcome> {
    tracker.transition('retrieving');
    const constants = this.deps.constants.lookup(request.utterance);

    tracker.transition('generating');
    const text = await this.callModel(
      this.conversationModel(),
      this.deps.composer.cookingQuestionRequest(
        request.utterance,
        constants,
        state.lastRecipe,
        constraints,
        state.history
      ),
      signal
    );
    return { text: text.trim(), verdict: 'accepted', disclosures: [] };
  }

  private conversationModel(): GenerativeModel {
    return this.deps.chatModel ?? this.deps.model;
  }

  private async retrieveFacts(
    query: RetrievalQuery,
    categories: FactCategory[],
    signal?: AbortSignal
  ): Promise<FactsResult> {
    const facts: RetrievedFact[] = [];
    let unavailable = false;

    for (const category of categories) {
      const result = await this.collectWithRetry(query, category, signal);
      if (result === null) {
        unavailable = true;
      } else {
        facts.push(...result);
      }
    }

    if (unavailable) return { facts, disclosures: [DISCLOSURES.retrievalUnavailable] };
    if (facts.length === 0) return { facts, disclosures: [DISCLOSURES.retrievalEmpty] };
    return { facts, disclosures: [] };
  }

  /** Facts for one category, or null when the store failed twice. */
  private async collectWithRetry(
    query: RetrievalQuery,
    category: FactCategory,
    signal?: AbortSignal
  ): Promise<RetrievedFact[] | null> {
    for (let attempt = 1; attempt <= 2; attempt++) {
      try {
        return await this.deps.retrieval.collect(query, category, this.options.retrievalK, signal);
      } catch (error) {
        if (!(error instanceof RetrievalUnavailableError)) throw error;
        logger.warning(`Retrieval of ${category} failed (attempt ${attempt}/2): ${error.message}`);
      }
    }
    return null;
  }

  /** One model call with its own deadline, retried once on backend failure. */
  private async callModel(
    model: GenerativeModel,
    request: GenerationRequest,
    signal?: AbortSignal
  ): Promise<string> {
    let lastError: BackendError | undefined;

    for (let attempt = 1; attempt <= 2; attempt++) {
      try {
        return await withDeadline(
          abortSignal => model.generate({ ...request, abortSignal }),
          this.options.modelTimeoutMs,
          signal
        );
      } catch (error) {
        if (error instanceof TurnCancelledError) throw error;
        lastError =
          error instanceof DeadlineExceededError
            ? new ModelTimeoutError(error.timeoutMs, error)
            : isModelFailure(error)
              ? error
              : new ModelUnavailableError(error instanceof Error ? error.message : String(error), error);
        logger.warning(`Model call failed (attempt ${attempt}/2): ${lastError.message}`);
      }
    }

    throw lastError ?? new ModelUnavailableError('Model call failed');
  }

  private async commit(
    request: TurnRequest,
    session: LoadedSession,
    extraction: ConstraintExtraction | null,
    outcome: TurnOutcome,
    signal?: AbortSignal
  ): Promise<ConversationState> {
    let base = session;

    for (let attempt = 1; attempt <= 2; attempt++) {
      throwIfCancelled(signal);
      const next = this.nextState(base.state, request, extraction, outcome);
      const result = await this.withStoreRetry(
        () => this.deps.store.save(request.sessionId, next, base.version),
        `save ${request.sessionId}`
      );
      if (result.status === 'ok') {
        return next;
      }

      logger.warning(
        `[${request.sessionId}] version conflict (expected ${base.version}, found ${result.currentVersion})`
      );
      if (attempt === 2) break;
      base = await this.loadSession(request.sessionId);
    }

    throw new SessionConflictError(request.sessionId);
  }

  private nextState(
    prior: ConversationState,
    request: TurnRequest,
    extraction: ConstraintExtraction | null,
    outcome: TurnOutcome
  ): ConversationState {
    const timestamp = this.now().toISOString();
    const messages: Message[] = [
      { role: 'user', content: request.utterance, timestamp },
      { role: 'assistant', content: outcome.text, timestamp }
    ];

    return {
      ...prior,
      constraints: extraction ? applyExtraction(prior.constraints, extraction) : prior.constraints,
      history: [...prior.history, ...messages].slice(-this.options.maxHistoryMessages),
      turnCount: prior.turnCount + 1,
      lastRecipe: outcome.lastRecipe ?? prior.lastRecipe,
      updatedAt: timestamp
    };
  }

  private async loadSession(sessionId: string): Promise<LoadedSession> {
    const result = await this.withStoreRetry(() => this.deps.store.load(sessionId), `load ${sessionId}`);
    if (result.status === 'found') {
      return { state: result.state, version: result.version };
    }

    const timestamp = this.now().toISOString();
    return {
      state: {
        sessionId,
        constraints: emptyConstraintSet(),
        history: [],
        turnCount: 0,
        createdAt: timestamp,
        updatedAt: timestamp
      },
      version: 0
    };
  }

  private async withStoreRetry<T>(operation: () => Promise<T>, label: string): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      logger.warning(`Session store ${label} failed, retrying once:`, error instanceof Error ? error.message : error);
    }
    try {
      return await operation();
    } catch (error) {
      if (error instanceof SessionStoreUnavailableError) throw error;
      throw new SessionStoreUnavailableError(
        `Session store ${label} failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }
}
