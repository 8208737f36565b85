export type ConstraintCategory =
  | 'diet'
  | 'mealType'
  | 'cookingMethod'
  | 'availableIngredients'
  | 'excludedIngredients';

export const CONSTRAINT_CATEGORIES: readonly ConstraintCategory[] = [
  'diet',
  'mealType',
  'cookingMethod',
  'availableIngredients',
  'excludedIngredients'
];

/**
 * What the user has in the kitchen. `unrestricted` means no inventory
 * constraint at all; `nothing` is the explicit "I have nothing" statement.
 */
export type Inventory =
  | { kind: 'unrestricted' }
  | { kind: 'only'; items: string[] }
  | { kind: 'nothing' };

export interface ConstraintSet {
  diet: string[];
  mealType: string[];
  cookingMethod: string[];
  availableIngredients: Inventory;
  excludedIngredients: string[];
}

/** Constraints pulled out of a single utterance. */
export interface ConstraintExtraction {
  extracted: ConstraintSet;
  negations: ConstraintCategory[];
  retractions: string[];
}

export interface Message {
  role: 'user' | 'assistant';
  content: string;
  timestamp: string;
}

export interface RecipeSnapshot {
  title: string;
  text: string;
}

export interface ConversationState {
  sessionId: string;
  constraints: ConstraintSet;
  history: Message[];
  turnCount: number;
  lastRecipe?: RecipeSnapshot;
  createdAt: string;
  updatedAt: string;
}

export type FactCategory = 'safety_rule' | 'recipe_reference';

export interface RetrievedFact {
  readonly sourceId: string;
  readonly snippet: string;
  readonly score: number;
  readonly category: FactCategory;
}

export interface DraftIngredient {
  name: string;
  quantity?: string;
}

export interface RecipeDraft {
  title: string;
  ingredients: DraftIngredient[];
  steps: string[];
  mealType: string;
  cookingMethod?: string;
}

export type ValidationCheck = 'inventory' | 'exclusion' | 'diet' | 'meal_type' | 'cooking_method' | 'safety';

export interface ConstraintViolation {
  check: ValidationCheck;
  violatedConstraint: string;
  reason: string;
}

export type ValidationVerdict =
  | { kind: 'accepted' }
  | { kind: 'rejected'; reason: string; violatedConstraint: string; violations: ConstraintViolation[] }
  | { kind: 'needs_regeneration'; feedback: string };

export type Intent =
  | 'chat'
  | 'constraint_update'
  | 'recipe_request'
  | 'safety_question'
  | 'cooking_question'
  | 'unknown';

export type TurnPhase =
  | 'idle'
  | 'classifying'
  | 'merging'
  | 'retrieving'
  | 'generating'
  | 'validating'
  | 'responding'
  | 'failed';

export type ResponseVerdict = 'accepted' | 'fallback' | 'clarification';

export interface TurnRequest {
  sessionId: string;
  utterance: string;
  negations?: ConstraintCategory[];
}

export interface TurnResponse {
  sessionId: string;
  text: string;
  constraints: string[];
  verdict: ResponseVerdict;
  intent: Intent;
  disclosures: string[];
  turnCount: number;
}

export interface GenerationRequest {
  system?: string;
  prompt: string;
  maxTokens: number;
  stopSequences?: string[];
  temperature?: number;
  abortSignal?: AbortSignal;
}

export interface GenerativeModel {
  generate(request: GenerationRequest): Promise<string>;
}

/** `requiredTags` must all be present on an entry; of `anyTags` at least one. */
export interface RetrievalFilters {
  category: FactCategory;
  requiredTags?: string[];
  anyTags?: string[];
}

export interface RetrievalResult {
  id: string;
  text: string;
  score: number;
  category: FactCategory;
}

export interface RetrievalStore {
  query(text: string, filters: RetrievalFilters, k: number, signal?: AbortSignal): Promise<RetrievalResult[]>;
}

export interface ConstantsLookup {
  lookup(query: string, limit?: number): string[];
}

export type SessionLoadResult =
  | { status: 'found'; state: ConversationState; version: number }
  | { status: 'not_found' };

export type SessionSaveResult =
  | { status: 'ok'; version: number }
  | { status: 'version_conflict'; currentVersion: number };

export interface SessionStore {
  load(sessionId: string): Promise<SessionLoadResult>;
  save(sessionId: string, state: ConversationState, expectedVersion: number): Promise<SessionSaveResult>;
}

export interface DietRule {
  incompatible: string[];
  allowed: string[];
}

export type DietIncompatibilityTable = Record<string, DietRule>;
