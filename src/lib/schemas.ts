import { z } from 'zod';

export const ConstraintCategorySchema = z.enum([
  'diet',
  'mealType',
  'cookingMethod',
  'availableIngredients',
  'excludedIngredients'
]);

export const InventorySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('unrestricted') }),
  z.object({ kind: z.literal('only'), items: z.array(z.string()).min(1) }),
  z.object({ kind: z.literal('nothing') })
]);

export const ConstraintSetSchema = z.object({
  diet: z.array(z.string()),
  mealType: z.array(z.string()),
  cookingMethod: z.array(z.string()),
  availableIngredients: InventorySchema,
  excludedIngredients: z.array(z.string())
});

export const MessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.string()
});

export const ConversationStateSchema = z.object({
  sessionId: z.string().min(1),
  constraints: ConstraintSetSchema,
  history: z.array(MessageSchema),
  turnCount: z.number().int().nonnegative(),
  lastRecipe: z.object({ title: z.string(), text: z.string() }).optional(),
  createdAt: z.string(),
  updatedAt: z.string()
});

export const TurnRequestSchema = z.object({
  sessionId: z.string().trim().min(1, 'sessionId is required'),
  utterance: z.string(),
  negations: z.array(ConstraintCategorySchema).optional()
});

export const RecipeDraftSchema = z.object({
  title: z.string(),
  mealType: z.string(),
  cookingMethod: z.string().optional(),
  ingredients: z.array(
    z.union([
      z.string().transform((name): { name: string; quantity?: string } => ({ name })),
      z.object({ name: z.string(), quantity: z.string().optional() })
    ])
  ),
  steps: z.array(z.string())
});

const TermSchema = z.object({
  name: z.string(),
  aliases: z.array(z.string()).default([])
});

export const LexiconSchema = z.object({
  diets: z.array(TermSchema),
  mealTypes: z.array(TermSchema),
  cookingMethods: z.array(TermSchema),
  ingredients: z.array(TermSchema),
  categoryResets: z.array(
    z.object({
      pattern: z.string(),
      category: ConstraintCategorySchema
    })
  ),
  nothingAvailable: z.array(z.string()),
  pantryStaples: z.array(z.string()),
  ingredientGroups: z.record(z.string(), z.array(z.string())).default({})
});

export const DietIncompatibilityTableSchema = z.record(
  z.string(),
  z.object({
    incompatible: z.array(z.string()),
    allowed: z.array(z.string()).default([])
  })
);

export const RecipeEntrySchema = z.object({
  id: z.string(),
  name: z.string(),
  tags: z.array(z.string()),
  ingredients: z.array(z.string()),
  steps: z.array(z.string())
});

export const SafetyRuleSchema = z.object({
  id: z.string(),
  topic: z.string(),
  rule: z.string()
});

export const CulinaryConstantsSchema = z.record(z.string(), z.string());

export type LexiconTerm = z.infer<typeof TermSchema>;
export type Lexicon = z.infer<typeof LexiconSchema>;
export type RecipeEntry = z.infer<typeof RecipeEntrySchema>;
export type SafetyRule = z.infer<typeof SafetyRuleSchema>;
export type RecipeDraftValidated = z.infer<typeof RecipeDraftSchema>;
