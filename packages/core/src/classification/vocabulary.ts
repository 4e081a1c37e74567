// packages/core/src/classification/vocabulary.ts

import { z } from 'zod';
import { loadDataFile } from '../utils/data.js';

export const categorySchema = z.enum([
  'recipe_request',
  'cooking_question',
  'ingredient_inquiry',
  'technique_question',
  'food_pairing',
  'nutrition_question',
  'image_request',
  'meal_planning',
  'recipe_review',
  'cooking_tips',
  'general_chat',
]);

const imageStyleSchema = z.enum([
  'food_photography',
  'romantic_dinner',
  'rustic_kitchen',
  'elegant_plating',
  'cooking_process',
  'ingredient_focus',
  'restaurant_style',
]);

export const classifierTablesSchema = z.object({
  intentPatterns: z.array(
    z.object({
      category: categorySchema,
      patterns: z.array(z.string().min(1)).min(1),
    }),
  ),
  vocabularies: z.object({
    ingredients: z.array(z.string()),
    techniques: z.array(z.string()),
    cuisines: z.array(z.string()),
    dietary: z.array(z.string()),
  }),
  urgentKeywords: z.array(z.string()),
  highPriorityCategories: z.array(categorySchema),
  imagePrefixes: z.array(z.string().min(1)),
  imageStyleKeywords: z.array(
    z.object({
      style: imageStyleSchema,
      keywords: z.array(z.string().min(1)),
    }),
  ),
  motifOptOutPhrases: z.array(z.string().min(1)),
});

export type ClassifierTables = z.output<typeof classifierTablesSchema>;

let cached: ClassifierTables | undefined;

/** Tables from data/classifier.json, read once per process. */
export function loadClassifierTables(): ClassifierTables {
  cached ??= loadDataFile('classifier.json', classifierTablesSchema);
  return cached;
}
