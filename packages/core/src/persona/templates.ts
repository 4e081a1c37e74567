// packages/core/src/persona/templates.ts

import { z } from 'zod';
import { moodSchema } from '../config/schema.js';
import { loadDataFile } from '../utils/data.js';

const phrases = z.array(z.string().min(1)).min(1);

export const romanticStyleSchema = z.enum([
  'passionate',
  'tender',
  'whimsical',
  'dramatic',
  'poetic',
  'intimate',
]);

const stylePhrases = z.object({ openings: phrases, closings: phrases });

export const personaTemplatesSchema = z.object({
  moods: z
    .array(
      z.object({
        mood: moodSchema,
        triggers: z.array(z.string().min(1)),
        framing: z.string().includes('{content}'),
      }),
    )
    .min(1),
  romanticVerbs: z.record(z.string(), z.string()),
  romanticStyles: z.object({
    passionate: stylePhrases,
    tender: stylePhrases,
    whimsical: stylePhrases,
    dramatic: stylePhrases,
    poetic: stylePhrases,
    intimate: stylePhrases,
  }),
  /** Which romantic style each mood writes in. */
  moodStyles: z.object({
    ecstatic: romanticStyleSchema,
    enthusiastic: romanticStyleSchema,
    romantic: romanticStyleSchema,
    contemplative: romanticStyleSchema,
    playful: romanticStyleSchema,
    passionate: romanticStyleSchema,
    serene: romanticStyleSchema,
    mischievous: romanticStyleSchema,
    nostalgic: romanticStyleSchema,
    inspired: romanticStyleSchema,
  }),
  motifTiers: z
    .array(z.object({ minLevel: z.number().int().min(1).max(10), phrases }))
    .min(1),
  imageStyles: z.object({
    food_photography: z.string(),
    romantic_dinner: z.string(),
    rustic_kitchen: z.string(),
    elegant_plating: z.string(),
    cooking_process: z.string(),
    ingredient_focus: z.string(),
    restaurant_style: z.string(),
  }),
  imageMotifPhrases: phrases,
  imageRomanticPhrases: phrases,
  imageCommentary: phrases,
  demoFallbackNote: z.string(),
});

export type PersonaTemplates = z.output<typeof personaTemplatesSchema>;
export type RomanticStyle = z.output<typeof romanticStyleSchema>;

let cached: PersonaTemplates | undefined;

export function loadPersonaTemplates(): PersonaTemplates {
  cached ??= loadDataFile('persona.json', personaTemplatesSchema);
  return cached;
}

/** Replace `{name}` placeholders. Unknown placeholders are left as they are. */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}
