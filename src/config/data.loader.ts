import { readFileSync } from 'fs';
import path from 'path';

import { z } from 'zod';

import { config } from './env.config.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected yyyy-MM-dd');

export const VocabularySchema = z.object({
  leaveTypes: z
    .array(
      z.object({
        type: z.string().min(1),
        label: z.string().min(1),
        synonyms: z.array(z.string().min(1)).default([]),
      }),
    )
    .min(1),
});

export const PolicyFileSchema = z.object({
  policies: z.array(
    z.object({
      leaveType: z.string().min(1),
      minNoticeDays: z.number().int().min(0),
      maxConsecutiveDays: z.number().int().positive(),
      countWeekends: z.boolean(),
      countHolidays: z.boolean(),
      blackouts: z
        .array(z.object({ start: isoDate, end: isoDate, label: z.string().optional() }))
        .default([]),
    }),
  ),
});

export const HolidayFileSchema = z.object({
  holidays: z.array(z.object({ date: isoDate, name: z.string() })),
});

export const SeedFileSchema = z.object({
  employees: z.array(
    z.object({
      employeeId: z.string().min(1),
      name: z.string().min(1),
      project: z.string().optional(),
      balances: z.record(z.number().int().min(0)),
    }),
  ),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;
export type PolicyFile = z.infer<typeof PolicyFileSchema>;
export type HolidayFile = z.infer<typeof HolidayFileSchema>;
export type SeedFile = z.infer<typeof SeedFileSchema>;

function loadJsonFile<S extends z.ZodTypeAny>(file: string, schema: S, dir: string): z.infer<S> {
  const fullPath = path.resolve(dir, file);
  const raw: unknown = JSON.parse(readFileSync(fullPath, 'utf8'));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error([`Invalid data file ${fullPath}:`, issues].join('\n'));
  }
  return parsed.data;
}

export function loadVocabulary(dir: string = config.CONFIG_DIR): Vocabulary {
  return loadJsonFile('leave-vocabulary.json', VocabularySchema, dir);
}

export function loadPolicies(dir: string = config.CONFIG_DIR): PolicyFile {
  return loadJsonFile('leave-policies.json', PolicyFileSchema, dir);
}

export function loadHolidays(dir: string = config.CONFIG_DIR): HolidayFile {
  return loadJsonFile('holidays.json', HolidayFileSchema, dir);
}

export function loadSeed(dir: string = config.CONFIG_DIR): SeedFile {
  return loadJsonFile('seed.json', SeedFileSchema, dir);
}
