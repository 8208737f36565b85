import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { DietIncompatibilityTable } from '../types';
import { DietIncompatibilityTableSchema, Lexicon, LexiconSchema } from './schemas';

export async function readJsonFile<T extends z.ZodTypeAny>(filePath: string, schema: T): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new Error(`Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = schema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid data in ${filePath}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export async function loadLexicon(dataDir: string): Promise<Lexicon> {
  return readJsonFile(path.join(dataDir, 'lexicon.json'), LexiconSchema);
}

export async function loadDietTable(filePath: string): Promise<DietIncompatibilityTable> {
  return readJsonFile(filePath, DietIncompatibilityTableSchema);
}
