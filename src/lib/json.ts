import { jsonrepair } from 'jsonrepair';
import { createLogger } from './logger';

const logger = createLogger('JSON');

/**
 * Fix a malformed JSON string with jsonrepair. Only called after a plain
 * JSON.parse has failed.
 */
export function repairJsonString(jsonString: string): string {
  try {
    const repairedJson = jsonrepair(jsonString.trim());
    logger.debug('Repaired JSON string', { original: jsonString, repaired: repairedJson });
    return repairedJson;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.warning('jsonrepair failed to fix JSON string', { original: jsonString, error: errorMessage });
    return jsonString.trim();
  }
}

function parseOrRepair(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return JSON.parse(repairJsonString(text));
  }
}

/**
 * Extract JSON from model output: a fenced code block if there is one,
 * otherwise the outermost object in the text.
 */
export function extractJsonFromText(text: string): unknown {
  const jsonBlockMatch = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (jsonBlockMatch) {
    return parseOrRepair(jsonBlockMatch[1].trim());
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    return parseOrRepair(text.slice(start, end + 1));
  }

  return parseOrRepair(text.trim());
}
