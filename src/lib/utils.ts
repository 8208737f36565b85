import { DeadlineExceededError, TurnCancelledError } from './errors';

/**
 * Runs `task` with its own deadline. The task receives a signal that aborts
 * when the deadline passes or when `parent` aborts; the returned promise
 * rejects with DeadlineExceededError or TurnCancelledError respectively.
 */
export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(new TurnCancelledError());
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const onParentAbort = () => {
      cleanup();
      controller.abort();
      reject(new TurnCancelledError());
    };

    const cleanup = () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    };

    timer = setTimeout(() => {
      cleanup();
      controller.abort();
      reject(new DeadlineExceededError(timeoutMs));
    }, timeoutMs);

    parent?.addEventListener('abort', onParentAbort, { once: true });

    task(controller.signal).then(
      value => {
        cleanup();
        resolve(value);
      },
      error => {
        cleanup();
        reject(error);
      },
    );
  });
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new TurnCancelledError();
  }
}

const IRREGULAR_PLURALS: Record<string, string> = {
  leaves: 'leaf',
  loaves: 'loaf',
  knives: 'knife',
  halves: 'half',
  molasses: 'molasses',
  hummus: 'hummus',
  couscous: 'couscous',
  asparagus: 'asparagus',
  swiss: 'swiss',
  grits: 'grits',
};

export function singularize(word: string): string {
  if (IRREGULAR_PLURALS[word]) return IRREGULAR_PLURALS[word];
  if (word.length <= 3) return word;
  if (word.endsWith('ies')) return `${word.slice(0, -3)}y`;
  if (word.endsWith('oes')) return word.slice(0, -2);
  if (/(?:ch|sh|ss|x)es$/.test(word)) return word.slice(0, -2);
  if (word.endsWith('ss') || word.endsWith('us')) return word;
  if (word.endsWith('s')) return word.slice(0, -1);
  return word;
}

/** Lower-cases, strips punctuation and singularizes every word. */
export function normalizeTerm(text: string): string {
  return text
    .toLowerCase()
    .replace(/[’']/g, '')
    .replace(/[^a-z0-9\s-]/g, ' ')
    .split(/\s+/)
    .filter(Boolean)
    .map(singularize)
    .join(' ');
}

/** Whole-word containment on normalized text. */
export function containsTerm(normalizedText: string, normalizedTerm: string): boolean {
  if (!normalizedTerm) return false;
  return ` ${normalizedText} `.includes(` ${normalizedTerm} `);
}

export function uniqueSorted(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort();
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
