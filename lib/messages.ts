import type { FieldErrorList } from './forms';

export type FlashCategory = 'error' | 'success' | 'warning' | 'info';

export interface FlashMessage {
  category: FlashCategory;
  text: string;
}

/** Distinct messages in first-seen order, with nested lists flattened. */
export function cleanErrorList(errors: FieldErrorList): string[] {
  const seen = new Set<string>();
  for (const error of errors) {
    if (typeof error === 'string') {
      seen.add(error);
    } else {
      for (const subError of error) seen.add(subError);
    }
  }
  return [...seen];
}

export function saveErrorSummary(errorCount: number): string {
  const clause = errorCount === 1 ? 'was an error' : `were ${errorCount} errors`;
  return `Could not save changes as there ${clause}. See below for details.`;
}
