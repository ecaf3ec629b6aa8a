/**
 * Document categories of the legal corpus
 * Each category is one subdirectory of the data directory, visited in this order.
 */

export const DOCUMENT_CATEGORIES = [
  'judgement',
  'decision',
  'statute',
  'interpretation',
] as const;

export type DocumentCategory = (typeof DOCUMENT_CATEGORIES)[number];

export const DOCUMENT_CATEGORY_LABELS: Record<DocumentCategory, string> = {
  judgement: 'Judgment',
  decision: 'Decision',
  statute: 'Statute',
  interpretation: 'Interpretation',
};
