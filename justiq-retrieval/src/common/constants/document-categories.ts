/**
 * Document categories of the legal corpus, as stored in `metadata.type`
 */

export const DOCUMENT_CATEGORIES = [
  'judgement',
  'decision',
  'statute',
  'interpretation',
] as const;

export type DocumentCategory = (typeof DOCUMENT_CATEGORIES)[number];
