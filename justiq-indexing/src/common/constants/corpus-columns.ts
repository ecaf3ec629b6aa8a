/**
 * Canonical column names of the corpus CSV files, in lookup priority order.
 * Headers are trimmed before they are matched against these names.
 */

export const CONTENT_COLUMN_NAMES = ['내용', 'content'] as const;

export const SECTION_COLUMN_NAMES = ['구분', 'section', 'category'] as const;
