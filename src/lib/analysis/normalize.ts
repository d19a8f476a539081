/**
 * Issue normalization
 *
 * pa11y messages embed element details and measured values, so the same
 * problem reads differently on every page. Known messages collapse to a
 * short label; anything else is cut to a fixed length.
 */

export const UNCLASSIFIED = 'unclassified';

const MAX_KEY_LENGTH = 80;

const MESSAGE_LABELS: ReadonlyArray<[RegExp, string]> = [
  [/This button element does not have a name available/i, 'Button missing accessible name'],
  [/This textinput element does not have a name available/i, 'Text input missing accessible name'],
  [/This form field should be labelled in some way/i, 'Form field missing label'],
  [/This element has insufficient contrast.*Expected.*ratio of at least [\d.]+:1/is, 'Insufficient color contrast'],
  [/Duplicate id attribute value.*found on the web page/is, 'Duplicate ID attribute'],
  [/Iframe element requires a non-empty title attribute/i, 'Iframe missing title attribute'],
  [/Presentational markup used that has become obsolete in HTML5/i, 'Obsolete HTML5 markup'],
  [/Img element.*missing.*alt/is, 'Image missing alt text'],
  [/link.*missing.*text/is, 'Link missing descriptive text'],
];

export function normalizeMessage(message: string): string {
  const text = message.trim();
  for (const [pattern, label] of MESSAGE_LABELS) {
    if (pattern.test(text)) return label;
  }
  return text.length > MAX_KEY_LENGTH ? `${text.slice(0, MAX_KEY_LENGTH)}...` : text;
}

/**
 * Grouping key for an issue: normalized message, else code, else unclassified.
 */
export function issueKey(message: string, code: string): string {
  if (message.trim()) return normalizeMessage(message);
  if (code.trim()) return code.trim();
  return UNCLASSIFIED;
}

// ============================================================================
// WCAG categories
// ============================================================================

export type WcagCategory =
  | 'Perceivable (Colors/Contrast)'
  | 'Operable (Navigation/Forms)'
  | 'Robust (Code Quality)'
  | 'Perceivable (Images/Media)'
  | 'Other';

const CATEGORY_KEYWORDS: ReadonlyArray<[WcagCategory, readonly string[]]> = [
  ['Perceivable (Colors/Contrast)', ['contrast', 'color']],
  ['Operable (Navigation/Forms)', ['button', 'input', 'form', 'label', 'name', 'title']],
  ['Robust (Code Quality)', ['markup', 'html5', 'obsolete']],
  ['Perceivable (Images/Media)', ['alt', 'image', 'img']],
];

/**
 * First matching keyword group wins.
 */
export function categorize(text: string): WcagCategory {
  const lowered = text.toLowerCase();
  for (const [category, words] of CATEGORY_KEYWORDS) {
    if (words.some(word => lowered.includes(word))) return category;
  }
  return 'Other';
}

// ============================================================================
// Recommendations
// ============================================================================

const FIXES: Record<string, readonly string[]> = {
  'Button missing accessible name': [
    'Add aria-label, aria-labelledby, or visible text to buttons',
    'Use descriptive button text instead of just icons',
  ],
  'Text input missing accessible name': [
    'Associate inputs with <label> elements',
    'Use aria-label or aria-labelledby attributes',
    'Ensure form labels are descriptive',
  ],
  'Insufficient color contrast': [
    'Use darker colors for text',
    'Test with color contrast analyzers',
    'Ensure 4.5:1 ratio for normal text, 3:1 for large text',
  ],
  'Form field missing label': [
    'Use <label for="input-id"> elements',
    'Add aria-label attributes',
    'Group related fields with fieldset/legend',
  ],
  'Duplicate ID attribute': [
    'Ensure all IDs are unique on the page',
    'Use classes instead of IDs for styling',
    'Validate HTML for duplicate IDs',
  ],
};

export const GENERIC_FIX = 'Review the original error messages for specific guidance.';

export function fixesFor(key: string): readonly string[] {
  return FIXES[key] ?? [GENERIC_FIX];
}
