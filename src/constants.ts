/**
 * Application constants
 */

export const CONSTANTS = {
  /**
   * Binder item count above which validation warns that import may be slow
   */
  LARGE_PROJECT_THRESHOLD: 500,

  /**
   * Single text files above this size (bytes) get a validation warning
   */
  LARGE_TEXT_FILE_BYTES: 10_000_000,

  /**
   * Format version written to Files/version.txt for Scrivener 3 bundles
   */
  SCRIVENER_FORMAT_VERSION: '16',

  /**
   * Title the foreign format uses when a project has none
   */
  UNTITLED_PROJECT: 'Untitled Project',

  /**
   * Fallback title for binder items that have no <Title>
   */
  UNTITLED_ITEM: 'Untitled',

  /**
   * Color used when a "R G B" string can't be parsed
   */
  FALLBACK_GRAY: '0.5 0.5 0.5',

  /**
   * Default document display hints
   */
  DEFAULT_COLOR_NAME: 'Brown',
  DEFAULT_ICON_NAME: 'doc.text',

  /**
   * Comment highlight color when the comment has none
   */
  DEFAULT_COMMENT_COLOR: '#FFFF00',

  /**
   * Rough words-per-page figure used for compile estimates
   */
  WORDS_PER_PAGE: 250,
} as const;
