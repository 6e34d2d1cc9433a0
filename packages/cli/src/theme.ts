/** tasksnap color palette: teal accents, amber for anything destructive. */
export const THEME = {
  /** Teal: identifiers, headings */
  primary: '#2DD4BF',
  /** Deep teal: borders */
  accent: '#0F766E',
  /** Gray: secondary detail */
  dim: '#6B7280',
  /** Dark gray: inactive borders */
  dimBorder: '#374151',
  /** Green: restored, passed, added lines */
  success: '#22C55E',
  /** Red: errors, removed lines */
  error: '#EF4444',
  /** Amber: warnings, confirmations */
  warning: '#F59E0B',
  text: 'white',
  textDim: '#9CA3AF',
} as const;
