// Substrings never allowed in typed text, matched case-insensitively
export const FORBIDDEN_TEXT_PATTERNS = [
  'rm -rf',
  'del /f /s /q',
  'format c:',
  'shutdown',
  'reboot',
  'reg delete',
  'rd /s /q',
  'drop database',
  'drop table',
] as const;

// Whole key combinations never sent, compared after normalization
export const FORBIDDEN_KEY_COMBOS = [
  'alt+f4',
  'ctrl+alt+del',
  'win+r',
  'f10',
] as const;
