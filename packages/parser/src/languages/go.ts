import type { LanguageProfile } from './types.js';

const GO_KEYWORDS = [
  'break',
  'case',
  'chan',
  'const',
  'continue',
  'default',
  'defer',
  'else',
  'fallthrough',
  'for',
  'func',
  'go',
  'goto',
  'if',
  'import',
  'interface',
  'map',
  'package',
  'range',
  'return',
  'select',
  'struct',
  'switch',
  'type',
  'var',
];

/**
 * Go profile.
 *
 * Method receivers are parenthesized (`func (s *Server) Start() {}`), so the
 * declared name is always the first identifier outside parens after `func`.
 * Backquoted raw strings share the escape-counting rule of the other quotes.
 */
export const goProfile: LanguageProfile = {
  id: 'go',
  extensions: ['.go'],
  keywords: new Set(GO_KEYWORDS),
  declarationKeyword: 'func',
  bindingKeywords: new Set(['var']),
  quoteDelimiters: new Set(["'", '"', '`']),
  symbolCharacters: new Set([
    '+', '-', ':', '?', '!', '<', '>', '*', '/', '%', '&', '|',
    '^', '~', '.', ',', '[', ']', '#', '@', '$', ';', '\\',
  ]),
};
