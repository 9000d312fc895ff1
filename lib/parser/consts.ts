/**
 * Parser constants.
 *
 * This module provides centralized constants used by the lexer and parser,
 * including the character constants for syntax tokens and regex patterns.
 *
 * @module
 */

// Character constants
export const LEFT_PAREN = "(";
export const RIGHT_PAREN = ")";
export const DOT = ".";
export const BACKSLASH = "\\";
export const LAMBDA_GLYPH = "λ";

/** Both spellings of the abstraction marker. */
export const LAMBDA_MARKERS: readonly string[] = [BACKSLASH, LAMBDA_GLYPH];

// Regex patterns
export const WHITESPACE_REGEX = /\s/;
export const IDENTIFIER_START_REGEX = /[a-zA-Z]/;
export const IDENTIFIER_CHAR_REGEX = /[a-zA-Z0-9_]/;

export const END_OF_INPUT = "end of input";
