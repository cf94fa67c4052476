/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * theme.ts: CSS custom properties for the Camsnap control page.
 */

/*
 * THEME
 *
 * Colors are CSS custom properties so the page follows the system light or dark preference through a single media query. The preview surface stays dark in both
 * schemes: a camera picture reads better against black.
 */

// Tokens shared by both schemes.
const FIXED_TOKENS: Readonly<Record<string, string>> = {

  "radius-lg": "6px",
  "radius-sm": "4px",
  "state-connected": "#2e9d5b",
  "state-idle": "#8a8f98",
  "state-lost": "#c7402d",
  "state-pending": "#e39b1b",
  "surface-preview": "#0b0c0e"
};

const LIGHT_TOKENS: Readonly<Record<string, string>> = {

  "border-default": "#d6d9de",
  "interactive-primary": "#1f6fd1",
  "interactive-primary-hover": "#185aab",
  "interactive-secondary": "#8a8f98",
  "interactive-secondary-hover": "#6d727b",
  "interactive-success": "#2e9d5b",
  "interactive-success-hover": "#24804a",
  "status-error-bg": "#fbe3e0",
  "status-error-border": "#f3c1ba",
  "status-error-text": "#7c1f14",
  "status-success-bg": "#dff3e6",
  "status-success-border": "#b9e2c8",
  "status-success-text": "#1b5e36",
  "surface-elevated": "#f6f7f9",
  "surface-page": "#ffffff",
  "text-heading": "#1c2430",
  "text-inverse": "#ffffff",
  "text-muted": "#8a8f98",
  "text-primary": "#2b313a",
  "text-secondary": "#5c636e"
};

// Only the tokens that change in dark mode.
const DARK_TOKENS: Readonly<Record<string, string>> = {

  "border-default": "#3a3f47",
  "interactive-primary": "#5a9ee8",
  "interactive-primary-hover": "#1f6fd1",
  "status-error-bg": "#3b1f1c",
  "status-error-border": "#5e302a",
  "status-error-text": "#f29a8e",
  "status-success-bg": "#1a3526",
  "status-success-border": "#2a5a3f",
  "status-success-text": "#7fd6a0",
  "surface-elevated": "#24272c",
  "surface-page": "#17191c",
  "text-heading": "#f2f4f7",
  "text-inverse": "#17191c",
  "text-primary": "#dde1e6",
  "text-secondary": "#a9afb8"
};

/**
 * Renders a token map as custom property declarations.
 * @param tokens - Token names without the leading dashes, and their values.
 * @param indent - Leading whitespace for each line.
 * @returns One declaration per line.
 */
function declare(tokens: Readonly<Record<string, string>>, indent: string): string[] {

  return Object.entries(tokens).map(([ name, value ]) => [ indent, "--", name, ": ", value, ";" ].join(""));
}

/**
 * Generates CSS custom property definitions for the light theme and its dark overrides.
 * @returns CSS string with :root variables and dark mode overrides.
 */
export function generateThemeStyles(): string {

  return [
    ":root {",
    ...declare(FIXED_TOKENS, "  "),
    ...declare(LIGHT_TOKENS, "  "),
    "}",
    "@media (prefers-color-scheme: dark) {",
    "  :root {",
    ...declare(DARK_TOKENS, "    "),
    "  }",
    "}"
  ].join("\n");
}
