/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ui.ts: Shared page structure and styles for Camsnap web pages.
 */
import { generateThemeStyles } from "./theme.js";

/**
 * Generates the base CSS styles. All colors reference the theme's custom properties.
 * @returns CSS styles as a string.
 */
export function generateBaseStyles(): string {

  return [

    "body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 1400px; margin: 30px auto; padding: 0 20px; ",
    "line-height: 1.6; color: var(--text-primary); background: var(--surface-page); }",
    "h1 { color: var(--text-heading); border-bottom: 2px solid var(--interactive-primary); padding-bottom: 10px; }",
    "h2 { color: var(--text-heading); margin-top: 0; font-size: 1.1em; }",
    "a { color: var(--interactive-primary); text-decoration: none; word-break: break-all; }",
    "a:hover { text-decoration: underline; }",

    // Buttons.
    ".btn { padding: 10px 20px; border: none; border-radius: var(--radius-lg); cursor: pointer; font-size: 14px; font-weight: 500; width: 100%; ",
    "margin-bottom: 8px; transition: background-color 0.2s; }",
    ".btn-primary { background: var(--interactive-primary); color: var(--text-inverse); }",
    ".btn-primary:hover { background: var(--interactive-primary-hover); }",
    ".btn-secondary { background: var(--interactive-secondary); color: var(--text-inverse); }",
    ".btn-secondary:hover { background: var(--interactive-secondary-hover); }",
    ".btn-success { background: var(--interactive-success); color: var(--text-inverse); }",
    ".btn-success:hover { background: var(--interactive-success-hover); }",
    ".btn:disabled { opacity: 0.6; cursor: not-allowed; }",

    // Alerts.
    ".alert { padding: 12px 15px; border-radius: var(--radius-lg); margin-bottom: 15px; }",
    ".alert-success { background: var(--status-success-bg); border: 1px solid var(--status-success-border); color: var(--status-success-text); }",
    ".alert-error { background: var(--status-error-bg); border: 1px solid var(--status-error-border); color: var(--status-error-text); }",

    // Forms.
    "label { display: block; font-size: 13px; color: var(--text-secondary); margin-bottom: 4px; }",
    "input, select { width: 100%; box-sizing: border-box; padding: 8px; margin-bottom: 12px; border: 1px solid var(--border-default); ",
    "border-radius: var(--radius-sm); background: var(--surface-page); color: var(--text-primary); }"
  ].join("\n");
}

/**
 * Generates the common page wrapper HTML structure with head, styles, and body. Theme styles are always included.
 * @param title - The page title.
 * @param styles - CSS styles to include in the head.
 * @param bodyContent - HTML content for the body.
 * @param scripts - Optional JavaScript to include at the end of the body.
 * @returns Complete HTML document string.
 */
export function generatePageWrapper(title: string, styles: string, bodyContent: string, scripts = ""): string {

  return [
    "<!DOCTYPE html>",
    "<html lang=\"en\">",
    "<head>",
    "<meta charset=\"UTF-8\">",
    "<meta name=\"viewport\" content=\"width=device-width, initial-scale=1.0\">",
    "<meta name=\"color-scheme\" content=\"light dark\">",
    "<title>" + title + "</title>",
    "<style>",
    generateThemeStyles(),
    styles,
    "</style>",
    "</head>",
    "<body>",
    bodyContent,
    scripts,
    "</body>",
    "</html>"
  ].join("\n");
}
