/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * html.ts: HTML utilities for Camsnap.
 */

const HTML_REPLACEMENTS: Readonly<Record<string, string>> = {

  "\"": "&quot;",
  "&": "&amp;",
  "'": "&#39;",
  "<": "&lt;",
  ">": "&gt;"
};

/**
 * Escapes HTML special characters so dynamic content can be embedded in a page.
 * @param text - The text to escape.
 * @returns The escaped text safe for HTML display.
 */
export function escapeHtml(text: string): string {

  return text.replace(/[&<>"']/g, (char) => HTML_REPLACEMENTS[char] ?? char);
}
