/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.ts: Category-based debug log filtering for Camsnap.
 */

/* Debug output is filtered by colon-separated categories (e.g., "session:read", "capture"). The CAMSNAP_DEBUG environment variable takes a comma-separated list of
 * patterns:
 *
 *   - "*" enables all categories.
 *   - "category" enables an exact category or any sub-category (prefix match).
 *   - "-category" excludes a category or its sub-categories, even when the wildcard is active.
 *
 * Examples:
 *   CAMSNAP_DEBUG=session             All session sub-categories (session:read, session:reconnect).
 *   CAMSNAP_DEBUG=*,-session:read     Everything except per-frame read failures.
 */

let anyEnabled = false;
let wildcardEnabled = false;

const includeSet = new Set<string>();

// Excludes take priority over includes and the wildcard.
const excludeSet = new Set<string>();

/**
 * Checks whether a category matches any pattern in the given set, either exactly or as a sub-category.
 * @param category - The category to check.
 * @param patterns - The set of patterns to match against.
 * @returns True if the category matches any pattern.
 */
function matchesAny(category: string, patterns: Set<string>): boolean {

  if(patterns.has(category)) {

    return true;
  }

  for(const pattern of patterns) {

    if(category.startsWith(pattern + ":")) {

      return true;
    }
  }

  return false;
}

/**
 * Parses a comma-separated pattern string and replaces the current filter configuration.
 * @param pattern - Comma-separated list of category patterns (e.g., "session,-session:read").
 */
export function initDebugFilter(pattern: string): void {

  includeSet.clear();
  excludeSet.clear();
  wildcardEnabled = false;
  anyEnabled = false;

  const parts = pattern.split(",").map((p) => p.trim()).filter((p) => p.length > 0);

  if(parts.length === 0) {

    return;
  }

  for(const part of parts) {

    if(part === "*") {

      wildcardEnabled = true;
    } else if(part.startsWith("-")) {

      excludeSet.add(part.substring(1));
    } else {

      includeSet.add(part);
    }
  }

  anyEnabled = true;
}

/**
 * Checks whether a debug category is enabled under the current filter configuration.
 * @param category - The category to check.
 * @returns True if debug output should be produced for this category.
 */
export function isCategoryEnabled(category: string): boolean {

  if(!anyEnabled || matchesAny(category, excludeSet)) {

    return false;
  }

  return wildcardEnabled || matchesAny(category, includeSet);
}

/**
 * Fast-path check for whether any debug categories are configured.
 * @returns True if at least one debug category is enabled.
 */
export function isAnyDebugEnabled(): boolean {

  return anyEnabled;
}

/**
 * Known debug categories, listed by --help.
 */
export const DEBUG_CATEGORIES: readonly { readonly category: string; readonly description: string }[] = [

  { category: "capture", description: "Capture requests, encoding, identifiers." },
  { category: "http:preview", description: "MJPEG preview clients connecting and disconnecting." },
  { category: "session", description: "Session open, close, and state transitions." },
  { category: "session:ffmpeg", description: "FFmpeg stderr output and process exits." },
  { category: "session:read", description: "Individual frame read failures." },
  { category: "session:reconnect", description: "Reconnect backoff and reopen attempts." },
  { category: "upload", description: "Uploader requests and responses." }
];
