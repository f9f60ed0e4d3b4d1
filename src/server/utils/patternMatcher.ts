/**
 * Glob-like pattern matching for crawl exclusion rules
 *
 * Supported syntax: `*` matches any run of characters, `?` matches one
 * character, everything else is literal. A pattern without wildcards matches
 * when it occurs anywhere in the subject (substring rule).
 */

function escapeRegex(value: string): string {
  return value.replace(/[.+^${}()|[\]\\]/g, '\\$&');
}

export function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map(char => {
      if (char === '*') return '.*';
      if (char === '?') return '.';
      return escapeRegex(char);
    })
    .join('');
  return new RegExp(`^${source}$`, 'i');
}

/**
 * Check a subject (URL or path) against one pattern
 */
export function matchesPattern(subject: string, pattern: string): boolean {
  if (!pattern) {
    return false;
  }
  if (!pattern.includes('*') && !pattern.includes('?')) {
    return subject.toLowerCase().includes(pattern.toLowerCase());
  }
  return globToRegExp(pattern).test(subject);
}

/**
 * Compiled set of exclusion patterns, checked against the full URL and its path
 */
export class PatternSet {
  private readonly patterns: string[];

  constructor(patterns: string[]) {
    this.patterns = patterns.filter(pattern => pattern.trim().length > 0);
  }

  /**
   * Return the first pattern matching the URL, or null
   */
  firstMatch(url: string): string | null {
    let path = url;
    try {
      const parsed = new URL(url);
      path = `${parsed.pathname}${parsed.search}`;
    } catch {
      // not absolute; match the raw value
    }

    for (const pattern of this.patterns) {
      if (matchesPattern(url, pattern) || matchesPattern(path, pattern)) {
        return pattern;
      }
    }
    return null;
  }

  get size(): number {
    return this.patterns.length;
  }
}
