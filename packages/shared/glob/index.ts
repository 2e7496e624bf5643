/**
 * Glob matching for identifiers and file paths.
 *
 * Supports `*` (within a segment), `**` (across segments), `?` and `{a,b}`.
 * A pattern without a `/` is matched against the basename only, the way
 * `find -name` treats it.
 */

const cache: Map<string, RegExp> = new Map();

export function globToRegExp(pattern: string): RegExp {
  const cached = cache.get(pattern);
  if (cached) return cached;

  let source = '';
  let braceDepth = 0;

  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];

    if (ch === '*') {
      if (pattern[i + 1] === '*') {
        // '**/' matches zero or more whole segments
        if (pattern[i + 2] === '/') {
          source += '(?:.*/)?';
          i += 2;
        } else {
          source += '.*';
          i += 1;
        }
      } else {
        source += '[^/]*';
      }
    } else if (ch === '?') {
      source += '[^/]';
    } else if (ch === '{') {
      braceDepth++;
      source += '(?:';
    } else if (ch === '}' && braceDepth > 0) {
      braceDepth--;
      source += ')';
    } else if (ch === ',' && braceDepth > 0) {
      source += '|';
    } else if ('\\^$.|+()[]{}'.includes(ch)) {
      source += `\\${ch}`;
    } else {
      source += ch;
    }
  }

  const regex = new RegExp(`^${source}$`);
  cache.set(pattern, regex);
  return regex;
}

export function matchesGlob(path: string, pattern: string): boolean {
  const normalized = path.replace(/\\/g, '/').replace(/^\.\//, '');
  const target = pattern.includes('/')
    ? normalized
    : normalized.slice(normalized.lastIndexOf('/') + 1);
  return globToRegExp(pattern.replace(/^\.\//, '')).test(target);
}
