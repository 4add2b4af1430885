/**
 * Shell-style glob matching for KEYS and the SCAN family.
 *
 * Supports:
 *   *        any sequence, including the empty one
 *   ?        exactly one character
 *   [abc]    one character from the set
 *   [a-z]    one character from the range
 *   [^abc]   one character not in the set (also [!abc])
 *   \x       the literal character x
 *
 * A pattern with an unterminated class matches nothing.
 */

interface ClassMatch {
  matched: boolean;
  /** Pattern index just past the closing bracket. */
  end: number;
}

function matchClass(pattern: string, start: number, ch: string): ClassMatch | null {
  let i = start + 1;
  let negate = false;
  if (pattern[i] === '^' || pattern[i] === '!') {
    negate = true;
    i++;
  }

  let matched = false;
  while (true) {
    if (i >= pattern.length) return null;
    if (pattern[i] === ']') break;

    let lo = pattern[i];
    if (lo === '\\' && i + 1 < pattern.length) {
      i++;
      lo = pattern[i];
    }
    i++;

    if (pattern[i] === '-' && i + 1 < pattern.length && pattern[i + 1] !== ']') {
      let hi = pattern[i + 1];
      i += 2;
      if (hi === '\\' && i < pattern.length) {
        hi = pattern[i];
        i++;
      }
      if (lo <= ch && ch <= hi) matched = true;
    } else if (lo === ch) {
      matched = true;
    }
  }

  return { matched: matched !== negate, end: i + 1 };
}

export function globMatch(pattern: string, subject: string): boolean {
  if (pattern === '*') return true;

  let p = 0;
  let s = 0;
  // last '*' seen and the subject position it currently absorbs up to
  let starP = -1;
  let starS = 0;

  while (s < subject.length) {
    if (p < pattern.length) {
      const c = pattern[p];
      if (c === '*') {
        starP = p;
        starS = s;
        p++;
        continue;
      }
      if (c === '?') {
        p++;
        s++;
        continue;
      }
      if (c === '[') {
        const cls = matchClass(pattern, p, subject[s]);
        if (cls === null) return false;
        if (cls.matched) {
          p = cls.end;
          s++;
          continue;
        }
      } else if (c === '\\' && p + 1 < pattern.length) {
        if (pattern[p + 1] === subject[s]) {
          p += 2;
          s++;
          continue;
        }
      } else if (c === subject[s]) {
        p++;
        s++;
        continue;
      }
    }

    if (starP >= 0) {
      starS++;
      s = starS;
      p = starP + 1;
      continue;
    }
    return false;
  }

  while (p < pattern.length && pattern[p] === '*') p++;
  return p === pattern.length;
}
