const UNQUOTED_SPECIAL = /[\s|&;<>()$`"*?[\]#~=%!{}]/;

/**
 * Read one POSIX shell word built from single-quoted runs and backslash
 * escapes. Throws on anything that would split the word or be expanded.
 */
export function readShellWord(input: string): string {
  let word = '';
  let i = 0;

  while (i < input.length) {
    const ch = input[i];

    if (ch === "'") {
      const end = input.indexOf("'", i + 1);
      if (end === -1) throw new Error('unterminated single quote');
      word += input.slice(i + 1, end);
      i = end + 1;
    } else if (ch === '\\') {
      if (i + 1 >= input.length) throw new Error('dangling escape');
      word += input[i + 1];
      i += 2;
    } else if (UNQUOTED_SPECIAL.test(ch)) {
      throw new Error(`unquoted special character ${JSON.stringify(ch)}`);
    } else {
      word += ch;
      i += 1;
    }
  }

  return word;
}

/**
 * Deterministic PRNG (mulberry32) so failures reproduce.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
