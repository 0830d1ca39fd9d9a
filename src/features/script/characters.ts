// Character name extraction: screenplay cues and, for prose, dialogue attribution.
// All names are canonicalized to upper case, the screenplay convention.

const TITLE_RE = /^(?:MR|MRS|MS|MISS|DR|PROF|PROFESSOR|SIR|LADY|LORD|MADAM|MADAME)\.?\s+/i;

/** Cue extensions such as (V.O.), (O.S.), (CONT'D) and the dual-dialogue caret. */
const EXTENSION_RE = /\s*\([^)]*\)\s*/g;

// Sentence openers that the attribution pattern would otherwise read as names ("Then Mara said").
const STOPWORDS = new Set([
  'A', 'AN', 'AND', 'AS', 'BUT', 'HE', 'SHE', 'IT', 'THEY', 'WE', 'I', 'YOU',
  'THEN', 'THE', 'WHEN', 'SO', 'NOW', 'LATER', 'FINALLY', 'STILL', 'ONCE', 'SOMEONE',
]);

const TRANSITION_RE = /^(?:[A-Z ]+ TO:|FADE (?:IN|OUT)[.:]?|FADE TO BLACK\.?|CUT TO BLACK\.?|THE END\.?)$/;

export function canonicalName(raw: string): string {
  return raw
    .replace(EXTENSION_RE, ' ')
    .replace(/\^\s*$/, '')
    .replace(/\s+/g, ' ')
    .trim()
    .toUpperCase();
}

/**
 * A screenplay character cue: an upper-case line of at most 40 chars that is not a
 * transition and does not end like a sentence. `@Name` forces a cue (Fountain).
 */
export function cueName(line: string): string | null {
  const t = line.trim();
  if (!t) return null;
  if (t.startsWith('@')) {
    const forced = canonicalName(t.slice(1));
    return forced || null;
  }
  if (t.length > 40) return null;
  if (!/[A-Z]/.test(t) || /[a-z]/.test(t.replace(EXTENSION_RE, ''))) return null;
  if (TRANSITION_RE.test(t)) return null;
  const name = canonicalName(t);
  if (!name || /[.!?:,;]$/.test(name)) return null;
  if (!/^[A-Z0-9][A-Z0-9 .'\-#]*$/.test(name)) return null;
  return name;
}

/**
 * Names from prose dialogue attribution: "Mara said", "said Dr. Chen", "Joe Bloggs whispered".
 * Titles are stripped; sentence openers are dropped.
 */
export function attributedNames(text: string): Set<string> {
  const names = new Set<string>();
  if (!text) return names;

  const verbGroup = '(?:said|asked|replied|whispered|shouted|muttered|yelled|called)';
  const titleRegex = '(?:Mr|Mrs|Ms|Miss|Dr|Prof|Professor|Sir|Lady|Lord|Madam|Madame)\\.?';
  const nameToken = '[A-Z][a-z]+';
  const nameSeq = `(?:${titleRegex}\\s+)?${nameToken}(?:\\s+${nameToken}){0,2}`;

  const before = new RegExp(`\\b(${nameSeq})\\s+${verbGroup}\\b`, 'g');
  const after = new RegExp(`\\b${verbGroup}\\s+(${nameSeq})\\b`, 'g');

  for (const re of [before, after]) {
    let m: RegExpExecArray | null;
    while ((m = re.exec(text)) !== null) {
      const raw = m[1];
      if (!raw) continue;
      const name = dropStopwords(canonicalName(raw.replace(TITLE_RE, '')));
      if (name) names.add(name);
    }
  }
  return names;
}

function dropStopwords(name: string): string {
  const parts = name.split(' ');
  while (parts.length && STOPWORDS.has(parts[0] ?? '')) parts.shift();
  return parts.join(' ');
}

/** Comparison key for spotting spelling variants: case, spacing and punctuation removed. */
export function nameKey(name: string): string {
  return name.replace(TITLE_RE, '').toUpperCase().replace(/[^A-Z0-9]/g, '');
}
