/**
 * Fuzzy string matching for dev extension search.
 *
 * Score tiers (higher is better):
 *   1000     exact
 *   700      starts with query
 *   500/400  substring, at a word boundary / elsewhere
 *   1–149    subsequence: every query char appears in order,
 *            with word-start and consecutive-char bonuses
 */

export interface StringMatchCandidate {
  id: number
  string: string
}

export interface StringMatch {
  candidateId: number
  string: string
  score: number
  /** Indices into `string` of the matched characters */
  positions: number[]
}

export interface MatchOptions {
  maxResults?: number
}

const WORD_SEPARATOR = /[\s\-_/.,()]/

function range(start: number, length: number): number[] {
  return Array.from({ length }, (_, i) => start + i)
}

function isWordStart(text: string, index: number): boolean {
  return index === 0 || WORD_SEPARATOR.test(text[index - 1] ?? '')
}

/**
 * Lowercase one UTF-16 unit at a time so indices into the result are indices
 * into `text` ('İ' folds to 'i', not the two-unit 'i̇').
 */
function foldCase(text: string): string {
  let folded = ''
  for (let i = 0; i < text.length; i++) {
    folded += text.charAt(i).toLowerCase().charAt(0)
  }
  return folded
}

function scoreCandidate(query: string, target: string): Omit<StringMatch, 'candidateId' | 'string'> | null {
  const t = foldCase(target)

  if (t === query) return { score: 1000, positions: range(0, t.length) }
  if (t.startsWith(query)) return { score: 700, positions: range(0, query.length) }

  const idx = t.indexOf(query)
  if (idx >= 0) {
    return { score: isWordStart(t, idx) ? 500 : 400, positions: range(idx, query.length) }
  }

  // Whitespace in the query only separates words; it never has to match
  const chars = query.replace(/\s+/g, '')
  const positions: number[] = []
  let score = 0
  let qi = 0
  for (let ti = 0; ti < t.length && qi < chars.length; ti++) {
    if (t[ti] !== chars[qi]) continue
    const last = positions[positions.length - 1]
    score += isWordStart(t, ti) ? 20 : last === ti - 1 ? 12 : 5
    positions.push(ti)
    qi++
  }
  if (qi < chars.length) return null

  return { score: Math.min(score, 149), positions }
}

/**
 * Match `query` against every candidate.
 *
 * Results are ordered by score, ties keeping candidate order. An empty query
 * matches every candidate with score 0.
 */
export function matchStrings(
  candidates: StringMatchCandidate[],
  query: string,
  options: MatchOptions = {}
): StringMatch[] {
  const q = foldCase(query.trim()).replace(/\s+/g, ' ')

  let matches: StringMatch[]
  if (!q) {
    matches = candidates.map(c => ({ candidateId: c.id, string: c.string, score: 0, positions: [] }))
  } else {
    matches = []
    for (const candidate of candidates) {
      const scored = scoreCandidate(q, candidate.string)
      if (scored) {
        matches.push({ candidateId: candidate.id, string: candidate.string, ...scored })
      }
    }
    matches.sort((a, b) => b.score - a.score)
  }

  return options.maxResults !== undefined ? matches.slice(0, options.maxResults) : matches
}
