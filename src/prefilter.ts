/**
 * KeywordPrefilter - Aho-Corasick gate over every enabled language's keywords
 *
 * Answers "could this text contain a time expression?" in one pass over the
 * text, independent of how many keywords are loaded. A miss here must never
 * hide a real match; a false hit only costs rule evaluation.
 *
 * Matching is case-insensitive: each dictionary character gets an edge for
 * its lower- and upper-case code unit, so the text is walked as-is without
 * being lower-cased or copied.
 */

// ============================================================================
// Type Definitions
// ============================================================================

export type PrefilterEntryKind = 'keyword' | 'prefix'

export interface PrefilterEntry {
  /** Dictionary word, lower-cased per code unit (same length as declared). */
  word: string
  kind: PrefilterEntryKind
  /** Languages that declared the word, in enable order. */
  languages: readonly string[]
}

export interface PrefilterHit extends PrefilterEntry {
  start: number
  end: number
}

export interface PrefilterSource {
  language: string
  keywords: readonly string[]
  prefixes: readonly string[]
}

/** Bits returned by {@link KeywordPrefilter.probe}. */
export const KEYWORD_HIT = 1
export const PREFIX_HIT = 2

/**
 * Aho-Corasick automaton node
 */
interface ACNode {
  children: Map<number, ACNode>
  fail: ACNode | null
  output: PrefilterEntry[]  // Entries ending at this node, fail chain included
  flags: number             // KEYWORD_HIT | PREFIX_HIT over `output`
}

const EMPTY_OUTPUT: readonly PrefilterEntry[] = Object.freeze([])

// ============================================================================
// Case Folding
// ============================================================================

/** Lower-cases one code unit at a time so offsets survive folding. */
export function foldCase(word: string): string {
  let folded = ''
  for (const ch of word.split('')) {
    const lower = ch.toLowerCase()
    folded += lower.length === 1 ? lower : ch
  }
  return folded
}

/** Code units a folded character matches in raw text. */
function caseVariants(ch: string): number[] {
  const variants = [ch.charCodeAt(0)]
  const upper = ch.toUpperCase()
  if (upper.length === 1 && upper !== ch && upper.toLowerCase() === ch) {
    variants.push(upper.charCodeAt(0))
  }
  return variants
}

// ============================================================================
// Automaton
// ============================================================================

export class KeywordPrefilter {
  private readonly root: ACNode
  private readonly size: number

  constructor(sources: readonly PrefilterSource[]) {
    this.root = this.createNode()
    this.size = this.build(sources)
  }

  /** Number of distinct dictionary entries. */
  get entryCount(): number {
    return this.size
  }

  private createNode(): ACNode {
    return {
      children: new Map(),
      fail: null,
      output: [],
      flags: 0,
    }
  }

  private build(sources: readonly PrefilterSource[]): number {
    // Collect entries so a word declared by several languages is stored once
    const entries = new Map<string, { word: string; kind: PrefilterEntryKind; languages: string[] }>()
    const collect = (word: string, kind: PrefilterEntryKind, language: string) => {
      const folded = foldCase(word)
      if (folded.length === 0) return
      const key = `${kind}:${folded}`
      const entry = entries.get(key)
      if (entry === undefined) {
        entries.set(key, { word: folded, kind, languages: [language] })
      } else if (!entry.languages.includes(language)) {
        entry.languages.push(language)
      }
    }
    for (const source of sources) {
      for (const keyword of source.keywords) collect(keyword, 'keyword', source.language)
      for (const prefix of source.prefixes) collect(prefix, 'prefix', source.language)
    }

    // Phase 1: Build trie, one edge per case variant
    for (const entry of entries.values()) {
      let node = this.root
      for (const ch of entry.word.split('')) {
        const variants = caseVariants(ch)
        let next = node.children.get(variants[0] ?? 0)
        if (next === undefined) {
          next = this.createNode()
          for (const code of variants) node.children.set(code, next)
        }
        node = next
      }
      node.output.push(Object.freeze({
        word: entry.word,
        kind: entry.kind,
        languages: Object.freeze([...entry.languages]),
      }))
    }

    // Phase 2: Build failure links using BFS
    const queue: ACNode[] = []
    const visited = new Set<ACNode>()

    for (const child of this.root.children.values()) {
      if (visited.has(child)) continue
      visited.add(child)
      child.fail = this.root
      child.flags = flagsOf(child.output)
      queue.push(child)
    }

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head]
      if (current === undefined) break

      for (const [code, child] of current.children) {
        if (visited.has(child)) continue
        visited.add(child)
        queue.push(child)

        // Follow failure links to find longest proper suffix
        let fail = current.fail
        while (fail !== null && !fail.children.has(code)) {
          fail = fail.fail
        }
        const target = fail?.children.get(code) ?? this.root
        child.fail = target

        // Merge outputs from failure chain (longest word first)
        if (target.output.length > 0) {
          child.output = [...child.output, ...target.output]
        }
        child.flags = flagsOf(child.output)
      }
    }

    return entries.size
  }

  private step(node: ACNode, code: number): ACNode {
    let current = node
    while (current !== this.root && !current.children.has(code)) {
      current = current.fail ?? this.root
    }
    return current.children.get(code) ?? this.root
  }

  /**
   * KEYWORD_HIT / PREFIX_HIT bits for the text, 0 when nothing matched.
   * Stops as soon as every requested bit is set. Allocates nothing.
   */
  probe(text: string, includePrefixes: boolean): number {
    const wanted = includePrefixes ? KEYWORD_HIT | PREFIX_HIT : KEYWORD_HIT
    let found = 0
    let node = this.root

    for (let i = 0; i < text.length; i++) {
      node = this.step(node, text.charCodeAt(i))
      found |= node.flags & wanted
      if (found === wanted) break
    }

    return found
  }

  containsCandidate(text: string, includePrefixes = true): boolean {
    return this.probe(text, includePrefixes) !== 0
  }

  /**
   * Find all dictionary hits in O(n + hits) time, ordered by end position
   * and, at the same end, longest word first.
   */
  matches(text: string): PrefilterHit[] {
    const hits: PrefilterHit[] = []
    let node = this.root

    for (let i = 0; i < text.length; i++) {
      node = this.step(node, text.charCodeAt(i))
      for (const entry of node.output) {
        hits.push({ ...entry, start: i + 1 - entry.word.length, end: i + 1 })
      }
    }

    return hits
  }

  /** Entries that end exactly at the end of the text, longest first. */
  suffixEntries(text: string): readonly PrefilterEntry[] {
    let node = this.root
    for (let i = 0; i < text.length; i++) {
      node = this.step(node, text.charCodeAt(i))
    }
    return node.output.length > 0 ? node.output : EMPTY_OUTPUT
  }
}

function flagsOf(output: readonly PrefilterEntry[]): number {
  let flags = 0
  for (const entry of output) {
    flags |= entry.kind === 'keyword' ? KEYWORD_HIT : PREFIX_HIT
  }
  return flags
}
