import type { AppliedSpan, Occurrence, ReplaceTarget } from './tools/docx/types.js';

export type OccurrenceState = 'active' | 'consumed' | 'possibly-stale';

export interface StoredOccurrence {
  readonly occurrence: Occurrence;
  state: OccurrenceState;
  /** Sum of length changes from earlier replacements in the same paragraph. */
  shift: number;
}

export interface SearchSessionOptions {
  rootDirectory: string;
  searchTerm: string;
  caseSensitive: boolean;
  contextChars: number;
}

export interface SearchSessionSnapshot extends SearchSessionOptions {
  sessionId: number;
  createdAt: number;
  totalOccurrences: number;
  active: number;
  consumed: number;
  possiblyStale: number;
  occurrences: Array<Occurrence & { state: OccurrenceState }>;
}

/**
 * Occurrences of one search, keyed by identity, from the search until the
 * next search or reset. Entries are never removed: a consumed occurrence
 * stays so a repeated request can be answered with "already replaced".
 */
export class SearchSession {
  readonly createdAt = Date.now();
  private readonly entries = new Map<string, StoredOccurrence>();
  private sequence = 0;

  constructor(
    readonly id: number,
    readonly options: SearchSessionOptions,
  ) {}

  /** Next identity, unique across every file scanned in this session. */
  nextId(): string {
    return `occ_${this.id}_${++this.sequence}`;
  }

  add(occurrence: Occurrence): void {
    this.entries.set(occurrence.id, { occurrence, state: 'active', shift: 0 });
  }

  get(id: string): StoredOccurrence | undefined {
    return this.entries.get(id);
  }

  list(): StoredOccurrence[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }

  /** Offsets to hand to the replacement engine, corrected by known shifts. */
  targetFor(entry: StoredOccurrence): ReplaceTarget {
    const { paragraphIndex, start, end, matchText } = entry.occurrence;
    return {
      paragraphIndex,
      start: start + entry.shift,
      end: end + entry.shift,
      matchText,
    };
  }

  /**
   * Mark an occurrence replaced. Later occurrences in the same paragraph
   * become possibly-stale and carry the span's length change; the engine's
   * staleness guard decides whether they still hold.
   */
  markConsumed(id: string, span: AppliedSpan): void {
    const consumed = this.entries.get(id);
    if (!consumed || consumed.state === 'consumed') return;
    consumed.state = 'consumed';

    const { filePath, paragraphIndex, end } = consumed.occurrence;
    for (const entry of this.entries.values()) {
      if (entry === consumed || entry.state === 'consumed') continue;
      const other = entry.occurrence;
      if (other.filePath !== filePath || other.paragraphIndex !== paragraphIndex) continue;
      if (other.start >= end) {
        entry.state = 'possibly-stale';
        entry.shift += span.delta;
      }
    }
  }

  snapshot(): SearchSessionSnapshot {
    let active = 0;
    let consumed = 0;
    let possiblyStale = 0;
    const occurrences: SearchSessionSnapshot['occurrences'] = [];

    for (const entry of this.entries.values()) {
      if (entry.state === 'active') active++;
      else if (entry.state === 'consumed') consumed++;
      else possiblyStale++;
      occurrences.push({ ...entry.occurrence, state: entry.state });
    }

    return {
      ...this.options,
      sessionId: this.id,
      createdAt: this.createdAt,
      totalOccurrences: this.entries.size,
      active,
      consumed,
      possiblyStale,
      occurrences,
    };
  }
}

/**
 * Holds the current search session. Handed to whoever needs it rather than
 * kept as a module global. Session numbers keep growing, so an identity
 * from an earlier search can never resolve against a later one.
 */
export class SearchSessionStore {
  private current: SearchSession | null = null;
  private sessionCounter = 0;

  begin(options: SearchSessionOptions): SearchSession {
    this.current = new SearchSession(++this.sessionCounter, options);
    return this.current;
  }

  get session(): SearchSession | null {
    return this.current;
  }

  resolve(id: string): { session: SearchSession; entry: StoredOccurrence } | undefined {
    const entry = this.current?.get(id);
    return this.current && entry ? { session: this.current, entry } : undefined;
  }

  reset(): void {
    this.current = null;
  }
}
