/**
 * Evidence bundle types.
 *
 * An evidence bundle is the closed, ID-indexed universe of web-search
 * snippets a single report may cite. IDs are assigned once at build time
 * and every downstream citation check is made against this set.
 */

export const EVIDENCE_CHANNELS = [
  'macro',
  'micro',
  'industry',
  'news',
  'qualitative',
  'strategy',
  'failure_check',
] as const;

export type EvidenceChannel = typeof EVIDENCE_CHANNELS[number];

/** A single citable snippet. */
export interface EvidenceItem {
  /** 1-based, unique within the bundle, assigned in insertion order. */
  readonly id: number;
  readonly label: EvidenceChannel;
  /** Trimmed, never empty. */
  readonly text: string;
  /** Source URL, or an empty string when the search provider gave none. */
  readonly source: string;
}

export interface EvidenceBundle {
  readonly snippets: readonly EvidenceItem[];
}

/** Raw notes for one channel with a parallel (possibly shorter) list of URLs. */
export interface ChannelNotes {
  notes: string[];
  sources?: string[];
}

export type EvidenceChannels = Partial<Record<EvidenceChannel, ChannelNotes>>;

/** Counts describing what the search layer actually produced. */
export interface SignalSummary {
  snippet_count: number;
  source_count: number;
  channels: string[];
}
