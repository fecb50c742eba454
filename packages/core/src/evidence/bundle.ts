import {
  EVIDENCE_CHANNELS,
  type EvidenceBundle,
  type EvidenceChannels,
  type EvidenceItem,
  type SignalSummary,
} from './types.js';

/**
 * Flatten per-channel notes into one ordered bundle.
 *
 * Channels are visited in `EVIDENCE_CHANNELS` order. Blank notes are skipped
 * without consuming an ID; a note beyond the end of its channel's source list
 * gets an empty source.
 */
export function buildEvidenceBundle(channels: EvidenceChannels): EvidenceBundle {
  const snippets: EvidenceItem[] = [];
  let nextId = 1;

  for (const label of EVIDENCE_CHANNELS) {
    const channel = channels[label];
    if (!channel) continue;

    const sources = channel.sources ?? [];
    channel.notes.forEach((note, index) => {
      const text = typeof note === 'string' ? note.trim() : '';
      if (!text) return;

      const source = sources[index];
      snippets.push(Object.freeze({
        id: nextId++,
        label,
        text,
        source: typeof source === 'string' ? source.trim() : '',
      }));
    });
  }

  return Object.freeze({ snippets: Object.freeze(snippets) });
}

/** An empty bundle, used when the search layer produced nothing usable. */
export const EMPTY_BUNDLE: EvidenceBundle = Object.freeze({ snippets: Object.freeze([]) });

/**
 * The set of IDs a claim may cite.
 * Items with a non-integer or non-positive id (from a hand-built or foreign
 * bundle) are not citable.
 */
export function evidenceIds(bundle: EvidenceBundle | undefined): Set<number> {
  const ids = new Set<number>();
  for (const item of bundle?.snippets ?? []) {
    if (Number.isInteger(item.id) && item.id > 0) {
      ids.add(item.id);
    }
  }
  return ids;
}

export function summarizeSignals(bundle: EvidenceBundle | undefined): SignalSummary {
  const snippets = bundle?.snippets ?? [];
  const channels = new Set<string>();
  let sourceCount = 0;

  for (const item of snippets) {
    const label = String(item.label ?? '').trim();
    if (label) channels.add(label);
    if (String(item.source ?? '').trim()) sourceCount++;
  }

  return {
    snippet_count: snippets.length,
    source_count: sourceCount,
    channels: [...channels].sort(),
  };
}

/** Collapse runs of whitespace and cut to `maxLength` characters. */
export function compactText(text: string, maxLength: number): string {
  return (text ?? '').split(/\s+/).filter(Boolean).join(' ').slice(0, maxLength);
}
