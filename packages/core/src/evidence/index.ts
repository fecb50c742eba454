export {
  EVIDENCE_CHANNELS,
  type EvidenceChannel,
  type EvidenceItem,
  type EvidenceBundle,
  type ChannelNotes,
  type EvidenceChannels,
  type SignalSummary,
} from './types.js';

export {
  buildEvidenceBundle,
  evidenceIds,
  summarizeSignals,
  compactText,
  EMPTY_BUNDLE,
} from './bundle.js';
