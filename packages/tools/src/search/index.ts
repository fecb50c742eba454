export {
  type SearchDepth,
  type SearchOptions,
  type SearchResult,
  type SearchClientOptions,
  type EvidenceSearch,
  DEFAULT_SEARCH_TIMEOUT_MS,
  TavilySearchClient,
  emptySearchResult,
} from './client.js';

export {
  type GatherOptions,
  type GatheredEvidence,
  type FailureCheckEvidence,
  MACRO_STRESS_BASELINE,
  MACRO_STRESS_KEYWORDS,
  MAX_SNIPPET_LENGTH,
  channelQueries,
  scoreMacroStress,
  gatherEvidence,
  failureStatusRequest,
} from './gather.js';
