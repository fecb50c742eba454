/**
 * Follow-up operations on a finished report: answering a question about it
 * and checking whether a company actually failed. Both prefer a reasoning
 * model and fall back to the deterministic heuristics when none answers.
 */

import {
  heuristicAnswer,
  heuristicFailureStatus,
  summarizeProviderError,
  type CompanyProfile,
  type FailureStatus,
  type JsonOutput,
  type ProviderPayload,
  type QuestionAnswer,
  type ReasoningLLM,
} from '@autopsy/core';
import {
  channelQueries,
  emptySearchResult,
  failureStatusRequest,
  type EvidenceSearch,
  type SearchResult,
} from '@autopsy/tools';

export const WEB_EVIDENCE_PER_QUERY = 4;

export type AnswerSource = 'model' | 'heuristic';

export interface AskResult {
  answer: QuestionAnswer;
  source: AnswerSource;
  webEvidence: ProviderPayload[];
  /** Why the model was not used, when it was not. */
  error?: string;
}

export interface AskOptions {
  document: JsonOutput;
  question: string;
  answerer?: ReasoningLLM;
  search?: EvidenceSearch;
}

/** The slice of a saved report a model needs to answer questions about it. */
export function reportContext(document: JsonOutput): ProviderPayload {
  const { metadata, report } = document;
  return {
    company: { name: metadata.company, ticker: metadata.ticker, industry: metadata.industry ?? '' },
    executive_summary: report.executive_summary,
    failure_drivers: report.failure_drivers,
    survivor_strategies: report.survivor_strategies,
    counterfactual_impact: report.counterfactual_impact,
    disagreements: report.disagreements,
    final_recommendations: report.final_recommendations,
    overall_confidence: report.overall_confidence,
  };
}

/** Web snippets paired with their source for a question, company query first. */
export async function questionEvidence(
  search: EvidenceSearch,
  document: JsonOutput,
  question: string,
): Promise<ProviderPayload[]> {
  const { company, ticker, industry } = document.metadata;
  const queries = [
    `${company} ${ticker} ${question}`,
    `${industry || 'listed'} distressed company survivor strategies ${question}`,
  ];

  const results = await Promise.all(
    queries.map(query => search.search(query, { maxResults: WEB_EVIDENCE_PER_QUERY })),
  );

  const evidence: ProviderPayload[] = [];
  for (const result of results) {
    result.snippets.slice(0, WEB_EVIDENCE_PER_QUERY).forEach((snippet, index) => {
      evidence.push({ snippet, source: result.sources[index] ?? '' });
    });
  }
  return evidence;
}

export async function askReport(options: AskOptions): Promise<AskResult> {
  const { document, question, answerer, search } = options;
  const webEvidence = search?.enabled ? await questionEvidence(search, document, question) : [];

  if (!answerer) {
    return {
      answer: heuristicAnswer(question, document.report),
      source: 'heuristic',
      webEvidence,
      error: 'no reasoning provider configured',
    };
  }

  try {
    const answer = await answerer.answerQuestion(question, reportContext(document), webEvidence);
    return { answer, source: 'model', webEvidence };
  } catch (err) {
    return {
      answer: heuristicAnswer(question, document.report),
      source: 'heuristic',
      webEvidence,
      error: summarizeProviderError(err) ?? 'provider failed without a message',
    };
  }
}

export interface VerifyOptions {
  companyInput: string;
  profile: CompanyProfile;
  search?: EvidenceSearch;
  verifier?: ReasoningLLM;
  failureYear?: number | null;
}

export interface VerifyResult {
  status: FailureStatus;
  sources: string[];
  error?: string;
}

export async function verifyCompany(options: VerifyOptions): Promise<VerifyResult> {
  const { companyInput, profile, search, verifier } = options;
  const failureQuery = channelQueries(profile, options.failureYear)
    .find(query => query.channel === 'failure_check');

  const result: SearchResult = search?.enabled && failureQuery
    ? await search.search(failureQuery.query, { maxResults: failureQuery.maxResults })
    : emptySearchResult(failureQuery?.query ?? companyInput);

  const request = failureStatusRequest(companyInput, profile, result);
  const sources = result.sources.filter(Boolean);

  if (!verifier) {
    return { status: heuristicFailureStatus(request), sources, error: 'no reasoning provider configured' };
  }

  try {
    return { status: await verifier.verifyFailureStatus(request), sources };
  } catch (err) {
    return {
      status: heuristicFailureStatus(request),
      sources,
      error: summarizeProviderError(err) ?? 'provider failed without a message',
    };
  }
}
