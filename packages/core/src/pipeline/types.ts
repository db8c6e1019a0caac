import type { RandomSource } from '../discovery/random.js';
import type { RawCandidate } from '../discovery/types.js';
import type { SolutionFragment, SourceCitation } from '../aggregation/types.js';
import type { Article, QualityReport } from '../quality/types.js';

// ---------------------------------------------------------------------------
// Collaborator interfaces, implemented by @erratum/tools
// ---------------------------------------------------------------------------

export interface SourceContext {
  abortSignal?: AbortSignal;
  /** Randomness for keyword sampling and synthetic signals. */
  random: RandomSource;
}

/** Produces raw candidates from one external signal source. */
export interface SourceAdapter {
  readonly name: string;
  discover(ctx: SourceContext): Promise<RawCandidate[]>;
}

export interface CollectedSolutions {
  solutions: SolutionFragment[];
  citations: SourceCitation[];
}

/** Gathers fixes and references for one error text. */
export interface SolutionCollector {
  readonly name: string;
  collect(errorText: string, ctx: SourceContext): Promise<CollectedSolutions>;
}

export interface PublishResult {
  postId: number;
  url: string;
  status: string;
  publishedAt: string;
}

export interface PublishContext {
  abortSignal?: AbortSignal;
}

export interface Publisher {
  publish(article: Article, report: QualityReport, ctx?: PublishContext): Promise<PublishResult>;
}
