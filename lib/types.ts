/**
 * Core type definitions for the news narration pipeline
 */

/**
 * Calendar parts as some feeds report them (month is 1-based)
 */
export interface CalendarParts {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
}

export type PublishedAtValue = string | number | Date | CalendarParts;

/**
 * A record as a source adapter hands it over, before normalization
 */
export interface RawSourceRecord {
  title?: string | null;
  description?: string | null;
  link?: string | null;
  published_at?: PublishedAtValue | null;
  source?: string | null;
}

/**
 * Canonical item shape; published_at is still the source's raw value
 */
export interface NormalizedItem {
  title: string;
  description: string;
  link: string;
  published_at: PublishedAtValue | null;
  source: string;
}

export interface RankScore {
  importance: number;
  entertainment: number;
  combined: number;
  reasoning: string;
}

export interface NewsItem {
  title: string;
  description: string;
  link: string;
  published_at: string; // ISO-8601, UTC
  source: string;
  fingerprint: string;
  rank?: RankScore;
}

export type RankedItem = NewsItem & { rank: RankScore };

/**
 * Section key (lowercase, underscored) -> raw section text
 */
export type ScriptDraft = Record<string, string>;

export interface FinalScript {
  metadata: {
    brand: string;
    generated_at: string;
    refinement_iterations: number;
  };
  sections: Record<string, string>;
}

export interface FreshnessCounts {
  admitted: number;
  old: number;
  duplicate: number;
  missing_date: number;
}

export interface AgentMessage<I = unknown, O = unknown> {
  agent: string;
  run_id: string;
  timestamp: string;
  input: I;
  output?: O;
  errors: string[];
  duration_ms?: number;
  api_calls?: number;
}

/**
 * Explicit per-run settings. Components receive these as arguments
 * rather than reading process-wide state.
 */
export interface PipelineSettings {
  language: string;
  country: string;
  max_age_hours: number;
  max_results: number;
  retention_cap: number;
  max_refine_iterations: number;
  top_count: number;
  brand_name: string;
  reddit_limit: number;
}
