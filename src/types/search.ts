import { IndexDocument, SourceType } from './record.js';

export type SelectableField = Exclude<keyof IndexDocument, 'embedding'>;

export interface VectorMatch {
  id: string;
  content: string;
  source: string;
  sourceType: SourceType;
  title?: string;
  page?: number;
  score: number;
}

export interface ContextReference {
  number: number;
  id: string;
  label: string;
  url?: string;
  page?: number;
}

/**
 * Either a numbered context block ready for the prompt, or the
 * insufficient-context sentinel that short-circuits the chat call.
 */
export type ContextWindow =
  | { sufficient: true; text: string; references: ContextReference[] }
  | { sufficient: false; reason: string };

export interface SearchResponse {
  query: string;
  matches: VectorMatch[];
  executionTime: number;
}

/**
 * A raw store hit: `id` and `score` always, other fields only when selected.
 */
export interface SearchHit {
  id: string;
  score: number;
  content?: string;
  source?: string;
  sourceType?: SourceType;
  title?: string;
  page?: number;
}
