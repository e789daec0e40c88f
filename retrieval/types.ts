export type RecordKind = 'pattern';

/**
 * One indexed pattern and the canned replies of the intent it belongs to.
 * Stored frozen; hits hand out copies.
 */
export interface IntentRecord {
  text: string;
  tag: string;
  responses: string[];
  kind: RecordKind;
}

export interface IndexConfig {
  modelName: string;
  dimension: number;
  totalVectors: number;
}

export interface SearchHit {
  /** 1-based position in the ranked result. */
  rank: number;
  record: IntentRecord;
  /** Squared Euclidean distance between query and stored vector. */
  distance: number;
  /** `1 / (1 + distance)`, always in (0, 1]. */
  score: number;
}

export interface MatchResult {
  matched: boolean;
  best?: SearchHit;
}

export type IndexStats =
  | { loaded: false; threshold: number }
  | {
    loaded: true;
    totalVectors: number;
    dimension: number;
    modelName: string;
    threshold: number;
  };

export function copyRecord(record: IntentRecord): IntentRecord {
  return {
    text: record.text,
    tag: record.tag,
    responses: [...record.responses],
    kind: record.kind
  };
}
