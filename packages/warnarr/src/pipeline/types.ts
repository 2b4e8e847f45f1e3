/**
 * Pipeline types
 */

import type { EntityMatcher } from '../matching/matcher.js';
import type { MatchMethod, MediaItem } from '../matching/types.js';
import type { WarningThresholds } from '../shared/types.js';

/** Persists a new overview for one item (Jellyfin in production) */
export interface DescriptionWriter {
  updateDescription(item: MediaItem, description: string): Promise<void>;
}

export type OutcomeStatus = 'updated' | 'skipped-no-match' | 'skipped-no-warnings' | 'failed';

export interface ItemOutcome {
  itemId: string;
  label: string;            // "Title (Year)"
  status: OutcomeStatus;
  method?: MatchMethod;
  dtddId?: number;
  warningText?: string;
  changed?: boolean;        // overview differed from the annotated one
  dryRun: boolean;
  stage?: 'match' | 'write';
  error?: string;
}

export interface PipelineDeps {
  matcher: Pick<EntityMatcher, 'match'>;
  writer: DescriptionWriter;
}

export interface PipelineOptions {
  thresholds: WarningThresholds;
  separator: string;
  dryRun?: boolean;
  onOutcome?: (outcome: ItemOutcome) => void;
}

export interface BatchSummary {
  processed: number;
  updated: number;
  noMatch: number;
  noWarnings: number;
  failed: number;
  elapsedMs: number;
  dryRun: boolean;
}

export interface ClearOutcome {
  itemId: string;
  label: string;
  status: 'cleared' | 'failed';
  error?: string;
}

export interface ClearSummary {
  scanned: number;
  cleared: number;
  failed: number;
  dryRun: boolean;
}
