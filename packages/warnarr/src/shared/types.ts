/**
 * Warnarr shared types
 */

// ============================================================================
// Configuration
// ============================================================================

export interface WarnarrConfig {
  // DoesTheDogDie.com API
  dtdd: {
    apiKey: string;
    baseUrl: string;
    delaySeconds: number;   // minimum spacing between outbound calls
    timeoutMs: number;
  };

  // Response cache (SQLite)
  cache: {
    dbPath: string;
    ttlSeconds: number;
  };

  // Jellyfin integration
  jellyfin: {
    url: string;
    apiKey: string;
    userId: string;         // optional; empty = use /Items/{id}
    libraries: string[];    // empty = every movie library
  };

  warnings: WarningThresholds & {
    separator: string;
  };

  runLog: {
    enabled: boolean;
    dir: string;
  };

  dryRun: boolean;
}

export interface WarningThresholds {
  minYesVotes: number;
  minYesRatio: number;      // 0..1
  includeSafeTopics: boolean;
}

// ============================================================================
// Errors
// ============================================================================

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
