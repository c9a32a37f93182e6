import { registerAs } from '@nestjs/config';

export interface RelationshipEngineConfig {
  resolver: {
    concurrencyLimit: number; // Max outstanding status lookups per batch
  };
  timeouts: {
    lookupMs: number;
    mutationMs: number;
    directoryMs: number;
  };
  search: {
    debounceMs: number; // Search-as-you-type
    fieldCheckDebounceMs: number; // Narrow per-field checks (username availability, etc.)
    resultLimit: number;
  };
}

function readPositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export default registerAs<RelationshipEngineConfig>('relationship', () => ({
  resolver: {
    concurrencyLimit: readPositiveInt(
      process.env.RELATIONSHIP_RESOLVER_CONCURRENCY,
      10,
    ),
  },
  timeouts: {
    lookupMs: readPositiveInt(process.env.RELATIONSHIP_LOOKUP_TIMEOUT_MS, 5000),
    mutationMs: readPositiveInt(
      process.env.RELATIONSHIP_MUTATION_TIMEOUT_MS,
      10000,
    ),
    directoryMs: readPositiveInt(
      process.env.RELATIONSHIP_DIRECTORY_TIMEOUT_MS,
      5000,
    ),
  },
  search: {
    debounceMs: readPositiveInt(process.env.RELATIONSHIP_SEARCH_DEBOUNCE_MS, 300),
    fieldCheckDebounceMs: 500,
    resultLimit: readPositiveInt(
      process.env.RELATIONSHIP_SEARCH_RESULT_LIMIT,
      20,
    ),
  },
}));
