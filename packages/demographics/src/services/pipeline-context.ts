import type { StatisticsSource } from '../providers/nomis-client.js';
import type { StationRegistry } from '../registry/station-registry.js';

/**
 * Collaborators every pipeline operation receives explicitly
 */
export interface PipelineContext {
  readonly registry: StationRegistry;
  readonly source: StatisticsSource;
}
