/**
 * Order pipeline: collaborators, service boundary, leases and batches.
 */

export { withTimeout, type Collaborators } from "./collaborators.js";
export { PreflightService, type PreflightServiceOptions, type ValidationOutcome } from "./service.js";
export { OrderLeaseManager, type OrderLease } from "./lease.js";
export {
  OrderPipeline,
  runBatch,
  type BatchItem,
  type BatchOptions,
  type BatchOutcome,
  type BatchStatus,
  type OrderPipelineOptions,
  type RunOptions,
} from "./pipeline.js";
export {
  InMemoryCollaborators,
  SampleFixturesSchema,
  SAMPLE_FIXTURES_FILE,
  loadSampleFixtures,
  type LoadedFixtures,
  type SampleFixtures,
} from "./memory.js";
