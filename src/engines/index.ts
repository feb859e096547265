export { ArtifactLayout, isUnitComplete, isFailureSentinel, outputDirName } from './artifact.layout.js';
export { PageUnitResolver } from './page-unit.resolver.js';
export { PageWorker } from './page.worker.js';
export { RunTally } from './run.tally.js';
export { PipelineScheduler } from './pipeline.scheduler.js';
export { Aggregator } from './aggregation/aggregator.js';
export { PipelineEngine } from './pipeline.engine.js';
export { BatchCoordinator, OutputDirAllocator, listDocuments } from './batch.coordinator.js';
