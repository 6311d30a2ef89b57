/**
 * Model acquisition pipeline.
 *
 * Downloads configured marketplace models and hub snapshots into a models
 * volume, verifies them, and skips the whole run when the configuration has
 * not changed since the last successful run. `src/cli.ts` is the container
 * entry point; everything below is exported for programmatic use.
 */

export * from './domain';
export * from './config/acquisition-config';
export * from './parser/sources';
export * from './parser/identifier-parser';
export * from './http/scoped-client';
export * from './registry/registry-client';
export { MarketplaceClient, MarketplaceClientOptions } from './registry/marketplace-client';
export { HubClient, HubClientOptions } from './registry/hub-client';
export * from './transfer/transfer-engine';
export { computeBackoff, withRetry } from './transfer/retry-policy';
export * from './placement/placement';
export { sha256File } from './placement/integrity';
export { computeFingerprint } from './gate/fingerprint';
export * from './gate/completion-marker';
export * from './engine/deadline';
export { AcquisitionPipeline, PipelineDependencies, runPipeline, exitCodeForStatus } from './engine/pipeline';
export { createLogger, setLogHandler, setLogLevel, LogLevel, Logger, LogEntry } from './logger';
