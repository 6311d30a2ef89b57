#!/usr/bin/env node
/**
 * `acquire-models`: run the acquisition pipeline once from the environment.
 *
 * Exit codes: 0 success or nothing to do, 2 partial failure, 3 every item
 * failed, 124 run budget exceeded, 1 setup failure.
 */

import { loadConfig } from './config/acquisition-config';
import { AcquisitionError, invalidConfigError, toTypedError } from './domain/errors';
import { PipelineDependencies, exitCodeForStatus, runPipeline } from './engine/pipeline';
import { LogLevel, logger, setLogLevel } from './logger';

export const SETUP_FAILURE_EXIT_CODE = 1;

export async function main(
  env: Record<string, string | undefined> = process.env,
  deps: PipelineDependencies = {},
): Promise<number> {
  const log = (deps.logger ?? logger).child({ component: 'cli' });
  const { config, errors, warnings } = loadConfig(env);
  if (config.debug) setLogLevel(LogLevel.Debug);
  for (const warning of warnings) log.warn(warning);

  try {
    if (errors.length > 0) throw new AcquisitionError(invalidConfigError(errors));
    const report = await runPipeline(config, deps);
    return exitCodeForStatus(report.status);
  } catch (err) {
    const typed = toTypedError(err);
    log.error('Acquisition could not run', { code: typed.code, error: typed.message, details: typed.details });
    return SETUP_FAILURE_EXIT_CODE;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.error('Unhandled failure', { error: err instanceof Error ? err.message : String(err) });
      process.exitCode = SETUP_FAILURE_EXIT_CODE;
    },
  );
}
