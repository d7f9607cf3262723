/**
 * KEV ingestion pipeline.
 *
 * configure -> extract -> transform -> load, each step run once. A failure
 * in any step is tagged with the step's name, logged, and turned into a
 * `Failed` outcome; the pipeline effect itself never fails.
 */

import { Cause, Data, Effect, Logger, pipe } from 'effect';
import { loadConfig, type EtlConfig } from './config';
import { PipelineFailure, UnexpectedError, type PipelineStep, type StepError } from './errors';
import { extract } from './fetcher';
import type { HttpClient } from './http';
import { load } from './loader';
import type { DocumentStore } from './store';
import { transform } from './transform';

type RunOutcome = Data.TaggedEnum<{
  Completed: { readonly inserted: number };
  Failed: { readonly step: PipelineStep; readonly error: StepError };
}>;

const RunOutcome = Data.taggedEnum<RunOutcome>();

// Runs an effect as the named step: defects become UnexpectedError, every
// failure is wrapped in a PipelineFailure, and log lines carry the step name.
const inStep =
  (step: PipelineStep) =>
  <A, E extends StepError, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, PipelineFailure, R> =>
    pipe(
      self,
      Effect.catchAllDefect((defect) =>
        Effect.fail(
          new UnexpectedError({
            message: defect instanceof Error ? defect.message : String(defect),
            cause: defect,
          })
        )
      ),
      Effect.mapError((error) => new PipelineFailure({ step, error })),
      Effect.annotateLogs('step', step)
    );

const MAX_CAUSE_DEPTH = 5;

// "TypeError: fetch failed <- Error: connect ECONNREFUSED 127.0.0.1:1"
const describeCause = (cause: unknown, depth = 0): string => {
  if (!(cause instanceof Error)) {
    return String(cause);
  }
  const head = `${cause.name}: ${cause.message}`;
  return cause.cause === undefined || depth >= MAX_CAUSE_DEPTH
    ? head
    : `${head} <- ${describeCause(cause.cause, depth + 1)}`;
};

const failureMessage = (failure: PipelineFailure): string => {
  const summary = `ETL process failed during ${failure.step}: ${failure.error.message}`;
  return failure.error.cause === undefined
    ? summary
    : `${summary} (caused by ${describeCause(failure.error.cause)})`;
};

const reportFailure = (failure: PipelineFailure): Effect.Effect<RunOutcome> =>
  pipe(
    Effect.logError(
      failureMessage(failure),
      Cause.fail(failure.error)
    ),
    Effect.as(RunOutcome.Failed({ step: failure.step, error: failure.error }))
  );

const runEtl = (config: EtlConfig): Effect.Effect<RunOutcome, never, HttpClient | DocumentStore> =>
  pipe(
    extract(config.feedUrl),
    inStep('extract'),
    Effect.flatMap((payload) => pipe(transform(payload), inStep('transform'))),
    Effect.flatMap((docs) => pipe(load(docs, config), inStep('load'))),
    Effect.tap(() => Effect.logInfo('ETL process completed successfully.')),
    Effect.map((inserted) => RunOutcome.Completed({ inserted })),
    Effect.catchTag('PipelineFailure', reportFailure)
  );

// Configuration problems are reported at the default level, since the
// configured one is not known yet.
const runFromEnvironment: Effect.Effect<RunOutcome, never, HttpClient | DocumentStore> = pipe(
  loadConfig,
  inStep('configure'),
  Effect.matchEffect({
    onFailure: reportFailure,
    onSuccess: (config) => pipe(runEtl(config), Logger.withMinimumLogLevel(config.logLevel)),
  })
);

export { runEtl, runFromEnvironment, RunOutcome };
