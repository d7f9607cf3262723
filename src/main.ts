import { Effect, Layer, Logger, pipe } from 'effect';
import { config as loadDotenv } from 'dotenv';
import { HttpClientLive } from './http';
import { runFromEnvironment } from './pipeline';
import { MongoDocumentStoreLive } from './store';

loadDotenv();

const MainLive = Layer.mergeAll(HttpClientLive, MongoDocumentStoreLive, Logger.pretty);

const program = pipe(runFromEnvironment, Effect.provide(MainLive));

// A failed run is already logged; only the exit status is left to set
Effect.runPromise(program)
  .then((outcome) => {
    if (outcome._tag === 'Failed') {
      process.exitCode = 1;
    }
  })
  .catch((error: unknown) => {
    console.error('Unhandled error:', error);
    process.exitCode = 1;
  });
