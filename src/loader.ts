import { Effect, Option, pipe } from 'effect';
import type { EtlConfig } from './config';
import { ConfigurationError, InsertError } from './errors';
import type { JsonObject } from './json';
import { DocumentStore } from './store';

type LoadTarget = Pick<EtlConfig, 'mongoUri' | 'database' | 'collection'>;

const load = (
  docs: ReadonlyArray<JsonObject>,
  target: LoadTarget
): Effect.Effect<number, ConfigurationError | InsertError, DocumentStore> =>
  Option.match(target.mongoUri, {
    onNone: () =>
      Effect.fail(
        new ConfigurationError({
          message: 'MONGO_URI not set in environment variables.',
          key: 'MONGO_URI',
        })
      ),
    onSome: (uri) => {
      if (docs.length === 0) {
        return pipe(Effect.logWarning('No documents to insert.'), Effect.as(0));
      }
      return pipe(
        DocumentStore,
        Effect.flatMap((store) =>
          store.insertMany({ uri, database: target.database, collection: target.collection }, docs)
        ),
        Effect.tap((inserted) =>
          Effect.logInfo(`Inserted ${inserted} documents into ${target.database}.${target.collection}`)
        )
      );
    },
  });

export { load };
