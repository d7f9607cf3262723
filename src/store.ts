import { Context, Effect, Layer, pipe } from 'effect';
import mongoose, { Schema, type Connection } from 'mongoose';
import { InsertError } from './errors';
import type { JsonObject } from './json';

interface StoreTarget {
  readonly uri: string;
  readonly database: string;
  readonly collection: string;
}

interface DocumentStore {
  /** Insert all documents in one unordered batch; succeeds with the inserted count. */
  insertMany: (
    target: StoreTarget,
    docs: ReadonlyArray<JsonObject>
  ) => Effect.Effect<number, InsertError>;
}

const DocumentStore = Context.GenericTag<DocumentStore>('DocumentStore');

// Records are schemaless; strict: false keeps every field the feed sends
const recordSchema = new Schema({}, { strict: false, versionKey: false });

const insertError = (target: StoreTarget, message: string) => (error: unknown) =>
  new InsertError({
    message,
    database: target.database,
    collection: target.collection,
    cause: error,
  });

const connect = (target: StoreTarget): Effect.Effect<Connection, InsertError> =>
  Effect.tryPromise({
    try: () => mongoose.createConnection(target.uri, { dbName: target.database }).asPromise(),
    catch: insertError(target, `Failed to connect to ${target.database}`),
  });

const disconnect = (connection: Connection): Effect.Effect<void> =>
  pipe(
    Effect.tryPromise(() => connection.close()),
    Effect.catchAll((error) => Effect.logWarning('Failed to close MongoDB connection', error))
  );

// Effect.acquireUseRelease closes the connection whether the insert succeeds or not
const MongoDocumentStoreLive = Layer.succeed(
  DocumentStore,
  DocumentStore.of({
    insertMany: (target, docs) =>
      Effect.acquireUseRelease(
        connect(target),
        (connection) =>
          Effect.tryPromise({
            try: async () => {
              const model = connection.model('Record', recordSchema, target.collection);
              // the driver assigns _id on the objects it is given, so hand it copies
              const inserted = await model.insertMany(
                docs.map((doc) => ({ ...doc })),
                { ordered: false, lean: true }
              );
              return inserted.length;
            },
            catch: insertError(
              target,
              `Bulk insert into ${target.database}.${target.collection} failed`
            ),
          }),
        disconnect
      ),
  })
);

export { DocumentStore, MongoDocumentStoreLive };
export type { StoreTarget };
