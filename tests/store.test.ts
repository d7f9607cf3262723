import { Effect, Either, pipe } from 'effect';
import mongoose from 'mongoose';
import type { JsonObject } from '../src/json';
import { DocumentStore, MongoDocumentStoreLive } from '../src/store';

// Nothing listens on port 1, so server selection fails quickly
const UNREACHABLE = {
  uri: 'mongodb://127.0.0.1:1/?serverSelectionTimeoutMS=500',
  database: 'etl_db',
  collection: 'cisa_kev',
};

const insertMany = (docs: ReadonlyArray<JsonObject>) =>
  Effect.runPromise(
    pipe(
      DocumentStore,
      Effect.flatMap((store) => store.insertMany(UNREACHABLE, docs)),
      Effect.either,
      Effect.provide(MongoDocumentStoreLive)
    )
  );

describe('MongoDocumentStoreLive', () => {
  afterAll(() => mongoose.disconnect());

  it('fails with an InsertError when the server cannot be reached', async () => {
    const result = await insertMany([{ cveID: 'CVE-2024-0001' }]);

    const failure = Either.match(result, {
      onLeft: (e) => ({ tag: e._tag, message: e.message, database: e.database, hasCause: e.cause !== undefined }),
      onRight: (n) => ({ tag: 'inserted', message: String(n), database: '', hasCause: false }),
    });
    expect(failure).toEqual({
      tag: 'InsertError',
      message: 'Failed to connect to etl_db',
      database: 'etl_db',
      hasCause: true,
    });
  }, 10000);
});
