import { Effect, Layer, Logger, Option, LogLevel } from 'effect';
import type { EtlConfig } from '../src/config';
import { FetchError, InsertError } from '../src/errors';
import { HttpClient } from '../src/http';
import type { JsonObject } from '../src/json';
import { DocumentStore, type StoreTarget } from '../src/store';

export const FEED_URL = 'https://feeds.example.test/kev.json';

export const testConfig = (overrides: Partial<EtlConfig> = {}): EtlConfig => ({
  feedUrl: FEED_URL,
  mongoUri: Option.some('mongodb://store.example.test:27017'),
  database: 'etl_db',
  collection: 'cisa_kev',
  logLevel: LogLevel.Info,
  ...overrides,
});

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });

export interface FakeHttp {
  readonly layer: Layer.Layer<HttpClient>;
  readonly requests: string[];
}

export const fakeHttp = (
  respond: (url: string) => Effect.Effect<Response, FetchError>
): FakeHttp => {
  const requests: string[] = [];
  const layer = Layer.succeed(
    HttpClient,
    HttpClient.of({
      get: (url) =>
        Effect.suspend(() => {
          requests.push(url);
          return respond(url);
        }),
    })
  );
  return { layer, requests };
};

export const respondWith = (response: () => Response): FakeHttp =>
  fakeHttp(() => Effect.sync(response));

export interface InsertCall {
  readonly target: StoreTarget;
  readonly docs: ReadonlyArray<JsonObject>;
}

export interface FakeStore {
  readonly layer: Layer.Layer<DocumentStore>;
  readonly calls: InsertCall[];
}

export const fakeStore = (options: { fail?: boolean } = {}): FakeStore => {
  const calls: InsertCall[] = [];
  const layer = Layer.succeed(
    DocumentStore,
    DocumentStore.of({
      insertMany: (target, docs) =>
        Effect.suspend(() => {
          calls.push({ target, docs });
          return options.fail
            ? Effect.fail(
                new InsertError({
                  message: 'connection refused',
                  database: target.database,
                  collection: target.collection,
                })
              )
            : Effect.succeed(docs.length);
        }),
    })
  );
  return { layer, calls };
};

export interface CapturedLogs {
  readonly layer: Layer.Layer<never>;
  readonly lines: string[];
}

// Replaces the default logger with one that records "LEVEL message" lines
export const captureLogs = (): CapturedLogs => {
  const lines: string[] = [];
  const logger = Logger.make(({ logLevel, message }) => {
    const text = Array.isArray(message) ? message.map(String).join(' ') : String(message);
    lines.push(`${logLevel.label} ${text}`);
  });
  return { layer: Logger.replace(Logger.defaultLogger, logger), lines };
};
