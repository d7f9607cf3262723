import { Context, Effect, Layer } from 'effect';
import { FetchError } from './errors';

// ============================================================================
// HttpClient service
// ============================================================================

interface HttpClient {
  get: (url: string) => Effect.Effect<Response, FetchError>;
}

const HttpClient = Context.GenericTag<HttpClient>('HttpClient');

// Effect.tryPromise hands the fiber's AbortSignal to the request, so an
// interrupted effect (e.g. a timeout upstream) also aborts the socket.
const HttpClientLive = Layer.succeed(
  HttpClient,
  HttpClient.of({
    get: (url: string) =>
      Effect.tryPromise({
        try: (signal) => fetch(url, { signal, headers: { accept: 'application/json' } }),
        catch: (error: unknown) =>
          new FetchError({
            message: `Failed to fetch ${url}`,
            url,
            cause: error,
          }),
      }),
  })
);

export { HttpClient, HttpClientLive };
