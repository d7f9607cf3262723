import { Duration, Effect, pipe } from 'effect';
import { FetchError, ParseError } from './errors';
import { HttpClient } from './http';
import type { JsonValue } from './json';

const FETCH_TIMEOUT = Duration.seconds(30);

const readBody = (response: Response, url: string): Effect.Effect<string, FetchError> =>
  Effect.tryPromise({
    try: () => response.text(),
    catch: (error: unknown) =>
      new FetchError({
        message: `Failed to read response body from ${url}`,
        url,
        cause: error,
      }),
  });

// JSON.parse throws SyntaxError; Effect.try turns it into a ParseError
const parseJson = (body: string, url: string): Effect.Effect<JsonValue, ParseError> =>
  Effect.try({
    try: (): JsonValue => JSON.parse(body),
    catch: (error: unknown) =>
      new ParseError({
        message: `Response from ${url} is not valid JSON`,
        url,
        cause: error,
      }),
  });

/**
 * GET the feed and parse it as JSON.
 *
 * The timeout bounds the whole exchange, body included. Nothing is retried.
 */
const extract = (url: string): Effect.Effect<JsonValue, FetchError | ParseError, HttpClient> =>
  pipe(
    Effect.logInfo(`Extracting data from ${url}`),
    Effect.zipRight(HttpClient),
    Effect.flatMap((http) => http.get(url)),
    Effect.flatMap((response) =>
      response.ok
        ? readBody(response, url)
        : Effect.fail(
            new FetchError({
              message: `HTTP error ${response.status}: ${url}`,
              url,
              status: response.status,
            })
          )
    ),
    Effect.timeoutFail({
      duration: FETCH_TIMEOUT,
      onTimeout: () =>
        new FetchError({
          message: `Request timed out after ${Duration.toMillis(FETCH_TIMEOUT)}ms: ${url}`,
          url,
        }),
    }),
    Effect.flatMap((body) => parseJson(body, url))
  );

export { extract, FETCH_TIMEOUT };
