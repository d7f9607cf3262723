import { Data } from 'effect';

// ============================================================================
// Typed Errors
// ============================================================================

// Each step exposes its failures through the Effect error channel;
// the _tag discriminant lets the orchestrator match on them with catchTag.

class ConfigurationError extends Data.TaggedError('ConfigurationError')<{
  message: string;
  key?: string;
  cause?: unknown;
}> {}

class FetchError extends Data.TaggedError('FetchError')<{
  message: string;
  url: string;
  status?: number;
  cause?: unknown;
}> {}

class ParseError extends Data.TaggedError('ParseError')<{
  message: string;
  url: string;
  cause?: unknown;
}> {}

// payload or record does not have the shape documents are built from
class TransformError extends Data.TaggedError('TransformError')<{
  message: string;
  index?: number;
}> {}

class InsertError extends Data.TaggedError('InsertError')<{
  message: string;
  database: string;
  collection: string;
  cause?: unknown;
}> {}

// a defect (thrown, not failed) inside one of the steps
class UnexpectedError extends Data.TaggedError('UnexpectedError')<{
  message: string;
  cause: unknown;
}> {}

type StepError =
  | ConfigurationError
  | FetchError
  | ParseError
  | TransformError
  | InsertError
  | UnexpectedError;

type PipelineStep = 'configure' | 'extract' | 'transform' | 'load';

class PipelineFailure extends Data.TaggedError('PipelineFailure')<{
  step: PipelineStep;
  error: StepError;
}> {}

export {
  ConfigurationError,
  FetchError,
  ParseError,
  TransformError,
  InsertError,
  UnexpectedError,
  PipelineFailure,
};
export type { StepError, PipelineStep };
