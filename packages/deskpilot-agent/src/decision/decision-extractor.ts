import { InferenceError } from '../common/pipeline.errors';

/**
 * Pulls one JSON value out of a free-form model reply.
 */
export type JsonExtractor = (reply: string) => unknown;

export const JSON_EXTRACTOR = Symbol('JSON_EXTRACTOR');

/**
 * Takes the span from the first `{` to the last `}` and parses it. Prose
 * around the object is discarded; two separate objects in one reply make
 * the span unparseable and are reported as malformed.
 */
export const extractJsonObject: JsonExtractor = (reply) => {
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start < 0 || end < start) {
    throw new InferenceError(
      'malformed',
      'No JSON object found in inference reply',
    );
  }

  try {
    return JSON.parse(reply.slice(start, end + 1));
  } catch (error) {
    throw new InferenceError(
      'malformed',
      'Inference reply contains an unparseable JSON object',
      { cause: error },
    );
  }
};
