import { InferenceError } from '../common/pipeline.errors';
import { extractJsonObject } from './decision-extractor';

function extractionError(reply: string): InferenceError {
  try {
    extractJsonObject(reply);
  } catch (error) {
    if (error instanceof InferenceError) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected extraction of ${reply} to fail`);
}

describe('extractJsonObject', () => {
  it('takes the object out of surrounding prose', () => {
    expect(
      extractJsonObject(
        'Sure! {"action":"wait","duration":2,"reasoning":"pausing"} Thanks.',
      ),
    ).toEqual({ action: 'wait', duration: 2, reasoning: 'pausing' });
  });

  it('keeps nested braces inside the outer object', () => {
    expect(extractJsonObject('```json\n{"a":{"b":1}}\n```')).toEqual({
      a: { b: 1 },
    });
  });

  it('reports a reply without an object as malformed', () => {
    const error = extractionError('I cannot see the screen.');

    expect(error.kind).toBe('malformed');
    expect(error.message).toBe('No JSON object found in inference reply');
  });

  it('reports a closing brace before the opening one as malformed', () => {
    expect(extractionError('} nothing {').kind).toBe('malformed');
  });

  it('reports two separate objects as malformed', () => {
    const error = extractionError('{"action":"wait"} or {"action":"key"}');

    expect(error.kind).toBe('malformed');
    expect(error.cause).toBeInstanceOf(SyntaxError);
  });
});
