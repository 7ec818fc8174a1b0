import { ValidationError } from '../common/pipeline.errors';
import { extractJsonObject } from './decision-extractor';
import { parseDecision } from './decision-validator';

function validationIssues(value: unknown): string[] {
  try {
    parseDecision(value);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('Expected the decision to be rejected');
}

describe('parseDecision', () => {
  it('parses a wait decision wrapped in prose', () => {
    const reply =
      'Sure! {"action":"wait","duration":2,"reasoning":"pausing"} Thanks.';

    expect(parseDecision(extractJsonObject(reply))).toEqual({
      action: 'wait',
      duration: 2,
      reasoning: 'pausing',
    });
  });

  it('fills click defaults', () => {
    expect(
      parseDecision({ action: 'click', coordinates: [500, 400] }),
    ).toEqual({
      action: 'click',
      coordinates: { x: 500, y: 400 },
      button: 'left',
      clickCount: 1,
      reasoning: '',
    });
  });

  it('keeps an explicit button and click count', () => {
    expect(
      parseDecision({
        action: 'click',
        coordinates: [10, 20],
        button: 'right',
        clickCount: 2,
      }),
    ).toMatchObject({ button: 'right', clickCount: 2 });
  });

  it('floors fractional coordinates to whole pixels', () => {
    expect(
      parseDecision({ action: 'click', coordinates: [1919.6, 1029.5] }),
    ).toMatchObject({ coordinates: { x: 1919, y: 1029 } });
  });

  it('matches the button name case-insensitively', () => {
    expect(
      parseDecision({ action: 'click', coordinates: [1, 2], button: 'Left' }),
    ).toMatchObject({ button: 'left' });
    expect(
      validationIssues({ action: 'click', coordinates: [1, 2], button: 'back' }),
    ).toEqual(['button must be one of the following values: left, right, middle']);
  });

  it('matches the action name case-insensitively', () => {
    expect(
      parseDecision({ action: 'KEY', key: 'enter', reasoning: 'submit' }),
    ).toEqual({ action: 'key', key: 'enter', reasoning: 'submit' });
  });

  it('drops fields that belong to other actions', () => {
    expect(
      parseDecision({
        action: 'type',
        text: 'hello world',
        coordinates: [1, 2],
        key: 'enter',
      }),
    ).toEqual({ action: 'type', text: 'hello world', reasoning: '' });
  });

  it('defaults scroll amount and wait duration', () => {
    expect(parseDecision({ action: 'scroll', direction: 'down' })).toEqual({
      action: 'scroll',
      direction: 'down',
      amount: 3,
      reasoning: '',
    });
    expect(parseDecision({ action: 'wait' })).toEqual({
      action: 'wait',
      duration: 1,
      reasoning: '',
    });
  });

  it('treats a null reasoning as empty', () => {
    expect(
      parseDecision({ action: 'wait', duration: 3, reasoning: null }),
    ).toEqual({ action: 'wait', duration: 3, reasoning: '' });
  });

  it('rejects values that are not objects', () => {
    expect(validationIssues([1, 2])).toEqual(['decision must be a JSON object']);
    expect(validationIssues('click')).toEqual([
      'decision must be a JSON object',
    ]);
    expect(validationIssues(null)).toEqual(['decision must be a JSON object']);
  });

  it('requires a known action', () => {
    expect(validationIssues({ text: 'hi' })).toEqual(['action is required']);
    expect(validationIssues({ action: 3 })).toEqual([
      'action must be a string',
    ]);
    expect(validationIssues({ action: 'drag' })).toEqual([
      'unknown action "drag"',
    ]);
  });

  it('requires a two-element numeric coordinate array for clicks', () => {
    expect(validationIssues({ action: 'click' })).toContain(
      'coordinates must be an array',
    );
    expect(
      validationIssues({ action: 'click', coordinates: [1, 2, 3] }),
    ).toEqual(['coordinates must contain no more than 2 elements']);
    expect(
      validationIssues({ action: 'click', coordinates: { x: 1, y: 2 } }),
    ).toContain('coordinates must be an array');
    expect(() =>
      parseDecision({ action: 'click', coordinates: ['1', 2] }),
    ).toThrow(ValidationError);
  });

  it('rejects a click count outside 1 to 3', () => {
    expect(
      validationIssues({ action: 'click', coordinates: [1, 2], clickCount: 4 }),
    ).toEqual(['clickCount must not be greater than 3']);
  });

  it('requires text and key to be strings', () => {
    expect(validationIssues({ action: 'type' })).toEqual([
      'text must be a string',
    ]);
    expect(validationIssues({ action: 'key', key: 13 })).toEqual([
      'key must be a string',
    ]);
  });

  it('matches scroll directions exactly', () => {
    expect(() => parseDecision({ action: 'scroll', direction: 'UP' })).toThrow(
      ValidationError,
    );
  });

  it('passes fractional and negative scroll amounts through', () => {
    expect(
      parseDecision({ action: 'scroll', direction: 'down', amount: 2.5 }),
    ).toMatchObject({ direction: 'down', amount: 2.5 });
    expect(
      parseDecision({ action: 'scroll', direction: 'down', amount: -3 }),
    ).toMatchObject({ direction: 'down', amount: -3 });
    expect(
      validationIssues({ action: 'scroll', direction: 'down', amount: '3' }),
    ).toEqual([
      'amount must be a number conforming to the specified constraints',
    ]);
  });

  it('requires a positive numeric wait duration', () => {
    expect(() => parseDecision({ action: 'wait', duration: -1 })).toThrow(
      ValidationError,
    );
    expect(() => parseDecision({ action: 'wait', duration: '2' })).toThrow(
      ValidationError,
    );
  });

  it('rejects a non-string reasoning', () => {
    expect(
      validationIssues({ action: 'key', key: 'tab', reasoning: 42 }),
    ).toEqual(['reasoning must be a string']);
  });

  it('reports every failed constraint at once', () => {
    const error = new ValidationError(
      validationIssues({ action: 'key', key: 13, reasoning: 42 }),
    );

    expect(error.issues).toHaveLength(2);
    expect(error.message).toMatch(/^Invalid decision: /);
  });
});
