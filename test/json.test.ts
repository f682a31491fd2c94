import { extractFirstJsonObject, tryParseJson } from '../src/utils/json.js';

describe('extractFirstJsonObject', () => {
  it('trims prose before and after the object', () => {
    expect(extractFirstJsonObject('Sure! {"text": "hi"} Hope that helps.')).toBe('{"text": "hi"}');
  });

  it('returns the whole input when it is already an object', () => {
    expect(extractFirstJsonObject('{"a": 1}')).toBe('{"a": 1}');
  });

  it('keeps nested objects intact', () => {
    expect(extractFirstJsonObject('x {"a": {"b": 2}} y')).toBe('{"a": {"b": 2}}');
  });

  it('ignores braces inside string literals', () => {
    const input = 'reply: {"text": "AI: use {curly} braces \\"}\\" here"} trailing }';
    expect(extractFirstJsonObject(input)).toBe('{"text": "AI: use {curly} braces \\"}\\" here"}');
  });

  it('returns only the first of two objects', () => {
    expect(extractFirstJsonObject('{"a": 1} and {"b": 2}')).toBe('{"a": 1}');
  });

  it('returns null when no brace is ever closed', () => {
    expect(extractFirstJsonObject('incomplete {"key": "value"')).toBeNull();
  });

  it('returns null when there is no object at all', () => {
    expect(extractFirstJsonObject('User: hello\nAI: hi there')).toBeNull();
  });
});

describe('tryParseJson', () => {
  it('parses valid JSON', () => {
    expect(tryParseJson('{"a": [1, 2]}')).toEqual({ a: [1, 2] });
  });

  it('returns undefined for invalid JSON', () => {
    expect(tryParseJson('{a: 1}')).toBeUndefined();
  });
});
