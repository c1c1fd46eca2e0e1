import { toCallToolResult, thrownToCallToolResult, EMPTY_OUTPUT } from '../../../src/tools/response.js';
import { failure, json, text } from '../../../src/types/result.js';

describe('toCallToolResult', () => {
  it('pretty-prints JSON data', () => {
    expect(toCallToolResult(json({ id: 7 }))).toEqual({ content: [{ type: 'text', text: '{\n  "id": 7\n}' }] });
  });

  it('passes text through', () => {
    expect(toCallToolResult(text('Merged'))).toEqual({ content: [{ type: 'text', text: 'Merged' }] });
  });

  it('substitutes a placeholder for empty text', () => {
    expect(toCallToolResult(text(''))).toEqual({ content: [{ type: 'text', text: EMPTY_OUTPUT }] });
    expect(EMPTY_OUTPUT).toBe('(no output)');
  });

  it('flags failures and keeps the descriptor', () => {
    const result = toCallToolResult(failure({ error: 'missing credential', details: 'Set a token' }));
    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      { type: 'text', text: '{\n  "error": "missing credential",\n  "details": "Set a token"\n}' },
    ]);
  });
});

describe('thrownToCallToolResult', () => {
  it('reports a thrown error as an unexpected execution error', () => {
    expect(thrownToCallToolResult(new Error('kaboom'))).toEqual({
      content: [{ type: 'text', text: '{\n  "error": "unexpected execution error",\n  "details": "kaboom"\n}' }],
      isError: true,
    });
  });
});
