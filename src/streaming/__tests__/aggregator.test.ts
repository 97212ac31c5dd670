import { describe, it, expect } from 'vitest';
import { StreamAggregator, resolveToolCall } from '../aggregator.js';
import type { ContentChunk, Frame, ToolCallFragment } from '../../shared/types.js';

function chunk(payload: ContentChunk): Frame {
  return { kind: 'chunk', payload };
}

function content(text: string, extra: Partial<ContentChunk> = {}): Frame {
  return chunk({ ...extra, choices: [{ delta: { content: text } }] });
}

function toolFragment(fragment: ToolCallFragment): Frame {
  return chunk({ choices: [{ delta: { tool_calls: [fragment] } }] });
}

describe('StreamAggregator', () => {
  it('starts from an empty result', () => {
    expect(new StreamAggregator().finalize()).toStrictEqual({ content: '' });
  });

  it('concatenates content in arrival order', () => {
    const aggregator = new StreamAggregator();
    aggregator.observe(chunk({ choices: [{ delta: { role: 'assistant', content: 'Hello' } }] }));
    aggregator.observe(content(' '));
    aggregator.observe(content('World'));

    expect(aggregator.finalize()).toStrictEqual({ content: 'Hello World', role: 'assistant' });
  });

  it('returns the content delta from observe', () => {
    const aggregator = new StreamAggregator();
    expect(aggregator.observe(content('Hi'))).toBe('Hi');
    expect(aggregator.observe(content(''))).toBe('');
    expect(aggregator.observe(chunk({ choices: [{ delta: { role: 'assistant' } }] }))).toBeUndefined();
    expect(aggregator.observe(chunk({ choices: [] }))).toBeUndefined();
  });

  it('returns nothing for non-content frames', () => {
    const aggregator = new StreamAggregator();
    expect(aggregator.observe({ kind: 'metering', payload: { energy_joules: 1 } })).toBeUndefined();
    expect(aggregator.observe({ kind: 'termination' })).toBeUndefined();
    expect(aggregator.observe({ kind: 'comment', raw: ': ping' })).toBeUndefined();
    expect(aggregator.observe({ kind: 'unparseable' })).toBeUndefined();
  });

  it('keeps the first id, model and created', () => {
    const aggregator = new StreamAggregator();
    aggregator.observe(content('a', { id: 'first', created: 100 }));
    aggregator.observe(content('b', { id: 'second', model: 'm-1', created: 200 }));
    aggregator.observe(content('c', { model: 'm-2' }));

    expect(aggregator.finalize()).toStrictEqual({
      content: 'abc',
      id: 'first',
      model: 'm-1',
      created: 100,
    });
  });

  it('keeps the last finish_reason and usage', () => {
    const aggregator = new StreamAggregator();
    aggregator.observe(chunk({ choices: [{ delta: {}, finish_reason: 'length' }] }));
    aggregator.observe(chunk({ choices: [{ delta: {}, finish_reason: 'stop' }] }));
    aggregator.observe(chunk({ choices: [], usage: { prompt_tokens: 1, completion_tokens: 1, total_tokens: 2 } }));
    aggregator.observe(chunk({ choices: [], usage: { prompt_tokens: 4, completion_tokens: 6, total_tokens: 10 } }));

    expect(aggregator.finalize()).toStrictEqual({
      content: '',
      finish_reason: 'stop',
      usage: { prompt_tokens: 4, completion_tokens: 6, total_tokens: 10 },
    });
  });

  it('keeps the last metering payload', () => {
    const aggregator = new StreamAggregator();
    expect(aggregator.finalize().energy).toBeUndefined();
    aggregator.observe({ kind: 'metering', payload: { energy_joules: 50.0 } });
    aggregator.observe({ kind: 'metering', payload: { energy_joules: 60.0 } });

    expect(aggregator.finalize().energy).toEqual({ energy_joules: 60.0 });
  });

  it('merges the reference stream into content, role, id and energy', () => {
    const aggregator = new StreamAggregator();
    aggregator.observe(chunk({ id: 't', choices: [{ delta: { role: 'assistant', content: 'H' } }] }));
    aggregator.observe(content('i'));
    aggregator.observe({ kind: 'metering', payload: { energy_joules: 25.0 } });
    aggregator.observe({ kind: 'termination' });

    expect(aggregator.finalize()).toStrictEqual({
      content: 'Hi',
      role: 'assistant',
      id: 't',
      energy: { energy_joules: 25.0 },
    });
  });

  it('returns equal but independent results on repeated finalize', () => {
    const aggregator = new StreamAggregator();
    aggregator.observe(chunk({ choices: [], usage: { total_tokens: 3 } }));

    const first = aggregator.finalize();
    const second = aggregator.finalize();
    expect(second).toStrictEqual(first);

    if (first.usage) first.usage.total_tokens = 99;
    expect(aggregator.finalize().usage).toEqual({ total_tokens: 3 });
  });

  describe('tool calls', () => {
    it('concatenates argument fragments for one index', () => {
      const aggregator = new StreamAggregator();
      aggregator.observe(toolFragment({ index: 0, id: 'call_1', function: { name: 'add', arguments: '{"a"' } }));
      aggregator.observe(toolFragment({ index: 0, function: { arguments: ':1}' } }));

      expect(aggregator.finalize().tool_calls).toStrictEqual([
        { index: 0, id: 'call_1', name: 'add', arguments: { a: 1 } },
      ]);
    });

    it('keeps interleaved indices apart, ordered by first appearance', () => {
      const aggregator = new StreamAggregator();
      aggregator.observe(toolFragment({ index: 1, id: 'call_b', function: { name: 'second', arguments: '{"x":' } }));
      aggregator.observe(toolFragment({ index: 0, id: 'call_a', function: { name: 'first', arguments: '{}' } }));
      aggregator.observe(toolFragment({ index: 1, id: 'ignored', function: { name: 'ignored', arguments: '2}' } }));

      expect(aggregator.finalize().tool_calls).toStrictEqual([
        { index: 1, id: 'call_b', name: 'second', arguments: { x: 2 } },
        { index: 0, id: 'call_a', name: 'first', arguments: {} },
      ]);
    });

    it('treats missing arguments as an empty object', () => {
      const aggregator = new StreamAggregator();
      aggregator.observe(toolFragment({ index: 0, function: { name: 'ping' } }));

      expect(aggregator.finalize().tool_calls).toStrictEqual([
        { index: 0, name: 'ping', arguments: {} },
      ]);
    });

    it('reports malformed arguments on the call without losing content', () => {
      const aggregator = new StreamAggregator();
      aggregator.observe(content('calling'));
      aggregator.observe(toolFragment({ index: 0, function: { name: 'add', arguments: '{"a": 1' } }));

      const result = aggregator.finalize();
      expect(result.content).toBe('calling');
      expect(result.tool_calls).toStrictEqual([
        {
          index: 0,
          name: 'add',
          rawArguments: '{"a": 1',
          error: 'Tool call 0 arguments are not a valid JSON object',
        },
      ]);
    });
  });
});

describe('resolveToolCall', () => {
  it('rejects arguments that parse to a non-object', () => {
    expect(resolveToolCall({ index: 2, argumentParts: ['[1,', '2]'] })).toStrictEqual({
      index: 2,
      rawArguments: '[1,2]',
      error: 'Tool call 2 arguments are not a valid JSON object',
    });
  });

  it('treats whitespace-only arguments as empty', () => {
    expect(resolveToolCall({ index: 0, argumentParts: ['  '] })).toStrictEqual({
      index: 0,
      arguments: {},
    });
  });
});
