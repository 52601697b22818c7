import { describe, it, expect } from 'vitest';
import { scan } from '../analyzers/assignment-scanner.js';
import { tokenize } from '../analyzers/lexer.js';
import { locate, type Region } from '../analyzers/region-locator.js';
import { isTerminalUse, LiveRangeRewriter } from './live-range-rewriter.js';
import { NamingRegistry } from './naming-registry.js';

function region(lines: string[]): Region {
  const [first] = locate(lines.join('\n'));
  if (!first) {
    throw new Error('no region');
  }
  return first;
}

const rewriter = new LiveRangeRewriter(NamingRegistry.fromFile());

const recommendations = region([
  'def build do',
  '  recommendations = []',
  '  recommendations = [recommendations, "x"]',
  '  recommendations',
  'end',
]);

describe('LiveRangeRewriter', () => {
  it('partitions the region after the first assignment into adjacent ranges', () => {
    const sites = scan(recommendations, 'recommendations');
    const plan = rewriter.plan(recommendations, 'recommendations', sites);

    expect(plan.ranges).toHaveLength(2);
    const [first, second] = plan.ranges;
    expect(first?.start).toBe(sites[0]?.valueEnd);
    expect(first?.end).toBe(second?.start);
    expect(second?.end).toBe(recommendations.text.length);
    expect(plan.ranges.map(range => [range.startLine, range.endLine])).toEqual([
      [1, 2],
      [2, 5],
    ]);
  });

  it('renames bindings and the references live in each range', () => {
    const result = rewriter.rewrite(recommendations, 'recommendations', scan(recommendations, 'recommendations'));
    expect(result.text).toBe(
      [
        'def build do',
        '  initial_recommendations = []',
        '  base_recommendations = [initial_recommendations, "x"]',
        '  base_recommendations',
        'end',
      ].join('\n')
    );
    expect(result.replacements).toBe(4);
    expect(result.plan.unrenamed).toBe(0);
  });

  it('resolves the trailing use to the last binding', () => {
    const plan = rewriter.plan(recommendations, 'recommendations', scan(recommendations, 'recommendations'));
    expect(plan.exits).toEqual([{ line: 3, name: 'base_recommendations', explicit: false }]);
  });

  it('leaves a function capture of the same name alone', () => {
    const captured = region([
      'def cap(list) do',
      '  alerts = list',
      '  alerts = Enum.map(alerts, &alerts/1)',
      '  alerts',
      'end',
    ]);

    const result = rewriter.rewrite(captured, 'alerts', scan(captured, 'alerts'));

    expect(result.text).toBe(
      [
        'def cap(list) do',
        '  initial_alerts = list',
        '  critical_alerts = Enum.map(initial_alerts, &alerts/1)',
        '  critical_alerts',
        'end',
      ].join('\n')
    );
  });

  it('applies a precomputed plan', () => {
    const sites = scan(recommendations, 'recommendations');
    const plan = rewriter.plan(recommendations, 'recommendations', sites);
    expect(rewriter.apply(recommendations, plan).text).toBe(
      rewriter.rewrite(recommendations, 'recommendations', sites).text
    );
  });
});

describe('isTerminalUse', () => {
  const lineTokens = (text: string) => tokenize(text).filter(token => token.kind !== 'newline');

  it('accepts a bare name, a pipe and a tagged pair', () => {
    expect(isTerminalUse(lineTokens('alerts'), 'alerts')).toBe(true);
    expect(isTerminalUse(lineTokens('alerts |> Enum.reverse()'), 'alerts')).toBe(true);
    expect(isTerminalUse(lineTokens('{:ok, alerts}'), 'alerts')).toBe(true);
  });

  it('rejects other shapes', () => {
    expect(isTerminalUse(lineTokens('alerts ++ more'), 'alerts')).toBe(false);
    expect(isTerminalUse(lineTokens('{:ok, alerts, 1}'), 'alerts')).toBe(false);
    expect(isTerminalUse(lineTokens('other'), 'alerts')).toBe(false);
  });
});
