import { describe, expect, it } from 'vitest';

import { analyzeComplexity } from '../src/analyzer/complexity.js';

describe('analyzeComplexity', () => {
  it('counts decision points and indentation depth for python', () => {
    const code = ['def f(x):', '    if x and y:', '        return 1', '    return 0'].join('\n');

    expect(analyzeComplexity(code, 'python')).toEqual({
      cyclomatic_complexity: 3,
      nesting_depth: 2,
      function_count: 1,
      class_count: 0,
      line_count: 4,
      comment_ratio: 0,
    });
  });

  it('rounds the comment ratio to three decimals', () => {
    const metrics = analyzeComplexity(['// one', 'const a = 1;', '// two'].join('\n'), 'javascript');
    expect(metrics.comment_ratio).toBe(0.667);
    expect(metrics.cyclomatic_complexity).toBe(1);
  });

  it('only reports line count for unknown languages', () => {
    expect(analyzeComplexity('a\nb', 'unknown')).toEqual({
      cyclomatic_complexity: 0,
      nesting_depth: 0,
      function_count: 0,
      class_count: 0,
      line_count: 2,
      comment_ratio: 0,
    });
  });
});
