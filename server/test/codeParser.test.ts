import { describe, expect, it } from 'vitest';

import { findStaticIssues, lineNumberAt, parseCode } from '../src/analyzer/codeParser.js';
import { detectLanguage } from '../src/analyzer/language.js';

describe('parseCode', () => {
  it('extracts python structure', () => {
    const code = [
      'import os',
      'from sys import argv',
      '',
      '# entry point',
      'class Greeter(Base):',
      '    def greet(self, name):',
      '        return name',
      '',
      'count = 3',
    ].join('\n');

    const parsed = parseCode(code, 'python');
    expect(parsed.line_count).toBe(9);
    expect(parsed.imports.map((i) => i.line)).toEqual([1, 2]);
    expect(parsed.comments).toEqual([{ line: 4, text: '# entry point' }]);
    expect(parsed.classes).toEqual([{ name: 'Greeter', inherits: 'Base', line: 5 }]);
    expect(parsed.functions).toEqual([{ name: 'greet', params: 'self, name', line: 6 }]);
    expect(parsed.variables).toEqual([{ name: 'count', line: 9, value: '3' }]);
    expect(parsed.potential_issues).toEqual([]);
  });

  it('does not treat control flow as java methods', () => {
    const code = ['public class Foo extends Bar {', '  public void run() {', '  } else if (ready) {', '  }', '}'].join('\n');

    const parsed = parseCode(code, 'java');
    expect(parsed.classes).toEqual([{ name: 'Foo', inherits: 'Bar', implements: '', line: 1 }]);
    expect(parsed.functions).toEqual([{ name: 'run', params: '', line: 2 }]);
  });

  it('reads arrow functions and exported classes in javascript', () => {
    const code = [
      "import fs from 'node:fs';",
      'export const load = async (path) => fs.readFileSync(path);',
      'export default class Store extends Base {}',
    ].join('\n');

    const parsed = parseCode(code, 'javascript');
    expect(parsed.imports).toHaveLength(1);
    expect(parsed.functions).toEqual([{ name: 'load', params: 'path', line: 2, type: 'arrow' }]);
    expect(parsed.classes).toEqual([{ name: 'Store', inherits: 'Base', line: 3 }]);
  });

  it('returns an empty structure for unknown languages', () => {
    const parsed = parseCode('hello\nworld', 'unknown');
    expect(parsed.line_count).toBe(2);
    expect(parsed.functions).toEqual([]);
    expect(parsed.potential_issues).toEqual([]);
  });
});

describe('findStaticIssues', () => {
  it('flags todos, credentials and javascript smells in order', () => {
    const code = ['// TODO: remove debug', 'const token = "test-secret";', 'if (a == b) console.log(a);'].join('\n');

    expect(findStaticIssues(code, 'javascript')).toEqual([
      { type: 'todo', line: 1, description: 'TODO comment: // TODO: remove debug' },
      { type: 'security', line: 2, description: 'Potential hardcoded credential at line 2' },
      { type: 'debug', line: 3, description: 'console.log statement should be removed in production code' },
      { type: 'style', line: 3, description: 'Consider using === instead of == for comparison' },
    ]);
  });

  it('runs the javascript checks on TypeScript sources', () => {
    const code = ['const count: number = 1;', 'console.log(count);'].join('\n');
    const language = detectLanguage(code, 'counter.ts');

    expect(language).toBe('javascript');
    expect(findStaticIssues(code, language)).toEqual([
      { type: 'debug', line: 2, description: 'console.log statement should be removed in production code' },
    ]);
  });

  it('ignores loose equality inside line comments', () => {
    expect(findStaticIssues('// a == b', 'javascript')).toEqual([]);
  });

  it('does not match marker words inside identifiers', () => {
    expect(findStaticIssues('debugger_enabled = True', 'python')).toEqual([]);
  });

  it('flags bare except and mutable defaults in python', () => {
    const code = ['def f(items=[]):', '    try:', '        return items', '    except:', '        pass'].join('\n');

    expect(findStaticIssues(code, 'python')).toEqual([
      { type: 'style', line: 4, description: 'Bare except clause should specify exceptions' },
      {
        type: 'bug',
        line: 1,
        description: 'Mutable default argument (list, dict, etc.) can cause unexpected behavior',
      },
    ]);
  });
});

describe('lineNumberAt', () => {
  it('counts newlines before the offset', () => {
    expect(lineNumberAt('a\nb\nc', 0)).toBe(1);
    expect(lineNumberAt('a\nb\nc', 4)).toBe(3);
  });
});
