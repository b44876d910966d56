import { render, screen } from '@testing-library/react';
import { describe, expect, it } from 'vitest';

import { ResultView } from '../src/components/ResultView.js';

function headings(): string[] {
  return screen.getAllByRole('heading').map((h) => h.textContent ?? '');
}

describe('ResultView', () => {
  it('renders one list item per recommendation, in order', () => {
    render(<ResultView envelope={{ analysis_id: 'r1', result: {}, recommendations: ['First', 'Second', 'Third'] }} />);

    expect(screen.getAllByRole('listitem').map((li) => li.textContent)).toEqual(['First', 'Second', 'Third']);
    expect(headings()).toEqual(['Analysis Results', 'Recommendations']);
  });

  it('renders the code analysis sections in order', () => {
    render(
      <ResultView
        envelope={{
          analysis_id: 'c1',
          result: {
            language: 'python',
            summary: 'Short summary',
            issues: [{ description: 'Bug in parser', details: 'Loop skips last item' }],
            static_issues: [{ type: 'todo', line: 3, description: 'TODO comment: # TODO' }],
            metrics: { cyclomatic_complexity: 2, line_count: 10 },
          },
          recommendations: [],
        }}
      />,
    );

    expect(headings()).toEqual(['Analysis Results', 'Code Analysis', 'Issues Detected', 'Static Checks', 'Code Metrics']);
    expect(screen.getByText('ID: c1')).toBeTruthy();
    expect(screen.getByText('Language: python')).toBeTruthy();
    expect(screen.getByText('Loop skips last item')).toBeTruthy();
    expect(screen.getByText('Line 3')).toBeTruthy();
    expect(screen.getByText('Cyclomatic complexity').nextElementSibling?.textContent).toBe('2');
  });

  it('falls back to potential issues and labels bare issue objects', () => {
    render(
      <ResultView
        envelope={{ result: { potential_issues: ['Banner overlaps', { type: 'style' }, {}] }, recommendations: [] }}
      />,
    );

    expect(screen.getByText('Banner overlaps')).toBeTruthy();
    expect(screen.getByText('style')).toBeTruthy();
    expect(screen.getByText('Issue')).toBeTruthy();
  });

  it('omits the line badge for line 0', () => {
    render(
      <ResultView
        envelope={{
          result: { static_issues: [{ type: 'todo', line: 0, description: 'Header TODO' }] },
          recommendations: [],
        }}
      />,
    );

    expect(screen.getByText('Header TODO')).toBeTruthy();
    expect(screen.queryByText('Line 0')).toBeNull();
  });

  it('shows correlations and skips empty root causes', () => {
    render(
      <ResultView
        envelope={{
          analysis_id: 'm1',
          result: { combined_analysis: 'Both inputs agree.', correlations: ['c1'], root_causes: [] },
        }}
      />,
    );

    expect(headings()).toEqual(['Analysis Results', 'Combined Analysis', 'Correlations']);
  });

  it('renders markup in model text as plain text', () => {
    const { container } = render(
      <ResultView envelope={{ analysis_id: 'x', result: { description: '<b>bold</b>' } }} />,
    );

    expect(screen.getByText('<b>bold</b>')).toBeTruthy();
    expect(container.querySelector('b')).toBeNull();
  });
});
