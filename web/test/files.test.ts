import { describe, expect, it } from 'vitest';

import { buildTextPreview, fileExtension, formatFileSize, isTextFile } from '../src/utils/files.js';

describe('formatFileSize', () => {
  it('formats sizes with binary units', () => {
    expect(formatFileSize(0)).toBe('0 Bytes');
    expect(formatFileSize(500)).toBe('500 Bytes');
    expect(formatFileSize(1536)).toBe('1.5 KB');
    expect(formatFileSize(1234567)).toBe('1.18 MB');
  });
});

describe('isTextFile', () => {
  it('accepts known text MIME types and code extensions', () => {
    expect(isTextFile({ name: 'data', type: 'application/json' })).toBe(true);
    expect(isTextFile({ name: 'main.PY', type: '' })).toBe(true);
    expect(isTextFile({ name: 'photo.png', type: 'image/png' })).toBe(false);
    expect(isTextFile({ name: 'Makefile', type: '' })).toBe(false);
  });

  it('lowercases extensions', () => {
    expect(fileExtension('Report.TSX')).toBe('.tsx');
    expect(fileExtension('README')).toBe('');
  });
});

describe('buildTextPreview', () => {
  it('keeps short text unchanged', () => {
    expect(buildTextPreview('a\nb\nc')).toBe('a\nb\nc');
    expect(buildTextPreview('1\n2\n3\n4\n5')).toBe('1\n2\n3\n4\n5');
  });

  it('cuts after five lines and appends an ellipsis line', () => {
    expect(buildTextPreview('1\n2\n3\n4\n5\n6\n7')).toBe('1\n2\n3\n4\n5\n...');
  });
});
