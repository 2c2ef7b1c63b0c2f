import { describe, expect, test } from 'vitest';

import { TextCleaner } from './text-cleaner';

describe('TextCleaner', () => {
  describe('countWords', () => {
    test('counts whitespace-delimited tokens', () => {
      expect(TextCleaner.countWords('  O ser  é,\n e o não-ser não é. ')).toBe(
        8,
      );
    });

    test('returns 0 for empty or blank text', () => {
      expect(TextCleaner.countWords('')).toBe(0);
      expect(TextCleaner.countWords(' \n\t ')).toBe(0);
    });
  });

  describe('findWords', () => {
    test('returns token spans in order', () => {
      expect(TextCleaner.findWords(' ab  c\nde')).toEqual([
        { start: 1, end: 3 },
        { start: 5, end: 6 },
        { start: 7, end: 9 },
      ]);
    });
  });

  describe('endsSentence', () => {
    test.each([
      ['fim.', true],
      ['será?', true],
      ['Ah!', true],
      ['assim…', true],
      ['"verdade."', true],
      ['(isto é.)', true],
      ['portanto,', false],
      ['Sr', false],
    ])('%s → %s', (token, expected) => {
      expect(TextCleaner.endsSentence(token)).toBe(expected);
    });
  });

  describe('findSentences', () => {
    test('splits at terminators', () => {
      const text = 'O ser é. O não ser não é! Será?';

      expect(
        TextCleaner.findSentences(text).map(({ start, end }) =>
          text.slice(start, end),
        ),
      ).toEqual(['O ser é.', 'O não ser não é!', 'Será?']);
    });

    test('closes a sentence at a blank line and keeps a trailing fragment', () => {
      const text = 'primeira parte sem ponto\n\nsegunda parte. resto';

      expect(
        TextCleaner.findSentences(text).map(({ start, end }) =>
          text.slice(start, end),
        ),
      ).toEqual(['primeira parte sem ponto', 'segunda parte.', 'resto']);
    });

    test('returns nothing for blank text', () => {
      expect(TextCleaner.findSentences('   ')).toEqual([]);
    });
  });

  describe('cleanResponse', () => {
    test('trims surrounding whitespace', () => {
      expect(TextCleaner.cleanResponse('\n  O ente é.  \n')).toBe('O ente é.');
    });

    test('unwraps a fenced block', () => {
      expect(TextCleaner.cleanResponse('```text\nO ente é.\n```')).toBe(
        'O ente é.',
      );
    });

    test('drops a leading label line', () => {
      expect(
        TextCleaner.cleanResponse('Aqui está o texto corrigido:\nO ente é.'),
      ).toBe('O ente é.');
      expect(TextCleaner.cleanResponse('Texto revisado:\nO ente é.')).toBe(
        'O ente é.',
      );
      expect(
        TextCleaner.cleanResponse('Here is the corrected text:\nO ente é.'),
      ).toBe('O ente é.');
    });

    test('keeps a colon inside the text', () => {
      expect(TextCleaner.cleanResponse('Ele disse: o ente é.')).toBe(
        'Ele disse: o ente é.',
      );
    });
  });

  describe('normalize', () => {
    test('unifies line endings and spacing', () => {
      expect(TextCleaner.normalize('a\r\nb\rc  d  \t e  \nf')).toBe(
        'a\nb\nc d e\nf',
      );
    });

    test('joins words hyphenated across a line break', () => {
      expect(TextCleaner.normalize('a metafí-\nsica clássica')).toBe(
        'a metafísica clássica',
      );
    });

    test('keeps a hyphen before a capitalized line', () => {
      expect(TextCleaner.normalize('ser-\nNada')).toBe('ser-\nNada');
    });

    test('returns empty string for empty input', () => {
      expect(TextCleaner.normalize('')).toBe('');
    });
  });

  describe('fold', () => {
    test('removes diacritics and lowercases', () => {
      expect(TextCleaner.fold('Metafísica Ação ÔNTICO')).toBe(
        'metafisica acao ontico',
      );
    });
  });
});
