import { describe, it, expect } from '@jest/globals';
import { deepmerge, isPlainObject, setNestedValue, PlainObject } from '../../utils';

describe('utils', () => {
  describe('deepmerge', () => {
    describe('all', () => {
      it('should return an empty object for no sources', () => {
        expect(deepmerge.all([])).toEqual({});
      });

      it('should let later sources win, merging nested objects', () => {
        const result = deepmerge.all([
          { maxDepth: 10, partials: { extension: 'hbs' } },
          { maxDepth: 20 },
          { partials: { directory: 'views' } }
        ]);

        expect(result).toEqual({ maxDepth: 20, partials: { extension: 'hbs', directory: 'views' } });
      });
    });

    describe('merge', () => {
      it('should replace arrays instead of merging them', () => {
        expect(deepmerge.merge({ delimiters: ['{{', '}}'] }, { delimiters: ['<%', '%>'] })).toEqual({
          delimiters: ['<%', '%>']
        });
      });

      it('should skip undefined values', () => {
        expect(deepmerge.merge({ escapeHtml: false }, { escapeHtml: undefined })).toEqual({ escapeHtml: false });
      });

      it('should ignore sources that are not objects', () => {
        const target: PlainObject = { a: 1 };

        expect(deepmerge.merge(target, 'nope')).toBe(target);
      });

      it('should not mutate its inputs', () => {
        const target: PlainObject = { partials: { extension: 'hbs' } };
        const source: PlainObject = { partials: { directory: 'views' } };

        deepmerge.merge(target, source);

        expect(target).toEqual({ partials: { extension: 'hbs' } });
        expect(source).toEqual({ partials: { directory: 'views' } });
      });
    });
  });

  describe('isPlainObject', () => {
    it('should accept objects only', () => {
      expect(isPlainObject({})).toBe(true);
      expect(isPlainObject([])).toBe(false);
      expect(isPlainObject(null)).toBe(false);
      expect(isPlainObject(new Date(0))).toBe(false);
      expect(isPlainObject('x')).toBe(false);
    });
  });

  describe('setNestedValue', () => {
    it('should create intermediate objects', () => {
      const target: PlainObject = {};

      setNestedValue(target, 'partials.directory', 'views');
      setNestedValue(target, 'partials.extension', 'hbs');
      setNestedValue(target, 'maxDepth', 5);

      expect(target).toEqual({ partials: { directory: 'views', extension: 'hbs' }, maxDepth: 5 });
    });
  });
});
