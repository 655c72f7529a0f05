import { describe, it, expect } from 'vitest';
import {
  didYouMean,
  findPossibleAddresses,
  isPossibleAddress,
} from '../../src/recognizer/recognizer.js';

describe('Address recognizer', () => {
  describe('isPossibleAddress', () => {
    it('should accept a dot-joined three-word address', () => {
      expect(isPossibleAddress('filled.count.soap')).toBe(true);
    });

    it('should reject plain prose', () => {
      expect(isPossibleAddress('not a 3wa')).toBe(false);
    });

    it('should reject mixed delimiters', () => {
      expect(isPossibleAddress('not.a 3wa')).toBe(false);
      expect(isPossibleAddress('filled.count。soap')).toBe(false);
    });

    it('should ignore surrounding whitespace', () => {
      expect(isPossibleAddress('  filled.count.soap \n')).toBe(true);
    });

    it('should accept any letter case', () => {
      expect(isPossibleAddress('Filled.COUNT.soap')).toBe(true);
    });

    it('should reject digits and symbols inside words', () => {
      expect(isPossibleAddress('invalid.3wa.address')).toBe(false);
      expect(isPossibleAddress('1.2.3')).toBe(false);
      expect(isPossibleAddress('filled.count.so@p')).toBe(false);
      expect(isPossibleAddress('filled.count.soap!')).toBe(false);
    });

    it('should require exactly three words', () => {
      expect(isPossibleAddress('filled.count')).toBe(false);
      expect(isPossibleAddress('filled.count.soap.extra')).toBe(false);
    });

    it('should reject leading, trailing and doubled delimiters', () => {
      expect(isPossibleAddress('.filled.count.soap')).toBe(false);
      expect(isPossibleAddress('filled.count.soap.')).toBe(false);
      expect(isPossibleAddress('filled..count.soap')).toBe(false);
      expect(isPossibleAddress('///filled.count.soap')).toBe(false);
    });

    it('should accept words from non-Latin scripts', () => {
      expect(isPossibleAddress('école.façade.naïve')).toBe(true);
      expect(isPossibleAddress('индекс.дом.плот')).toBe(true);
      expect(isPossibleAddress('άλφα.βήτα.γάμμα')).toBe(true);
      expect(isPossibleAddress('产品.餐厅.没有')).toBe(true);
      expect(isPossibleAddress('डाकिया.चाकू.रोना')).toBe(true);
    });

    it('should accept a script full stop used for both joins', () => {
      expect(isPossibleAddress('ひかる。こうえん。ちず')).toBe(true);
      expect(isPossibleAddress('ひかる・こうえん・ちず')).toBe(true);
    });

    it('should return the same answer on repeated calls', () => {
      expect(isPossibleAddress('filled.count.soap')).toBe(true);
      expect(isPossibleAddress('filled.count.soap')).toBe(true);
      expect(isPossibleAddress('not a 3wa')).toBe(false);
      expect(isPossibleAddress('not a 3wa')).toBe(false);
    });
  });

  describe('findPossibleAddresses', () => {
    it('should find a single address in a sentence', () => {
      expect(
        findPossibleAddresses('Please leave by my porch at filled.count.soap')
      ).toEqual(['filled.count.soap']);
    });

    it('should find several addresses in order of appearance', () => {
      expect(
        findPossibleAddresses(
          'Please leave by my porch at filled.count.soap or deed.tulip.judge'
        )
      ).toEqual(['filled.count.soap', 'deed.tulip.judge']);
      expect(
        findPossibleAddresses('from index.home.raft to filled.count.soap')
      ).toEqual(['index.home.raft', 'filled.count.soap']);
    });

    it('should return an empty list when nothing matches', () => {
      expect(findPossibleAddresses('Please leave by my porch')).toEqual([]);
      expect(findPossibleAddresses('')).toEqual([]);
    });

    it('should leave adjacent punctuation out of the match', () => {
      expect(findPossibleAddresses('Meet at filled.count.soap.')).toEqual([
        'filled.count.soap',
      ]);
      expect(findPossibleAddresses('(filled.count.soap)')).toEqual([
        'filled.count.soap',
      ]);
      expect(findPossibleAddresses('///filled.count.soap')).toEqual([
        'filled.count.soap',
      ]);
      expect(
        findPossibleAddresses('filled.count.soap,deed.tulip.judge')
      ).toEqual(['filled.count.soap', 'deed.tulip.judge']);
    });

    it('should keep the original casing', () => {
      expect(findPossibleAddresses('Go to Filled.COUNT.soap now')).toEqual([
        'Filled.COUNT.soap',
      ]);
    });

    it('should not match two or four dotted segments', () => {
      expect(findPossibleAddresses('see example.com today')).toEqual([]);
      expect(findPossibleAddresses('a.b.c.d')).toEqual([]);
      expect(findPossibleAddresses('path one.two.three.four here')).toEqual([]);
    });

    it('should not match numbers or words glued to digits', () => {
      expect(findPossibleAddresses('version 1.2.3 released')).toEqual([]);
      expect(findPossibleAddresses('abc1.def.ghi')).toEqual([]);
      expect(findPossibleAddresses('invalid.3wa.address')).toEqual([]);
    });

    it('should not match mixed delimiters', () => {
      expect(findPossibleAddresses('hello filled.count。soap')).toEqual([]);
    });

    it('should find addresses joined by a script full stop', () => {
      expect(
        findPossibleAddresses('住所 产品。餐厅。没有 です')
      ).toEqual(['产品。餐厅。没有']);
    });

    it('should give the same result when called twice', () => {
      const text = 'filled.count.soap then deed.tulip.judge then index.home.raft';
      const first = findPossibleAddresses(text);
      const second = findPossibleAddresses(text);
      expect(second).toEqual(first);
      expect(first).toHaveLength(3);
    });

    it('should only return strings that are possible addresses', () => {
      const texts = [
        'Meet at filled.count.soap. Bring deed.tulip.judge!',
        '///index.home.raft, (école.façade.naïve) and 1.2.3',
        'индекс.дом.плот; a.b.c.d; x.y',
      ];
      for (const text of texts) {
        const found = findPossibleAddresses(text);
        expect(found.length).toBeGreaterThan(0);
        for (const candidate of found) {
          expect(isPossibleAddress(candidate)).toBe(true);
        }
      }
    });
  });

  describe('didYouMean', () => {
    it('should accept words joined by spaces', () => {
      expect(didYouMean('filled count soap')).toBe(true);
    });

    it('should accept words joined by hyphens', () => {
      expect(didYouMean('filled-count-soap')).toBe(true);
    });

    it('should reject run-together words', () => {
      expect(didYouMean('filledcountsoap')).toBe(false);
    });

    it('should accept the canonical and script full stops', () => {
      expect(didYouMean('filled.count.soap')).toBe(true);
      expect(didYouMean('filled｡count｡soap')).toBe(true);
    });

    it('should accept a two-character separator used twice', () => {
      expect(didYouMean('filled, count, soap')).toBe(true);
      expect(didYouMean('filled  count  soap')).toBe(true);
    });

    it('should reject separators that differ between the words', () => {
      expect(didYouMean('filled count-soap')).toBe(false);
      expect(didYouMean('filled.count soap')).toBe(false);
    });

    it('should reject the wrong number of words', () => {
      expect(didYouMean('filled count')).toBe(false);
      expect(didYouMean('filled count soap today')).toBe(false);
    });

    it('should reject digits and overly long separators', () => {
      expect(didYouMean('filled 1count soap')).toBe(false);
      expect(didYouMean('filled   count   soap')).toBe(false);
    });
  });
});
