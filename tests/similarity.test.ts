import { describe, it, expect } from 'vitest';
import { tokenize, tokenOverlapRatio } from '../src/utils/similarity';

describe('tokenize', () => {
    it('keeps accented and non-Latin letters inside tokens', () => {
        expect(tokenize('José Pérez')).toEqual(new Set(['josé', 'pérez']));
        expect(tokenize('राम  शर्मा')).toEqual(new Set(['राम', 'शर्मा']));
    });

    it('splits on punctuation and keeps digits', () => {
        expect(tokenize('12, MG Road - 560001')).toEqual(new Set(['12', 'mg', 'road', '560001']));
    });
});

describe('tokenOverlapRatio', () => {
    it('scores shared tokens against all tokens', () => {
        expect(tokenOverlapRatio('Ravi Kumar', 'RAVI KUMAR')).toBe(1);
        expect(tokenOverlapRatio('Ravi Kumar', 'Ravi Kumar Singh')).toBeCloseTo(2 / 3);
        expect(tokenOverlapRatio('José Álvarez', 'JOSÉ ÁLVAREZ')).toBe(1);
    });

    it('treats composed and decomposed accents alike', () => {
        expect(tokenOverlapRatio('Jose\u0301', 'Jos\u00e9')).toBe(1);
    });

    it('does not match different names in other scripts', () => {
        expect(tokenOverlapRatio('राम शर्मा', 'सीता देवी')).toBe(0);
        expect(tokenOverlapRatio('José', 'María')).toBe(0);
    });

    it('never matches text that has no tokens', () => {
        expect(tokenOverlapRatio('', '')).toBe(0);
        expect(tokenOverlapRatio('---', 'Ravi Kumar')).toBe(0);
    });
});
