import { describe, test, expect } from '@jest/globals';

import { countNbspEntities, normalizeNbspEntities, normalizeNbspText } from '../html/pre/normalizeEntities';
import { parseFragment } from '../html/shared/parser';

describe('non-breaking space normalization', () => {
    test('replaces the named entity and the literal character', () => {
        expect(normalizeNbspEntities('a&nbsp;b')).toBe('a b');
        expect(normalizeNbspEntities('a\u00A0b')).toBe('a b');
    });

    test('replaces decimal and hexadecimal character references', () => {
        expect(normalizeNbspEntities('a&#160;b&#0160;c&#xA0;d&#xa0;e&#X00A0;f')).toBe('a b c d e f');
    });

    test('leaves other references and escaped entity text alone', () => {
        const html = '<p>&#1600; &amp;nbsp; &#xA00; &lt;b&gt;</p>';
        expect(normalizeNbspEntities(html)).toBe(html);
        expect(countNbspEntities(html)).toBe(0);
    });

    test('counts every replacement', () => {
        expect(countNbspEntities('<p>&nbsp;&nbsp;</p><p>\u00A0x&#160;</p>')).toBe(4);
    });

    test('returns empty and non-string input unchanged', () => {
        expect(normalizeNbspEntities('')).toBe('');
        expect(normalizeNbspEntities(undefined as unknown as string)).toBeUndefined();
        expect(countNbspEntities('')).toBe(0);
    });

    test('normalizes text nodes of an already parsed tree', () => {
        const root = parseFragment('<p>one&nbsp;two</p><p>three</p><p><b>\u00A0</b></p>');
        expect(normalizeNbspText(root)).toBe(2);
        expect(root.innerHTML).toBe('<p>one two</p><p>three</p><p><b> </b></p>');
    });
});
