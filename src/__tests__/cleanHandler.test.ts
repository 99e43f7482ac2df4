import { describe, test, expect, jest, beforeEach, afterEach } from '@jest/globals';

import { cleanEditorContent } from '../cleanHandler';
import logger from '../logger';
import { FakeEditorHost } from './fakeEditorHost';

const SELECTION = '<span class="MsoNormal" style="margin:0cm">Hello</span>&nbsp;<span>World</span>';
const WORD_DOCUMENT = '<p class="MsoNormal">&nbsp;</p><p>Keep me</p>';

describe('cleanEditorContent', () => {
    let warnSpy: jest.SpiedFunction<(...args: unknown[]) => void>;

    beforeEach(() => {
        warnSpy = jest
            .spyOn(logger as unknown as { warn: (...args: unknown[]) => void }, 'warn')
            .mockImplementation(() => undefined);
    });

    afterEach(() => {
        warnSpy.mockRestore();
    });

    test('cleans only the selection when one is present', () => {
        const host = new FakeEditorHost(WORD_DOCUMENT, SELECTION);

        const outcome = cleanEditorContent(host);

        expect(outcome).toEqual({ scope: 'selection', changed: true, selectionFallback: false });
        expect(host.replacedSelections).toEqual(['Hello World']);
        expect(host.documentWrites).toEqual([]);
    });

    test('cleans the whole document when the cursor is collapsed', () => {
        const host = new FakeEditorHost(WORD_DOCUMENT);

        const outcome = cleanEditorContent(host);

        expect(outcome).toEqual({ scope: 'document', changed: true, selectionFallback: false });
        expect(host.documentWrites).toEqual(['<p>Keep me</p>']);
        expect(host.replacedSelections).toEqual([]);
    });

    test('does not touch the host when the document is already clean', () => {
        const host = new FakeEditorHost('<p>Already <em>clean</em></p>');

        const outcome = cleanEditorContent(host);

        expect(outcome).toEqual({ scope: 'document', changed: false, selectionFallback: false });
        expect(host.documentWrites).toEqual([]);
    });

    test('does not touch the host when the selection is already clean', () => {
        const host = new FakeEditorHost(WORD_DOCUMENT, '<strong>clean</strong>');

        const outcome = cleanEditorContent(host);

        expect(outcome).toEqual({ scope: 'selection', changed: false, selectionFallback: false });
        expect(host.replacedSelections).toEqual([]);
        expect(host.documentWrites).toEqual([]);
    });

    test('falls back to the whole document when the selection cannot be read', () => {
        const host = new FakeEditorHost(WORD_DOCUMENT, SELECTION);
        host.selectionError = new Error('cannot stringify');

        const outcome = cleanEditorContent(host);

        expect(outcome).toEqual({ scope: 'document', changed: true, selectionFallback: true });
        expect(host.documentWrites).toEqual(['<p>Keep me</p>']);
        expect(warnSpy).toHaveBeenCalledWith(
            'Failed to read selected content; cleaning the whole document instead',
            host.selectionError
        );
    });

    test('falls back to the whole document when the host returns no selection HTML', () => {
        const host = new FakeEditorHost(WORD_DOCUMENT);
        host.unavailableSelection = true;

        const outcome = cleanEditorContent(host);

        expect(outcome).toEqual({ scope: 'document', changed: true, selectionFallback: true });
        expect(host.documentWrites).toEqual(['<p>Keep me</p>']);
    });

    test('falls back to the whole document when replacing the selection fails', () => {
        const host = new FakeEditorHost(WORD_DOCUMENT, SELECTION);
        host.replaceError = new Error('schema rejected content');

        const outcome = cleanEditorContent(host);

        expect(outcome).toEqual({ scope: 'document', changed: true, selectionFallback: true });
        expect(host.replacedSelections).toEqual([]);
        expect(host.documentWrites).toEqual(['<p>Keep me</p>']);
    });
});
