import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { errorMessage, isLogVerbose, logIntercept, logSheet, setLogVerbose, warnSheet } from './log';

describe('log', () => {
    let logCalls: string[] = [];

    beforeEach(() => {
        logCalls = [];
        vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
            logCalls.push(args.map(String).join(' '));
        });
    });
    afterEach(() => {
        setLogVerbose(false);
    });

    it('stays quiet unless verbose', () => {
        logSheet('open', { detent: 'large' });
        logIntercept('threshold reached');
        expect(isLogVerbose()).toBe(false);
        expect(logCalls).toEqual([]);
    });

    it('prefixes messages and appends the payload as json', () => {
        setLogVerbose(true);
        logSheet('open', { detent: 'large' });
        logIntercept('threshold reached', { detent: 'medium', threshold: 'height:300' });
        expect(logCalls).toEqual(['[Sheet] open {"detent":"large"}', '[Intercept] threshold reached {"detent":"medium","threshold":"height:300"}']);
    });

    it('omits an empty payload', () => {
        setLogVerbose(true);
        logSheet('close', {});
        expect(logCalls).toEqual(['[Sheet] close']);
    });

    it('always prints warnings', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        warnSheet('ignoring undeclared detent', { detent: 'medium' });
        expect(warn).toHaveBeenCalledWith('[Sheet] ignoring undeclared detent {"detent":"medium"}');
    });
});

describe('errorMessage', () => {
    it('reads errors and stringifies the rest', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom');
        expect(errorMessage('plain')).toBe('plain');
        expect(errorMessage(42)).toBe('42');
    });
});
