import { afterEach, describe, expect, it, vi } from 'vitest';
import { isLogVerbose, setLogVerbose } from './log';
import { createSheetInterceptor, selectChangeObserver } from './sheetInterceptorPlugin';
import { mountSetup, type Mounted } from './testUtils';
import { legacyChangeObserver, nativeChangeObserver, useChangeObserver, type ChangeObserver } from './useChangeCompat';

describe('selectChangeObserver', () => {
    it('defaults to the native strategy', () => {
        expect(selectChangeObserver({})).toBe(nativeChangeObserver);
    });

    it('resolves the capability flag', () => {
        expect(selectChangeObserver({ reportsPreviousValue: false })).toBe(legacyChangeObserver);
        expect(selectChangeObserver({ reportsPreviousValue: true })).toBe(nativeChangeObserver);
    });

    it('lets an explicit strategy win over the flag', () => {
        expect(selectChangeObserver({ changeObserver: 'native', reportsPreviousValue: false })).toBe(nativeChangeObserver);
        const custom: ChangeObserver = { kind: 'legacy', observe: legacyChangeObserver.observe };
        expect(selectChangeObserver({ changeObserver: custom })).toBe(custom);
    });
});

describe('createSheetInterceptor', () => {
    let mounted: Mounted | null = null;
    afterEach(() => {
        mounted?.unmount();
        mounted = null;
        setLogVerbose(false);
    });

    it('provides the strategy to every component of the app', () => {
        const seen: ChangeObserver[] = [];
        mounted = mountSetup(() => {
            seen.push(useChangeObserver());
        }, [createSheetInterceptor({ reportsPreviousValue: false })]);
        expect(seen).toEqual([legacyChangeObserver]);
    });

    it('turns on verbose logging and reports the chosen strategy', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        mounted = mountSetup(() => {}, [createSheetInterceptor({ changeObserver: 'legacy', verbose: true })]);
        expect(isLogVerbose()).toBe(true);
        expect(log).toHaveBeenCalledWith('[Sheet] installed {"changeObserver":"legacy"}');
    });

    it('leaves logging alone when verbose is not set', () => {
        mounted = mountSetup(() => {}, [createSheetInterceptor()]);
        expect(isLogVerbose()).toBe(false);
    });
});
