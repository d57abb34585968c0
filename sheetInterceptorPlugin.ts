/*
|----------------------------------------------------------------------------
| sheetInterceptorPlugin.ts — app-wide setup, resolved once at startup
|----------------------------------------------------------------------------
*/

import type { App, Plugin } from 'vue';
import { logSheet, setLogVerbose } from './log';
import { CHANGE_OBSERVER_KEY, changeObserverOf, resolveChangeObserver, type ChangeObserver, type ChangeObserverKind } from './useChangeCompat';

export interface SheetInterceptorOptions {
    /** Strategy for `onChangeCompat`. Wins over `reportsPreviousValue`. */
    changeObserver?: ChangeObserverKind | ChangeObserver;
    /** Capability flag; `false` selects the fixed-baseline emulation. */
    reportsPreviousValue?: boolean;
    verbose?: boolean; // default false
}

export function selectChangeObserver(opts: SheetInterceptorOptions): ChangeObserver {
    const { changeObserver, reportsPreviousValue } = opts;
    if (typeof changeObserver === 'string') return changeObserverOf(changeObserver);
    if (changeObserver) return changeObserver;
    return resolveChangeObserver({ reportsPreviousValue: reportsPreviousValue ?? true });
}

export function createSheetInterceptor(opts: SheetInterceptorOptions = {}): Plugin {
    const observer = selectChangeObserver(opts);
    return {
        install(app: App) {
            if (opts.verbose !== undefined) setLogVerbose(opts.verbose);
            app.provide(CHANGE_OBSERVER_KEY, observer);
            logSheet('installed', { changeObserver: observer.kind });
        },
    };
}
