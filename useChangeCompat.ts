/*
|----------------------------------------------------------------------------
| useChangeCompat.ts — (previous, current) change observation
| - native: Vue watch, previous is the value right before the change
| - legacy: previous is the value captured when observation started
|----------------------------------------------------------------------------
*/

import { hasInjectionContext, inject, toValue, watch, type InjectionKey, type MaybeRefOrGetter, type WatchStopHandle } from 'vue';

export type ChangeHandler<V> = (previous: V, current: V) => void;
export type ChangeObserverKind = 'native' | 'legacy';

export interface ChangeObserver {
    readonly kind: ChangeObserverKind;
    observe<V>(source: MaybeRefOrGetter<V>, handler: ChangeHandler<V>): WatchStopHandle;
}

export const CHANGE_OBSERVER_KEY: InjectionKey<ChangeObserver> = Symbol('change-observer');

export const nativeChangeObserver: ChangeObserver = {
    kind: 'native',
    observe(source, handler) {
        return watch(
            () => toValue(source),
            (current, previous) => handler(previous, current),
        );
    },
};

/**
 * Emulated previous value for hosts whose change notification only carries the new value.
 *
 * The baseline is the value seen when observation started and it is never advanced, so from
 * the second change on `previous` is stale: `v0 -> v1 -> v2` reports `(v0, v1)` then `(v0, v2)`.
 */
export class FixedBaselineObserver<V> {
    constructor(
        readonly baseline: V,
        private readonly handler: ChangeHandler<V>,
    ) {}

    notify(current: V): void {
        this.handler(this.baseline, current);
    }
}

export const legacyChangeObserver: ChangeObserver = {
    kind: 'legacy',
    observe(source, handler) {
        const emulation = new FixedBaselineObserver(toValue(source), handler);
        return watch(
            () => toValue(source),
            (current) => emulation.notify(current),
        );
    },
};

export interface ChangeObserverCapabilities {
    /** The host hands the previous value to change callbacks. */
    reportsPreviousValue: boolean;
}

export function resolveChangeObserver(capabilities: ChangeObserverCapabilities): ChangeObserver {
    return capabilities.reportsPreviousValue ? nativeChangeObserver : legacyChangeObserver;
}

export function changeObserverOf(kind: ChangeObserverKind): ChangeObserver {
    return kind === 'legacy' ? legacyChangeObserver : nativeChangeObserver;
}

/** Strategy provided by the app, or the native one. */
export function useChangeObserver(): ChangeObserver {
    if (!hasInjectionContext()) return nativeChangeObserver;
    return inject(CHANGE_OBSERVER_KEY, nativeChangeObserver);
}

/**
 * Calls `handler(previous, current)` once per change of `source`.
 * Stops with the component or effect scope it was called in.
 */
export function onChangeCompat<V>(source: MaybeRefOrGetter<V>, handler: ChangeHandler<V>, observer?: ChangeObserver): WatchStopHandle {
    const strategy = observer ?? useChangeObserver();
    return strategy.observe(source, handler);
}
