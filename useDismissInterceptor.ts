/* ----------------------------------------------------------------------------
| useDismissInterceptor.ts — veto drag-to-dismiss on sheet content (Vue 3)
| - Declares the sheet's detents and owns the selected one
| - Reaching the threshold detent snaps back and calls onIntercept
| - Interactive dismissal is disabled while applied
|---------------------------------------------------------------------------- */

import { getCurrentScope, nextTick, onScopeDispose, ref, type Ref, type WatchStopHandle } from 'vue';
import { logIntercept, warnSheet } from './log';
import type { PresentationDetent } from './presentationDetent';
import { onChangeCompat, type ChangeObserver } from './useChangeCompat';
import { useSheetPresentation, type SheetPresentation } from './useBottomSheet';

/* -------------------------------- Config -------------------------------- */
export interface DismissInterceptorConfig {
    readonly thresholdDetent: PresentationDetent;
    readonly defaultDetent: PresentationDetent;
    /** Always holds both the threshold and the default detent. Each read is a fresh copy. */
    readonly availableDetents: ReadonlySet<PresentationDetent>;
}

export function createDismissInterceptorConfig(
    thresholdDetent: PresentationDetent,
    defaultDetent: PresentationDetent,
    other: Iterable<PresentationDetent> = [],
): DismissInterceptorConfig {
    const available = new Set<PresentationDetent>(other);
    available.add(thresholdDetent);
    available.add(defaultDetent);
    return Object.freeze({
        thresholdDetent,
        defaultDetent,
        get availableDetents(): ReadonlySet<PresentationDetent> {
            return new Set(available);
        },
    });
}

export interface DetentResolution {
    detent: PresentationDetent;
    intercepted: boolean;
}

export function resolveDetentChange(config: DismissInterceptorConfig, previous: PresentationDetent, current: PresentationDetent): DetentResolution {
    if (current === config.thresholdDetent) return { detent: previous, intercepted: true };
    return { detent: current, intercepted: false };
}

/* ------------------------------ Composable ------------------------------ */
export type Schedule = (task: () => void) => void;

/** Runs the task after the current flush, rollback render included. Not cancellable. */
export const scheduleAfterFlush: Schedule = (task) => {
    void nextTick(task);
};

export interface DismissInterceptorOptions {
    /** Sheet to decorate. Defaults to the one presenting the calling component. */
    sheet?: SheetPresentation | null;
    /** Defaults to the strategy provided by the app. */
    observer?: ChangeObserver;
    schedule?: Schedule; // default scheduleAfterFlush
}

export interface DismissInterceptor {
    readonly config: DismissInterceptorConfig;
    readonly currentDetent: Ref<PresentationDetent>;
    readonly sheet: SheetPresentation | null;
    /** Undoes the decoration; also runs when the owning scope is disposed. */
    stop: () => void;
}

/**
 * Intercepts attempts to drag the presenting sheet to `config.thresholdDetent`.
 *
 * The selection snaps back to the detent it came from and `onIntercept` runs on the next tick,
 * so a confirmation ("discard unsaved changes?") can decide whether to close the sheet.
 *
 * @example
 * ```ts
 * const isAlertPresented = ref(false);
 * useDismissInterceptor(
 *     createDismissInterceptorConfig(Detent.height(300), Detent.large, [Detent.medium]),
 *     () => (isAlertPresented.value = true),
 * );
 * ```
 */
export function useDismissInterceptor(config: DismissInterceptorConfig, onIntercept: () => void, opts: DismissInterceptorOptions = {}): DismissInterceptor {
    const { observer, schedule = scheduleAfterFlush } = opts;
    const sheet = opts.sheet === undefined ? useSheetPresentation() : opts.sheet;

    const currentDetent = ref<PresentationDetent>(config.defaultDetent);
    const releases: Array<() => void> = [];

    if (sheet) {
        releases.push(sheet.presentationDetents(config.availableDetents, currentDetent));
        releases.push(sheet.interactiveDismissDisabled(true));
    } else {
        warnSheet('dismiss interceptor has no sheet to decorate', { detent: config.defaultDetent });
    }

    const stopObserving: WatchStopHandle = onChangeCompat(
        currentDetent,
        (previous, current) => {
            const { detent, intercepted } = resolveDetentChange(config, previous, current);
            if (!intercepted) return;
            currentDetent.value = detent;
            logIntercept('threshold reached, snapping back', { detent, threshold: current });
            schedule(onIntercept);
        },
        observer,
    );

    let stopped = false;
    function stop() {
        if (stopped) return;
        stopped = true;
        stopObserving();
        releases.forEach((release) => release());
    }
    if (getCurrentScope()) onScopeDispose(stop);

    return { config, currentDetent, sheet, stop };
}
