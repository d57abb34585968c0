/* ----------------------------------------------------------------------------
| useBottomSheet.ts — Detent-aware Bottom Sheet (Vue 3)
| - Presentation detents with a bindable selection
| - Interactive dismissal (ESC/backdrop/drag) that content can disable
| - onBeforeClose veto, typed event emitter, stacked z-index
|---------------------------------------------------------------------------- */

import {
    computed,
    getCurrentInstance,
    getCurrentScope,
    hasInjectionContext,
    inject,
    onMounted,
    onScopeDispose,
    provide,
    ref,
    shallowRef,
    watch,
    type ComputedRef,
    type InjectionKey,
    type Ref,
} from 'vue';
import { errorMessage, logSheet, warnSheet } from './log';
import { Detent, detentHeight, isRenderableDetent, type PresentationDetent } from './presentationDetent';

/* -------------------------------- Types --------------------------------- */
export type CloseReason = 'programmatic' | 'backdrop' | 'esc' | 'drag';

const INTERACTIVE_REASONS: ReadonlySet<CloseReason> = new Set(['backdrop', 'esc', 'drag']);

export function isInteractiveReason(reason: CloseReason): boolean {
    return INTERACTIVE_REASONS.has(reason);
}

export interface BottomSheetHooks {
    onBeforeClose?: (reason: CloseReason) => boolean | Promise<boolean>;
    onOpen?: () => void;
    onClose?: (reason: CloseReason) => void;
    onDetentChange?: (detent: PresentationDetent, previous: PresentationDetent) => void;
    onDismissBlocked?: (reason: CloseReason) => void;
}

type EventMap = {
    open: void;
    close: { reason: CloseReason };
    detent: { detent: PresentationDetent; previous: PresentationDetent };
    dismissBlocked: { reason: CloseReason };
};
type Handler<K extends keyof EventMap> = (payload: EventMap[K]) => void;

function createEmitter() {
    const handlers: { [K in keyof EventMap]: Set<Handler<K>> } = {
        open: new Set(),
        close: new Set(),
        detent: new Set(),
        dismissBlocked: new Set(),
    };
    function on<K extends keyof EventMap>(event: K, handler: Handler<K>) {
        const set = handlers[event];
        set.add(handler);
        return () => {
            set.delete(handler);
        };
    }
    function off<K extends keyof EventMap>(event: K, handler: Handler<K>) {
        handlers[event].delete(handler);
    }
    function emit<K extends keyof EventMap>(event: K, payload: EventMap[K]) {
        handlers[event].forEach((h) => {
            try {
                h(payload);
            } catch (err) {
                warnSheet('listener failed', { event, error: errorMessage(err) });
            }
        });
    }
    return { on, off, emit };
}

interface Declaration {
    detents: ReadonlySet<PresentationDetent>;
    selection: Ref<PresentationDetent> | null;
}

export interface BottomSheetOptions extends BottomSheetHooks {
    /** Detents */
    detents?: Iterable<PresentationDetent>; // default ['large']
    initialDetent?: PresentationDetent; // default first declared detent

    /** Dismissal */
    closeOnEsc?: boolean; // default true
    closeOnBackdrop?: boolean; // default true
    interactiveDismissDisabled?: boolean; // default false

    /** Scroll */
    lockBodyScroll?: boolean; // default true

    /** Styling */
    autoInjectStyle?: boolean; // default true
    animationMs?: number; // default 220
    overlayMaxOpacity?: number; // default 0.4
    zIndexBase?: number; // default 1000
    baseStyles?: boolean; // default true
}

/**
 * What sheet content sees of the sheet presenting it.
 */
export interface SheetPresentation {
    readonly isOpen: Ref<boolean>;
    readonly currentDetent: ComputedRef<PresentationDetent>;
    readonly detents: ComputedRef<ReadonlySet<PresentationDetent>>;
    readonly isInteractiveDismissDisabled: ComputedRef<boolean>;
    /** Declares the detents the sheet may rest at, optionally bound to `selection`. Returns a release. */
    presentationDetents(detents: Iterable<PresentationDetent>, selection?: Ref<PresentationDetent>): () => void;
    /** Refuses ESC, backdrop and drag dismissal until released. */
    interactiveDismissDisabled(disabled?: boolean): () => void;
    selectDetent(detent: PresentationDetent): boolean;
    requestClose(reason: CloseReason): Promise<boolean>;
    close(reason?: CloseReason): void;
}

export const SHEET_PRESENTATION_KEY: InjectionKey<SheetPresentation> = Symbol('sheet-presentation');

/** The sheet presenting the calling component, if any. */
export function useSheetPresentation(): SheetPresentation | null {
    if (!hasInjectionContext()) return null;
    return inject(SHEET_PRESENTATION_KEY, null);
}

/* ------------------------------- Utils ---------------------------------- */
function callIfFn<T extends unknown[]>(name: string, fn: ((...args: T) => void) | undefined, ...args: T): void {
    if (typeof fn !== 'function') return;
    try {
        fn(...args);
    } catch (err) {
        warnSheet('hook failed', { hook: name, error: errorMessage(err) });
    }
}

function renderable(detents: Iterable<PresentationDetent>): Set<PresentationDetent> {
    const out = new Set<PresentationDetent>();
    for (const d of detents) {
        if (isRenderableDetent(d)) out.add(d);
        else warnSheet('dropping detent the sheet cannot render', { detent: d });
    }
    return out;
}

/* ------------------------------ Core CSS -------------------------------- */
const CORE_STYLE_ID = 'use-bottom-sheet-core-style';
const CORE_CSS = `
/* injected by useBottomSheet */
.bs-overlay {
  position: fixed; top: 0; right: 0; bottom: 0; left: 0;
  background: #000; opacity: 0; pointer-events: auto;
}

.bs-sheet {
  position: fixed; left: 0; right: 0; bottom: 0;
  background: #fff; border-top-left-radius: 16px; border-top-right-radius: 16px;
  box-shadow: 0 10px 30px rgba(0,0,0,.2);
  outline: none;
  display: flex; flex-direction: column;
  padding-bottom: calc(env(safe-area-inset-bottom, 0px) + 12px);
}

.bs-handle {
  width: 50px; height: 5px; border-radius: 999px; background: rgba(0,0,0,.15);
  margin: 8px auto 4px auto;
}
`;

function ensureCoreStyle(auto: boolean) {
    if (!auto) return;
    if (typeof document === 'undefined') return;
    if (document.getElementById(CORE_STYLE_ID)) return;
    const style = document.createElement('style');
    style.id = CORE_STYLE_ID;
    style.textContent = CORE_CSS;
    document.head.appendChild(style);
}

/* ----------------------------- Z-index stack ---------------------------- */
let STACK_COUNT = 0;

/* ------------------------------ Composable ------------------------------ */
export function useBottomSheet(opts: BottomSheetOptions = {}) {
    const {
        // Detents
        detents: initialDetents = [Detent.large],
        initialDetent,

        // Dismissal
        closeOnEsc = true,
        closeOnBackdrop = true,
        interactiveDismissDisabled: alwaysDisabled = false,

        // Scroll
        lockBodyScroll = true,

        // Styling
        autoInjectStyle = true,
        animationMs = 220,
        overlayMaxOpacity = 0.4,
        zIndexBase = 1000,
        baseStyles = true,

        // Hooks
        onBeforeClose,
        onOpen,
        onClose,
        onDetentChange,
        onDismissBlocked,
    } = opts;

    /* ----- Events ----- */
    const events = createEmitter();

    /* ----- State ----- */
    const isOpen = ref(false);
    const sheetRef = ref<HTMLElement | null>(null);
    const stackIndex = ref<number | null>(null);

    const declared = renderable(initialDetents);
    if (declared.size === 0) declared.add(Detent.large);
    const [firstDeclared = Detent.large] = declared;
    const ownSelection = ref<PresentationDetent>(initialDetent !== undefined && declared.has(initialDetent) ? initialDetent : firstDeclared);
    // Latest declaration wins; releasing one in the middle uncovers nothing.
    const declarations = shallowRef<readonly Declaration[]>([]);

    const dismissLocks = ref(0);

    let savedOverflow: string | null = null;

    const detents = computed<ReadonlySet<PresentationDetent>>(() => declarations.value.at(-1)?.detents ?? declared);
    const selection = computed(() => {
        for (let i = declarations.value.length - 1; i >= 0; i--) {
            const bound = declarations.value[i].selection;
            if (bound) return bound;
        }
        return ownSelection;
    });
    const currentDetent = computed(() => selection.value.value);
    const isInteractiveDismissDisabled = computed(() => alwaysDisabled || dismissLocks.value > 0);

    /* ----- Styles ----- */
    const baseZ = computed(() => zIndexBase + (stackIndex.value ?? 0) * 2);

    const sheetStyle = computed<Record<string, string>>(() => {
        const s: Record<string, string> = {
            height: detentHeight(currentDetent.value),
            transition: `height ${animationMs}ms ease`,
            zIndex: String(baseZ.value + 1),
        };
        if (baseStyles) {
            s.position = 'fixed';
            s.left = '0';
            s.right = '0';
            s.bottom = '0';
            s.background = '#fff';
            s.borderTopLeftRadius = '16px';
            s.borderTopRightRadius = '16px';
            s.boxShadow = '0 10px 30px rgba(0,0,0,.2)';
            s.outline = 'none';
            s.display = 'flex';
            s.flexDirection = 'column';
        }
        return s;
    });

    const overlayStyle = computed<Record<string, string>>(() => {
        const s: Record<string, string> = {
            opacity: String(isOpen.value ? overlayMaxOpacity : 0),
            transition: `opacity ${animationMs}ms ease`,
            zIndex: String(baseZ.value),
        };
        if (baseStyles) {
            s.position = 'fixed';
            s.left = '0';
            s.right = '0';
            s.top = '0';
            s.bottom = '0';
            s.background = '#000';
        }
        return s;
    });

    /* ----- Scroll lock ----- */
    function lockScroll() {
        if (typeof document === 'undefined' || savedOverflow !== null) return;
        savedOverflow = document.body.style.overflow;
        document.body.style.overflow = 'hidden';
    }
    function unlockScroll() {
        if (typeof document === 'undefined' || savedOverflow === null) return;
        document.body.style.overflow = savedOverflow;
        savedOverflow = null;
    }

    /* ----- Open/Close ----- */
    function open() {
        if (isOpen.value) return;
        isOpen.value = true;
        stackIndex.value = ++STACK_COUNT;
        logSheet('open', { detent: currentDetent.value });
        callIfFn('onOpen', onOpen);
        events.emit('open', undefined);
    }

    async function requestClose(reason: CloseReason): Promise<boolean> {
        if (!isOpen.value) return false;
        if (isInteractiveReason(reason) && isInteractiveDismissDisabled.value) {
            logSheet('interactive dismissal blocked', { reason, detent: currentDetent.value });
            callIfFn('onDismissBlocked', onDismissBlocked, reason);
            events.emit('dismissBlocked', { reason });
            return false;
        }
        if (onBeforeClose) {
            try {
                const ok = await onBeforeClose(reason);
                if (!ok) return false;
            } catch (err) {
                warnSheet('onBeforeClose failed, keeping sheet open', { reason, error: errorMessage(err) });
                return false;
            }
        }
        close(reason);
        return true;
    }

    function close(reason: CloseReason = 'programmatic') {
        if (!isOpen.value) return;
        isOpen.value = false;
        if (stackIndex.value !== null) {
            STACK_COUNT = Math.max(0, STACK_COUNT - 1);
            stackIndex.value = null;
        }
        logSheet('close', { reason });
        callIfFn('onClose', onClose, reason);
        events.emit('close', { reason });
    }

    function toggle(force?: boolean) {
        const next = typeof force === 'boolean' ? force : !isOpen.value;
        if (next) open();
        else void requestClose('programmatic');
    }

    /* ----- Detent API ----- */
    function presentationDetents(list: Iterable<PresentationDetent>, bound?: Ref<PresentationDetent>) {
        const next = renderable(list);
        if (next.size === 0) {
            warnSheet('no renderable detents declared, keeping current ones');
            return () => {};
        }
        const declaration: Declaration = { detents: next, selection: bound ?? null };
        declarations.value = [...declarations.value, declaration];
        if (!next.has(currentDetent.value)) {
            warnSheet('selected detent is not among the declared detents', { detent: currentDetent.value });
        }
        return () => {
            declarations.value = declarations.value.filter((d) => d !== declaration);
        };
    }

    function interactiveDismissDisabled(disabled = true) {
        if (!disabled) return () => {};
        dismissLocks.value++;
        let released = false;
        return () => {
            if (released) return;
            released = true;
            dismissLocks.value = Math.max(0, dismissLocks.value - 1);
        };
    }

    function selectDetent(detent: PresentationDetent): boolean {
        if (!detents.value.has(detent)) {
            warnSheet('ignoring undeclared detent', { detent });
            return false;
        }
        selection.value.value = detent;
        return true;
    }

    // Post flush: content watchers (an interceptor's rollback) settle the detent first.
    let reported = currentDetent.value;
    watch(
        currentDetent,
        (detent) => {
            if (detent === reported) return;
            const previous = reported;
            reported = detent;
            logSheet('detent', { detent, previous });
            callIfFn('onDetentChange', onDetentChange, detent, previous);
            events.emit('detent', { detent, previous });
        },
        { flush: 'post' },
    );

    /* ----- DOM handlers ----- */
    function onKeydown(e: KeyboardEvent) {
        if (!isOpen.value || !closeOnEsc || e.key !== 'Escape') return;
        e.preventDefault();
        void requestClose('esc');
    }

    function onOverlayClick() {
        if (closeOnBackdrop) void requestClose('backdrop');
    }

    /* ----- Lifecycle ----- */
    const instance = getCurrentInstance();
    if (instance) {
        onMounted(() => {
            ensureCoreStyle(autoInjectStyle);
            document.addEventListener('keydown', onKeydown);
        });
    }

    if (getCurrentScope()) {
        onScopeDispose(() => {
            if (typeof document !== 'undefined') document.removeEventListener('keydown', onKeydown);
            unlockScroll();
            if (stackIndex.value !== null) {
                STACK_COUNT = Math.max(0, STACK_COUNT - 1);
                stackIndex.value = null;
            }
        });
    }

    watch(isOpen, (opened) => {
        if (opened && lockBodyScroll) lockScroll();
        else unlockScroll();
    });

    /* ----- Bind helpers ----- */
    const bindOverlay = () => ({
        class: 'bs-overlay',
        style: overlayStyle.value,
        onClick: onOverlayClick,
    });

    const bindSheet = () => ({
        ref: sheetRef,
        class: 'bs-sheet',
        style: sheetStyle.value,
        role: 'dialog' as const,
        'aria-modal': 'true',
        'data-open': String(isOpen.value),
        'data-detent': currentDetent.value,
        tabIndex: -1,
    });

    const presentation: SheetPresentation = {
        isOpen,
        currentDetent,
        detents,
        isInteractiveDismissDisabled,
        presentationDetents,
        interactiveDismissDisabled,
        selectDetent,
        requestClose,
        close,
    };
    if (instance) provide(SHEET_PRESENTATION_KEY, presentation);

    /* ----- Expose ----- */
    return {
        /** state */
        isOpen,
        sheetRef,
        detents,
        currentDetent,
        isInteractiveDismissDisabled,
        sheetStyle,
        overlayStyle,

        /** actions */
        open,
        toggle,
        close: () => requestClose('programmatic'),
        closeNow: close,
        requestClose,

        /** detent api */
        presentationDetents,
        interactiveDismissDisabled,
        selectDetent,

        /** handlers */
        onKeydown,
        onOverlayClick,

        bindOverlay,
        bindSheet,

        /** content-facing view */
        presentation,

        /** events */
        events,
    };
}

export type BottomSheet = ReturnType<typeof useBottomSheet>;
